import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeEach } from "vitest";
import {
  InMemoryEligibilityRegistry,
  loadRegistryFile,
  registryFromJson,
} from "../../src/registry/memory.js";
import {
  fromRawEligibility,
  isEligible,
  normalizeCap,
} from "../../src/registry/interface.js";
import { ASSET_A, ASSET_B, UNLISTED_ASSET } from "../fixtures.js";

const ASSETS_FILE = fileURLToPath(new URL("../data/assets.json", import.meta.url));

describe("InMemoryEligibilityRegistry", () => {
  let registry: InMemoryEligibilityRegistry;

  beforeEach(() => {
    registry = new InMemoryEligibilityRegistry();
  });

  it("lists an asset with defaults", () => {
    registry.list(ASSET_A);

    expect(registry.lookup(ASSET_A)).toEqual({
      listed: true,
      enabled: true,
      decimals: 18,
      unitsPerReferenceAmount: 1n,
      capUnits: null,
    });
    expect(registry.assetIds()).toEqual([ASSET_A]);
  });

  it("returns undefined for an unlisted asset", () => {
    expect(registry.lookup(UNLISTED_ASSET)).toBeUndefined();
  });

  it("returns copies that cannot change the registry", () => {
    registry.list(ASSET_A);
    const entry = registry.lookup(ASSET_A);
    if (entry) entry.enabled = false;

    expect(registry.lookup(ASSET_A)?.enabled).toBe(true);
  });

  it("updates enabled flag and cap", () => {
    registry.list(ASSET_A, { capUnits: 100n });
    registry.setEnabled(ASSET_A, false);
    registry.setCap(ASSET_A, null);

    expect(registry.lookup(ASSET_A)).toMatchObject({ enabled: false, capUnits: null });
  });

  it("delists an asset", () => {
    registry.list(ASSET_A);
    registry.delist(ASSET_A);

    const entry = registry.lookup(ASSET_A);
    expect(entry).toMatchObject({ listed: false, enabled: false });
    expect(isEligible(entry)).toBe(false);
  });

  it("refuses updates to unknown assets", () => {
    expect(() => registry.setCap(UNLISTED_ASSET, 1n)).toThrow(
      `Asset not listed: ${UNLISTED_ASSET}`
    );
  });
});

describe("eligibility helpers", () => {
  it("treats a zero cap as uncapped", () => {
    expect(normalizeCap(0n)).toBeNull();
    expect(normalizeCap(25n)).toBe(25n);
    expect(
      fromRawEligibility({
        listed: true,
        enabled: true,
        decimals: 6,
        unitsPerReferenceAmount: 1n,
        capUnits: 0n,
      }).capUnits
    ).toBeNull();
  });

  it("requires an asset to be listed and enabled", () => {
    const base = {
      decimals: 6,
      unitsPerReferenceAmount: 1n,
      capUnits: null,
    };
    expect(isEligible(undefined)).toBe(false);
    expect(isEligible({ ...base, listed: true, enabled: true })).toBe(true);
    expect(isEligible({ ...base, listed: true, enabled: false })).toBe(false);
    expect(isEligible({ ...base, listed: false, enabled: true })).toBe(false);
  });
});

describe("registryFromJson", () => {
  it("parses entries with string amounts", () => {
    const registry = registryFromJson({
      assets: [
        {
          asset: ASSET_A.toLowerCase(),
          decimals: 6,
          unitsPerReferenceAmount: "1000000",
          capUnits: "250",
        },
      ],
    });

    expect(registry.lookup(ASSET_A)).toEqual({
      listed: true,
      enabled: true,
      decimals: 6,
      unitsPerReferenceAmount: 1_000_000n,
      capUnits: 250n,
    });
  });

  it("rejects a document without an assets array", () => {
    expect(() => registryFromJson({})).toThrow(
      'Asset registry must contain an "assets" array'
    );
    expect(() => registryFromJson(null)).toThrow(
      'Asset registry must contain an "assets" array'
    );
  });

  it("rejects malformed entries", () => {
    expect(() => registryFromJson({ assets: ["nope"] })).toThrow(
      "Asset registry entry 0 is not an object"
    );
    expect(() => registryFromJson({ assets: [{ asset: "0x1234" }] })).toThrow(
      "Asset registry entry 0 has an invalid address"
    );
    expect(() =>
      registryFromJson({ assets: [{ asset: ASSET_A, capUnits: "-1" }] })
    ).toThrow("Asset registry entry 0 has an invalid amount");
  });

  it("loads a registry file", async () => {
    const registry = await loadRegistryFile(ASSETS_FILE);

    expect(registry.assetIds()).toEqual([ASSET_A, ASSET_B]);
    expect(registry.lookup(ASSET_A)?.capUnits).toBe(500_000_000n);
    expect(registry.lookup(ASSET_B)).toMatchObject({ enabled: false, capUnits: null });
  });
});
