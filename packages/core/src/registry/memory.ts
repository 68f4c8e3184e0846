import { readFile } from "node:fs/promises";
import type { Address } from "viem";
import { normalizeAddress, parseUnits } from "../address.js";
import type { AssetId } from "../types.js";
import {
  fromRawEligibility,
  type AssetEligibility,
  type EligibilityRegistry,
} from "./interface.js";

export interface ListAssetInput {
  enabled?: boolean;
  decimals?: number;
  unitsPerReferenceAmount?: bigint;
  /** Omit or pass null for an uncapped asset. */
  capUnits?: bigint | null;
}

/**
 * In-memory eligibility registry
 * Suitable for development, tests and file-backed deployments
 */
export class InMemoryEligibilityRegistry implements EligibilityRegistry {
  private assets = new Map<AssetId, AssetEligibility>();

  lookup(asset: AssetId): AssetEligibility | undefined {
    const entry = this.assets.get(asset);
    return entry ? { ...entry } : undefined;
  }

  list(asset: Address, input: ListAssetInput = {}): AssetEligibility {
    const entry: AssetEligibility = {
      listed: true,
      enabled: input.enabled ?? true,
      decimals: input.decimals ?? 18,
      unitsPerReferenceAmount: input.unitsPerReferenceAmount ?? 1n,
      capUnits: input.capUnits ?? null,
    };
    this.assets.set(asset, entry);
    return entry;
  }

  setEnabled(asset: AssetId, enabled: boolean): void {
    this.update(asset, { enabled });
  }

  setCap(asset: AssetId, capUnits: bigint | null): void {
    this.update(asset, { capUnits });
  }

  delist(asset: AssetId): void {
    this.update(asset, { listed: false, enabled: false });
  }

  assetIds(): AssetId[] {
    return Array.from(this.assets.keys());
  }

  private update(asset: AssetId, data: Partial<AssetEligibility>): void {
    const entry = this.assets.get(asset);
    if (!entry) {
      throw new Error(`Asset not listed: ${asset}`);
    }
    this.assets.set(asset, { ...entry, ...data });
  }
}

/**
 * Build a registry from parsed JSON.
 *
 * Expected shape:
 * ```json
 * { "assets": [{ "asset": "0x...", "enabled": true, "decimals": 6,
 *                "unitsPerReferenceAmount": "1", "capUnits": "0" }] }
 * ```
 * `capUnits` of "0" means uncapped.
 */
export function registryFromJson(data: unknown): InMemoryEligibilityRegistry {
  const registry = new InMemoryEligibilityRegistry();
  const assets =
    typeof data === "object" && data !== null && "assets" in data
      ? data.assets
      : undefined;

  if (!Array.isArray(assets)) {
    throw new Error('Asset registry must contain an "assets" array');
  }

  assets.forEach((item: unknown, index) => {
    if (typeof item !== "object" || item === null) {
      throw new Error(`Asset registry entry ${index} is not an object`);
    }
    const entry: Record<string, unknown> = { ...item };
    const asset = normalizeAddress(
      typeof entry.asset === "string" ? entry.asset : undefined
    );
    if (!asset) {
      throw new Error(`Asset registry entry ${index} has an invalid address`);
    }

    const capUnits = parseUnits(entry.capUnits ?? "0");
    const unitsPerReferenceAmount = parseUnits(
      entry.unitsPerReferenceAmount ?? "1"
    );
    if (capUnits === undefined || unitsPerReferenceAmount === undefined) {
      throw new Error(`Asset registry entry ${index} has an invalid amount`);
    }

    const eligibility = fromRawEligibility({
      listed: true,
      enabled: entry.enabled !== false,
      decimals: typeof entry.decimals === "number" ? entry.decimals : 18,
      unitsPerReferenceAmount,
      capUnits,
    });
    registry.list(asset, eligibility);
  });

  return registry;
}

export async function loadRegistryFile(
  path: string
): Promise<InMemoryEligibilityRegistry> {
  const contents = await readFile(path, "utf8");
  return registryFromJson(JSON.parse(contents));
}
