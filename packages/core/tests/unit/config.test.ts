import { describe, it, expect } from "vitest";
import {
  DEFAULT_PORT,
  DEFAULT_SINK_ADDRESS,
  loadLedgerConfig,
  parseBootstrapTokens,
} from "../../src/config.js";
import { ADMIN, ENGINE, SPONSOR } from "../fixtures.js";

const TOKEN = "led_test_abcdefghijkmnopqrstuvwxy";
const OPERATOR_KEY = `0x${"22".repeat(32)}`;

describe("loadLedgerConfig", () => {
  it("applies defaults around a required admin", () => {
    expect(loadLedgerConfig({ LEDGER_ADMIN_ADDRESS: ADMIN })).toEqual({
      ok: true,
      config: {
        port: DEFAULT_PORT,
        admin: ADMIN,
        engine: undefined,
        sink: { kind: "memory", address: DEFAULT_SINK_ADDRESS },
        registryFile: undefined,
        auth: { enabled: true },
        bootstrapTokens: [],
      },
    });
  });

  it("reads every setting", () => {
    const result = loadLedgerConfig({
      PORT: "8080",
      LEDGER_ADMIN_ADDRESS: ADMIN.toLowerCase(),
      LEDGER_ENGINE_ADDRESS: ENGINE,
      ASSET_REGISTRY_FILE: "./assets.json",
      AUTH_ENABLED: "false",
      LEDGER_TOKENS: `${TOKEN}=${SPONSOR}`,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.config).toMatchObject({
      port: 8080,
      admin: ADMIN,
      engine: ENGINE,
      registryFile: "./assets.json",
      auth: { enabled: false },
      bootstrapTokens: [{ token: TOKEN, address: SPONSOR }],
    });
  });

  it("collects every problem", () => {
    expect(
      loadLedgerConfig({
        PORT: "70000",
        LEDGER_ENGINE_ADDRESS: "0x1234",
      })
    ).toEqual({
      ok: false,
      errors: [
        "PORT must be between 1 and 65535, got 70000",
        "LEDGER_ADMIN_ADDRESS is required and must be a non-zero address",
        "LEDGER_ENGINE_ADDRESS is not a valid address",
      ],
    });
  });

  it("rejects an unknown sink kind", () => {
    expect(
      loadLedgerConfig({ LEDGER_ADMIN_ADDRESS: ADMIN, LEDGER_SINK: "ipfs" })
    ).toEqual({
      ok: false,
      errors: ['LEDGER_SINK must be "memory" or "evm", got ipfs'],
    });
  });

  it("rejects an invalid sink address", () => {
    expect(
      loadLedgerConfig({ LEDGER_ADMIN_ADDRESS: ADMIN, LEDGER_SINK_ADDRESS: "nope" })
    ).toEqual({
      ok: false,
      errors: ["LEDGER_SINK_ADDRESS is not a valid address"],
    });
  });

  describe("evm sink", () => {
    it("requires an RPC URL and operator key", () => {
      expect(
        loadLedgerConfig({ LEDGER_ADMIN_ADDRESS: ADMIN, LEDGER_SINK: "evm" })
      ).toEqual({
        ok: false,
        errors: [
          "EVM_RPC_URL is required when LEDGER_SINK=evm",
          "LEDGER_OPERATOR_PRIVATE_KEY must be a 0x-prefixed 32-byte hex key",
        ],
      });
    });

    it("rejects unsupported networks", () => {
      const result = loadLedgerConfig({
        LEDGER_ADMIN_ADDRESS: ADMIN,
        LEDGER_SINK: "evm",
        EVM_NETWORK: "dogechain",
        EVM_RPC_URL: "http://localhost:8545",
        LEDGER_OPERATOR_PRIVATE_KEY: OPERATOR_KEY,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^EVM_NETWORK dogechain is not supported/);
    });

    it("defaults to base-sepolia", () => {
      const result = loadLedgerConfig({
        LEDGER_ADMIN_ADDRESS: ADMIN,
        LEDGER_SINK: "evm",
        EVM_RPC_URL: "http://localhost:8545",
        LEDGER_OPERATOR_PRIVATE_KEY: OPERATOR_KEY,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.config.sink).toEqual({
        kind: "evm",
        address: DEFAULT_SINK_ADDRESS,
        network: "base-sepolia",
        rpcUrl: "http://localhost:8545",
        operatorPrivateKey: OPERATOR_KEY,
      });
    });
  });
});

describe("parseBootstrapTokens", () => {
  it("parses comma-separated pairs", () => {
    const errors: string[] = [];

    expect(parseBootstrapTokens(` ${TOKEN}=${SPONSOR.toLowerCase()} ,`, errors)).toEqual([
      { token: TOKEN, address: SPONSOR },
    ]);
    expect(errors).toEqual([]);
  });

  it("reports bad pairs without echoing the address", () => {
    const errors: string[] = [];

    expect(parseBootstrapTokens(`bad=${SPONSOR}`, errors)).toEqual([]);
    expect(errors).toEqual(["LEDGER_TOKENS entry is not token=address: bad=..."]);
  });

  it("returns nothing for an empty value", () => {
    expect(parseBootstrapTokens(undefined, [])).toEqual([]);
    expect(parseBootstrapTokens("  ", [])).toEqual([]);
  });
});
