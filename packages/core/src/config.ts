import type { Address, Hex } from "viem";
import { normalizeAddress } from "./address.js";
import { createAuthConfig, type AuthConfig } from "./auth/config.js";
import { validateTokenFormat } from "./auth/tokens.js";
import { SUPPORTED_EVM_NETWORKS } from "./sink/evm.js";

// ============================================================================
// Types
// ============================================================================

export type SinkConfig =
  | { kind: "memory"; address: Address }
  | {
      kind: "evm";
      address: Address;
      network: string;
      rpcUrl: string;
      operatorPrivateKey: Hex;
    };

export interface BootstrapToken {
  token: string;
  address: Address;
}

export interface LedgerConfig {
  port: number;
  admin: Address;
  engine: Address | undefined;
  sink: SinkConfig;
  registryFile: string | undefined;
  auth: AuthConfig;
  bootstrapTokens: BootstrapToken[];
}

export type ConfigResult =
  | { ok: true; config: LedgerConfig }
  | { ok: false; errors: string[] };

type Env = Record<string, string | undefined>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_PORT = 4030;

/** Conventional burn address used by the in-memory sink. */
export const DEFAULT_SINK_ADDRESS: Address =
  "0x000000000000000000000000000000000000dEaD";

const DEFAULT_EVM_NETWORK = "base-sepolia";

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse comma-separated `token=address` pairs.
 */
export function parseBootstrapTokens(
  value: string | undefined,
  errors: string[]
): BootstrapToken[] {
  if (!value?.trim()) return [];

  const tokens: BootstrapToken[] = [];
  for (const pair of value.split(",").map((p) => p.trim()).filter(Boolean)) {
    const [token = "", rawAddress] = pair.split("=").map((p) => p.trim());
    const address = normalizeAddress(rawAddress);
    if (!validateTokenFormat(token) || !address) {
      errors.push(`LEDGER_TOKENS entry is not token=address: ${pair.split("=")[0]}=...`);
      continue;
    }
    tokens.push({ token, address });
  }
  return tokens;
}

function parsePort(value: string | undefined, errors: string[]): number {
  if (!value) return DEFAULT_PORT;
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    errors.push(`PORT must be between 1 and 65535, got ${value}`);
    return DEFAULT_PORT;
  }
  return port;
}

function parseSink(env: Env, errors: string[]): SinkConfig | undefined {
  const kind = env.LEDGER_SINK ?? "memory";
  const address = env.LEDGER_SINK_ADDRESS
    ? normalizeAddress(env.LEDGER_SINK_ADDRESS)
    : DEFAULT_SINK_ADDRESS;
  if (!address) {
    errors.push("LEDGER_SINK_ADDRESS is not a valid address");
    return undefined;
  }

  if (kind === "memory") {
    return { kind, address };
  }

  if (kind !== "evm") {
    errors.push(`LEDGER_SINK must be "memory" or "evm", got ${kind}`);
    return undefined;
  }

  const network = env.EVM_NETWORK ?? DEFAULT_EVM_NETWORK;
  const rpcUrl = env.EVM_RPC_URL;
  const key = env.LEDGER_OPERATOR_PRIVATE_KEY;
  const before = errors.length;

  if (!SUPPORTED_EVM_NETWORKS.includes(network)) {
    errors.push(
      `EVM_NETWORK ${network} is not supported (${SUPPORTED_EVM_NETWORKS.join(", ")})`
    );
  }
  if (!rpcUrl) {
    errors.push("EVM_RPC_URL is required when LEDGER_SINK=evm");
  }
  if (!key || !/^0x[0-9a-fA-F]{64}$/.test(key)) {
    errors.push("LEDGER_OPERATOR_PRIVATE_KEY must be a 0x-prefixed 32-byte hex key");
  }

  if (errors.length > before || !rpcUrl || !key) return undefined;
  return {
    kind,
    address,
    network,
    rpcUrl,
    operatorPrivateKey: `0x${key.slice(2)}`,
  };
}

/**
 * Build ledger configuration from environment variables.
 * Collects every problem instead of stopping at the first.
 */
export function loadLedgerConfig(env: Env): ConfigResult {
  const errors: string[] = [];

  const port = parsePort(env.PORT, errors);

  const admin = normalizeAddress(env.LEDGER_ADMIN_ADDRESS);
  if (!admin) {
    errors.push("LEDGER_ADMIN_ADDRESS is required and must be a non-zero address");
  }

  const engine = env.LEDGER_ENGINE_ADDRESS
    ? normalizeAddress(env.LEDGER_ENGINE_ADDRESS)
    : undefined;
  if (env.LEDGER_ENGINE_ADDRESS && !engine) {
    errors.push("LEDGER_ENGINE_ADDRESS is not a valid address");
  }

  const sink = parseSink(env, errors);
  const bootstrapTokens = parseBootstrapTokens(env.LEDGER_TOKENS, errors);

  if (errors.length > 0 || !admin || !sink) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    config: {
      port,
      admin,
      engine,
      sink,
      registryFile: env.ASSET_REGISTRY_FILE || undefined,
      auth: createAuthConfig(env),
      bootstrapTokens,
    },
  };
}
