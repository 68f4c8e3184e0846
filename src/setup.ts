import { Hono } from "hono";
import { logger } from "hono/logger";
import {
  createLedgerModule,
  createPrivateKeyErc20Gateway,
  errorSummary,
  EvmAssetSink,
  InMemoryAssetSink,
  InMemoryEligibilityRegistry,
  loadRegistryFile,
  type AssetSink,
  type EligibilityRegistry,
  type LedgerConfig,
  type LedgerModule,
  type SinkConfig,
} from "@sponsor-ledger/core";
import { InMemoryTokenStorage, type TokenStorage } from "@sponsor-ledger/core/auth";
import { createLedgerRoutes } from "@sponsor-ledger/core/hono";

export interface LedgerApp {
  app: Hono;
  ledgerModule: LedgerModule;
  tokens: TokenStorage;
}

export interface LedgerAppOverrides {
  registry?: EligibilityRegistry;
  sink?: AssetSink;
  tokens?: TokenStorage;
  /** Disable request logging (tests). */
  quiet?: boolean;
}

function createSink(config: SinkConfig): AssetSink {
  if (config.kind === "memory") {
    console.warn("⚠️  Using in-memory sink - balances are simulated");
    return new InMemoryAssetSink(config.address);
  }

  const gateway = createPrivateKeyErc20Gateway({
    network: config.network,
    rpcUrl: config.rpcUrl,
    privateKey: config.operatorPrivateKey,
  });
  console.info(`✅ EVM sink ${config.address} on ${config.network}, operator ${gateway.operator}`);
  return new EvmAssetSink(config.address, gateway);
}

async function createRegistry(
  registryFile: string | undefined
): Promise<EligibilityRegistry> {
  if (!registryFile) {
    console.warn("⚠️  No ASSET_REGISTRY_FILE - no assets are eligible");
    return new InMemoryEligibilityRegistry();
  }
  const registry = await loadRegistryFile(registryFile);
  console.info(`✅ Eligible assets: ${registry.assetIds().join(", ") || "none"}`);
  return registry;
}

/**
 * Wire a ledger, its token storage and the HTTP app from configuration.
 */
export async function createLedgerApp(
  config: LedgerConfig,
  overrides: LedgerAppOverrides = {}
): Promise<LedgerApp> {
  const registry = overrides.registry ?? (await createRegistry(config.registryFile));
  const sink = overrides.sink ?? createSink(config.sink);
  const ledgerModule = createLedgerModule({ registry, sink, owner: config.admin });

  if (config.engine) {
    const configured = await ledgerModule.ledger.setConsumingEngine(
      config.admin,
      config.engine
    );
    if (!configured.success) {
      throw new Error(`Could not configure consuming engine: ${configured.message}`);
    }
  }

  const tokens = overrides.tokens ?? new InMemoryTokenStorage();
  for (const { token, address } of config.bootstrapTokens) {
    const environment = token.startsWith("led_live_") ? "live" : "test";
    await tokens.createToken({ address, token }, environment);
  }

  if (!config.auth.enabled) {
    console.warn("⚠️  Authentication disabled - callers are trusted from X-Caller-Address");
  }

  const app = new Hono();
  if (!overrides.quiet) {
    app.use(logger());
  }

  app.get("/health", (c) =>
    c.json({
      status: "ok",
      owner: ledgerModule.ledger.owner(),
      engine: ledgerModule.ledger.consumingEngine(),
      sink: sink.address,
    })
  );

  app.route(
    "/",
    createLedgerRoutes(ledgerModule, {
      auth: { enabled: config.auth.enabled, storage: tokens },
    })
  );

  app.onError((error, c) => {
    console.error("[Server] Unhandled error:", errorSummary(error));
    return c.json({ error: "internal_error", message: "Internal server error" }, 500);
  });

  return { app, ledgerModule, tokens };
}
