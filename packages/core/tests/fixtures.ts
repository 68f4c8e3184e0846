import type { Address } from "viem";
import { InMemoryAssetSink } from "../src/sink/memory.js";
import { InMemoryEligibilityRegistry } from "../src/registry/memory.js";
import { createLedgerModule, type LedgerModule } from "../src/ledger/module.js";

// Digit-only addresses are already in checksum form.
export const ADMIN: Address = "0x1000000000000000000000000000000000000001";
export const ENGINE: Address = "0x2000000000000000000000000000000000000002";
export const SPONSOR: Address = "0x3000000000000000000000000000000000000003";
export const SPONSOR_2: Address = "0x3000000000000000000000000000000000000033";
export const BENEFICIARY: Address = "0x4000000000000000000000000000000000000004";
export const BENEFICIARY_2: Address = "0x4000000000000000000000000000000000000044";
export const ASSET_A: Address = "0x5000000000000000000000000000000000000005";
export const ASSET_B: Address = "0x5000000000000000000000000000000000000055";
export const UNLISTED_ASSET: Address = "0x5000000000000000000000000000000000000555";
export const SINK: Address = "0x000000000000000000000000000000000000dEaD";

export interface TestLedger extends LedgerModule {
  registry: InMemoryEligibilityRegistry;
  sink: InMemoryAssetSink;
}

/**
 * Ledger with ASSET_A and ASSET_B listed (uncapped), both sponsors funded
 * with 10_000 of each asset, and ENGINE configured as consumer.
 */
export async function createTestLedger(): Promise<TestLedger> {
  const registry = new InMemoryEligibilityRegistry();
  registry.list(ASSET_A, { decimals: 6 });
  registry.list(ASSET_B, { decimals: 18 });

  const sink = new InMemoryAssetSink(SINK);
  for (const holder of [SPONSOR, SPONSOR_2, BENEFICIARY]) {
    sink.fund(holder, ASSET_A, 10_000n);
    sink.fund(holder, ASSET_B, 10_000n);
  }

  const ledgerModule = createLedgerModule({ registry, sink, owner: ADMIN });
  const configured = await ledgerModule.ledger.setConsumingEngine(ADMIN, ENGINE);
  if (!configured.success) {
    throw new Error(configured.message);
  }

  return { ...ledgerModule, registry, sink };
}
