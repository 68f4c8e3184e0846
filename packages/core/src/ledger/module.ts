/**
 * Ledger Module Factory
 *
 * Creates a ledger with injectable store, audit log, registry and sink.
 * Custom store implementations (Redis, PostgreSQL, etc.) can replace the
 * in-memory defaults.
 *
 * @example
 * ```typescript
 * import { createLedgerModule, InMemoryEligibilityRegistry } from "@sponsor-ledger/core";
 *
 * const registry = new InMemoryEligibilityRegistry();
 * registry.list(usdc, { decimals: 6, capUnits: 1_000_000_000n });
 *
 * const ledgerModule = createLedgerModule({ registry, sink, owner: adminAddress });
 * await ledgerModule.ledger.setConsumingEngine(adminAddress, engineAddress);
 *
 * const result = await ledgerModule.ledger.sponsor(sponsorAddress, {
 *   beneficiary,
 *   asset: usdc,
 *   amount: 100_000n,
 * });
 * ```
 */

import type { EligibilityRegistry } from "../registry/interface.js";
import type { AssetSink } from "../sink/interface.js";
import { InMemoryAuditLog, type AuditLog } from "./audit.js";
import { LedgerCore } from "./core.js";
import { checkInvariants, type InvariantViolation } from "./invariants.js";
import { InMemoryLedgerStore, type LedgerStore } from "./store.js";

export interface LedgerModuleConfig {
  /**
   * Ledger state store.
   * Defaults to InMemoryLedgerStore if not provided.
   */
  store?: LedgerStore;

  /**
   * Audit log for ledger events.
   * Defaults to InMemoryAuditLog if not provided.
   */
  audit?: AuditLog;

  /** Decides which assets may be sponsored and their caps. */
  registry: EligibilityRegistry;

  /** Irreversible destination for sponsored assets. */
  sink: AssetSink;

  /** Initial owner (admin) address. */
  owner: string;
}

export interface LedgerModule {
  ledger: LedgerCore;
  store: LedgerStore;
  audit: AuditLog;
  registry: EligibilityRegistry;
  sink: AssetSink;

  /**
   * Check state invariants across every known beneficiary.
   * Returns an empty list when the ledger is consistent.
   */
  verify: () => InvariantViolation[];
}

export function createLedgerModule(config: LedgerModuleConfig): LedgerModule {
  const store = config.store ?? new InMemoryLedgerStore();
  const audit = config.audit ?? new InMemoryAuditLog();
  const ledger = new LedgerCore({
    store,
    audit,
    registry: config.registry,
    sink: config.sink,
    owner: config.owner,
  });

  return {
    ledger,
    store,
    audit,
    registry: config.registry,
    sink: config.sink,
    verify: () => checkInvariants(store, { registry: config.registry }),
  };
}
