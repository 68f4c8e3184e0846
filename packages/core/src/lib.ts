/**
 * @sponsor-ledger/core - Sponsorship unit ledger
 *
 * Converts irrevocable asset transfers into per-beneficiary unit balances
 * that a single consuming engine can draw down.
 *
 * @example
 * ```typescript
 * import {
 *   createLedgerModule,
 *   InMemoryAssetSink,
 *   InMemoryEligibilityRegistry,
 * } from "@sponsor-ledger/core";
 *
 * const registry = new InMemoryEligibilityRegistry();
 * registry.list(asset, { capUnits: 1_000_000n });
 *
 * const { ledger } = createLedgerModule({
 *   registry,
 *   sink: new InMemoryAssetSink(sinkAddress),
 *   owner: admin,
 * });
 *
 * const result = await ledger.sponsor(sponsor, { beneficiary, asset, amount: 100n });
 * if (!result.success) {
 *   console.error(result.error, result.message);
 * }
 * ```
 */

// Module factory (preferred API)
export {
  createLedgerModule,
  type LedgerModule,
  type LedgerModuleConfig,
} from "./ledger/module.js";

// Ledger core
export {
  LedgerCore,
  type LedgerCoreConfig,
  type SponsorInput,
  type SponsorReceipt,
  type ConsumeInput,
  type ConsumeReceipt,
  type ForfeitSummary,
} from "./ledger/core.js";

// State store
export { InMemoryLedgerStore, type LedgerStore } from "./ledger/store.js";

// Audit log
export {
  InMemoryAuditLog,
  formatAuditRecord,
  type AuditLog,
  type AuditQuery,
} from "./ledger/audit.js";

// Accounts & invariants
export { readAccount, formatAccount } from "./ledger/account.js";
export {
  checkInvariants,
  type InvariantName,
  type InvariantScope,
  type InvariantViolation,
} from "./ledger/invariants.js";

// Eligibility registry
export {
  normalizeCap,
  fromRawEligibility,
  isEligible,
  type AssetEligibility,
  type RawAssetEligibility,
  type EligibilityRegistry,
} from "./registry/interface.js";
export {
  InMemoryEligibilityRegistry,
  registryFromJson,
  loadRegistryFile,
  type ListAssetInput,
} from "./registry/memory.js";

// Sinks
export {
  transferAndMeasure,
  type AssetSink,
  type ReceiptCheck,
} from "./sink/interface.js";
export { InMemoryAssetSink, type TransferHook } from "./sink/memory.js";
export {
  EvmAssetSink,
  createPrivateKeyErc20Gateway,
  deliveredAmount,
  getChain,
  SUPPORTED_EVM_NETWORKS,
  type Erc20Gateway,
  type PrivateKeyGatewayConfig,
  type TransferReceipt,
} from "./sink/evm.js";

// Errors
export {
  LEDGER_ERROR_MESSAGES,
  LEDGER_ERROR_STATUS,
  ledgerFailure,
  errorSummary,
  type LedgerErrorCode,
  type LedgerErrorStatus,
  type LedgerFailure,
  type LedgerResult,
} from "./errors.js";

// Configuration
export {
  loadLedgerConfig,
  parseBootstrapTokens,
  DEFAULT_PORT,
  DEFAULT_SINK_ADDRESS,
  type LedgerConfig,
  type SinkConfig,
  type BootstrapToken,
  type ConfigResult,
} from "./config.js";

// Addresses & amounts
export { normalizeAddress, parseUnits } from "./address.js";

export type * from "./types.js";
