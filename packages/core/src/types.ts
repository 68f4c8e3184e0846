import type { Address } from "viem";

export type { Address };

/**
 * Asset identifiers are token contract addresses.
 */
export type AssetId = Address;

/**
 * Snapshot of a beneficiary's position.
 */
export interface BeneficiaryAccount {
  beneficiary: Address;
  sponsor: Address | null;
  activeAssetCount: number;
  lifetimeAllocated: bigint;
  balances: Record<AssetId, bigint>;
}

// -----------------------------------------------------------------------------
// Audit records
// -----------------------------------------------------------------------------

export type EngineConfiguredRecord = {
  type: "engine_configured";
  previousEngine: Address | null;
  engine: Address;
};

export type SponsoredRecord = {
  type: "sponsored";
  sponsor: Address;
  beneficiary: Address;
  asset: AssetId;
  requested: bigint;
  newBalance: bigint;
};

export type SponsoredReceivedRecord = {
  type: "sponsored_received";
  sponsor: Address;
  beneficiary: Address;
  asset: AssetId;
  requested: bigint;
  received: bigint;
};

export type ConsumedRecord = {
  type: "consumed";
  beneficiary: Address;
  asset: AssetId;
  amount: bigint;
  remaining: bigint;
};

export type ForfeitedRecord = {
  type: "forfeited";
  beneficiary: Address;
  asset: AssetId;
  amount: bigint;
};

export type SponsorClearedRecord = {
  type: "sponsor_cleared";
  beneficiary: Address;
  previousSponsor: Address;
};

export type ForfeitSummaryRecord = {
  type: "sponsor_cleared_with_forfeit";
  beneficiary: Address;
  assetsCleared: number;
  totalForfeited: bigint;
  sponsorCleared: boolean;
};

export type OwnershipTransferStartedRecord = {
  type: "ownership_transfer_started";
  owner: Address;
  pendingOwner: Address;
};

export type OwnershipTransferredRecord = {
  type: "ownership_transferred";
  previousOwner: Address | null;
  owner: Address;
};

export type LedgerEvent =
  | EngineConfiguredRecord
  | SponsoredRecord
  | SponsoredReceivedRecord
  | ConsumedRecord
  | ForfeitedRecord
  | SponsorClearedRecord
  | ForfeitSummaryRecord
  | OwnershipTransferStartedRecord
  | OwnershipTransferredRecord;

export type LedgerEventType = LedgerEvent["type"];

/**
 * A ledger event as stored in the audit log.
 */
export type AuditRecord = LedgerEvent & {
  sequence: number;
  at: Date;
};
