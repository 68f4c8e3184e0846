import type { Address } from "viem";
import type { AssetId, BeneficiaryAccount } from "../types.js";
import type { LedgerStore } from "./store.js";

export function readAccount(
  store: LedgerStore,
  beneficiary: Address
): BeneficiaryAccount {
  const balances: Record<AssetId, bigint> = {};
  for (const asset of store.heldAssets(beneficiary)) {
    balances[asset] = store.getBalance(beneficiary, asset);
  }

  return {
    beneficiary,
    sponsor: store.getSponsor(beneficiary) ?? null,
    activeAssetCount: store.getActiveAssetCount(beneficiary),
    lifetimeAllocated: store.getLifetimeAllocated(beneficiary),
    balances,
  };
}

/**
 * Format an account for API responses.
 * Converts BigInt values to strings for JSON serialization.
 */
export function formatAccount(account: BeneficiaryAccount) {
  return {
    beneficiary: account.beneficiary,
    sponsor: account.sponsor,
    activeAssetCount: account.activeAssetCount,
    lifetimeAllocated: account.lifetimeAllocated.toString(),
    balances: Object.fromEntries(
      Object.entries(account.balances).map(([asset, units]) => [
        asset,
        units.toString(),
      ])
    ),
  };
}
