import type { Address } from "viem";
import type { EligibilityRegistry } from "../registry/interface.js";
import type { AssetId } from "../types.js";
import type { LedgerStore } from "./store.js";

export type InvariantName =
  | "active_asset_count"
  | "negative_balance"
  | "self_sponsor"
  | "unsponsored_balance"
  | "cap_exceeded";

export interface InvariantViolation {
  invariant: InvariantName;
  subject: Address;
  detail: string;
}

export interface InvariantScope {
  /** Beneficiaries to check. Defaults to every beneficiary the store knows. */
  beneficiaries?: Address[];
  /**
   * Assets whose cumulative totals are checked against registry caps.
   * Defaults to every asset with a cumulative total.
   */
  assets?: AssetId[];
  registry?: EligibilityRegistry;
}

/**
 * Check the ledger's state invariants. Returns every violation found.
 */
export function checkInvariants(
  store: LedgerStore,
  scope: InvariantScope = {}
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  for (const beneficiary of scope.beneficiaries ?? store.beneficiaries()) {
    const held = store.heldAssets(beneficiary);
    const balances = held.map((asset) => store.getBalance(beneficiary, asset));
    const positive = balances.filter((units) => units > 0n).length;
    const active = store.getActiveAssetCount(beneficiary);

    if (balances.some((units) => units < 0n)) {
      violations.push({
        invariant: "negative_balance",
        subject: beneficiary,
        detail: "balance below zero",
      });
    }

    if (active !== positive) {
      violations.push({
        invariant: "active_asset_count",
        subject: beneficiary,
        detail: `active count ${active}, positive balances ${positive}`,
      });
    }

    const sponsor = store.getSponsor(beneficiary);
    if (sponsor === beneficiary) {
      violations.push({
        invariant: "self_sponsor",
        subject: beneficiary,
        detail: "beneficiary is its own sponsor",
      });
    }

    if (positive > 0 && !sponsor) {
      violations.push({
        invariant: "unsponsored_balance",
        subject: beneficiary,
        detail: "positive balance without an assigned sponsor",
      });
    }
  }

  if (scope.registry) {
    for (const asset of scope.assets ?? store.assets()) {
      const cap = scope.registry.lookup(asset)?.capUnits ?? null;
      const total = store.getCumulativeSponsored(asset);
      if (cap !== null && total > cap) {
        violations.push({
          invariant: "cap_exceeded",
          subject: asset,
          detail: `cumulative ${total} over cap ${cap}`,
        });
      }
    }
  }

  return violations;
}
