/**
 * Ledger Core
 *
 * Turns irrevocable transfers into the sink into per-beneficiary unit
 * balances, and lets the configured consuming engine draw them down.
 *
 * A beneficiary is locked to its sponsor while it holds any positive
 * balance. Once every balance is back to zero (consumed or forfeited) the
 * beneficiary can be adopted by a new sponsor.
 */

import type { Address } from "viem";
import { normalizeAddress } from "../address.js";
import {
  errorSummary,
  ledgerFailure,
  type LedgerResult,
} from "../errors.js";
import { isEligible, type EligibilityRegistry } from "../registry/interface.js";
import { transferAndMeasure, type AssetSink } from "../sink/interface.js";
import type { AssetId, BeneficiaryAccount } from "../types.js";
import { readAccount } from "./account.js";
import { InMemoryAuditLog, type AuditLog } from "./audit.js";
import { OwnershipControl } from "./ownership.js";
import { OperationQueue } from "./serial.js";
import { InMemoryLedgerStore, type LedgerStore } from "./store.js";

export interface LedgerCoreConfig {
  registry: EligibilityRegistry;
  sink: AssetSink;
  /** Initial owner, installed when the store has none. */
  owner: string;
  store?: LedgerStore;
  audit?: AuditLog;
}

export interface SponsorInput {
  beneficiary: string;
  asset: string;
  /** Requested amount, denominated in the asset's smallest unit. */
  amount: bigint;
}

export interface SponsorReceipt {
  sponsor: Address;
  beneficiary: Address;
  asset: AssetId;
  requested: bigint;
  received: bigint;
  newBalance: bigint;
  /** True when this call assigned or switched the sponsor. */
  sponsorAssigned: boolean;
}

export interface ConsumeInput {
  beneficiary: string;
  asset: string;
  amount: bigint;
}

export interface ConsumeReceipt {
  beneficiary: Address;
  asset: AssetId;
  amount: bigint;
  remaining: bigint;
}

export interface ForfeitSummary {
  beneficiary: Address;
  assetsCleared: number;
  totalForfeited: bigint;
  sponsorCleared: boolean;
  forfeited: { asset: AssetId; amount: bigint }[];
}

export class LedgerCore {
  readonly store: LedgerStore;
  readonly audit: AuditLog;
  readonly registry: EligibilityRegistry;
  readonly sink: AssetSink;
  private ownership: OwnershipControl;
  private queue = new OperationQueue();

  constructor(config: LedgerCoreConfig) {
    this.store = config.store ?? new InMemoryLedgerStore();
    this.audit = config.audit ?? new InMemoryAuditLog();
    this.registry = config.registry;
    this.sink = config.sink;
    this.ownership = new OwnershipControl(this.store, this.audit);
    this.ownership.initialize(config.owner);
  }

  // ===========================================================================
  // Admin
  // ===========================================================================

  setConsumingEngine(
    caller: string,
    engine: string
  ): Promise<LedgerResult<{ engine: Address; previousEngine: Address | null }>> {
    type Configured = { engine: Address; previousEngine: Address | null };
    return this.exclusive<Configured>("setConsumingEngine", async () => {
      if (!this.ownership.isOwner(caller)) return ledgerFailure("not_owner");

      const next = normalizeAddress(engine);
      if (!next) return ledgerFailure("invalid_address");

      const previousEngine = this.store.getConsumingEngine() ?? null;
      this.store.setConsumingEngine(next);
      this.audit.append({ type: "engine_configured", previousEngine, engine: next });
      console.info(`[Ledger] Consuming engine set to ${next}`);
      return { success: true, engine: next, previousEngine };
    });
  }

  transferOwnership(
    caller: string,
    newOwner: string
  ): Promise<LedgerResult<{ pendingOwner: Address }>> {
    return this.exclusive<{ pendingOwner: Address }>("transferOwnership", async () =>
      this.ownership.transferOwnership(caller, newOwner)
    );
  }

  acceptOwnership(caller: string): Promise<LedgerResult<{ owner: Address }>> {
    return this.exclusive<{ owner: Address }>("acceptOwnership", async () =>
      this.ownership.acceptOwnership(caller)
    );
  }

  // ===========================================================================
  // Sponsor
  // ===========================================================================

  /**
   * Credit `beneficiary` with whatever the sink actually receives when
   * `amount` of `asset` is pulled from the caller.
   */
  sponsor(
    caller: string,
    input: SponsorInput
  ): Promise<LedgerResult<SponsorReceipt>> {
    return this.exclusive<SponsorReceipt>("sponsor", () =>
      this.sponsorUnlocked(caller, input)
    );
  }

  private async sponsorUnlocked(
    caller: string,
    input: SponsorInput
  ): Promise<LedgerResult<SponsorReceipt>> {
    const sponsor = normalizeAddress(caller);
    const beneficiary = normalizeAddress(input.beneficiary);
    const asset = normalizeAddress(input.asset);
    if (!sponsor || !beneficiary || !asset) {
      return ledgerFailure("invalid_address");
    }
    if (beneficiary === sponsor) {
      return ledgerFailure("self_sponsorship_forbidden");
    }
    if (input.amount <= 0n) {
      return ledgerFailure("invalid_amount");
    }

    const eligibility = this.registry.lookup(asset);
    if (!eligibility || !isEligible(eligibility)) {
      return ledgerFailure("asset_not_eligible");
    }

    const currentSponsor = this.store.getSponsor(beneficiary);
    if (
      currentSponsor &&
      currentSponsor !== sponsor &&
      this.store.getActiveAssetCount(beneficiary) > 0
    ) {
      return ledgerFailure("sponsor_locked");
    }

    // A full cap cannot absorb any positive receipt; refuse before moving assets.
    const cap = eligibility.capUnits;
    const prior = this.store.getCumulativeSponsored(asset);
    if (cap !== null && prior >= cap) {
      return ledgerFailure("cap_exceeded");
    }

    const acceptable = (received: bigint) =>
      received > 0n && (cap === null || prior + received <= cap);

    let received: bigint;
    try {
      received = await transferAndMeasure(
        this.sink,
        asset,
        sponsor,
        input.amount,
        acceptable
      );
    } catch (error) {
      console.error("[Ledger] Sponsor transfer failed:", {
        error: errorSummary(error),
        sponsor,
        beneficiary,
        asset,
        requested: input.amount.toString(),
      });
      return ledgerFailure("transfer_failed");
    }

    if (received === 0n) {
      return ledgerFailure("zero_received");
    }

    const cumulative = prior + received;
    if (cap !== null && cumulative > cap) {
      console.warn("[Ledger] Sponsorship over cap:", {
        asset,
        received: received.toString(),
        cap: cap.toString(),
      });
      return ledgerFailure("cap_exceeded");
    }

    // Every check passed: apply all effects.
    this.store.setCumulativeSponsored(asset, cumulative);

    const sponsorAssigned = currentSponsor !== sponsor;
    if (sponsorAssigned) {
      this.store.setSponsor(beneficiary, sponsor);
    }

    const previousBalance = this.store.getBalance(beneficiary, asset);
    const newBalance = previousBalance + received;
    this.store.setBalance(beneficiary, asset, newBalance);
    if (previousBalance === 0n) {
      this.store.setActiveAssetCount(
        beneficiary,
        this.store.getActiveAssetCount(beneficiary) + 1
      );
    }

    this.store.setLifetimeAllocated(
      beneficiary,
      this.store.getLifetimeAllocated(beneficiary) + received
    );

    this.audit.append({
      type: "sponsored",
      sponsor,
      beneficiary,
      asset,
      requested: input.amount,
      newBalance,
    });
    this.audit.append({
      type: "sponsored_received",
      sponsor,
      beneficiary,
      asset,
      requested: input.amount,
      received,
    });

    return {
      success: true,
      sponsor,
      beneficiary,
      asset,
      requested: input.amount,
      received,
      newBalance,
      sponsorAssigned,
    };
  }

  // ===========================================================================
  // Consume
  // ===========================================================================

  /**
   * Debit a beneficiary's balance. Only the consuming engine may call this.
   */
  consume(
    caller: string,
    input: ConsumeInput
  ): Promise<LedgerResult<ConsumeReceipt>> {
    return this.exclusive<ConsumeReceipt>("consume", async () => {
      const engine = this.store.getConsumingEngine();
      if (!engine || normalizeAddress(caller) !== engine) {
        return ledgerFailure("unauthorized_caller");
      }

      const beneficiary = normalizeAddress(input.beneficiary);
      const asset = normalizeAddress(input.asset);
      if (!beneficiary || !asset) return ledgerFailure("invalid_address");
      if (input.amount <= 0n) return ledgerFailure("invalid_amount");

      const balance = this.store.getBalance(beneficiary, asset);
      if (input.amount > balance) return ledgerFailure("insufficient_balance");

      const remaining = balance - input.amount;
      this.store.setBalance(beneficiary, asset, remaining);
      if (remaining === 0n) {
        this.store.setActiveAssetCount(
          beneficiary,
          this.store.getActiveAssetCount(beneficiary) - 1
        );
      }

      this.audit.append({
        type: "consumed",
        beneficiary,
        asset,
        amount: input.amount,
        remaining,
      });

      return { success: true, beneficiary, asset, amount: input.amount, remaining };
    });
  }

  // ===========================================================================
  // Clear & forfeit
  // ===========================================================================

  /**
   * Release the caller from its sponsor once every balance is zero.
   */
  clearSponsorIfEmpty(
    caller: string
  ): Promise<LedgerResult<{ beneficiary: Address; previousSponsor: Address }>> {
    type Cleared = { beneficiary: Address; previousSponsor: Address };
    return this.exclusive<Cleared>("clearSponsorIfEmpty", async () => {
      const beneficiary = normalizeAddress(caller);
      if (!beneficiary) return ledgerFailure("invalid_address");

      const previousSponsor = this.store.getSponsor(beneficiary);
      if (!previousSponsor) return ledgerFailure("nothing_to_forfeit");
      if (this.store.getActiveAssetCount(beneficiary) !== 0) {
        return ledgerFailure("not_empty");
      }

      this.store.setSponsor(beneficiary, undefined);
      this.audit.append({ type: "sponsor_cleared", beneficiary, previousSponsor });
      return { success: true, beneficiary, previousSponsor };
    });
  }

  /**
   * Zero the caller's balance in each listed asset, then release the
   * sponsor if nothing remains.
   *
   * Only the listed assets are forfeited. Assets left off the list keep
   * their balance and keep the caller locked to its sponsor.
   */
  clearSponsorAndForfeit(
    caller: string,
    assets: string[]
  ): Promise<LedgerResult<ForfeitSummary>> {
    return this.exclusive<ForfeitSummary>("clearSponsorAndForfeit", async () =>
      this.forfeitUnlocked(caller, assets)
    );
  }

  /**
   * Forfeit every asset the caller currently holds.
   */
  clearSponsorAndForfeitAll(
    caller: string
  ): Promise<LedgerResult<ForfeitSummary>> {
    return this.exclusive<ForfeitSummary>("clearSponsorAndForfeitAll", async () => {
      const beneficiary = normalizeAddress(caller);
      if (!beneficiary) return ledgerFailure("invalid_address");
      return this.forfeitUnlocked(beneficiary, this.store.heldAssets(beneficiary));
    });
  }

  private forfeitUnlocked(
    caller: string,
    assets: string[]
  ): LedgerResult<ForfeitSummary> {
    const beneficiary = normalizeAddress(caller);
    if (!beneficiary) return ledgerFailure("invalid_address");

    const listed = new Set<AssetId>();
    for (const value of assets) {
      const asset = normalizeAddress(value);
      if (!asset) return ledgerFailure("invalid_address");
      listed.add(asset);
    }

    const forfeited: { asset: AssetId; amount: bigint }[] = [];
    for (const asset of listed) {
      const amount = this.store.getBalance(beneficiary, asset);
      if (amount > 0n) forfeited.push({ asset, amount });
    }

    const totalForfeited = forfeited.reduce((sum, f) => sum + f.amount, 0n);
    if (totalForfeited === 0n) return ledgerFailure("nothing_to_forfeit");

    for (const { asset, amount } of forfeited) {
      this.store.setBalance(beneficiary, asset, 0n);
      this.store.setActiveAssetCount(
        beneficiary,
        this.store.getActiveAssetCount(beneficiary) - 1
      );
      this.audit.append({ type: "forfeited", beneficiary, asset, amount });
    }

    const sponsor = this.store.getSponsor(beneficiary);
    const sponsorCleared =
      sponsor !== undefined && this.store.getActiveAssetCount(beneficiary) === 0;
    if (sponsor && sponsorCleared) {
      this.store.setSponsor(beneficiary, undefined);
      this.audit.append({
        type: "sponsor_cleared",
        beneficiary,
        previousSponsor: sponsor,
      });
    }

    this.audit.append({
      type: "sponsor_cleared_with_forfeit",
      beneficiary,
      assetsCleared: forfeited.length,
      totalForfeited,
      sponsorCleared,
    });

    return {
      success: true,
      beneficiary,
      assetsCleared: forfeited.length,
      totalForfeited,
      sponsorCleared,
      forfeited,
    };
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  sponsorOf(beneficiary: string): Address | null {
    const normalized = normalizeAddress(beneficiary);
    return normalized ? this.store.getSponsor(normalized) ?? null : null;
  }

  balanceOf(beneficiary: string, asset: string): bigint {
    const b = normalizeAddress(beneficiary);
    const a = normalizeAddress(asset);
    return b && a ? this.store.getBalance(b, a) : 0n;
  }

  activeAssetCount(beneficiary: string): number {
    const normalized = normalizeAddress(beneficiary);
    return normalized ? this.store.getActiveAssetCount(normalized) : 0;
  }

  cumulativeSponsored(asset: string): bigint {
    const normalized = normalizeAddress(asset);
    return normalized ? this.store.getCumulativeSponsored(normalized) : 0n;
  }

  lifetimeAllocated(beneficiary: string): bigint {
    const normalized = normalizeAddress(beneficiary);
    return normalized ? this.store.getLifetimeAllocated(normalized) : 0n;
  }

  consumingEngine(): Address | null {
    return this.store.getConsumingEngine() ?? null;
  }

  owner(): Address | null {
    return this.store.getOwner() ?? null;
  }

  pendingOwner(): Address | null {
    return this.store.getPendingOwner() ?? null;
  }

  getAccount(beneficiary: string): BeneficiaryAccount | undefined {
    const normalized = normalizeAddress(beneficiary);
    return normalized ? readAccount(this.store, normalized) : undefined;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  private exclusive<T extends object>(
    name: string,
    task: () => Promise<LedgerResult<T>>
  ): Promise<LedgerResult<T>> {
    const running = this.queue.current();
    if (running) {
      console.warn(`[Ledger] ${name} refused: re-entered during ${running}`);
      return Promise.resolve(ledgerFailure("reentrant_call"));
    }
    return this.queue.run(name, task);
  }
}
