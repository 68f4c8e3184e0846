import type { Address } from "viem";
import type { AssetId } from "../types.js";

/**
 * Ledger state store.
 *
 * Owns every mutable value of a ledger. Reads of absent keys return the
 * empty default (no sponsor, zero balance, zero counters).
 */
export interface LedgerStore {
  getSponsor(beneficiary: Address): Address | undefined;
  setSponsor(beneficiary: Address, sponsor: Address | undefined): void;

  getBalance(beneficiary: Address, asset: AssetId): bigint;
  setBalance(beneficiary: Address, asset: AssetId, units: bigint): void;
  /** Assets for which the beneficiary holds a positive balance. */
  heldAssets(beneficiary: Address): AssetId[];

  getActiveAssetCount(beneficiary: Address): number;
  setActiveAssetCount(beneficiary: Address, count: number): void;

  getCumulativeSponsored(asset: AssetId): bigint;
  setCumulativeSponsored(asset: AssetId, units: bigint): void;

  getLifetimeAllocated(beneficiary: Address): bigint;
  setLifetimeAllocated(beneficiary: Address, units: bigint): void;

  getConsumingEngine(): Address | undefined;
  setConsumingEngine(engine: Address): void;

  getOwner(): Address | undefined;
  setOwner(owner: Address): void;
  getPendingOwner(): Address | undefined;
  setPendingOwner(pending: Address | undefined): void;

  /** Beneficiaries the store has seen, in first-write order. */
  beneficiaries(): Address[];
  /** Assets with a cumulative sponsored total. */
  assets(): AssetId[];

  reset(): void;
}

export class InMemoryLedgerStore implements LedgerStore {
  private sponsors = new Map<Address, Address>();
  private balances = new Map<Address, Map<AssetId, bigint>>();
  private activeCounts = new Map<Address, number>();
  private cumulative = new Map<AssetId, bigint>();
  private lifetime = new Map<Address, bigint>();
  private known = new Set<Address>();
  private engine: Address | undefined;
  private owner: Address | undefined;
  private pendingOwner: Address | undefined;

  getSponsor(beneficiary: Address): Address | undefined {
    return this.sponsors.get(beneficiary);
  }

  setSponsor(beneficiary: Address, sponsor: Address | undefined): void {
    this.known.add(beneficiary);
    if (sponsor) {
      this.sponsors.set(beneficiary, sponsor);
    } else {
      this.sponsors.delete(beneficiary);
    }
  }

  getBalance(beneficiary: Address, asset: AssetId): bigint {
    return this.balances.get(beneficiary)?.get(asset) ?? 0n;
  }

  setBalance(beneficiary: Address, asset: AssetId, units: bigint): void {
    if (units < 0n) {
      throw new RangeError(
        `Balance underflow for ${beneficiary} in ${asset}: ${units}`
      );
    }
    this.known.add(beneficiary);
    const entries = this.balances.get(beneficiary) ?? new Map<AssetId, bigint>();
    if (units === 0n) {
      entries.delete(asset);
    } else {
      entries.set(asset, units);
    }
    this.balances.set(beneficiary, entries);
  }

  heldAssets(beneficiary: Address): AssetId[] {
    return Array.from(this.balances.get(beneficiary)?.keys() ?? []);
  }

  getActiveAssetCount(beneficiary: Address): number {
    return this.activeCounts.get(beneficiary) ?? 0;
  }

  setActiveAssetCount(beneficiary: Address, count: number): void {
    if (count < 0) {
      throw new RangeError(`Active asset count underflow for ${beneficiary}`);
    }
    this.known.add(beneficiary);
    this.activeCounts.set(beneficiary, count);
  }

  getCumulativeSponsored(asset: AssetId): bigint {
    return this.cumulative.get(asset) ?? 0n;
  }

  setCumulativeSponsored(asset: AssetId, units: bigint): void {
    this.cumulative.set(asset, units);
  }

  getLifetimeAllocated(beneficiary: Address): bigint {
    return this.lifetime.get(beneficiary) ?? 0n;
  }

  setLifetimeAllocated(beneficiary: Address, units: bigint): void {
    this.known.add(beneficiary);
    this.lifetime.set(beneficiary, units);
  }

  getConsumingEngine(): Address | undefined {
    return this.engine;
  }

  setConsumingEngine(engine: Address): void {
    this.engine = engine;
  }

  getOwner(): Address | undefined {
    return this.owner;
  }

  setOwner(owner: Address): void {
    this.owner = owner;
  }

  getPendingOwner(): Address | undefined {
    return this.pendingOwner;
  }

  setPendingOwner(pending: Address | undefined): void {
    this.pendingOwner = pending;
  }

  beneficiaries(): Address[] {
    return Array.from(this.known);
  }

  assets(): AssetId[] {
    return Array.from(this.cumulative.keys());
  }

  reset(): void {
    this.sponsors.clear();
    this.balances.clear();
    this.activeCounts.clear();
    this.cumulative.clear();
    this.lifetime.clear();
    this.known.clear();
    this.engine = undefined;
    this.owner = undefined;
    this.pendingOwner = undefined;
  }
}
