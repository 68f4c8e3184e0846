import type { Address } from "viem";
import type { AssetId } from "../types.js";
import type { AssetSink, ReceiptCheck } from "./interface.js";

export type TransferHook = (transfer: {
  asset: AssetId;
  from: Address;
  amount: bigint;
}) => void | Promise<void>;

const BPS_DENOMINATOR = 10_000n;

/**
 * In-memory sink with simulated holder balances.
 * Supports fee-on-transfer assets for exercising exact-receipt crediting.
 */
export class InMemoryAssetSink implements AssetSink {
  private holdings = new Map<AssetId, Map<Address, bigint>>();
  private received = new Map<AssetId, bigint>();
  private feeBps = new Map<AssetId, bigint>();
  private fixedFees = new Map<AssetId, bigint>();
  private hook: TransferHook | undefined;

  constructor(readonly address: Address) {}

  /** Credit a holder with spendable assets. */
  fund(holder: Address, asset: AssetId, amount: bigint): void {
    this.setHolderBalance(holder, asset, this.holderBalance(holder, asset) + amount);
  }

  holderBalance(holder: Address, asset: AssetId): bigint {
    return this.holdings.get(asset)?.get(holder) ?? 0n;
  }

  /** Total the sink has received in `asset`. */
  balanceOf(asset: AssetId): bigint {
    return this.received.get(asset) ?? 0n;
  }

  /** Deduct a percentage (in basis points) from every transfer of `asset`. */
  setTransferFeeBps(asset: AssetId, bps: bigint): void {
    if (bps < 0n || bps > BPS_DENOMINATOR) {
      throw new RangeError(`Fee out of range: ${bps} bps`);
    }
    this.feeBps.set(asset, bps);
  }

  /** Deduct a fixed amount (capped at the transfer) from every transfer. */
  setFixedTransferFee(asset: AssetId, fee: bigint): void {
    this.fixedFees.set(asset, fee);
  }

  /** Called after the holder is debited and before the sink is credited. */
  onTransfer(hook: TransferHook | undefined): void {
    this.hook = hook;
  }

  async pull(
    asset: AssetId,
    from: Address,
    amount: bigint,
    check?: ReceiptCheck
  ): Promise<bigint> {
    const available = this.holderBalance(from, asset);
    if (available < amount) {
      throw new Error(
        `Insufficient funds: ${from} holds ${available} of ${asset}, needs ${amount}`
      );
    }

    const delivered = amount - this.feeFor(asset, amount);
    if (check && !check(delivered)) {
      return delivered;
    }

    this.setHolderBalance(from, asset, available - amount);
    if (this.hook) {
      try {
        await this.hook({ asset, from, amount });
      } catch (error) {
        this.setHolderBalance(from, asset, this.holderBalance(from, asset) + amount);
        throw error;
      }
    }

    this.received.set(asset, this.balanceOf(asset) + delivered);
    return delivered;
  }

  private setHolderBalance(holder: Address, asset: AssetId, amount: bigint): void {
    const balances = this.holdings.get(asset) ?? new Map<Address, bigint>();
    balances.set(holder, amount);
    this.holdings.set(asset, balances);
  }

  private feeFor(asset: AssetId, amount: bigint): bigint {
    const percentage = ((this.feeBps.get(asset) ?? 0n) * amount) / BPS_DENOMINATOR;
    const total = percentage + (this.fixedFees.get(asset) ?? 0n);
    return total > amount ? amount : total;
  }
}
