import type { Address } from "viem";
import type { AssetId } from "../types.js";

/**
 * Decides whether a transfer delivering `received` units may settle.
 */
export type ReceiptCheck = (received: bigint) => boolean;

/**
 * Irreversible destination for sponsored assets.
 *
 * The ledger only ever moves assets into the sink; nothing is withdrawn.
 */
export interface AssetSink {
  readonly address: Address;
  /**
   * Move `amount` of `asset` from `from` into the sink and return what this
   * transfer delivered. Inflows from other sources are never counted.
   *
   * Sinks that can settle conditionally leave every balance untouched when
   * `check` rejects the delivered amount. Sinks that cannot (an on-chain
   * transfer is final once mined) settle regardless.
   */
  pull(
    asset: AssetId,
    from: Address,
    amount: bigint,
    check?: ReceiptCheck
  ): Promise<bigint>;
}

/**
 * Transfer into the sink and report what it actually received.
 *
 * Assets that take a fee on transfer deliver less than requested; the
 * delivered amount is the only amount that may be credited, and never more
 * than was requested.
 */
export async function transferAndMeasure(
  sink: AssetSink,
  asset: AssetId,
  from: Address,
  amount: bigint,
  check?: ReceiptCheck
): Promise<bigint> {
  const clamp = (received: bigint) =>
    received < 0n ? 0n : received > amount ? amount : received;
  const received = await sink.pull(
    asset,
    from,
    amount,
    check ? (delivered) => check(clamp(delivered)) : undefined
  );
  return clamp(received);
}
