import type { AssetId } from "../types.js";

/**
 * Eligibility entry for an asset.
 *
 * `capUnits` is null when the asset is uncapped.
 */
export interface AssetEligibility {
  listed: boolean;
  enabled: boolean;
  decimals: number;
  unitsPerReferenceAmount: bigint;
  capUnits: bigint | null;
}

/**
 * Raw registry entry as published by registries that use 0 for "uncapped".
 */
export interface RawAssetEligibility {
  listed: boolean;
  enabled: boolean;
  decimals: number;
  unitsPerReferenceAmount: bigint;
  capUnits: bigint;
}

/**
 * Read-only registry deciding which assets may be sponsored.
 */
export interface EligibilityRegistry {
  lookup(asset: AssetId): AssetEligibility | undefined;
}

export function normalizeCap(capUnits: bigint): bigint | null {
  return capUnits === 0n ? null : capUnits;
}

export function fromRawEligibility(raw: RawAssetEligibility): AssetEligibility {
  return { ...raw, capUnits: normalizeCap(raw.capUnits) };
}

export function isEligible(entry: AssetEligibility | undefined): boolean {
  return Boolean(entry?.listed && entry.enabled);
}
