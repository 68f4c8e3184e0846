import { getAddress, isAddress, zeroAddress, type Address } from "viem";

/**
 * Normalize an address to its checksum form.
 * Returns undefined for missing, malformed or zero addresses.
 */
export function normalizeAddress(
  value: string | null | undefined
): Address | undefined {
  if (!value || !isAddress(value, { strict: false })) return undefined;
  const address = getAddress(value);
  return address === zeroAddress ? undefined : address;
}

/**
 * Parse a decimal unit amount. Returns undefined when the value is not a
 * non-negative integer.
 */
export function parseUnits(value: unknown): bigint | undefined {
  if (typeof value === "bigint") return value >= 0n ? value : undefined;
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : undefined;
  }
  if (typeof value !== "string" || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return BigInt(value.trim());
}
