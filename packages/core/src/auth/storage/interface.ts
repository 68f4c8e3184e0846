import type { Address } from "viem";

/**
 * API token bound to a ledger caller address.
 */
export interface CallerToken {
  id: string;
  tokenHash: string;
  address: Address;
  name: string | null;
  isActive: boolean;
  createdAt: Date;
  expiresAt: Date | null;
  lastUsedAt: Date | null;
}

export interface CreateTokenInput {
  address: Address;
  name?: string;
  expiresAt?: Date | null;
  /** Use a known token string instead of generating one. */
  token?: string;
}

/**
 * Token storage interface
 *
 * Only token hashes are kept; the plaintext is returned once, at creation.
 */
export interface TokenStorage {
  /** Look up by plaintext token. Returns null if unknown. */
  findByToken(token: string): Promise<CallerToken | null>;

  createToken(
    input: CreateTokenInput,
    environment: "test" | "live"
  ): Promise<{ token: string; record: CallerToken }>;

  /** Soft delete - set isActive = false */
  revokeToken(id: string): Promise<void>;

  touchToken(id: string): Promise<void>;
}
