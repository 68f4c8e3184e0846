import type { Address } from "viem";
import { validateTokenFormat } from "./tokens.js";
import type { TokenStorage } from "./storage/interface.js";

/**
 * Authenticated caller
 */
export interface AuthContext {
  tokenId: string;
  caller: Address;
}

export type AuthErrorCode =
  | "MISSING_TOKEN"
  | "INVALID_TOKEN"
  | "EXPIRED_TOKEN"
  | "INACTIVE_TOKEN";

export type ValidationResult =
  | { valid: true; context: AuthContext }
  | { valid: false; error: { code: AuthErrorCode; message: string } };

const BEARER_PREFIX = /^bearer\s+/i;

/**
 * Bearer token validator
 * Resolves an Authorization header to the caller address bound to the token
 */
export class BearerTokenValidator {
  constructor(private storage: TokenStorage) {}

  async validate(
    authHeader: string | null | undefined
  ): Promise<ValidationResult> {
    const header = authHeader?.trim();
    if (!header) {
      return invalid(
        "MISSING_TOKEN",
        "Authorization header missing. Expected: Bearer <token>"
      );
    }

    if (!BEARER_PREFIX.test(header)) {
      return invalid(
        "INVALID_TOKEN",
        "Invalid authorization header format. Expected: Bearer <token>"
      );
    }

    const token = header.replace(BEARER_PREFIX, "").trim();
    if (!validateTokenFormat(token)) {
      return invalid(
        "INVALID_TOKEN",
        "Invalid token format. Expected: led_{test|live}_{24-char-base58}"
      );
    }

    const record = await this.storage.findByToken(token);
    if (!record) {
      return invalid("INVALID_TOKEN", "Token not found");
    }

    if (!record.isActive) {
      return invalid("INACTIVE_TOKEN", "Token has been revoked");
    }

    if (record.expiresAt && record.expiresAt.getTime() < Date.now()) {
      return invalid(
        "EXPIRED_TOKEN",
        `Token expired at ${record.expiresAt.toISOString()}`
      );
    }

    await this.storage.touchToken(record.id);

    return {
      valid: true,
      context: { tokenId: record.id, caller: record.address },
    };
  }
}

function invalid(code: AuthErrorCode, message: string): ValidationResult {
  return { valid: false, error: { code, message } };
}
