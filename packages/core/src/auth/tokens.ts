import crypto from "node:crypto";

/**
 * Base58 alphabet - excludes confusing characters (0, O, I, l)
 */
const BASE58_ALPHABET =
  "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";

const TOKEN_PATTERN = new RegExp(`^led_(test|live)_[${BASE58_ALPHABET}]{24}$`);

export type TokenEnvironment = "test" | "live";

function randomBase58(length: number): string {
  const bytes = crypto.randomBytes(length);
  return Array.from(bytes, (byte) => BASE58_ALPHABET[byte % BASE58_ALPHABET.length]).join("");
}

/**
 * Generate a caller API token.
 *
 * @example
 * generateToken("test") => "led_test_4x7k2n9m3p1q8w5e6r2t9y4u"
 */
export function generateToken(environment: TokenEnvironment): string {
  return `led_${environment}_${randomBase58(24)}`;
}

/**
 * SHA-256 hex digest of a token, used as its lookup key.
 */
export function hashToken(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}

export function validateTokenFormat(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}
