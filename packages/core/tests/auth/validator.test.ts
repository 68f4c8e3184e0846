import { describe, test, expect, beforeEach } from "vitest";
import { BearerTokenValidator } from "../../src/auth/validator.js";
import { InMemoryTokenStorage } from "../../src/auth/storage/memory.js";
import { createAuthConfig } from "../../src/auth/config.js";
import { SPONSOR } from "../fixtures.js";

describe("BearerTokenValidator", () => {
  let validator: BearerTokenValidator;
  let storage: InMemoryTokenStorage;

  beforeEach(() => {
    storage = new InMemoryTokenStorage();
    validator = new BearerTokenValidator(storage);
  });

  describe("Valid Token", () => {
    test("resolves the caller bound to the token", async () => {
      const { token, record } = await storage.createToken({ address: SPONSOR }, "test");

      const result = await validator.validate(`Bearer ${token}`);

      expect(result).toEqual({
        valid: true,
        context: { tokenId: record.id, caller: SPONSOR },
      });
    });

    test("updates lastUsedAt on validation", async () => {
      const { token } = await storage.createToken({ address: SPONSOR }, "test");

      await validator.validate(`Bearer ${token}`);

      const updated = await storage.findByToken(token);
      expect(updated?.lastUsedAt).toBeInstanceOf(Date);
    });

    test("accepts Bearer with different casing", async () => {
      const { token } = await storage.createToken({ address: SPONSOR }, "test");

      for (const scheme of ["Bearer", "bearer", "BEARER"]) {
        const result = await validator.validate(`${scheme} ${token}`);
        expect(result.valid).toBe(true);
      }
    });

    test("accepts a token that has not yet expired", async () => {
      const { token } = await storage.createToken(
        { address: SPONSOR, expiresAt: new Date(Date.now() + 60_000) },
        "live"
      );

      expect((await validator.validate(`Bearer ${token}`)).valid).toBe(true);
    });
  });

  describe("Rejected Token", () => {
    test("rejects missing authorization header", async () => {
      expect(await validator.validate(null)).toEqual({
        valid: false,
        error: {
          code: "MISSING_TOKEN",
          message: "Authorization header missing. Expected: Bearer <token>",
        },
      });
      expect((await validator.validate("   ")).valid).toBe(false);
    });

    test("rejects a non-bearer scheme", async () => {
      const result = await validator.validate("Basic dXNlcjpwYXNz");

      expect(result).toEqual({
        valid: false,
        error: {
          code: "INVALID_TOKEN",
          message: "Invalid authorization header format. Expected: Bearer <token>",
        },
      });
    });

    test("rejects a malformed token", async () => {
      const result = await validator.validate("Bearer led_test_short");

      expect(result).toEqual({
        valid: false,
        error: {
          code: "INVALID_TOKEN",
          message: "Invalid token format. Expected: led_{test|live}_{24-char-base58}",
        },
      });
    });

    test("rejects an unknown token", async () => {
      const result = await validator.validate("Bearer led_test_abcdefghijkmnopqrstuvwxy");

      expect(result).toEqual({
        valid: false,
        error: { code: "INVALID_TOKEN", message: "Token not found" },
      });
    });

    test("rejects a revoked token", async () => {
      const { token, record } = await storage.createToken({ address: SPONSOR }, "test");
      await storage.revokeToken(record.id);

      const result = await validator.validate(`Bearer ${token}`);

      expect(result).toEqual({
        valid: false,
        error: { code: "INACTIVE_TOKEN", message: "Token has been revoked" },
      });
    });

    test("rejects an expired token", async () => {
      const expiresAt = new Date("2020-01-01T00:00:00.000Z");
      const { token } = await storage.createToken({ address: SPONSOR, expiresAt }, "test");

      const result = await validator.validate(`Bearer ${token}`);

      expect(result).toEqual({
        valid: false,
        error: {
          code: "EXPIRED_TOKEN",
          message: "Token expired at 2020-01-01T00:00:00.000Z",
        },
      });
    });
  });
});

describe("createAuthConfig", () => {
  test("enables auth by default", () => {
    expect(createAuthConfig({})).toEqual({ enabled: true });
  });

  test("disables auth only for the literal false", () => {
    expect(createAuthConfig({ AUTH_ENABLED: "false" })).toEqual({ enabled: false });
    expect(createAuthConfig({ AUTH_ENABLED: "0" })).toEqual({ enabled: true });
  });
});
