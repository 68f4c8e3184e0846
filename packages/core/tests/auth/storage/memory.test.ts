import { describe, test, expect, beforeEach } from "vitest";
import { InMemoryTokenStorage } from "../../../src/auth/storage/memory.js";
import { hashToken } from "../../../src/auth/tokens.js";
import { BENEFICIARY, SPONSOR } from "../../fixtures.js";

const KNOWN_TOKEN = "led_test_abcdefghijkmnopqrstuvwxy";

describe("InMemoryTokenStorage", () => {
  let storage: InMemoryTokenStorage;

  beforeEach(() => {
    storage = new InMemoryTokenStorage();
  });

  describe("createToken", () => {
    test("creates a token bound to the caller address", async () => {
      const { token, record } = await storage.createToken(
        { address: SPONSOR, name: "sponsor key" },
        "test"
      );

      expect(token).toMatch(/^led_test_/);
      expect(record.address).toBe(SPONSOR);
      expect(record.name).toBe("sponsor key");
      expect(record.isActive).toBe(true);
      expect(record.expiresAt).toBeNull();
      expect(record.lastUsedAt).toBeNull();
      expect(record.createdAt).toBeInstanceOf(Date);
    });

    test("stores only the hash of the token", async () => {
      const { token, record } = await storage.createToken({ address: SPONSOR }, "live");

      expect(token).toMatch(/^led_live_/);
      expect(record.tokenHash).toBe(hashToken(token));
      expect(record.name).toBeNull();
    });

    test("accepts a known token string", async () => {
      const { token } = await storage.createToken(
        { address: SPONSOR, token: KNOWN_TOKEN },
        "test"
      );

      expect(token).toBe(KNOWN_TOKEN);
    });

    test("rejects a malformed token string", async () => {
      await expect(
        storage.createToken({ address: SPONSOR, token: "led_test_short" }, "test")
      ).rejects.toThrow("Invalid token format. Expected: led_{test|live}_{24-char-base58}");
    });

    test("rejects a token registered twice", async () => {
      await storage.createToken({ address: SPONSOR, token: KNOWN_TOKEN }, "test");

      await expect(
        storage.createToken({ address: BENEFICIARY, token: KNOWN_TOKEN }, "test")
      ).rejects.toThrow("Token already registered");
    });

    test("generates unique ids", async () => {
      const first = await storage.createToken({ address: SPONSOR }, "test");
      const second = await storage.createToken({ address: SPONSOR }, "test");

      expect(first.record.id).not.toBe(second.record.id);
    });
  });

  describe("findByToken", () => {
    test("finds a token by its plaintext", async () => {
      const { token, record } = await storage.createToken({ address: SPONSOR }, "test");

      expect(await storage.findByToken(token)).toEqual(record);
    });

    test("returns null for an unknown token", async () => {
      expect(await storage.findByToken(KNOWN_TOKEN)).toBeNull();
    });
  });

  describe("revokeToken", () => {
    test("marks the token inactive", async () => {
      const { token, record } = await storage.createToken({ address: SPONSOR }, "test");

      await storage.revokeToken(record.id);

      const found = await storage.findByToken(token);
      expect(found?.isActive).toBe(false);
      expect(found?.id).toBe(record.id);
    });

    test("throws for an unknown id", async () => {
      await expect(storage.revokeToken("missing")).rejects.toThrow(
        "Token not found: missing"
      );
    });
  });

  describe("touchToken", () => {
    test("records the last use", async () => {
      const { token, record } = await storage.createToken({ address: SPONSOR }, "test");

      await storage.touchToken(record.id);

      const found = await storage.findByToken(token);
      expect(found?.lastUsedAt).toBeInstanceOf(Date);
    });
  });
});
