import { randomUUID } from "node:crypto";
import { generateToken, hashToken, validateTokenFormat } from "../tokens.js";
import type { CallerToken, CreateTokenInput, TokenStorage } from "./interface.js";

/**
 * In-memory token storage, keyed by token hash
 * WARNING: All data is lost on process restart
 */
export class InMemoryTokenStorage implements TokenStorage {
  private tokens = new Map<string, CallerToken>();

  async findByToken(token: string): Promise<CallerToken | null> {
    return this.tokens.get(hashToken(token)) ?? null;
  }

  async createToken(
    input: CreateTokenInput,
    environment: "test" | "live"
  ): Promise<{ token: string; record: CallerToken }> {
    const token = input.token ?? generateToken(environment);
    if (!validateTokenFormat(token)) {
      throw new Error("Invalid token format. Expected: led_{test|live}_{24-char-base58}");
    }

    const tokenHash = hashToken(token);
    if (this.tokens.has(tokenHash)) {
      throw new Error("Token already registered");
    }

    const record: CallerToken = {
      id: randomUUID(),
      tokenHash,
      address: input.address,
      name: input.name ?? null,
      isActive: true,
      createdAt: new Date(),
      expiresAt: input.expiresAt ?? null,
      lastUsedAt: null,
    };

    this.tokens.set(tokenHash, record);
    return { token, record };
  }

  async revokeToken(id: string): Promise<void> {
    this.update(id, { isActive: false });
  }

  async touchToken(id: string): Promise<void> {
    this.update(id, { lastUsedAt: new Date() });
  }

  private update(id: string, data: Partial<CallerToken>): void {
    const record = Array.from(this.tokens.values()).find((t) => t.id === id);
    if (!record) {
      throw new Error(`Token not found: ${id}`);
    }
    this.tokens.set(record.tokenHash, { ...record, ...data, id, tokenHash: record.tokenHash });
  }
}
