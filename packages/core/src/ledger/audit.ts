import type { Address } from "viem";
import type { AuditRecord, LedgerEvent, LedgerEventType } from "../types.js";

export interface AuditQuery {
  beneficiary?: Address;
  type?: LedgerEventType;
  /** Most recent records first, capped at this many. */
  limit?: number;
}

/**
 * Append-only audit log of ledger events.
 */
export interface AuditLog {
  append(event: LedgerEvent): AuditRecord;
  list(query?: AuditQuery): AuditRecord[];
}

/**
 * In-memory audit log
 * WARNING: All records are lost on process restart
 */
export class InMemoryAuditLog implements AuditLog {
  private records: AuditRecord[] = [];

  append(event: LedgerEvent): AuditRecord {
    const record: AuditRecord = {
      ...event,
      sequence: this.records.length + 1,
      at: new Date(),
    };
    this.records.push(record);
    return record;
  }

  list(query: AuditQuery = {}): AuditRecord[] {
    const matching = this.records.filter((record) => {
      if (query.type && record.type !== query.type) return false;
      if (query.beneficiary) {
        return "beneficiary" in record && record.beneficiary === query.beneficiary;
      }
      return true;
    });

    const newestFirst = matching.reverse();
    return query.limit !== undefined
      ? newestFirst.slice(0, query.limit)
      : newestFirst;
  }
}

/**
 * Convert an audit record to a JSON-safe object.
 * BigInt fields become decimal strings.
 */
export function formatAuditRecord(
  record: AuditRecord
): Record<string, string | number | boolean | null> {
  const out: Record<string, string | number | boolean | null> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "bigint") {
      out[key] = value.toString();
    } else if (value instanceof Date) {
      out[key] = value.toISOString();
    } else if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean" ||
      value === null
    ) {
      out[key] = value;
    }
  }
  return out;
}
