import type { Address } from "viem";
import { normalizeAddress } from "../address.js";
import { ledgerFailure, type LedgerResult } from "../errors.js";
import type { AuditLog } from "./audit.js";
import type { LedgerStore } from "./store.js";

/**
 * Two-step ownership handoff.
 *
 * The current owner nominates a successor, who must accept before the
 * handoff takes effect. Only the owner may configure the consuming engine.
 */
export class OwnershipControl {
  constructor(
    private store: LedgerStore,
    private audit: AuditLog
  ) {}

  /**
   * Install the initial owner on a store that has none.
   * A store that already has an owner keeps it.
   */
  initialize(owner: string): void {
    if (this.store.getOwner()) return;
    const normalized = normalizeAddress(owner);
    if (!normalized) {
      throw new Error(`Invalid ledger owner address: ${owner}`);
    }
    this.store.setOwner(normalized);
    this.audit.append({
      type: "ownership_transferred",
      previousOwner: null,
      owner: normalized,
    });
  }

  isOwner(caller: string): boolean {
    const owner = this.store.getOwner();
    return owner !== undefined && normalizeAddress(caller) === owner;
  }

  transferOwnership(
    caller: string,
    newOwner: string
  ): LedgerResult<{ pendingOwner: Address }> {
    const owner = this.store.getOwner();
    if (!owner || normalizeAddress(caller) !== owner) {
      return ledgerFailure("not_owner");
    }

    const pendingOwner = normalizeAddress(newOwner);
    if (!pendingOwner) return ledgerFailure("invalid_address");

    this.store.setPendingOwner(pendingOwner);
    this.audit.append({ type: "ownership_transfer_started", owner, pendingOwner });
    return { success: true, pendingOwner };
  }

  acceptOwnership(caller: string): LedgerResult<{ owner: Address }> {
    const pending = this.store.getPendingOwner();
    if (!pending || normalizeAddress(caller) !== pending) {
      return ledgerFailure("not_pending_owner");
    }

    const previousOwner = this.store.getOwner() ?? null;
    this.store.setOwner(pending);
    this.store.setPendingOwner(undefined);
    this.audit.append({ type: "ownership_transferred", previousOwner, owner: pending });
    return { success: true, owner: pending };
  }
}
