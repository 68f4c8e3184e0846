/**
 * Ledger failure codes.
 *
 * Every failing operation leaves the ledger untouched and reports one of
 * these codes to the caller.
 */
export type LedgerErrorCode =
  | "invalid_address"
  | "self_sponsorship_forbidden"
  | "asset_not_eligible"
  | "sponsor_locked"
  | "unauthorized_caller"
  | "invalid_amount"
  | "insufficient_balance"
  | "cap_exceeded"
  | "nothing_to_forfeit"
  | "not_empty"
  | "zero_received"
  | "transfer_failed"
  | "reentrant_call"
  | "not_owner"
  | "not_pending_owner";

/**
 * Human-readable messages for ledger errors.
 */
export const LEDGER_ERROR_MESSAGES: Record<LedgerErrorCode, string> = {
  invalid_address: "Address is missing, malformed or the zero address",
  self_sponsorship_forbidden: "A beneficiary cannot sponsor itself",
  asset_not_eligible: "Asset is not listed or is disabled",
  sponsor_locked:
    "Beneficiary is locked to another sponsor while it holds a balance",
  unauthorized_caller: "Caller is not the configured consuming engine",
  invalid_amount: "Amount must be greater than zero",
  insufficient_balance: "Amount exceeds the beneficiary's balance",
  cap_exceeded: "Sponsorship would exceed the asset's cumulative cap",
  nothing_to_forfeit: "Nothing to clear or forfeit",
  not_empty: "Beneficiary still holds a positive balance",
  zero_received: "The sink received nothing from the transfer",
  transfer_failed: "Asset transfer into the sink failed",
  reentrant_call: "Ledger operation re-entered while another was running",
  not_owner: "Caller is not the ledger owner",
  not_pending_owner: "Caller is not the pending ledger owner",
};

export type LedgerErrorStatus = 400 | 403 | 409 | 422 | 502;

/**
 * HTTP status codes for ledger errors.
 */
export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, LedgerErrorStatus> = {
  invalid_address: 400,
  self_sponsorship_forbidden: 400,
  asset_not_eligible: 422,
  sponsor_locked: 409,
  unauthorized_caller: 403,
  invalid_amount: 400,
  insufficient_balance: 422,
  cap_exceeded: 422,
  nothing_to_forfeit: 422,
  not_empty: 409,
  zero_received: 422,
  transfer_failed: 502,
  reentrant_call: 409,
  not_owner: 403,
  not_pending_owner: 403,
};

export type LedgerFailure = {
  success: false;
  error: LedgerErrorCode;
  message: string;
};

/**
 * Result of a ledger operation.
 */
export type LedgerResult<T extends object = Record<never, never>> =
  | ({ success: true } & T)
  | LedgerFailure;

export function ledgerFailure(error: LedgerErrorCode): LedgerFailure {
  return { success: false, error, message: LEDGER_ERROR_MESSAGES[error] };
}

/**
 * Extract a human-readable error message from an unknown error.
 */
export function errorSummary(error: unknown): string {
  if (!error) return "unknown_error";
  if (typeof error === "string") return error;
  if (error instanceof Error) {
    const withShort = error as Error & { shortMessage?: unknown };
    if (typeof withShort.shortMessage === "string") return withShort.shortMessage;
    return error.message;
  }

  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
