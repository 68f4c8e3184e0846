import { Hono, type Context } from "hono";
import type { Address } from "viem";

import { normalizeAddress, parseUnits } from "../address.js";
import {
  LEDGER_ERROR_STATUS,
  type LedgerFailure,
  type LedgerResult,
} from "../errors.js";
import { formatAccount } from "../ledger/account.js";
import { formatAuditRecord } from "../ledger/audit.js";
import type { ForfeitSummary } from "../ledger/core.js";
import type { LedgerModule } from "../ledger/module.js";
import type { LedgerEventType } from "../types.js";
import { createLedgerAuthMiddleware, type LedgerAuthConfig } from "./middleware.js";

export interface LedgerRoutesConfig {
  auth?: LedgerAuthConfig;
  /** Maximum records returned by GET /audit. Defaults to 100. */
  maxAuditRecords?: number;
}

const AUDIT_TYPES: readonly LedgerEventType[] = [
  "engine_configured",
  "sponsored",
  "sponsored_received",
  "consumed",
  "forfeited",
  "sponsor_cleared",
  "sponsor_cleared_with_forfeit",
  "ownership_transfer_started",
  "ownership_transferred",
];

function isAuditType(value: string): value is LedgerEventType {
  return AUDIT_TYPES.some((type) => type === value);
}

// -----------------------------------------------------------------------------
// Request helpers
// -----------------------------------------------------------------------------

async function readBody(c: Context): Promise<Record<string, unknown> | undefined> {
  try {
    const body: unknown = await c.req.json();
    return typeof body === "object" && body !== null && !Array.isArray(body)
      ? { ...body }
      : undefined;
  } catch {
    return undefined;
  }
}

function badRequest(c: Context, message: string) {
  return c.json({ error: "invalid_request", message }, 400);
}

function failure(c: Context, result: LedgerFailure) {
  return c.json(
    { error: result.error, message: result.message },
    LEDGER_ERROR_STATUS[result.error]
  );
}

function callerOf(c: Context): Address | undefined {
  return c.get("caller") ?? undefined;
}

function unauthenticated(c: Context) {
  return c.json({ error: "Unauthorized", message: "Authentication required" }, 401);
}

/**
 * Body fields shared by sponsor and consume.
 */
function readTransferFields(body: Record<string, unknown>) {
  const beneficiary = typeof body.beneficiary === "string" ? body.beneficiary : undefined;
  const asset = typeof body.asset === "string" ? body.asset : undefined;
  const amount = typeof body.amount === "string" ? parseUnits(body.amount) : undefined;
  if (beneficiary === undefined || asset === undefined || amount === undefined) {
    return undefined;
  }
  return { beneficiary, asset, amount };
}

// -----------------------------------------------------------------------------
// Routes
// -----------------------------------------------------------------------------

/**
 * HTTP surface for a ledger module.
 *
 * Read routes are public. Mutating routes act as the authenticated caller.
 * Amounts travel as decimal strings.
 */
export function createLedgerRoutes(
  ledgerModule: LedgerModule,
  config: LedgerRoutesConfig = {}
): Hono {
  const { ledger, audit, registry } = ledgerModule;
  const auth = createLedgerAuthMiddleware(config.auth);
  const maxAuditRecords = config.maxAuditRecords ?? 100;
  const app = new Hono();

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  app.get("/beneficiaries/:address", (c) => {
    const account = ledger.getAccount(c.req.param("address"));
    if (!account) return badRequest(c, "Invalid beneficiary address");
    return c.json(formatAccount(account));
  });

  app.get("/beneficiaries/:address/balances/:asset", (c) => {
    const beneficiary = normalizeAddress(c.req.param("address"));
    const asset = normalizeAddress(c.req.param("asset"));
    if (!beneficiary || !asset) return badRequest(c, "Invalid address");
    return c.json({
      beneficiary,
      asset,
      balance: ledger.balanceOf(beneficiary, asset).toString(),
    });
  });

  app.get("/assets/:asset/totals", (c) => {
    const asset = normalizeAddress(c.req.param("asset"));
    if (!asset) return badRequest(c, "Invalid asset address");
    const eligibility = registry.lookup(asset);
    return c.json({
      asset,
      cumulativeSponsored: ledger.cumulativeSponsored(asset).toString(),
      listed: eligibility?.listed ?? false,
      enabled: eligibility?.enabled ?? false,
      capUnits: eligibility?.capUnits?.toString() ?? null,
    });
  });

  app.get("/engine", (c) =>
    c.json({
      engine: ledger.consumingEngine(),
      owner: ledger.owner(),
      pendingOwner: ledger.pendingOwner(),
    })
  );

  app.get("/audit", (c) => {
    const limitParam = c.req.query("limit");
    const limit = limitParam === undefined ? maxAuditRecords : Number(limitParam);
    if (!Number.isInteger(limit) || limit < 1) {
      return badRequest(c, "limit must be a positive integer");
    }

    const beneficiaryParam = c.req.query("beneficiary");
    const beneficiary = beneficiaryParam ? normalizeAddress(beneficiaryParam) : undefined;
    if (beneficiaryParam && !beneficiary) {
      return badRequest(c, "Invalid beneficiary address");
    }

    const typeParam = c.req.query("type");
    if (typeParam !== undefined && !isAuditType(typeParam)) {
      return badRequest(c, `Unknown record type: ${typeParam}`);
    }

    const records = audit.list({
      beneficiary,
      type: typeParam,
      limit: Math.min(limit, maxAuditRecords),
    });
    return c.json({ records: records.map(formatAuditRecord) });
  });

  // ---------------------------------------------------------------------------
  // Sponsor & consume
  // ---------------------------------------------------------------------------

  app.post("/sponsor", auth, async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const body = await readBody(c);
    const fields = body ? readTransferFields(body) : undefined;
    if (!fields) {
      return badRequest(c, "Expected { beneficiary, asset, amount } with amount as a decimal string");
    }

    const result = await ledger.sponsor(caller, fields);
    if (!result.success) return failure(c, result);

    console.info(
      `[Ledger] Sponsored ${result.beneficiary}: requested=${result.requested} received=${result.received} asset=${result.asset}`
    );
    return c.json({
      sponsor: result.sponsor,
      beneficiary: result.beneficiary,
      asset: result.asset,
      requested: result.requested.toString(),
      received: result.received.toString(),
      newBalance: result.newBalance.toString(),
      sponsorAssigned: result.sponsorAssigned,
    });
  });

  app.post("/consume", auth, async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const body = await readBody(c);
    const fields = body ? readTransferFields(body) : undefined;
    if (!fields) {
      return badRequest(c, "Expected { beneficiary, asset, amount } with amount as a decimal string");
    }

    const result = await ledger.consume(caller, fields);
    if (!result.success) return failure(c, result);

    return c.json({
      beneficiary: result.beneficiary,
      asset: result.asset,
      amount: result.amount.toString(),
      remaining: result.remaining.toString(),
    });
  });

  // ---------------------------------------------------------------------------
  // Clear & forfeit
  // ---------------------------------------------------------------------------

  app.post("/sponsor/clear", auth, async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const result = await ledger.clearSponsorIfEmpty(caller);
    if (!result.success) return failure(c, result);
    return c.json(result);
  });

  app.post("/sponsor/forfeit", auth, async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const body = await readBody(c);
    if (!body) return badRequest(c, "Expected { assets: string[] } or { all: true }");

    let result: LedgerResult<ForfeitSummary>;
    if (body.all === true) {
      result = await ledger.clearSponsorAndForfeitAll(caller);
    } else if (
      Array.isArray(body.assets) &&
      body.assets.every((asset): asset is string => typeof asset === "string")
    ) {
      result = await ledger.clearSponsorAndForfeit(caller, body.assets);
    } else {
      return badRequest(c, "Expected { assets: string[] } or { all: true }");
    }

    if (!result.success) return failure(c, result);
    return c.json({
      beneficiary: result.beneficiary,
      assetsCleared: result.assetsCleared,
      totalForfeited: result.totalForfeited.toString(),
      sponsorCleared: result.sponsorCleared,
      forfeited: result.forfeited.map(({ asset, amount }) => ({
        asset,
        amount: amount.toString(),
      })),
    });
  });

  // ---------------------------------------------------------------------------
  // Admin
  // ---------------------------------------------------------------------------

  app.post("/admin/engine", auth, async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const body = await readBody(c);
    if (!body || typeof body.engine !== "string") {
      return badRequest(c, "Expected { engine }");
    }

    const result = await ledger.setConsumingEngine(caller, body.engine);
    if (!result.success) return failure(c, result);
    return c.json(result);
  });

  app.post("/admin/ownership/transfer", auth, async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const body = await readBody(c);
    if (!body || typeof body.newOwner !== "string") {
      return badRequest(c, "Expected { newOwner }");
    }

    const result = await ledger.transferOwnership(caller, body.newOwner);
    if (!result.success) return failure(c, result);
    return c.json(result);
  });

  app.post("/admin/ownership/accept", auth, async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const result = await ledger.acceptOwnership(caller);
    if (!result.success) return failure(c, result);
    return c.json(result);
  });

  return app;
}
