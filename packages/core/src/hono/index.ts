/**
 * @sponsor-ledger/core/hono - Hono routes for the sponsorship ledger
 *
 * @example
 * ```typescript
 * import { Hono } from "hono";
 * import { createLedgerRoutes } from "@sponsor-ledger/core/hono";
 *
 * const app = new Hono();
 * app.route("/v1", createLedgerRoutes(ledgerModule, { auth: { storage } }));
 * ```
 */

export {
  createLedgerAuthMiddleware,
  CALLER_HEADER,
  type LedgerAuthConfig,
} from "./middleware.js";

export { createLedgerRoutes, type LedgerRoutesConfig } from "./routes.js";
