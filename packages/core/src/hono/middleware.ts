import type { MiddlewareHandler } from "hono";
import type { Address } from "viem";

import { normalizeAddress } from "../address.js";
import { InMemoryTokenStorage } from "../auth/storage/memory.js";
import type { TokenStorage } from "../auth/storage/interface.js";
import { BearerTokenValidator } from "../auth/validator.js";

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface LedgerAuthConfig {
  /**
   * When false, the caller is taken from the `X-Caller-Address` header.
   * Only for local development.
   */
  enabled?: boolean;
  storage?: TokenStorage;
}

declare module "hono" {
  interface ContextVariableMap {
    caller: Address | null;
  }
}

export const CALLER_HEADER = "x-caller-address";

// -----------------------------------------------------------------------------
// Middleware Factory
// -----------------------------------------------------------------------------

/**
 * Resolve the request's caller address, or answer 401.
 *
 * @example
 * ```typescript
 * const auth = createLedgerAuthMiddleware({ storage });
 * app.post("/sponsor", auth, (c) => c.json({ caller: c.get("caller") }));
 * ```
 */
export function createLedgerAuthMiddleware(
  config: LedgerAuthConfig = {}
): MiddlewareHandler {
  const enabled = config.enabled !== false;
  const validator = new BearerTokenValidator(
    config.storage ?? new InMemoryTokenStorage()
  );

  return async (c, next) => {
    c.set("caller", null);

    if (!enabled) {
      const caller = normalizeAddress(c.req.header(CALLER_HEADER));
      if (!caller) {
        return c.json(
          {
            error: "Unauthorized",
            message: `Missing or invalid ${CALLER_HEADER} header`,
          },
          401
        );
      }
      c.set("caller", caller);
      await next();
      return;
    }

    const result = await validator.validate(c.req.header("authorization"));
    if (!result.valid) {
      return c.json(
        {
          error: "Unauthorized",
          message: result.error.message,
          code: result.error.code,
        },
        401
      );
    }

    c.set("caller", result.context.caller);
    await next();
  };
}
