import { serve } from "@hono/node-server";

import { config } from "./config.js";
import { createLedgerApp } from "./setup.js";

const { app } = await createLedgerApp(config);

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.info(`🚀 Sponsorship ledger listening on http://localhost:${info.port}`);
});
