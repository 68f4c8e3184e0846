import dotenv from "dotenv";
import { loadLedgerConfig, type LedgerConfig } from "@sponsor-ledger/core";

dotenv.config();

const result = loadLedgerConfig(process.env);

if (!result.ok) {
  console.error("❌ Invalid ledger configuration:");
  for (const error of result.errors) {
    console.error(`   ${error}`);
  }
  process.exit(1);
}

export const config: LedgerConfig = result.config;
