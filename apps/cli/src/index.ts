#!/usr/bin/env -S npx tsx
import dotenv from "dotenv";
import fs from "fs";
import { fileURLToPath } from "url";
import { errorMessage, getLogger } from "@expense-summary/core";
import { run } from "./cli";

// Load env from repo root first, then allow app-local overrides
const rootEnv = fileURLToPath(new URL("../../../.env", import.meta.url));
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const logger = getLogger("cli");
try {
  process.exitCode = await run(process.argv.slice(2), { logger });
} catch (e) {
  logger.error("cli.error", { error: errorMessage(e) });
  process.exitCode = 1;
}
