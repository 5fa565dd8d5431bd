import dotenv from "dotenv";
import fs from "fs";
import { fileURLToPath } from "url";
import { getLogger } from "@expense-summary/core";
import { createApp } from "./app";
import { loadApiConfig } from "./config";

// Load env from repo root first, then allow app-local overrides
const rootEnv = fileURLToPath(new URL("../../../.env", import.meta.url));
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const logger = getLogger("api");
const config = loadApiConfig();
const app = createApp(config, logger);

app.listen(config.port, () => {
  logger.info("api.listen", { port: config.port, summary_pages: config.summaryPages });
});
