import { getLogger, loadCoreConfig, parsePositiveInt } from "@expense-summary/core";

export interface ApiConfig {
  port: number;
  bodyLimit: string;
  summaryPages: number;
}

const DEFAULT_PORT = 3001;
const DEFAULT_BODY_LIMIT = "25mb";

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const { summaryPages } = loadCoreConfig(env);
  const port = env.API_PORT === undefined ? DEFAULT_PORT : parsePositiveInt(env.API_PORT);
  if (port === null) {
    getLogger("api").warn("config.invalid", { key: "API_PORT", value: env.API_PORT, fallback: DEFAULT_PORT });
  }
  return {
    port: port ?? DEFAULT_PORT,
    bodyLimit: env.API_BODY_LIMIT?.trim() || DEFAULT_BODY_LIMIT,
    summaryPages,
  };
}
