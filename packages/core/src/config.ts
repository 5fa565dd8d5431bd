import { getLogger } from "./logger";

export const DEFAULT_SUMMARY_PAGES = 2;

export interface CoreConfig {
  // Leading pages whose text is searched for the summary fields
  summaryPages: number;
}

export function parsePositiveInt(raw: string | undefined): number | null {
  if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) return null;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n >= 1 ? n : null;
}

export function loadCoreConfig(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  const raw = env.SUMMARY_PAGES;
  const summaryPages = parsePositiveInt(raw);
  if (raw !== undefined && summaryPages === null) {
    getLogger("core").warn("config.invalid", { key: "SUMMARY_PAGES", value: raw, fallback: DEFAULT_SUMMARY_PAGES });
  }
  return { summaryPages: summaryPages ?? DEFAULT_SUMMARY_PAGES };
}
