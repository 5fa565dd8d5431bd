export * from "./types";
export * from "./extract/index";
export * from "./ingest/index";
export * from "./export/index";
export * from "./split/index";
export { runBatch } from "./batch";
export type { BatchOptions } from "./batch";
export { DocumentReadError, NothingToExportError, errorMessage } from "./errors";
export { loadCoreConfig, parsePositiveInt, DEFAULT_SUMMARY_PAGES } from "./config";
export type { CoreConfig } from "./config";
export { getLogger, isLevel, isLogFormat } from "./logger";
export type { Logger, Level, LogFormat, LogContext } from "./logger";
