export type Level = "trace" | "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

interface BaseCtx {
  service?: string;
  job_id?: string;
  req_id?: string;
  document?: string;
}

interface LogOptions {
  level?: Level;
  format?: LogFormat;
  // Defaults to console.log; tests pass their own to capture entries
  sink?: (line: string) => void;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  child(ctx: BaseCtx): Logger;
  trace(msg: string, ctx?: LogContext): void;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVELS: Level[] = ["trace", "debug", "info", "warn", "error"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

function nowISO() { return new Date().toISOString(); }

export function isLevel(value: unknown): value is Level {
  return LEVELS.some((l) => l === value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === "json" || value === "pretty";
}

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const env = process.env;
  const lvl: Level = opts.level ?? (isLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info");
  const fmt: LogFormat = opts.format ?? (isLogFormat(env.LOG_FORMAT) ? env.LOG_FORMAT : "pretty");
  // eslint-disable-next-line no-console
  const sink = opts.sink ?? ((line: string) => console.log(line));

  function emit(base: BaseCtx, level: Level, msg: string, extra?: LogContext) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    if (fmt === "json") {
      sink(JSON.stringify({ ts: nowISO(), level, msg, ...base, ...(extra || {}) }));
      return;
    }
    const { service: svc, ...rest } = base;
    const ctx: LogContext = { ...rest, ...(extra || {}) };
    const head = `[${nowISO()}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    sink(`${head} - ${msg}${ctxStr}`);
  }

  function create(current: BaseCtx): Logger {
    return {
      child(ctx: BaseCtx) { return create({ ...current, ...ctx }); },
      trace(msg, ctx) { emit(current, "trace", msg, ctx); },
      debug(msg, ctx) { emit(current, "debug", msg, ctx); },
      info(msg, ctx) { emit(current, "info", msg, ctx); },
      warn(msg, ctx) { emit(current, "warn", msg, ctx); },
      error(msg, ctx) { emit(current, "error", msg, ctx); },
    };
  }

  return create({ service });
}
