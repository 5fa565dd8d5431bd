import fs from "fs/promises";
import path from "path";
import { parseArgs } from "util";
import {
  errorMessage,
  exportFileName,
  ExportFormat,
  exportRecords,
  getLogger,
  guessAdapter,
  isExportFormat,
  loadCoreConfig,
  Logger,
  NothingToExportError,
  parsePositiveInt,
  runBatch,
  SourceDocument,
  splitPdfPages,
} from "@expense-summary/core";

export const USAGE = "Usage: expense-summary [--out FILE] [--format xlsx|csv] [--pages N] [--split-dir DIR] <files...>";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_NOTHING_TO_EXPORT = 2;

export interface RunOptions {
  cwd?: string;
  logger?: Logger;
  now?: Date;
}

interface CliArgs {
  files: string[];
  out?: string;
  format: ExportFormat;
  pages: number;
  splitDir?: string;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        out: { type: "string", short: "o" },
        format: { type: "string", short: "f" },
        pages: { type: "string", short: "p" },
        "split-dir": { type: "string" },
      },
    });
  } catch (e) {
    throw new UsageError(errorMessage(e));
  }
}

function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseRaw(argv);
  if (positionals.length === 0) throw new UsageError("No input files given");

  // Without --format, a .csv output path selects csv
  const format = values.format ?? (values.out && path.extname(values.out).toLowerCase() === ".csv" ? "csv" : "xlsx");
  if (!isExportFormat(format)) throw new UsageError(`Unsupported format: ${format}`);

  let pages = loadCoreConfig().summaryPages;
  if (values.pages !== undefined) {
    const n = parsePositiveInt(values.pages);
    if (n === null) throw new UsageError(`--pages must be a whole number of at least 1, got ${values.pages}`);
    pages = n;
  }

  return { files: positionals, out: values.out, format, pages, splitDir: values["split-dir"] };
}

async function loadDocuments(files: string[], cwd: string, log: Logger): Promise<SourceDocument[]> {
  const documents: SourceDocument[] = [];
  for (const file of files) {
    try {
      documents.push({ name: path.basename(file), data: await fs.readFile(path.resolve(cwd, file)) });
    } catch (e) {
      log.warn("cli.file.unreadable", { file, error: errorMessage(e) });
    }
  }
  return documents;
}

async function writePages(documents: SourceDocument[], skip: Set<string>, dir: string, log: Logger): Promise<number> {
  await fs.mkdir(dir, { recursive: true });
  let written = 0;
  for (const doc of documents) {
    if (skip.has(doc.name) || guessAdapter(doc.name, doc.mime, doc.data) !== "pdf") continue;
    try {
      for (const page of await splitPdfPages(doc)) {
        await fs.writeFile(path.join(dir, page.name), page.data);
        written++;
      }
    } catch (e) {
      log.warn("cli.split.failed", { document: doc.name, error: errorMessage(e) });
    }
  }
  return written;
}

/** Runs the command line and resolves to the process exit code. */
export async function run(argv: string[], opts: RunOptions = {}): Promise<number> {
  const log = opts.logger ?? getLogger("cli");
  const cwd = opts.cwd ?? process.cwd();

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    log.error(e.message);
    log.error(USAGE);
    return EXIT_USAGE;
  }

  const documents = await loadDocuments(args.files, cwd, log);
  const result = await runBatch(documents, {
    maxPages: args.pages,
    logger: log,
    onProgress: (e) => {
      if (e.type === "document.start") log.info("cli.progress", { document: e.name, step: `${e.index + 1}/${e.total}` });
    },
  });

  if (args.splitDir !== undefined) {
    const unreadable = new Set(result.failures.map((f) => f.source_name));
    const dir = path.resolve(cwd, args.splitDir);
    const written = await writePages(documents, unreadable, dir, log);
    log.info("cli.split.done", { dir, pages: written });
  }

  let body: Buffer;
  try {
    body = exportRecords(result.records, args.format);
  } catch (e) {
    if (!(e instanceof NothingToExportError)) throw e;
    log.warn(e.message);
    return EXIT_NOTHING_TO_EXPORT;
  }

  const out = path.resolve(cwd, args.out ?? exportFileName(args.format, opts.now));
  await fs.writeFile(out, body);
  log.info(`Successfully processed ${result.records.length} files`, { output: out, failures: result.failures.length });
  return EXIT_OK;
}
