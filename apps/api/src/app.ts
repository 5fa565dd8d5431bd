import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import {
  assembleRecord,
  DocumentFailure,
  errorMessage,
  exportFileName,
  EXPORT_MIME,
  exportRecords,
  ExtractedRecord,
  getLogger,
  guessAdapter,
  isExportFormat,
  Logger,
  NothingToExportError,
  PageDocument,
  runBatch,
  SourceDocument,
  splitPdfPages,
} from "@expense-summary/core";
import { ApiConfig } from "./config";
import { batchRequestSchema, BatchRequest, describeIssues, extractTextSchema } from "./schemas";

type JobStatus = "queued" | "processing" | "done" | "failed";

interface JobRecord {
  id: string;
  status: JobStatus;
  created_at: string;
  split_pages: boolean;
  progress: { processed: number; total: number };
  records: ExtractedRecord[];
  failures: DocumentFailure[];
  warnings: string[];
  pages: PageDocument[];
  error?: string;
}

function jobView(job: JobRecord) {
  const { pages, ...rest } = job;
  return { ...rest, pages_available: pages.length };
}

function requestId(res: Response): string {
  const id: unknown = res.locals.req_id;
  return typeof id === "string" ? id : "";
}

export function createApp(config: ApiConfig, logger: Logger = getLogger("api")): express.Express {
  const app = express();
  app.use(express.json({ limit: config.bodyLimit }));
  app.use(cors());
  app.use(helmet());
  // Job polling and successful responses would drown the access log
  app.use(morgan<Request, Response>("dev", {
    skip: (req, res) => req.path.startsWith("/jobs") || res.statusCode < 400,
  }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    // Attach a simple request id for correlation if provided or create one
    const header = req.headers["x-request-id"];
    res.locals.req_id = typeof header === "string" && header ? header : uuidv4();
    next();
  });

  // In-memory job store; nothing outlives the process
  const jobs = new Map<string, JobRecord>();

  async function processBatch(job: JobRecord, body: BatchRequest, documents: SourceDocument[]) {
    const log = logger.child({ job_id: job.id });
    try {
      job.status = "processing";
      const result = await runBatch(documents, {
        maxPages: body.max_pages ?? config.summaryPages,
        logger: log,
        onProgress: (e) => {
          if (e.type !== "document.start") job.progress.processed = e.index + 1;
        },
      });
      job.records = result.records;
      job.failures = result.failures;

      if (body.split_pages) {
        const unreadable = new Set(result.failures.map((f) => f.source_name));
        for (const doc of documents) {
          if (unreadable.has(doc.name) || guessAdapter(doc.name, doc.mime, doc.data) !== "pdf") continue;
          try {
            job.pages.push(...(await splitPdfPages(doc)));
          } catch (e) {
            job.warnings.push(`Could not split ${doc.name}: ${errorMessage(e)}`);
            log.warn("batch.split.failed", { document: doc.name, error: errorMessage(e) });
          }
        }
      }

      job.status = "done";
      log.info("batch.job.done", { records: job.records.length, failures: job.failures.length, pages: job.pages.length });
    } catch (e) {
      job.status = "failed";
      job.error = errorMessage(e);
      log.error("batch.job.error", { error: job.error });
    }
  }

  app.get("/health", (_req: Request, res: Response) => res.json({ ok: true }));

  // POST /extract { text, name? } -> record for ad-hoc text
  app.post("/extract", (req: Request, res: Response) => {
    const parsed = extractTextSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: describeIssues(parsed.error) });
    const record = assembleRecord(parsed.data.name ?? "text", parsed.data.text);
    logger.debug("extract.text", { req_id: requestId(res), chars: parsed.data.text.length });
    return res.json(record);
  });

  // POST /batches { files: [{ name, mime?, data_base64 }], max_pages?, split_pages? } -> { job_id, total }
  app.post("/batches", async (req: Request, res: Response) => {
    const parsed = batchRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: describeIssues(parsed.error) });
    const body = parsed.data;

    const documents: SourceDocument[] = body.files.map((f) => ({
      name: f.name,
      mime: f.mime,
      data: Buffer.from(f.data_base64, "base64"),
    }));
    const job: JobRecord = {
      id: uuidv4(),
      status: "queued",
      created_at: new Date().toISOString(),
      split_pages: body.split_pages,
      progress: { processed: 0, total: documents.length },
      records: [],
      failures: [],
      warnings: [],
      pages: [],
    };
    jobs.set(job.id, job);
    logger.info("batch.job.start", { job_id: job.id, req_id: requestId(res), files: documents.length, split_pages: body.split_pages });
    res.json({ job_id: job.id, total: documents.length });

    await processBatch(job, body, documents);
  });

  app.get("/jobs/:id", (req: Request, res: Response) => {
    const job = jobs.get(req.params.id);
    if (!job) return res.status(404).json({ error: "not_found" });
    return res.json(jobView(job));
  });

  // GET /jobs/:id/export?format=xlsx|csv
  app.get("/jobs/:id/export", (req: Request, res: Response) => {
    const job = jobs.get(req.params.id);
    if (!job) return res.status(404).json({ error: "not_found" });
    const fmt = req.query.format ?? "xlsx";
    if (!isExportFormat(fmt)) return res.status(400).json({ error: "unsupported_format" });
    if (job.status !== "done") return res.status(409).json({ error: "job_not_done", status: job.status });

    try {
      const body = exportRecords(job.records, fmt);
      res.setHeader("Content-Type", EXPORT_MIME[fmt]);
      res.setHeader("Content-Disposition", `attachment; filename="${exportFileName(fmt)}"`);
      return res.send(body);
    } catch (e) {
      if (e instanceof NothingToExportError) {
        return res.status(422).json({ error: "nothing_to_export", message: e.message });
      }
      logger.error("export.error", { job_id: job.id, error: errorMessage(e) });
      return res.status(500).json({ error: errorMessage(e) });
    }
  });

  app.get("/jobs/:id/pages", (req: Request, res: Response) => {
    const job = jobs.get(req.params.id);
    if (!job) return res.status(404).json({ error: "not_found" });
    if (job.status !== "done") return res.status(409).json({ error: "job_not_done", status: job.status });
    return res.json(job.pages.map((p) => ({
      source_name: p.source_name,
      page_no: p.page_no,
      name: p.name,
      data_base64: Buffer.from(p.data).toString("base64"),
    })));
  });

  return app;
}
