import fetch from 'node-fetch';
import { z } from 'zod';

export type ClientOptions = { baseUrl: string; apiKey?: string };

const amount = z.number().nullable();

export const extractedRecordSchema = z.object({
  source_name: z.string(),
  legal_entity: z.string().nullable(),
  currency: z.string().nullable(),
  amount_due_employee: amount,
  amount_due_company_card: amount,
  total_paid_by_company: amount,
});

export const jobViewSchema = z.object({
  id: z.string(),
  status: z.enum(['queued', 'processing', 'done', 'failed']),
  created_at: z.string(),
  split_pages: z.boolean(),
  progress: z.object({ processed: z.number(), total: z.number() }),
  records: z.array(extractedRecordSchema),
  failures: z.array(z.object({ source_name: z.string(), error: z.string() })),
  warnings: z.array(z.string()),
  pages_available: z.number(),
  error: z.string().optional(),
});

export const pageSchema = z.object({
  source_name: z.string(),
  page_no: z.number(),
  name: z.string(),
  data_base64: z.string(),
});

const submittedSchema = z.object({ job_id: z.string(), total: z.number() });
const errorBodySchema = z.object({ error: z.string() }).passthrough();

export type ExtractedRecordView = z.infer<typeof extractedRecordSchema>;
export type JobView = z.infer<typeof jobViewSchema>;
export type PageView = z.infer<typeof pageSchema>;
export type UploadFile = { name: string; data: Uint8Array; mime?: string };
export type BatchSubmitOptions = { maxPages?: number; splitPages?: boolean };
export type WaitOptions = { intervalMs?: number; timeoutMs?: number };

/** Non-2xx response; `code` carries the API's `error` field when present. */
export class ApiError extends Error {
  constructor(readonly status: number, readonly code: string, readonly body: unknown) {
    super(`Request failed with ${status}: ${code}`);
    this.name = 'ApiError';
  }
}

export class ExpenseSummaryClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  private async request<T>(path: string, schema: z.ZodType<T>, init: { method?: string; body?: unknown } = {}): Promise<T> {
    const r = await fetch(`${this.opts.baseUrl}${path}`, {
      method: init.method ?? 'GET',
      headers: this.headers(),
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
    });
    const json: unknown = await r.json();
    if (!r.ok) throw toApiError(r.status, json);
    return schema.parse(json);
  }

  async health() {
    return this.request('/health', z.object({ ok: z.boolean() }));
  }

  async extractText(text: string, name?: string): Promise<ExtractedRecordView> {
    return this.request('/extract', extractedRecordSchema, { method: 'POST', body: { text, name } });
  }

  async submitBatch(files: UploadFile[], opts: BatchSubmitOptions = {}) {
    const body = {
      files: files.map((f) => ({ name: f.name, mime: f.mime, data_base64: Buffer.from(f.data).toString('base64') })),
      max_pages: opts.maxPages,
      split_pages: opts.splitPages,
    };
    return this.request('/batches', submittedSchema, { method: 'POST', body });
  }

  async job(id: string) {
    return this.request(`/jobs/${encodeURIComponent(id)}`, jobViewSchema);
  }

  /** Polls until the job leaves the queued/processing states. */
  async waitForJob(id: string, opts: WaitOptions = {}): Promise<JobView> {
    const interval = opts.intervalMs ?? 100;
    const deadline = Date.now() + (opts.timeoutMs ?? 30_000);
    for (;;) {
      const job = await this.job(id);
      if (job.status === 'done' || job.status === 'failed') return job;
      if (Date.now() >= deadline) throw new Error(`Timed out waiting for job ${id}`);
      await new Promise((resolve) => setTimeout(resolve, interval));
    }
  }

  async exportJob(id: string, format: 'xlsx' | 'csv' = 'xlsx'): Promise<Buffer> {
    const q = new URLSearchParams({ format }).toString();
    const r = await fetch(`${this.opts.baseUrl}/jobs/${encodeURIComponent(id)}/export?${q}`, { headers: this.headers() });
    if (!r.ok) throw toApiError(r.status, await r.json());
    return Buffer.from(await r.arrayBuffer());
  }

  async pages(id: string): Promise<PageView[]> {
    return this.request(`/jobs/${encodeURIComponent(id)}/pages`, z.array(pageSchema));
  }
}

function toApiError(status: number, json: unknown): ApiError {
  const parsed = errorBodySchema.safeParse(json);
  return new ApiError(status, parsed.success ? parsed.data.error : 'unknown_error', json);
}
