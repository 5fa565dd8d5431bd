import { loadCoreConfig } from "./config";
import { errorMessage } from "./errors";
import { assembleRecord } from "./extract/index";
import { DocumentTextReader, readLeadingText } from "./ingest/index";
import { getLogger, Logger } from "./logger";
import { BatchProgressEvent, BatchResult, ExtractedRecord, DocumentFailure, FieldPattern, SourceDocument } from "./types";

export interface BatchOptions {
  maxPages?: number;
  patterns?: readonly FieldPattern[];
  readText?: DocumentTextReader;
  onProgress?: (event: BatchProgressEvent) => void;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Extracts one record per document, in input order. A document that cannot be
 * read or parsed is skipped and reported in `failures`; the batch carries on.
 * Aborting stops before the next document and keeps what was completed.
 */
export async function runBatch(documents: readonly SourceDocument[], opts: BatchOptions = {}): Promise<BatchResult> {
  const log = opts.logger ?? getLogger("core");
  const maxPages = opts.maxPages ?? loadCoreConfig().summaryPages;
  const readText = opts.readText ?? readLeadingText;
  const total = documents.length;
  const records: ExtractedRecord[] = [];
  const failures: DocumentFailure[] = [];
  let aborted = false;

  log.info("batch.start", { documents: total, max_pages: maxPages });

  for (const [index, doc] of documents.entries()) {
    if (opts.signal?.aborted) {
      aborted = true;
      log.warn("batch.aborted", { completed: index, total });
      break;
    }
    opts.onProgress?.({ type: "document.start", index, total, name: doc.name });
    let record: ExtractedRecord;
    try {
      const text = await readText(doc, maxPages);
      record = assembleRecord(doc.name, text, opts.patterns);
    } catch (e) {
      const error = errorMessage(e);
      failures.push({ source_name: doc.name, error });
      log.warn("batch.document.failed", { document: doc.name, index, error });
      opts.onProgress?.({ type: "document.failed", index, total, name: doc.name, error });
      continue;
    }
    records.push(record);
    log.debug("batch.document.done", { document: doc.name, index });
    opts.onProgress?.({ type: "document.done", index, total, name: doc.name, record });
  }

  log.info("batch.done", { records: records.length, failures: failures.length, aborted });
  return { records, failures, aborted };
}
