import { DocumentReadError } from '../errors';
import { getLogger } from '../logger';
import { SourceDocument } from '../types';
import { readPdfText } from './pdf';
import { readPlainText } from './text';
import { Adapter, DocumentText } from './types';

export function guessAdapter(filename?: string, mime?: string, data?: Uint8Array): Adapter {
  const ext = (filename || '').toLowerCase();
  const m = (mime || '').toLowerCase();
  if (ext.endsWith('.pdf') || m.includes('application/pdf')) return 'pdf';
  if (data && data.byteLength >= 4 && Buffer.from(data.subarray(0, 4)).toString('ascii') === '%PDF') return 'pdf';
  return 'text';
}

export async function readDocumentText(doc: SourceDocument, maxPages?: number): Promise<DocumentText> {
  const log = getLogger('core').child({ document: doc.name });
  const adapter = guessAdapter(doc.name, doc.mime, doc.data);
  const opts = { maxPages, filename: doc.name, mime: doc.mime };
  let out: DocumentText;
  try {
    out = adapter === 'pdf' ? await readPdfText(doc.data, opts) : readPlainText(doc.data, opts);
  } catch (e) {
    throw new DocumentReadError(doc.name, e);
  }
  log.debug('ingest.complete', { adapter, bytes: out.meta.bytes, pages_read: out.pageMap.length, pages: out.pageCount, warnings: out.warnings.length });
  return out;
}

export type DocumentTextReader = (doc: SourceDocument, maxPages: number) => Promise<string>;

/** Text of the first `maxPages` pages; pages without text contribute empty lines. */
export const readLeadingText: DocumentTextReader = async (doc, maxPages) => {
  const out = await readDocumentText(doc, maxPages);
  return out.text;
};

export { readPdfText } from './pdf';
export { readPlainText } from './text';
export type { Adapter, DocumentText, IngestOptions, PageSpan } from './types';
