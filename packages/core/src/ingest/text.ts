import { DocumentText, IngestOptions, PageSpan } from "./types";

// Form feeds separate pages, as text dumps of PDFs write them
export function readPlainText(data: Uint8Array, opts: IngestOptions = {}): DocumentText {
  const pages = Buffer.from(data).toString("utf8").split("\f");
  const kept = pages.slice(0, opts.maxPages ?? pages.length);
  let text = "";
  const pageMap: PageSpan[] = [];
  kept.forEach((pageText, i) => {
    if (i > 0) text += "\n";
    const start = text.length;
    text += pageText;
    pageMap.push({ page: i + 1, start, end: text.length });
  });
  return {
    text,
    pageMap,
    pageCount: pages.length,
    warnings: [],
    meta: { adapter: "text", mime: opts.mime, filename: opts.filename, bytes: data.byteLength },
  };
}
