import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { DocumentText, IngestOptions, PageSpan } from "./types";

type PdfTextItem = {
  str: string;
  x: number;
  y: number;
  width: number;
};

type PdfLine = { y: number; items: PdfTextItem[] };

function clusterItemsIntoLines(items: PdfTextItem[]): PdfLine[] {
  const lineTolerance = 3; // points
  const lines: PdfLine[] = [];
  for (const item of items) {
    let line = lines.find((ln) => Math.abs(ln.y - item.y) <= lineTolerance);
    if (!line) {
      line = { y: item.y, items: [] };
      lines.push(line);
    }
    line.items.push(item);
  }

  // Sort top-to-bottom (PDF origin bottom-left)
  lines.sort((a, b) => b.y - a.y);

  return lines;
}

// Rebuild lines from text geometry: a wide jump between items becomes a tab,
// a smaller one a space, so "Label : value" pairs stay on one line.
function linesToText(lines: PdfLine[]): string {
  const defaultWordGap = 2.5;
  const defaultColumnGap = 12;
  const out: string[] = [];

  for (const line of lines) {
    const sorted = line.items.slice().sort((a, b) => a.x - b.x);
    let totalWidth = 0;
    let totalChars = 0;
    for (const item of sorted) {
      totalWidth += item.width || item.str.length * 4;
      totalChars += item.str.replace(/\s+/g, "").length || item.str.length;
    }
    const avgCharWidth = totalChars ? totalWidth / totalChars : 0;
    const wordGapThreshold = Math.max(defaultWordGap, avgCharWidth * 0.6);
    const columnGapThreshold = Math.max(defaultColumnGap, avgCharWidth * 3.5);

    let buffer = "";
    let prevRight: number | null = null;
    for (const item of sorted) {
      if (prevRight !== null) {
        const gap = item.x - prevRight;
        if (gap > columnGapThreshold) buffer += "\t";
        else if (gap > wordGapThreshold) buffer += " ";
      }
      buffer += item.str;
      prevRight = item.x + (item.width || item.str.length * 4);
    }
    out.push(buffer);
  }

  return out.join("\n");
}

export async function readPdfText(data: Uint8Array, opts: IngestOptions = {}): Promise<DocumentText> {
  // pdf.js refuses Buffer instances and may detach what it is given
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    useSystemFonts: false,
    disableFontFace: true,
    verbosity: 0,
  });
  const doc = await loadingTask.promise.catch(async (e: unknown) => {
    await loadingTask.destroy();
    throw e;
  });

  try {
    const pageCount = doc.numPages;
    const limit = Math.min(pageCount, opts.maxPages ?? pageCount);
    let text = "";
    const pageMap: PageSpan[] = [];

    for (let p = 1; p <= limit; p++) {
      const page = await doc.getPage(p);
      const content = await page.getTextContent();
      const items: PdfTextItem[] = [];
      for (const it of content.items) {
        if (!("str" in it) || !it.str) continue;
        items.push({
          str: it.str.replace(/\u00A0/g, " "),
          x: Number(it.transform[4] ?? 0),
          y: Number(it.transform[5] ?? 0),
          width: Number(it.width ?? 0),
        });
      }
      const pageText = linesToText(clusterItemsIntoLines(items));
      if (p > 1) text += "\n";
      const start = text.length;
      text += pageText;
      pageMap.push({ page: p, start, end: text.length });
    }

    return {
      text,
      pageMap,
      pageCount,
      warnings: text.trim() ? [] : ["No selectable text found in the pages read."],
      meta: { adapter: "pdf", mime: opts.mime, filename: opts.filename, bytes: data.byteLength },
    };
  } finally {
    await doc.destroy();
  }
}
