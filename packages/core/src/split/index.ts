import path from "path";
import { PDFDocument } from "pdf-lib";
import { PageDocument, SourceDocument } from "../types";

async function copyPage(source: PDFDocument, pageNo: number): Promise<Uint8Array> {
  const count = source.getPageCount();
  if (!Number.isInteger(pageNo) || pageNo < 1 || pageNo > count) {
    throw new RangeError(`Page ${pageNo} is out of range (1-${count})`);
  }
  const out = await PDFDocument.create();
  const [page] = await out.copyPages(source, [pageNo - 1]);
  out.addPage(page);
  return out.save();
}

export function pageFileName(sourceName: string, pageNo: number): string {
  const stem = path.basename(sourceName, path.extname(sourceName));
  return `${stem}_page_${pageNo}.pdf`;
}

/** Standalone PDF holding only page `pageNo` (1-based) of `data`. */
export async function extractPdfPage(data: Uint8Array, pageNo: number): Promise<Uint8Array> {
  const source = await PDFDocument.load(data);
  return copyPage(source, pageNo);
}

export async function splitPdfPages(doc: SourceDocument): Promise<PageDocument[]> {
  const source = await PDFDocument.load(doc.data);
  const pages: PageDocument[] = [];
  for (let pageNo = 1; pageNo <= source.getPageCount(); pageNo++) {
    pages.push({
      source_name: doc.name,
      page_no: pageNo,
      name: pageFileName(doc.name, pageNo),
      data: await copyPage(source, pageNo),
    });
  }
  return pages;
}
