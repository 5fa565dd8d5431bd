import { PDFDocument, StandardFonts } from "pdf-lib";

export const SUMMARY_LINES = [
  "Expense Report Summary",
  "Custom 10-Legal Entity : ACME$1",
  "Currency : USD",
  "Amount Due Employee : USD 1,234.56",
  "Amount Due Company Card : (200.00)",
  "Total Paid By Company : 1.034,56",
];

export const SUMMARY_TEXT = SUMMARY_LINES.join("\n");

/** Builds a PDF with one page per entry; each line is drawn 16pt below the previous one. */
export async function makePdf(pages: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const lines of pages) {
    const page = doc.addPage([612, 792]);
    lines.forEach((line, i) => {
      page.drawText(line, { x: 50, y: 740 - i * 16, size: 11, font });
    });
  }
  return doc.save();
}
