import * as XLSX from "xlsx";
import { ExtractedRecord } from "../types";
import { Cell, EXPORT_HEADERS, ensureExportable, recordsToRows } from "./columns";

export const SHEET_NAME = "Expense Data";

function width(cell: Cell): number {
  return cell === null ? 0 : String(cell).length;
}

/** One-sheet workbook; absent values are left as empty cells and columns fit their longest value. */
export function recordsToXlsx(records: readonly ExtractedRecord[]): Buffer {
  ensureExportable(records);
  const rows = recordsToRows(records);
  const sheet = XLSX.utils.aoa_to_sheet([EXPORT_HEADERS, ...rows]);
  sheet["!cols"] = EXPORT_HEADERS.map((header, i) => ({
    wch: Math.max(header.length, ...rows.map((r) => width(r[i]))) + 2,
  }));
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
  return XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
}
