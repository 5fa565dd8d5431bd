import { format } from "date-fns";
import { NothingToExportError } from "../errors";
import { ExtractedRecord } from "../types";

export type ExportFormat = "xlsx" | "csv";
export type Cell = string | number | null;

export const EXPORT_COLUMNS = [
  { key: "source_name", header: "File Name" },
  { key: "legal_entity", header: "Legal Entity" },
  { key: "currency", header: "Currency" },
  { key: "amount_due_employee", header: "Amount Due Employee" },
  { key: "amount_due_company_card", header: "Amount Due Company Card" },
  { key: "total_paid_by_company", header: "Total Paid By Company" },
] as const satisfies ReadonlyArray<{ key: keyof ExtractedRecord; header: string }>;

export const EXPORT_HEADERS: string[] = EXPORT_COLUMNS.map((c) => c.header);

export function isExportFormat(value: unknown): value is ExportFormat {
  return value === "xlsx" || value === "csv";
}

export function ensureExportable(records: readonly ExtractedRecord[]): void {
  if (records.length === 0) throw new NothingToExportError();
}

export function recordsToRows(records: readonly ExtractedRecord[]): Cell[][] {
  return records.map((r) => EXPORT_COLUMNS.map((c) => r[c.key]));
}

export function exportFileName(fmt: ExportFormat, now: Date = new Date()): string {
  return `expense_data_${format(now, "yyyyMMdd_HHmmss")}.${fmt}`;
}

export const EXPORT_MIME: Record<ExportFormat, string> = {
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  csv: "text/csv; charset=utf-8",
};
