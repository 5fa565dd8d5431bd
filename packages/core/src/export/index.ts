import { ExtractedRecord } from "../types";
import { ExportFormat } from "./columns";
import { recordsToCsv } from "./csv";
import { recordsToXlsx } from "./xlsx";

export function exportRecords(records: readonly ExtractedRecord[], fmt: ExportFormat): Buffer {
  return fmt === "csv" ? Buffer.from(recordsToCsv(records), "utf8") : recordsToXlsx(records);
}

export * from "./columns";
export { recordsToCsv } from "./csv";
export { recordsToXlsx, SHEET_NAME } from "./xlsx";
