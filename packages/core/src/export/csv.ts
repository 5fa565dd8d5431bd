import { ExtractedRecord } from "../types";
import { Cell, EXPORT_HEADERS, ensureExportable, recordsToRows } from "./columns";

const q = (s: string) => (/[",\r\n]/.test(s) ? '"' + s.replace(/"/g, '""') + '"' : s);

function cellText(cell: Cell): string {
  return cell === null ? "" : String(cell);
}

export function recordsToCsv(records: readonly ExtractedRecord[]): string {
  ensureExportable(records);
  const body = recordsToRows(records).map((row) => row.map((c) => q(cellText(c))).join(","));
  return [EXPORT_HEADERS.map(q).join(","), ...body].join("\n") + "\n";
}
