export type TextField = "legal_entity" | "currency";
export type AmountField = "amount_due_employee" | "amount_due_company_card" | "total_paid_by_company";

export interface ExtractedFields {
  legal_entity: string | null;
  currency: string | null;
  amount_due_employee: number | null;
  amount_due_company_card: number | null;
  total_paid_by_company: number | null;
}

export interface ExtractedRecord extends ExtractedFields {
  source_name: string;
}

export interface BasePattern {
  label: string; // exact label phrase as printed on the summary page
  // Label and colon; capture group 1 holds the raw value
  pattern: RegExp;
  // Label and value on one line without a colon; tried when `pattern` finds nothing
  inlinePattern: RegExp;
}

export interface TextFieldPattern extends BasePattern {
  field: TextField;
  kind: "token" | "free-text";
  clean?: (raw: string) => string;
}

export interface AmountFieldPattern extends BasePattern {
  field: AmountField;
  kind: "amount";
}

export type FieldPattern = TextFieldPattern | AmountFieldPattern;

export interface SourceDocument {
  name: string;
  data: Uint8Array;
  mime?: string;
}

export interface DocumentFailure {
  source_name: string;
  error: string;
}

export interface BatchResult {
  records: ExtractedRecord[];
  failures: DocumentFailure[];
  aborted: boolean;
}

export type BatchProgressEvent =
  | { type: "document.start"; index: number; total: number; name: string }
  | { type: "document.done"; index: number; total: number; name: string; record: ExtractedRecord }
  | { type: "document.failed"; index: number; total: number; name: string; error: string };

export interface PageDocument {
  source_name: string;
  page_no: number; // 1-based
  name: string;
  data: Uint8Array;
}
