import { ExtractedFields, ExtractedRecord, FieldPattern } from "../types";
import { normalizeAmount } from "./amount";
import { locateField } from "./locate";
import { EXPENSE_FIELD_PATTERNS } from "./patterns";

export function emptyFields(): ExtractedFields {
  return {
    legal_entity: null,
    currency: null,
    amount_due_employee: null,
    amount_due_company_card: null,
    total_paid_by_company: null,
  };
}

export function extractExpenseFields(
  text: string,
  patterns: readonly FieldPattern[] = EXPENSE_FIELD_PATTERNS
): ExtractedFields {
  const fields = emptyFields();
  for (const p of patterns) {
    const raw = locateField(text, p);
    if (raw === null) continue;
    if (p.kind === "amount") {
      fields[p.field] = normalizeAmount(raw);
    } else {
      fields[p.field] = raw;
    }
  }
  return fields;
}

export function assembleRecord(
  sourceName: string,
  text: string,
  patterns: readonly FieldPattern[] = EXPENSE_FIELD_PATTERNS
): ExtractedRecord {
  return Object.freeze({ source_name: sourceName, ...extractExpenseFields(text, patterns) });
}

export { normalizeAmount } from "./amount";
export { locateField } from "./locate";
export { EXPENSE_FIELD_PATTERNS, amountPattern, textPattern, cleanEntityToken } from "./patterns";
