import { AmountField, AmountFieldPattern, BasePattern, FieldPattern, TextField, TextFieldPattern } from "../types";

// The label must end at a word boundary
const LABEL_END = "(?![\\p{L}\\p{N}])";
// A colon, after which the value may sit on a following line
const COLON_SEPARATOR = "[ \\t]*:\\s*";
// No colon: the value follows on the same line
const INLINE_SEPARATOR = "[ \\t]+";
const CURRENCY_MARKER = "(?:USD|EUR|GBP|[€$£])";
const AMOUNT_CAPTURE = `(?:${CURRENCY_MARKER}[ \\t]*)?([\\d,.()\\-]+)`;
const LINE_CAPTURE = "([^\\s:][^\\r\\n]*)";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function labelPatterns(label: string, capture: string): Pick<BasePattern, "pattern" | "inlinePattern"> {
  if (!label.trim()) throw new Error("Field label must not be empty");
  const head = escapeRegExp(label) + LABEL_END;
  return {
    pattern: new RegExp(`${head}${COLON_SEPARATOR}${capture}`, "u"),
    inlinePattern: new RegExp(`${head}${INLINE_SEPARATOR}${capture}`, "u"),
  };
}

export function textPattern(
  field: TextField,
  label: string,
  kind: TextFieldPattern["kind"],
  clean?: (raw: string) => string
): TextFieldPattern {
  return { field, label, kind, ...labelPatterns(label, LINE_CAPTURE), clean };
}

export function amountPattern(field: AmountField, label: string): AmountFieldPattern {
  return { field, label, kind: "amount", ...labelPatterns(label, AMOUNT_CAPTURE) };
}

/** Keeps letters, digits and `$`; extraction tends to leave stray punctuation around entity codes. */
export function cleanEntityToken(raw: string): string {
  return raw.replace(/[^\p{L}\p{N}$]/gu, "");
}

export const EXPENSE_FIELD_PATTERNS: readonly FieldPattern[] = Object.freeze([
  textPattern("legal_entity", "Custom 10-Legal Entity", "token", cleanEntityToken),
  textPattern("currency", "Currency", "free-text"),
  amountPattern("amount_due_employee", "Amount Due Employee"),
  amountPattern("amount_due_company_card", "Amount Due Company Card"),
  amountPattern("total_paid_by_company", "Total Paid By Company"),
]);
