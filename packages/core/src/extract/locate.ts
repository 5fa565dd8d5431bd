import { FieldPattern } from "../types";

/**
 * Returns the raw value captured after the first `Label :` occurrence, falling
 * back to the first `Label value` line, or null when the label is absent or
 * nothing usable follows it.
 */
export function locateField(text: string, pattern: FieldPattern): string | null {
  const m = pattern.pattern.exec(text) ?? pattern.inlinePattern.exec(text);
  if (!m) return null;
  const raw = (m[1] ?? "").trim();
  const value = pattern.kind !== "amount" && pattern.clean ? pattern.clean(raw) : raw;
  return value ? value : null;
}
