const CURRENCY_MARKERS = /(?:USD|EUR|GBP|[€$£])\s*/g;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Converts a captured amount such as "USD 1,234.56", "1.234,56" or "(200.00)"
 * into a signed number. Returns null for anything that does not parse.
 *
 * When both separators are present the leftmost one groups thousands. A lone
 * comma is always a thousands mark ("1,234" -> 1234) while a lone period is
 * kept as the decimal point ("1.234" -> 1.234).
 */
export function normalizeAmount(raw: string | null | undefined): number | null {
  let s = (raw ?? "").trim();
  if (!s) return null;

  const parenNeg = s.startsWith("(") && s.endsWith(")");
  if (parenNeg) s = s.slice(1, -1);

  s = s.replace(CURRENCY_MARKERS, "").trim();

  const dot = s.indexOf(".");
  const comma = s.indexOf(",");
  if (dot >= 0 && comma >= 0) {
    s = dot < comma
      ? s.replace(/\./g, "").replace(/,/g, ".")
      : s.replace(/,/g, "");
  } else if (comma >= 0) {
    s = s.replace(/,/g, "");
  }

  if (!DECIMAL.test(s)) return null;
  const value = Number(s);
  if (!Number.isFinite(value)) return null;

  const signed = parenNeg || s.startsWith("-") ? -Math.abs(value) : value;
  return signed === 0 ? 0 : signed;
}
