/**
 * Milepost and identifier normalizers.
 * Source tables are hand-maintained, so every parser here returns null
 * (or an empty string) instead of throwing on malformed text.
 */

const NUMERIC = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * Parse a "major+minor" milepost into a number.
 *
 * The major part is a zero-padded whole milepost, the minor part the
 * fractional offset: "663+0.0150" -> 663.015, "000+0.0000" -> 0.
 * Either part may carry a leading minus sign.
 *
 * @returns The milepost, or null when the text is not in "major+minor" form
 *
 * @example
 * parseMilepost("663+0.0150") // 663.015
 * parseMilepost("5+0.0")      // 5
 * parseMilepost("-1+0.5")     // -0.5
 * parseMilepost("garbage")    // null
 */
export function parseMilepost(text: unknown): number | null {
  if (text === null || text === undefined) return null;

  const parts = String(text).trim().split("+");
  if (parts.length !== 2) return null;

  const major = parts[0].trim().replace(/^0+/, "") || "0";
  const minor = parts[1].trim();

  if (!NUMERIC.test(major) || !NUMERIC.test(minor)) return null;

  const value = Number(major) + Number(minor);
  return Number.isFinite(value) ? value : null;
}

/**
 * Normalize a corridor or department id: trimmed, upper-case.
 */
export function normalizeCorridorId(text: unknown): string {
  if (text === null || text === undefined) return "";
  return String(text).trim().toUpperCase();
}

/**
 * Strip a single trailing letter from a departmental route.
 *
 * @example
 * stripTrailingLetter("N-1A")   // "N-1"
 * stripTrailingLetter("U-8133") // "U-8133"
 */
export function stripTrailingLetter(route: unknown): string {
  const normalized = normalizeCorridorId(route);
  if (!normalized) return normalized;
  return /[A-Z]$/.test(normalized) ? normalized.slice(0, -1) : normalized;
}

/**
 * Parse a numeric table cell. Blank and non-numeric cells are null.
 */
export function parseNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const text = String(value).trim();
  if (text === "") return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}
