const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a numeric-like value as a float. Anything that is not a finite decimal
 * (blank strings, "n/a", NaN, Infinity, hex literals) becomes 0.
 */
export function parseNumeric(raw: unknown): number {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : 0;
  if (typeof raw === "boolean") return raw ? 1 : 0;
  if (typeof raw !== "string") return 0;

  const s = raw.trim();
  if (!DECIMAL_PATTERN.test(s)) return 0;
  const value = parseFloat(s);
  return Number.isFinite(value) ? value : 0;
}

/** True when `parseNumeric` would read an actual number rather than fall back to 0. */
export function isNumeric(raw: unknown): boolean {
  if (typeof raw === "number") return Number.isFinite(raw);
  if (typeof raw === "boolean") return true;
  if (typeof raw !== "string") return false;
  const s = raw.trim();
  return DECIMAL_PATTERN.test(s) && Number.isFinite(parseFloat(s));
}

/** Round to the nearest integer, ties going away from zero (2.5 → 3, -2.5 → -3). */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  return rounded === 0 ? 0 : rounded;
}

/** Parse as float, round, else 0. */
export function toInteger(raw: unknown): number {
  return roundHalfAwayFromZero(parseNumeric(raw));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return roundHalfAwayFromZero(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Split a comma-separated free-text field into its distinct, non-empty,
 * trimmed entries. Matching is case-insensitive; the first spelling wins.
 */
export function splitList(raw: string | null | undefined): string[] {
  if (!raw) return [];
  const seen = new Set<string>();
  const items: string[] = [];
  for (const part of raw.split(",")) {
    const item = part.trim();
    const key = item.toLowerCase();
    if (!item || seen.has(key)) continue;
    seen.add(key);
    items.push(item);
  }
  return items;
}
