/**
 * Input checks shared by the storage session.
 */

/**
 * True when every value is a string that is non-empty after trimming.
 * Called with no values it returns false.
 */
export function checkString(...values: unknown[]): boolean {
  if (values.length === 0) {
    return false;
  }
  return values.every((value) => typeof value === 'string' && value.trim().length > 0);
}

/**
 * Parse a note id into its canonical document key.
 * Accepts decimal strings and safe integers; anything negative, fractional
 * or non-numeric yields null.
 */
export function parseId(raw: unknown): string | null {
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) && raw >= 0 ? String(raw) : null;
  }
  if (typeof raw !== 'string') {
    return null;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? String(value) : null;
}
