const DIGITS = /^\d+$/;

/**
 * Parses a non-negative decimal header value such as `Content-Length` or `Age`.
 * Signs, whitespace, fractions and exponents are rejected.
 */
export function parseInteger(input: string): number | null {
  if (!DIGITS.test(input)) {
    return null;
  }
  const value = Number(input);
  return Number.isSafeInteger(value) ? value : null;
}
