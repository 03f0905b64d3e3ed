/**
 * Postal Code Utilities
 *
 * Formatting and validation of Polish postal codes (PNA, XX-XXX).
 */

export const POLISH_POSTAL_CODE_PATTERN = /^\d{2}-\d{3}$/;

/**
 * Format Polish postal code by adding dash separator
 *
 * Only formats codes that are exactly 5 digits without any separators.
 * Preserves already formatted codes and invalid inputs unchanged.
 *
 * @example
 * formatPolishPostalCode('53332')   // returns '53-332'
 * formatPolishPostalCode('53-332')  // returns '53-332' (already formatted)
 * formatPolishPostalCode('5333')    // returns '5333' (invalid length)
 */
export function formatPolishPostalCode(code: string): string {
  if (/^\d{5}$/.test(code)) {
    return `${code.slice(0, 2)}-${code.slice(2)}`;
  }
  return code;
}

export function isPolishPostalCode(code: string): boolean {
  return POLISH_POSTAL_CODE_PATTERN.test(code);
}

/**
 * Canonical XX-XXX form of user input, or null when the input is neither
 * `XX-XXX` nor five bare digits.
 *
 * @example
 * toCanonicalPostalCode(' 00950 ') // '00-950'
 * toCanonicalPostalCode('00 950')  // null
 */
export function toCanonicalPostalCode(input: string): string | null {
  const formatted = formatPolishPostalCode(input.trim());
  return isPolishPostalCode(formatted) ? formatted : null;
}
