/**
 * Number formatting for G-code words
 */

/**
 * Round to `precision` decimals and trim trailing zeros.
 *
 * @example
 * formatNumber(1.5, 3);      // '1.5'
 * formatNumber(-0.0001, 3);  // '0'
 * formatNumber(2, 3);        // '2'
 * formatNumber(1e21, 3);     // '1000000000000000000000'
 */
export function formatNumber(value: number, precision: number): string {
  // toFixed switches to exponent notation from 1e21; such values are integers
  if (Math.abs(value) >= 1e21) {
    return BigInt(value).toString();
  }
  let text = value.toFixed(precision);
  if (text.includes('.')) {
    text = text.replace(/0+$/, '').replace(/\.$/, '');
  }
  return text === '-0' ? '0' : text;
}

/** M words are written with two digits: M03, M05 */
export function formatMWord(code: number): string {
  return `M${String(code).padStart(2, '0')}`;
}
