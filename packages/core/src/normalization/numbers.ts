/**
 * Locale-agnostic number parsing and exact decimal sums.
 */

/** Sums are carried in integer ten-thousandths */
const SUM_SCALE = 10_000;

/**
 * Parse a decimal written with either `.` or `,` as decimal separator.
 *
 * - currency or label text before the number and unit text after it are ignored
 * - a space is read as a thousands separator only before a group of three digits
 * - with both separators present the later one is the decimal point
 * - a single `,` followed by one or two digits is a decimal comma
 * - any other `,` is a thousands separator
 *
 * Returns null for anything that does not leave a single finite number,
 * including digits split by letters or spaces (`1.5e3`, `5 kg x 2`).
 */
export function parseDecimal(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  let cleaned = raw
    .trim()
    .replace(/^[^\d+.,-]+/, '')
    .replace(/[^\d]+$/, '')
    .replace(/(\d) (?=\d{3}(?!\d))/g, '$1');
  if (!/^[+-]?[\d.,]*\d$/.test(cleaned)) return null;

  const lastComma = cleaned.lastIndexOf(',');
  const lastDot = cleaned.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    cleaned =
      lastComma > lastDot
        ? cleaned.replace(/\./g, '').replace(',', '.')
        : cleaned.replace(/,/g, '');
  } else if (lastComma !== -1) {
    const commaCount = cleaned.split(',').length - 1;
    const decimals = cleaned.length - lastComma - 1;
    cleaned =
      commaCount === 1 && decimals > 0 && decimals <= 2
        ? cleaned.replace(',', '.')
        : cleaned.replace(/,/g, '');
  }

  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/** Non-negative number or 0: missing, unparsable and negative values all collapse to 0 */
export function parseNonNegative(raw: string | null | undefined): number {
  const value = parseDecimal(raw);
  return value !== null && value > 0 ? value : 0;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON * Math.sign(value)) * factor) / factor;
}

export function roundMoney(value: number): number {
  return roundTo(value, 2);
}

export function toScaled(value: number): number {
  return Math.round(value * SUM_SCALE);
}

export function fromScaled(scaled: number): number {
  return scaled / SUM_SCALE;
}
