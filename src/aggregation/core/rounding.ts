/**
 * Decimal rounding, half away from zero (PostgreSQL ROUND(numeric, n) semantics)
 */

/**
 * Move the decimal point by editing the exponent of the decimal string form
 */
function shiftDecimal(value: number, exponent: number): number {
  const [mantissa, exp = '0'] = String(value).split('e');
  return Number(`${mantissa}e${Number(exp) + exponent}`);
}

/**
 * Round a number to a fixed number of decimal places, half away from zero.
 *
 * Shifts by exponent notation rather than multiplying, so that a literal
 * such as 1.005 rounds to 1.01 instead of 1.00.
 *
 * @example
 * roundHalfAwayFromZero(2.345, 2)  // => 2.35
 * roundHalfAwayFromZero(-2.345, 2) // => -2.35
 */
export function roundHalfAwayFromZero(value: number, decimalPlaces: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const sign = value < 0 ? -1 : 1;
  const rounded = shiftDecimal(Math.round(shiftDecimal(Math.abs(value), decimalPlaces)), -decimalPlaces);
  // Negative zero prints as "-0" in some renderers
  return rounded === 0 ? 0 : sign * rounded;
}

/**
 * Round sum / count to a fixed number of decimal places, half away from zero.
 *
 * When the scaled sum is a safe integer (integer questionnaire totals) the
 * quotient is rounded with integer arithmetic, so a true mean of x.xx5 is
 * never mis-rounded by binary floating point.
 */
export function roundQuotient(sum: number, count: number, decimalPlaces: number): number {
  const scaledSum = shiftDecimal(sum, decimalPlaces);

  if (Number.isSafeInteger(scaledSum) && Number.isSafeInteger(count) && count > 0) {
    const magnitude = Math.abs(scaledSum);
    let quotient = Math.floor(magnitude / count);
    const remainder = magnitude - quotient * count;
    if (remainder * 2 >= count) {
      quotient += 1;
    }
    const result = shiftDecimal(quotient, -decimalPlaces);
    return scaledSum < 0 && result !== 0 ? -result : result;
  }

  return roundHalfAwayFromZero(sum / count, decimalPlaces);
}
