/**
 * Rounding Utilities
 *
 * Decimal rounding for sample components. Rounding is applied to each
 * component on its own, never to a vector as a whole.
 */

import { ANIMATION } from '../constants/animation';

/**
 * True when the binary value lies exactly halfway between two decimals at
 * `precision` places. toFixed(100) prints the exact expansion of every value
 * that can be such a tie.
 */
function isHalfwayTie(magnitude: number, precision: number): boolean {
  const exact = magnitude.toFixed(100);
  const fraction = exact.slice(exact.indexOf('.') + 1);
  return fraction[precision] === '5' && /^0*$/.test(fraction.slice(precision + 1));
}

/**
 * Rounds a number to a fixed count of decimal places by its exact binary
 * value. Exact ties go to the even digit: 0.03125 gives 0.0312.
 * Negative zero is normalized to zero.
 */
export function roundTo(value: number, precision: number = ANIMATION.SAMPLE_PRECISION): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  const magnitude = Math.abs(value);
  let rounded = Number(magnitude.toFixed(precision));

  if (isHalfwayTie(magnitude, precision)) {
    const exact = magnitude.toFixed(100);
    const truncated = exact.slice(0, exact.indexOf('.') + 1 + precision).replace(/\.$/, '');
    const lastDigit = Number(truncated.charAt(truncated.length - 1));
    if (lastDigit % 2 === 0) {
      rounded = Number(truncated);
    }
  }

  const signed = value < 0 ? -rounded : rounded;
  return signed === 0 ? 0 : signed;
}

export function roundVec3(
  [x, y, z]: readonly [number, number, number],
  precision: number = ANIMATION.SAMPLE_PRECISION
): [number, number, number] {
  return [roundTo(x, precision), roundTo(y, precision), roundTo(z, precision)];
}

export function roundQuat(
  [x, y, z, w]: readonly [number, number, number, number],
  precision: number = ANIMATION.SAMPLE_PRECISION
): [number, number, number, number] {
  return [roundTo(x, precision), roundTo(y, precision), roundTo(z, precision), roundTo(w, precision)];
}
