import { ShapeMismatchError } from './errors';

/**
 * Number of observations in a call.
 *
 * Every vector must have length 1 or the same length as every other vector
 * longer than 1. Length-1 vectors are repeated; if all vectors have length 1
 * the batch has one observation. A zero-length vector with only length-1
 * partners gives an empty batch.
 *
 * @throws ShapeMismatchError naming each input and its length
 */
export function broadcastLength(
  formula: string,
  vectors: Record<string, readonly unknown[]>,
): number {
  let length = 1;
  let fixed = false;

  for (const vector of Object.values(vectors)) {
    if (vector.length === 1) continue;
    if (!fixed) {
      length = vector.length;
      fixed = true;
    } else if (vector.length !== length) {
      const lengths: Record<string, number> = {};
      for (const [name, v] of Object.entries(vectors)) {
        lengths[name] = v.length;
      }
      throw new ShapeMismatchError(formula, lengths);
    }
  }

  return length;
}

/** Value of a vector at observation `index`, repeating length-1 vectors. */
export function at<T>(vector: readonly T[], index: number): T {
  return vector.length === 1 ? vector[0] : vector[index];
}

/** Round to 1 decimal place. NaN stays NaN. */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Mean of two 1-decimal values, rounded to 1 decimal. Works in whole tenths
 * so a half-way mean such as 138.15 rounds up to 138.2 rather than following
 * its binary approximation down.
 */
export function averageRound1(a: number, b: number): number {
  return Math.round((Math.round(a * 10) + Math.round(b * 10)) / 2) / 10;
}
