/**
 * Non-fatal warnings raised while computing a batch.
 *
 * A warning never stops computation: every observation still gets a result.
 * Callers pass `onWarning` to collect warnings; otherwise they are logged.
 */

import type { Sex } from './types';

export type WarningCode = 'age-out-of-range' | 'unrecognized-sex';

export interface FormulaWarning {
  code: WarningCode;
  /** Name of the formula that raised it, e.g. "ckidU25Creatinine" */
  formula: string;
  message: string;
}

export type WarningHandler = (warning: FormulaWarning) => void;

export const consoleWarningHandler: WarningHandler = (warning) => {
  console.warn(`[egfr-core] ${warning.formula}: ${warning.message}`);
};

/** Age range the CKiD U25 equations were derived on, in years. */
export const CKID_U25_AGE_RANGE = { min: 1, max: 25 } as const;

/**
 * Warn once per batch if any age lies outside the CKiD U25 range.
 * Checks the batch minimum and maximum; NaN entries are skipped.
 */
export function warnIfAgeOutOfRange(
  ages: readonly number[],
  formula: string,
  onWarning: WarningHandler,
): void {
  let min = Infinity;
  let max = -Infinity;
  for (const age of ages) {
    if (Number.isNaN(age)) continue;
    if (age < min) min = age;
    if (age > max) max = age;
  }

  if (min < CKID_U25_AGE_RANGE.min || max > CKID_U25_AGE_RANGE.max) {
    onWarning({
      code: 'age-out-of-range',
      formula,
      message: `there are age values <${CKID_U25_AGE_RANGE.min} or >${CKID_U25_AGE_RANGE.max} years; for those children, eGFR values might be invalid`,
    });
  }
}

/**
 * Warn if any sex value is neither 'F' nor 'M'. Those observations take the
 * formula's `fallback` branch: male for equations that test for 'F',
 * female for those that test for 'M'.
 */
export function warnIfUnrecognizedSex(
  sexes: readonly string[],
  fallback: Sex,
  formula: string,
  onWarning: WarningHandler,
): void {
  const count = sexes.filter((sex) => sex !== 'F' && sex !== 'M').length;
  if (count === 0) return;

  onWarning({
    code: 'unrecognized-sex',
    formula,
    message: `${count} sex value(s) are not "F" or "M"; ${fallback === 'F' ? 'female' : 'male'} coefficients were used for them`,
  });
}
