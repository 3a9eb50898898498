/**
 * CKiD U25 equations for children and young adults (ages 1-25).
 *
 * Both equations pick an age- and sex-specific coefficient K, then
 *   creatinine: eGFR = K × height(m) / SCr(mg/dL)
 *   cystatin C: eGFR = K / CysC(mg/L)
 * and round to 1 decimal.
 *
 * Reference: Pierce CB, Muñoz A, Ng DK, Warady BA, Furth SL, Schwartz GJ.
 * Age- and sex-dependent clinical equations to estimate glomerular filtration
 * rates in children and young adults with chronic kidney disease. Kidney
 * International. 2021;99(4):948–956. doi:10.1016/j.kint.2020.10.047
 */
import type {
  CkidU25CombinedInputs,
  CkidU25CombinedRow,
  CkidU25CreatinineInputs,
  CkidU25CystatinInputs,
  CombinedOptions,
  FormulaOptions,
} from './types';
import {
  ckidU25CombinedSchema,
  ckidU25CreatinineSchema,
  ckidU25CystatinSchema,
  combinedOptionsSchema,
  parseFormulaInput,
  type ValidatedCkidU25Creatinine,
  type ValidatedCkidU25Cystatin,
} from './validation';
import {
  consoleWarningHandler,
  warnIfAgeOutOfRange,
  warnIfUnrecognizedSex,
  type WarningHandler,
} from './warnings';
import { at, averageRound1, broadcastLength, round1 } from './vector';

// ---------------------------------------------------------------------------
// Coefficients (one observation)
// ---------------------------------------------------------------------------

/**
 * Creatinine coefficient K.
 *   age < 12:   F 36.1 × 1.008^(age−12)   M 39 × 1.008^(age−12)
 *   12 – <18:   F 36.1 × 1.023^(age−12)   M 39 × 1.045^(age−12)
 *   ≥ 18:       F 41.4                     M 50.8
 * Any sex other than 'F' takes the male coefficient.
 */
export function ckidU25CreatinineCoefficient(age: number, sex: string): number {
  const female = sex === 'F';

  if (age < 12) {
    return female ? 36.1 * Math.pow(1.008, age - 12) : 39 * Math.pow(1.008, age - 12);
  }
  if (age < 18) {
    return female ? 36.1 * Math.pow(1.023, age - 12) : 39 * Math.pow(1.045, age - 12);
  }
  return female ? 41.4 : 50.8;
}

/**
 * Cystatin C coefficient K. Female exponents are offset from age 12, male
 * exponents from age 15, and the male band edge is 15 where the female one
 * is 12.
 *   age < 12:   F 79.9 × 1.004^(age−12)   M 87.2 × 1.011^(age−15)
 *   12 – <15:   F 79.9 × 0.974^(age−12)   M 87.2 × 1.011^(age−15)
 *   15 – <18:   F 79.9 × 0.974^(age−12)   M 87.2 × 0.960^(age−15)
 *   ≥ 18:       F 77.1                     M 68.3
 */
export function ckidU25CystatinCoefficient(age: number, sex: string): number {
  const female = sex === 'F';

  if (age < 12) {
    return female ? 79.9 * Math.pow(1.004, age - 12) : 87.2 * Math.pow(1.011, age - 15);
  }
  if (age < 15) {
    return female ? 79.9 * Math.pow(0.974, age - 12) : 87.2 * Math.pow(1.011, age - 15);
  }
  if (age < 18) {
    return female ? 79.9 * Math.pow(0.974, age - 12) : 87.2 * Math.pow(0.960, age - 15);
  }
  return female ? 77.1 : 68.3;
}

// ---------------------------------------------------------------------------
// Batch estimates on validated vectors
// ---------------------------------------------------------------------------

function estimateFromCreatinine(
  formula: string,
  { creat, age, sex, height }: ValidatedCkidU25Creatinine,
  onWarning: WarningHandler,
): number[] {
  const length = broadcastLength(formula, { creat, age, sex, height });
  warnIfAgeOutOfRange(age, formula, onWarning);
  warnIfUnrecognizedSex(sex, 'M', formula, onWarning);

  return Array.from({ length }, (_, i) => {
    const coefficient = ckidU25CreatinineCoefficient(at(age, i), at(sex, i));
    return round1((coefficient * (at(height, i) / 100)) / at(creat, i));
  });
}

function estimateFromCystatin(
  formula: string,
  { cystatin, age, sex }: ValidatedCkidU25Cystatin,
  onWarning: WarningHandler,
): number[] {
  const length = broadcastLength(formula, { cystatin, age, sex });
  warnIfAgeOutOfRange(age, formula, onWarning);
  warnIfUnrecognizedSex(sex, 'M', formula, onWarning);

  return Array.from({ length }, (_, i) => {
    return round1(ckidU25CystatinCoefficient(at(age, i), at(sex, i)) / at(cystatin, i));
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Creatinine-based eGFR (mL/min/1.73m²) by the CKiD U25 equation.
 * Creatinine in mg/dL, height in cm.
 *
 * Ages outside 1-25 raise one warning for the batch; those observations are
 * still computed.
 *
 * @example
 * ckidU25Creatinine({ creat: 1, age: 12, sex: 'F', height: 132 }); // [47.7]
 */
export function ckidU25Creatinine(
  inputs: CkidU25CreatinineInputs,
  options: FormulaOptions = {},
): number[] {
  const formula = 'ckidU25Creatinine';
  const vectors = parseFormulaInput(formula, ckidU25CreatinineSchema, inputs);
  return estimateFromCreatinine(formula, vectors, options.onWarning ?? consoleWarningHandler);
}

/**
 * Cystatin C-based eGFR (mL/min/1.73m²) by the CKiD U25 equation.
 * Cystatin C in mg/L.
 *
 * @example
 * ckidU25Cystatin({ cystatin: 1, age: 18, sex: 'F' }); // [77.1]
 */
export function ckidU25Cystatin(
  inputs: CkidU25CystatinInputs,
  options: FormulaOptions = {},
): number[] {
  const formula = 'ckidU25Cystatin';
  const vectors = parseFormulaInput(formula, ckidU25CystatinSchema, inputs);
  return estimateFromCystatin(formula, vectors, options.onWarning ?? consoleWarningHandler);
}

/**
 * Average of the creatinine- and cystatin C-based CKiD U25 estimates, which
 * tracks measured GFR more closely than either alone.
 *
 * Each estimate is rounded to 1 decimal before averaging and the average is
 * rounded again. With `verbose: true` every row carries all three values.
 *
 * @example
 * ckidU25Combined({ cystatin: 1, creat: 0.7, age: 18, sex: 'F', height: 132 }); // [77.6]
 */
export function ckidU25Combined(
  inputs: CkidU25CombinedInputs,
  options: CombinedOptions & { verbose: true },
): CkidU25CombinedRow[];
export function ckidU25Combined(
  inputs: CkidU25CombinedInputs,
  options?: CombinedOptions & { verbose?: false },
): number[];
export function ckidU25Combined(
  inputs: CkidU25CombinedInputs,
  options?: CombinedOptions,
): number[] | CkidU25CombinedRow[];
export function ckidU25Combined(
  inputs: CkidU25CombinedInputs,
  options: CombinedOptions = {},
): number[] | CkidU25CombinedRow[] {
  const formula = 'ckidU25Combined';
  const vectors = parseFormulaInput(formula, ckidU25CombinedSchema, inputs);
  const { verbose } = parseFormulaInput(formula, combinedOptionsSchema, options);
  const onWarning = options.onWarning ?? consoleWarningHandler;

  // Check all five inputs together so a cystatin/creatinine mismatch fails
  // before either estimate is computed.
  const length = broadcastLength(formula, vectors);

  const creatinine = estimateFromCreatinine('ckidU25Creatinine', vectors, onWarning);
  const cystatin = estimateFromCystatin('ckidU25Cystatin', vectors, onWarning);

  const rows = Array.from({ length }, (_, i): CkidU25CombinedRow => {
    const cr = at(creatinine, i);
    const cys = at(cystatin, i);
    return { creatinine: cr, cystatin: cys, average: averageRound1(cr, cys) };
  });

  return verbose ? rows : rows.map((row) => row.average);
}
