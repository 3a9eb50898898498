import type {
  CkdEpi2021Inputs,
  CkdEpiInputs,
  CockcroftInputs,
  EgfrCategory,
  FormulaOptions,
  IbwInputs,
  MdrdInputs,
  OffsetOptions,
  SchwartzInputs,
  UnitOptions,
} from './types';
import {
  CREATININE_FACTOR,
  CREATININE_FACTOR_EPI,
  EGFR_THRESHOLDS,
  normalizeConcentration,
} from './units';
import {
  ckdEpi2021Schema,
  ckdEpiSchema,
  cockcroftSchema,
  ibwSchema,
  mdrdSchema,
  offsetOptionsSchema,
  parseFormulaInput,
  schwartzSchema,
  unitOptionsSchema,
} from './validation';
import { consoleWarningHandler, warnIfUnrecognizedSex } from './warnings';
import { at, broadcastLength } from './vector';

/** Age used by the equations: `offset` years are added only when positive. */
function offsetAge(age: number, offset: number): number {
  return offset > 0 ? age + offset : age;
}

/**
 * eGFR (mL/min/1.73m²) by the CKD-EPI 2009 equation.
 * Creatinine in µmol/L by default (÷ 88.42), or mg/dL with `units: 'US'`.
 *
 * Reference: Levey AS, Stevens LA, Schmid CH, et al. A new equation to
 * estimate glomerular filtration rate. Ann Intern Med 2009; 150(9):604-612.
 *
 * @example
 * ckdEpi({ creat: 120, age: 45.2, sex: 'M', ethnicity: 'non-black' });
 */
export function ckdEpi(inputs: CkdEpiInputs, options: OffsetOptions = {}): number[] {
  const formula = 'ckdEpi';
  const { creat, age, sex, ethnicity } = parseFormulaInput(formula, ckdEpiSchema, inputs);
  const { units, offset } = parseFormulaInput(formula, offsetOptionsSchema, options);

  const length = broadcastLength(formula, { creat, age, sex, ethnicity });
  warnIfUnrecognizedSex(sex, 'F', formula, options.onWarning ?? consoleWarningHandler);

  return Array.from({ length }, (_, i) => {
    const male = at(sex, i) === 'M';
    const kappa = male ? 0.9 : 0.7;
    const alpha = male ? -0.411 : -0.329;
    const sexFactor = male ? 1 : 1.018;

    const cr = normalizeConcentration('creatinine', at(creat, i), units, CREATININE_FACTOR_EPI);
    const ratio = cr / kappa;

    const gfr = 141
      * Math.pow(Math.min(ratio, 1), alpha)
      * Math.pow(Math.max(ratio, 1), -1.209)
      * Math.pow(0.993, offsetAge(at(age, i), offset))
      * sexFactor;

    return at(ethnicity, i) === 'black' ? gfr * 1.159 : gfr;
  });
}

/** CKD-EPI 2009 with creatinine in mg/dL. */
export function ckdEpiUS(
  inputs: CkdEpiInputs,
  options: Omit<OffsetOptions, 'units'> = {},
): number[] {
  return ckdEpi(inputs, { ...options, units: 'US' });
}

/**
 * eGFR using the CKD-EPI 2021 equation (race-free).
 * Creatinine in µmol/L by default (÷ 88.4), or mg/dL with `units: 'US'`.
 */
export function ckdEpi2021(inputs: CkdEpi2021Inputs, options: OffsetOptions = {}): number[] {
  const formula = 'ckdEpi2021';
  const { creat, age, sex } = parseFormulaInput(formula, ckdEpi2021Schema, inputs);
  const { units, offset } = parseFormulaInput(formula, offsetOptionsSchema, options);

  const length = broadcastLength(formula, { creat, age, sex });
  warnIfUnrecognizedSex(sex, 'M', formula, options.onWarning ?? consoleWarningHandler);

  return Array.from({ length }, (_, i) => {
    const cr = normalizeConcentration('creatinine', at(creat, i), units, CREATININE_FACTOR);
    const ageTerm = Math.pow(0.9938, offsetAge(at(age, i), offset));

    if (at(sex, i) === 'F') {
      const kappa = 0.7;
      const alpha = cr <= kappa ? -0.241 : -1.200;
      return 142 * Math.pow(cr / kappa, alpha) * ageTerm * 1.012;
    } else {
      const kappa = 0.9;
      const alpha = cr <= kappa ? -0.302 : -1.200;
      return 142 * Math.pow(cr / kappa, alpha) * ageTerm;
    }
  });
}

/**
 * eGFR by the abbreviated (four variable) MDRD equation.
 * Creatinine in µmol/L by default (÷ 88.42), or mg/dL with `units: 'US'`.
 *
 * Reference: Levey AS, Greene T, Kusek JW, et al. A simplified equation to
 * predict glomerular filtration rate from serum creatinine. J Am Soc Nephrol
 * 2000; 11:A0828.
 */
export function mdrd(inputs: MdrdInputs, options: OffsetOptions = {}): number[] {
  const formula = 'mdrd';
  const { creat, age, sex, ethnicity } = parseFormulaInput(formula, mdrdSchema, inputs);
  const { units, offset } = parseFormulaInput(formula, offsetOptionsSchema, options);

  const length = broadcastLength(formula, { creat, age, sex, ethnicity });
  warnIfUnrecognizedSex(sex, 'F', formula, options.onWarning ?? consoleWarningHandler);

  return Array.from({ length }, (_, i) => {
    const sexFactor = at(sex, i) === 'M' ? 1 : 0.742;
    const cr = normalizeConcentration('creatinine', at(creat, i), units, CREATININE_FACTOR_EPI);

    const gfr = 186
      * Math.pow(cr, -1.154)
      * Math.pow(offsetAge(at(age, i), offset), -0.203)
      * sexFactor;

    return at(ethnicity, i) === 'black' ? gfr * 1.21 : gfr;
  });
}

/** MDRD with creatinine in mg/dL. */
export function mdrdUS(
  inputs: MdrdInputs,
  options: Omit<OffsetOptions, 'units'> = {},
): number[] {
  return mdrd(inputs, { ...options, units: 'US' });
}

/**
 * Pediatric eGFR by the bedside Schwartz formula. Height in cm.
 *   SI (µmol/L): 36.5 × height / SCr
 *   otherwise (mg/dL): 0.413 × height / SCr
 *
 * Reference: Schwartz GJ, Munoz A, Schneider MF et al. New equations to
 * estimate GFR in children with CKD. J Am Soc Nephrol 2009; 20(3):629-637.
 */
export function schwartz(inputs: SchwartzInputs, options: UnitOptions = {}): number[] {
  const formula = 'schwartz';
  const { creat, height } = parseFormulaInput(formula, schwartzSchema, inputs);
  const { units } = parseFormulaInput(formula, unitOptionsSchema, options);

  const length = broadcastLength(formula, { creat, height });
  const k = units === 'SI' ? 36.5 : 0.413;

  return Array.from({ length }, (_, i) => (k * at(height, i)) / at(creat, i));
}

/** Bedside Schwartz with creatinine in mg/dL. */
export function schwartzUS(inputs: SchwartzInputs): number[] {
  return schwartz(inputs, { units: 'US' });
}

/**
 * Creatinine clearance (mL/min, not normalised to body surface area) by the
 * Cockcroft-Gault equation. Weight in kg.
 * Creatinine in µmol/L by default (÷ 88.4), or mg/dL with `units: 'US'`.
 *
 * Reference: Cockcroft DW, Gault MH. Prediction of creatinine clearance from
 * serum creatinine. Nephron 1976; 16(1):31-41
 */
export function cockcroft(inputs: CockcroftInputs, options: UnitOptions = {}): number[] {
  const formula = 'cockcroft';
  const { creat, age, sex, weight } = parseFormulaInput(formula, cockcroftSchema, inputs);
  const { units } = parseFormulaInput(formula, unitOptionsSchema, options);

  const length = broadcastLength(formula, { creat, age, sex, weight });
  warnIfUnrecognizedSex(sex, 'F', formula, options.onWarning ?? consoleWarningHandler);

  return Array.from({ length }, (_, i) => {
    const sexFactor = at(sex, i) === 'M' ? 1 : 0.85;
    const cr = normalizeConcentration('creatinine', at(creat, i), units, CREATININE_FACTOR);
    return (sexFactor * (140 - at(age, i)) * at(weight, i)) / cr / 72;
  });
}

/** Cockcroft-Gault with creatinine in mg/dL. */
export function cockcroftUS(
  inputs: CockcroftInputs,
  options: Omit<UnitOptions, 'units'> = {},
): number[] {
  return cockcroft(inputs, { ...options, units: 'US' });
}

/**
 * Adult ideal body weight (kg) from height (cm), assuming an ideal BMI of 23
 * for males and 21.5 for females.
 */
export function ibw(inputs: IbwInputs, options: FormulaOptions = {}): number[] {
  const formula = 'ibw';
  const { height, sex } = parseFormulaInput(formula, ibwSchema, inputs);

  const length = broadcastLength(formula, { height, sex });
  warnIfUnrecognizedSex(sex, 'F', formula, options.onWarning ?? consoleWarningHandler);

  return Array.from({ length }, (_, i) => {
    const bmiTarget = at(sex, i) === 'M' ? 23 : 21.5;
    const heightM = at(height, i) / 100;
    return heightM * heightM * bmiTarget;
  });
}

/**
 * KDIGO GFR category for an eGFR in mL/min/1.73m².
 * G1 (≥90), G2 (60-89), G3a (45-59), G3b (30-44), G4 (15-29), G5 (<15).
 * Returns undefined for a missing (NaN) value.
 */
export function classifyEgfr(egfr: number): EgfrCategory | undefined {
  if (Number.isNaN(egfr)) return undefined;
  if (egfr >= EGFR_THRESHOLDS.normal) return 'G1';
  if (egfr >= EGFR_THRESHOLDS.mildlyDecreased) return 'G2';
  if (egfr >= EGFR_THRESHOLDS.mildToModerate) return 'G3a';
  if (egfr >= EGFR_THRESHOLDS.moderateToSevere) return 'G3b';
  if (egfr >= EGFR_THRESHOLDS.severelyDecreased) return 'G4';
  return 'G5';
}
