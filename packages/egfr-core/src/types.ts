/**
 * Shared input and result types.
 *
 * Every formula takes measurement vectors: one entry per observation, or a
 * single value that is repeated across the batch. A bare number counts as a
 * length-1 vector.
 */

import type { WarningHandler } from './warnings';
import type { UnitSystem } from './units';

/** One value per observation, or a single value broadcast to every observation. */
export type MeasurementInput = number | readonly number[];

/** Biological sex as recorded for the equations: 'F' female, 'M' male. */
export type Sex = 'F' | 'M';

export type SexInput = Sex | readonly Sex[];

/** CKD-EPI 2009 and MDRD apply a coefficient for 'black'; anything else gets none. */
export type Ethnicity = 'black' | 'non-black';

export type EthnicityInput = Ethnicity | readonly Ethnicity[];

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface FormulaOptions {
  /** Receives non-fatal warnings. Defaults to console output. */
  onWarning?: WarningHandler;
}

export interface UnitOptions extends FormulaOptions {
  /** Creatinine unit system. 'SI' = µmol/L (default), 'US' = mg/dL. */
  units?: UnitSystem;
}

export interface OffsetOptions extends UnitOptions {
  /** Years added to every age, for serial measurements (e.g. transplant follow-up). */
  offset?: number;
}

export interface CombinedOptions extends FormulaOptions {
  /** Return the creatinine, cystatin and averaged columns instead of the average only. */
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// CKiD U25
// ---------------------------------------------------------------------------

export interface CkidU25CreatinineInputs {
  /** Serum creatinine, mg/dL */
  creat: MeasurementInput;
  /** Years */
  age: MeasurementInput;
  sex: SexInput;
  /** cm */
  height: MeasurementInput;
}

export interface CkidU25CystatinInputs {
  /** Serum cystatin C, mg/L */
  cystatin: MeasurementInput;
  age: MeasurementInput;
  sex: SexInput;
}

export type CkidU25CombinedInputs = CkidU25CreatinineInputs & CkidU25CystatinInputs;

/** One row of the verbose combined result; each column rounded to 1 decimal. */
export interface CkidU25CombinedRow {
  creatinine: number;
  cystatin: number;
  average: number;
}

// ---------------------------------------------------------------------------
// Adult and bedside formulas
// ---------------------------------------------------------------------------

export interface CkdEpiInputs {
  creat: MeasurementInput;
  age: MeasurementInput;
  sex: SexInput;
  ethnicity: EthnicityInput;
}

export type MdrdInputs = CkdEpiInputs;

export interface CkdEpi2021Inputs {
  creat: MeasurementInput;
  age: MeasurementInput;
  sex: SexInput;
}

export interface SchwartzInputs {
  creat: MeasurementInput;
  /** cm */
  height: MeasurementInput;
}

export interface CockcroftInputs {
  creat: MeasurementInput;
  age: MeasurementInput;
  sex: SexInput;
  /** kg */
  weight: MeasurementInput;
}

export interface IbwInputs {
  /** cm */
  height: MeasurementInput;
  sex: SexInput;
}

/** KDIGO GFR categories. */
export type EgfrCategory = 'G1' | 'G2' | 'G3a' | 'G3b' | 'G4' | 'G5';
