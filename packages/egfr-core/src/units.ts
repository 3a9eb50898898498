/**
 * Unit systems and concentration conversions.
 *
 * The equations are written against conventional (US) units, so SI inputs
 * are divided by a molar-mass factor before use:
 *   creatinine: µmol/L → mg/dL | cystatin C: mg/L → mg/dL | bilirubin: µmol/L → mg/dL
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConcentrationMetric = 'creatinine' | 'cystatin' | 'bilirubin';

/** SI = µmol/L (mg/L for cystatin C). US = mg/dL. */
export type UnitSystem = 'SI' | 'US';

export interface UnitDef {
  /** SI units per 1 US unit (divide an SI value by this to get US) */
  factor: number;
}

// ---------------------------------------------------------------------------
// Conversion constants
// ---------------------------------------------------------------------------

/** µmol/L per mg/dL. Cockcroft-Gault and CKD-EPI 2021. */
export const CREATININE_FACTOR = 88.4;

/** µmol/L per mg/dL as published with CKD-EPI 2009 and MDRD. */
export const CREATININE_FACTOR_EPI = 88.42;

const CYSTATIN_FACTOR = 10; // mg/L ↔ mg/dL
const BILIRUBIN_FACTOR = 17.1;

export const UNIT_DEFS: Record<ConcentrationMetric, UnitDef> = {
  creatinine: {
    factor: CREATININE_FACTOR,
  },
  cystatin: {
    factor: CYSTATIN_FACTOR,
  },
  bilirubin: {
    factor: BILIRUBIN_FACTOR,
  },
};

// ---------------------------------------------------------------------------
// Conversion helpers
// ---------------------------------------------------------------------------

/**
 * Express a concentration in mg/dL.
 *
 * Only 'SI' converts. Any other tag, including ones outside UnitSystem from
 * untyped callers, leaves the value as it is.
 *
 * @param factor - overrides the metric's default factor (e.g. 88.42 for CKD-EPI 2009)
 */
export function normalizeConcentration(
  metric: ConcentrationMetric,
  value: number,
  units: string,
  factor: number = UNIT_DEFS[metric].factor,
): number {
  return units === 'SI' ? value / factor : value;
}

// ---------------------------------------------------------------------------
// Clinical thresholds
// ---------------------------------------------------------------------------

/** KDIGO eGFR category lower bounds in mL/min/1.73m² */
export const EGFR_THRESHOLDS = {
  normal: 90,              // G1
  mildlyDecreased: 60,     // G2
  mildToModerate: 45,      // G3a
  moderateToSevere: 30,    // G3b
  severelyDecreased: 15,   // G4
} as const;
