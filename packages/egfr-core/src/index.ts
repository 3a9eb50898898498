// Types
export type {
  MeasurementInput,
  Sex,
  SexInput,
  Ethnicity,
  EthnicityInput,
  FormulaOptions,
  UnitOptions,
  OffsetOptions,
  CombinedOptions,
  CkidU25CreatinineInputs,
  CkidU25CystatinInputs,
  CkidU25CombinedInputs,
  CkidU25CombinedRow,
  CkdEpiInputs,
  CkdEpi2021Inputs,
  MdrdInputs,
  SchwartzInputs,
  CockcroftInputs,
  IbwInputs,
  EgfrCategory,
} from './types';

// CKiD U25 (pediatric / young adult)
export {
  ckidU25Creatinine,
  ckidU25Cystatin,
  ckidU25Combined,
  ckidU25CreatinineCoefficient,
  ckidU25CystatinCoefficient,
} from './ckid-u25';

// Adult and bedside formulas
export {
  ckdEpi,
  ckdEpiUS,
  ckdEpi2021,
  mdrd,
  mdrdUS,
  schwartz,
  schwartzUS,
  cockcroft,
  cockcroftUS,
  ibw,
  classifyEgfr,
} from './calculations';

// Units
export {
  UNIT_DEFS,
  CREATININE_FACTOR,
  CREATININE_FACTOR_EPI,
  EGFR_THRESHOLDS,
  normalizeConcentration,
  type ConcentrationMetric,
  type UnitSystem,
  type UnitDef,
} from './units';

// Warnings
export {
  consoleWarningHandler,
  CKID_U25_AGE_RANGE,
  type FormulaWarning,
  type WarningCode,
  type WarningHandler,
} from './warnings';

// Errors
export {
  FormulaError,
  FormulaInputError,
  ShapeMismatchError,
  type FormulaErrorCode,
} from './errors';

// Broadcasting helpers
export { averageRound1, broadcastLength, round1 } from './vector';
