import { describe, it, expect } from 'vitest';
import {
  normalizeConcentration,
  UNIT_DEFS,
  CREATININE_FACTOR,
  CREATININE_FACTOR_EPI,
} from './units';

describe('normalizeConcentration', () => {
  it('converts SI creatinine with the default 88.4 factor', () => {
    expect(normalizeConcentration('creatinine', 88.4, 'SI')).toBe(1);
    expect(normalizeConcentration('creatinine', 176.8, 'SI')).toBe(2);
  });

  it('accepts a per-formula factor', () => {
    expect(normalizeConcentration('creatinine', 88.42, 'SI', CREATININE_FACTOR_EPI)).toBe(1);
    expect(normalizeConcentration('creatinine', 88.4, 'SI', CREATININE_FACTOR_EPI)).toBeCloseTo(0.99977, 5);
  });

  it('leaves US values unchanged', () => {
    expect(normalizeConcentration('creatinine', 1.2, 'US')).toBe(1.2);
  });

  it('passes unknown unit tags through unconverted', () => {
    expect(normalizeConcentration('creatinine', 120, 'metric')).toBe(120);
    expect(normalizeConcentration('creatinine', 120, 'si')).toBe(120);
    expect(normalizeConcentration('creatinine', 120, '')).toBe(120);
  });

  it('converts cystatin C mg/L to mg/dL', () => {
    expect(normalizeConcentration('cystatin', 10, 'SI')).toBe(1);
  });

  it('converts bilirubin µmol/L to mg/dL', () => {
    expect(normalizeConcentration('bilirubin', 17.1, 'SI')).toBe(1);
    expect(normalizeConcentration('bilirubin', 34.2, 'SI')).toBe(2);
  });
});

describe('UNIT_DEFS', () => {
  it('keeps the two creatinine constants distinct', () => {
    expect(UNIT_DEFS.creatinine.factor).toBe(CREATININE_FACTOR);
    expect(CREATININE_FACTOR).toBe(88.4);
    expect(CREATININE_FACTOR_EPI).toBe(88.42);
  });
});
