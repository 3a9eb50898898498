import { describe, it, expect } from 'vitest';
import {
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
import { FormulaInputError, ShapeMismatchError } from './errors';
import type { FormulaWarning } from './warnings';

describe('ckdEpi (CKD-EPI 2009)', () => {
  it('calculates for a male with SI creatinine', () => {
    // 120 / 88.42 = 1.357 mg/dL; 141 × (1.357/0.9)^−1.209 × 0.993^45.2 ≈ 62.47
    const [egfr] = ckdEpi({ creat: 120, age: 45.2, sex: 'M', ethnicity: 'non-black' });
    expect(egfr).toBeCloseTo(62.467, 2);
  });

  it('applies the female and black coefficients with US creatinine', () => {
    const [egfr] = ckdEpiUS({ creat: 1.5, age: 64.3, sex: 'F', ethnicity: 'black' });
    expect(egfr).toBeCloseTo(42.142, 2);
  });

  it('uses the low-creatinine branch below kappa', () => {
    // 141 × (0.5/0.7)^−0.329 × 0.993^30 × 1.018 ≈ 129.87
    const [egfr] = ckdEpi({ creat: 0.5, age: 30, sex: 'F', ethnicity: 'non-black' }, { units: 'US' });
    expect(egfr).toBeCloseTo(129.873, 2);
  });

  it('adds a positive offset to age', () => {
    const [egfr] = ckdEpiUS({ creat: 1.5, age: 64.3, sex: 'F', ethnicity: 'black' }, { offset: 5 });
    expect(egfr).toBeCloseTo(40.688, 2);
  });

  it('ignores a zero or negative offset', () => {
    const inputs = { creat: 1.5, age: 64.3, sex: 'F', ethnicity: 'black' } as const;
    expect(ckdEpiUS(inputs, { offset: -3 })).toEqual(ckdEpiUS(inputs));
    expect(ckdEpiUS(inputs, { offset: 0 })).toEqual(ckdEpiUS(inputs));
  });

  it('matches SI and US inputs using the 88.42 factor', () => {
    const [si] = ckdEpi({ creat: 132.63, age: 50, sex: 'M', ethnicity: 'non-black' });
    const [us] = ckdEpiUS({ creat: 132.63 / 88.42, age: 50, sex: 'M', ethnicity: 'non-black' });
    expect(si).toBeCloseTo(us, 10);
  });

  it('computes a vector of patients', () => {
    const result = ckdEpi({
      creat: [120, NaN],
      age: [45.2, 50],
      sex: ['M', 'F'],
      ethnicity: 'non-black',
    });
    expect(result).toHaveLength(2);
    expect(result[0]).toBeCloseTo(62.467, 2);
    expect(result[1]).toBeNaN();
  });

  it('uses the female branch for an unrecognised sex and warns', () => {
    const warnings: FormulaWarning[] = [];
    const sex = JSON.parse('"X"');
    const [unknown] = ckdEpiUS(
      { creat: 1.5, age: 64.3, sex, ethnicity: 'black' },
      { onWarning: (w) => { warnings.push(w); } },
    );
    const [female] = ckdEpiUS({ creat: 1.5, age: 64.3, sex: 'F', ethnicity: 'black' });
    expect(unknown).toBe(female);
    expect(warnings).toEqual([
      {
        code: 'unrecognized-sex',
        formula: 'ckdEpi',
        message: '1 sex value(s) are not "F" or "M"; female coefficients were used for them',
      },
    ]);
  });

  it('rejects non-numeric creatinine', () => {
    const inputs = JSON.parse('{"creat": [120, "high"], "age": 40, "sex": "M", "ethnicity": "non-black"}');
    let caught: unknown;
    try {
      ckdEpi(inputs);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FormulaInputError);
    if (caught instanceof FormulaInputError) {
      expect(caught.fields).toEqual({ 'creat.1': 'Expected a number' });
      expect(caught.code).toBe('invalid-input');
      expect(caught.formula).toBe('ckdEpi');
    }
  });
});

describe('ckdEpi2021 (race-free)', () => {
  it('calculates for a female at the kappa threshold region', () => {
    // 88.4 µmol/L = 1 mg/dL; 142 × (1/0.7)^−1.2 × 0.9938^50 × 1.012 ≈ 68.63
    const [egfr] = ckdEpi2021({ creat: 88.4, age: 50, sex: 'F' });
    expect(egfr).toBeCloseTo(68.633, 2);
  });

  it('calculates for a male below kappa in US units', () => {
    // 142 × (0.8/0.9)^−0.302 × 0.9938^40 ≈ 114.74
    const [egfr] = ckdEpi2021({ creat: 0.8, age: 40, sex: 'M' }, { units: 'US' });
    expect(egfr).toBeCloseTo(114.735, 2);
  });

  it('decreases with the age offset', () => {
    const [base] = ckdEpi2021({ creat: 0.8, age: 40, sex: 'M' }, { units: 'US' });
    const [later] = ckdEpi2021({ creat: 0.8, age: 40, sex: 'M' }, { units: 'US', offset: 10 });
    const [older] = ckdEpi2021({ creat: 0.8, age: 50, sex: 'M' }, { units: 'US' });
    expect(later).toBeLessThan(base);
    expect(later).toBe(older);
  });
});

describe('mdrd', () => {
  it('calculates for a male with SI creatinine', () => {
    // 186 × (120/88.42)^−1.154 × 45.2^−0.203 ≈ 60.32
    const [egfr] = mdrd({ creat: 120, age: 45.2, sex: 'M', ethnicity: 'non-black' });
    expect(egfr).toBeCloseTo(60.320, 2);
  });

  it('applies female and black coefficients with US creatinine', () => {
    // 186 × 1.5^−1.154 × 64.3^−0.203 × 0.742 × 1.21 ≈ 44.92
    const [egfr] = mdrdUS({ creat: 1.5, age: 64.3, sex: 'F', ethnicity: 'black' });
    expect(egfr).toBeCloseTo(44.919, 2);
  });

  it('adds the offset to age', () => {
    const [withOffset] = mdrdUS({ creat: 1.5, age: 60, sex: 'M', ethnicity: 'non-black' }, { offset: 4.3 });
    const [older] = mdrdUS({ creat: 1.5, age: 64.3, sex: 'M', ethnicity: 'non-black' });
    expect(withOffset).toBeCloseTo(older, 10);
  });
});

describe('schwartz (bedside)', () => {
  it('uses 36.5 for µmol/L', () => {
    // 36.5 × 101 / 64
    expect(schwartz({ creat: 64, height: 101 })).toEqual([57.6015625]);
  });

  it('uses 0.413 for mg/dL', () => {
    const [egfr] = schwartzUS({ creat: 0.7, height: 101 });
    expect(egfr).toBeCloseTo(59.59, 5);
  });

  it('treats an unknown unit tag as mg/dL', () => {
    const units = JSON.parse('"metric"');
    expect(schwartz({ creat: 0.7, height: 101 }, { units })).toEqual(schwartzUS({ creat: 0.7, height: 101 }));
  });

  it('broadcasts a single height over several creatinine values', () => {
    expect(schwartz({ creat: [64, 128], height: 101 })).toEqual([57.6015625, 28.80078125]);
  });

  it('rejects mismatched lengths', () => {
    expect(() => schwartz({ creat: [64, 128], height: [101, 110, 120] })).toThrow(ShapeMismatchError);
  });
});

describe('cockcroft (Cockcroft-Gault)', () => {
  it('calculates creatinine clearance in µmol/L', () => {
    // 0.85 × (140 − 25) × 60 / 1 / 72 ≈ 81.458
    const [crcl] = cockcroft({ creat: 88.4, age: 25, sex: 'F', weight: 60 });
    expect(crcl).toBeCloseTo(81.458, 3);
  });

  it('gives the same result for mg/dL input', () => {
    const [crcl] = cockcroftUS({ creat: 1, age: 25, sex: 'F', weight: 60 });
    expect(crcl).toBeCloseTo(81.458, 3);
  });

  it('has no sex factor for males', () => {
    // (140 − 60) × 80 / 1.2 / 72 ≈ 74.074
    const [crcl] = cockcroftUS({ creat: 1.2, age: 60, sex: 'M', weight: 80 });
    expect(crcl).toBeCloseTo(74.074, 3);
  });
});

describe('ibw (ideal body weight)', () => {
  it('uses BMI 23 for males', () => {
    // 1.83² × 23
    const [weight] = ibw({ height: 183, sex: 'M' });
    expect(weight).toBeCloseTo(77.0247, 4);
  });

  it('uses BMI 21.5 for females', () => {
    // 1.65² × 21.5
    const [weight] = ibw({ height: 165, sex: 'F' });
    expect(weight).toBeCloseTo(58.53375, 4);
  });

  it('maps over a vector of patients', () => {
    const result = ibw({ height: [183, 165], sex: ['M', 'F'] });
    expect(result).toHaveLength(2);
    expect(result[0]).toBeCloseTo(77.0247, 4);
    expect(result[1]).toBeCloseTo(58.53375, 4);
  });
});

describe('classifyEgfr', () => {
  it('returns the KDIGO category at each threshold', () => {
    expect(classifyEgfr(95)).toBe('G1');
    expect(classifyEgfr(90)).toBe('G1');
    expect(classifyEgfr(89.9)).toBe('G2');
    expect(classifyEgfr(60)).toBe('G2');
    expect(classifyEgfr(59)).toBe('G3a');
    expect(classifyEgfr(45)).toBe('G3a');
    expect(classifyEgfr(44)).toBe('G3b');
    expect(classifyEgfr(30)).toBe('G3b');
    expect(classifyEgfr(29)).toBe('G4');
    expect(classifyEgfr(15)).toBe('G4');
    expect(classifyEgfr(14.9)).toBe('G5');
  });

  it('returns undefined for a missing value', () => {
    expect(classifyEgfr(NaN)).toBeUndefined();
  });
});
