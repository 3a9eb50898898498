/**
 * Errors thrown for usage mistakes. Clinical edge cases (out-of-range ages,
 * unknown sex values) are warnings instead; see warnings.ts.
 *
 * Messages name inputs and lengths only, never measurement values.
 */

export type FormulaErrorCode = 'invalid-input' | 'shape-mismatch';

export class FormulaError extends Error {
  constructor(
    message: string,
    public readonly code: FormulaErrorCode,
    public readonly formula: string,
  ) {
    super(`${formula}: ${message}`);
    this.name = 'FormulaError';
  }
}

/** An input failed schema validation (wrong type, non-numeric entry). */
export class FormulaInputError extends FormulaError {
  constructor(
    formula: string,
    /** Input path → first error message for that path */
    public readonly fields: Record<string, string>,
  ) {
    const summary = Object.entries(fields)
      .map(([path, message]) => `${path} (${message})`)
      .join(', ');
    super(`invalid input: ${summary}`, 'invalid-input', formula);
    this.name = 'FormulaInputError';
  }
}

/** Input vectors cannot be broadcast against each other. */
export class ShapeMismatchError extends FormulaError {
  constructor(
    formula: string,
    /** Input name → vector length */
    public readonly lengths: Record<string, number>,
  ) {
    const summary = Object.entries(lengths)
      .map(([name, length]) => `${name}=${length}`)
      .join(', ');
    super(
      `inputs must have length 1 or share one length; got ${summary}`,
      'shape-mismatch',
      formula,
    );
    this.name = 'ShapeMismatchError';
  }
}
