import { z } from 'zod';
import { FormulaInputError } from './errors';

/**
 * A single measurement. NaN is accepted as a missing value and carries
 * through to that observation's result.
 */
const measurementValue = z.union([z.number(), z.nan()], {
  errorMap: () => ({ message: 'Expected a number' }),
});

/** number | number[] → number[] */
export const measurementSchema = z.preprocess(
  (value) => (typeof value === 'number' ? [value] : value),
  z.array(measurementValue),
);

/**
 * Sex is parsed as free text: values other than 'F' and 'M' take each
 * formula's fallback branch and are reported as a warning, not rejected.
 */
export const sexSchema = z.preprocess(
  (value) => (typeof value === 'string' ? [value] : value),
  z.array(z.string({ invalid_type_error: 'Expected "F" or "M"' })),
);

export const ethnicitySchema = z.preprocess(
  (value) => (typeof value === 'string' ? [value] : value),
  z.array(z.string({ invalid_type_error: 'Expected "black" or "non-black"' })),
);

// ---------------------------------------------------------------------------
// Formula inputs
// ---------------------------------------------------------------------------

export const ckidU25CreatinineSchema = z.object({
  creat: measurementSchema,
  age: measurementSchema,
  sex: sexSchema,
  height: measurementSchema,
});

export const ckidU25CystatinSchema = z.object({
  cystatin: measurementSchema,
  age: measurementSchema,
  sex: sexSchema,
});

export const ckidU25CombinedSchema = ckidU25CreatinineSchema.merge(ckidU25CystatinSchema);

export const ckdEpiSchema = z.object({
  creat: measurementSchema,
  age: measurementSchema,
  sex: sexSchema,
  ethnicity: ethnicitySchema,
});

export const mdrdSchema = ckdEpiSchema;

export const ckdEpi2021Schema = ckdEpiSchema.omit({ ethnicity: true });

export const schwartzSchema = z.object({
  creat: measurementSchema,
  height: measurementSchema,
});

export const cockcroftSchema = z.object({
  creat: measurementSchema,
  age: measurementSchema,
  sex: sexSchema,
  weight: measurementSchema,
});

export const ibwSchema = z.object({
  height: measurementSchema,
  sex: sexSchema,
});

export type ValidatedCkidU25Creatinine = z.infer<typeof ckidU25CreatinineSchema>;
export type ValidatedCkidU25Cystatin = z.infer<typeof ckidU25CystatinSchema>;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * `units` stays a free string: unknown tags mean "no conversion", matching
 * how the formulas have always treated them.
 */
export const unitOptionsSchema = z.object({
  units: z.string().default('SI'),
});

export const offsetOptionsSchema = unitOptionsSchema.extend({
  offset: z.number().default(0),
});

export const combinedOptionsSchema = z.object({
  verbose: z.boolean().default(false),
});

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Get human-readable error messages from a validation error, keyed by path.
 */
export function getValidationErrors(errors: z.ZodError): Record<string, string> {
  const errorMap: Record<string, string> = {};

  for (const issue of errors.issues) {
    const path = issue.path.join('.');
    if (!errorMap[path]) {
      errorMap[path] = issue.message;
    }
  }

  return errorMap;
}

/**
 * Parse formula input with a schema.
 *
 * @throws FormulaInputError listing each failing path
 */
export function parseFormulaInput<Output, Input>(
  formula: string,
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  data: unknown,
): Output {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw new FormulaInputError(formula, getValidationErrors(result.error));
  }

  return result.data;
}
