/**
 * Zod Validation Schemas for MCP tool inputs
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Upper bound on k for a single search call */
export const MAX_TOP_K = 100;

/**
 * Number of similar reports to return
 */
export const TopK = z.number().int().min(1).max(MAX_TOP_K);

/**
 * Coarse grayscale statistics of a 224x224 radiograph
 */
export const ImageFeaturesSchema = z.object({
  brightness: z.number().min(0).max(255).describe('Mean pixel intensity (0-255)'),
  contrast: z.number().min(0).describe('Standard deviation of pixel intensity'),
  edgeDensity: z.number().min(0).max(1).describe('Fraction of edge pixels (0-1)'),
  asymmetry: z.number().min(0).describe('Absolute difference of left/right half mean intensity'),
});

export const PatientGender = z.enum(['Male', 'Female', 'Other']);

export const PatientInfoSchema = z.object({
  name: z.string().trim().min(1, 'Patient name is required'),
  age: z.number().int().min(0).max(120).default(25),
  gender: PatientGender.default('Male'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// INDEX & SEARCH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const IndexStatusInput = z.object({});

export const IndexBuildInput = z.object({});

export const IndexRebuildInput = z.object({});

export const SearchInput = z.object({
  query: z.string().trim().min(1, 'Query text is required'),
  k: TopK.optional(),
});

export const ClassifyInput = z.object({
  report_text: z.string(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// REPORT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ReportGenerateInput = z
  .object({
    query: z.string().trim().min(1).optional(),
    image_features: ImageFeaturesSchema.optional(),
    patient: PatientInfoSchema.optional(),
  })
  .refine((input) => (input.query === undefined) !== (input.image_features === undefined), {
    message: 'Provide exactly one of query or image_features',
  });

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConfigKey = z.enum([
  'corpus_path',
  'index_path',
  'metadata_path',
  'embedding_model',
  'embedding_batch_size',
  'python_path',
  'default_top_k',
]);

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number()]),
});
