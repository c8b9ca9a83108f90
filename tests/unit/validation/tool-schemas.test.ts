/**
 * Unit tests for tool input schemas
 *
 * @module tests/unit/validation/tool-schemas
 */

import { describe, it, expect } from 'vitest';
import {
  validateInput,
  ValidationError,
  SearchInput,
  ReportGenerateInput,
  ConfigSetInput,
  ImageFeaturesSchema,
} from '../../../src/utils/validation.js';

const FEATURES = { brightness: 120, contrast: 30, edgeDensity: 0.05, asymmetry: 4 };

describe('validateInput', () => {
  it('should return parsed data', () => {
    expect(validateInput(SearchInput, { query: '  pneumonia  ', k: 3 })).toEqual({ query: 'pneumonia', k: 3 });
  });

  it('should throw ValidationError naming the field', () => {
    expect(() => validateInput(SearchInput, { query: 'x', k: 2.5 })).toThrow(ValidationError);
    expect(() => validateInput(SearchInput, { query: '' })).toThrow('query: Query text is required');
  });
});

describe('ReportGenerateInput', () => {
  it('should fill patient defaults', () => {
    const input = validateInput(ReportGenerateInput, { query: 'cough', patient: { name: 'Test Patient' } });
    expect(input.patient).toEqual({ name: 'Test Patient', age: 25, gender: 'Male' });
  });

  it('should accept image features alone', () => {
    expect(validateInput(ReportGenerateInput, { image_features: FEATURES }).image_features).toEqual(FEATURES);
  });

  it('should require exactly one of query and image_features', () => {
    expect(() => validateInput(ReportGenerateInput, {})).toThrow('Provide exactly one of query or image_features');
    expect(() => validateInput(ReportGenerateInput, { query: 'q', image_features: FEATURES })).toThrow(
      'Provide exactly one of query or image_features'
    );
  });

  it('should reject out of range patient age', () => {
    expect(() => validateInput(ReportGenerateInput, { query: 'q', patient: { name: 'A', age: 130 } })).toThrow(
      ValidationError
    );
  });
});

describe('ImageFeaturesSchema', () => {
  it('should bound brightness and edge density', () => {
    expect(ImageFeaturesSchema.safeParse({ ...FEATURES, brightness: 256 }).success).toBe(false);
    expect(ImageFeaturesSchema.safeParse({ ...FEATURES, edgeDensity: 1.5 }).success).toBe(false);
    expect(ImageFeaturesSchema.safeParse(FEATURES).success).toBe(true);
  });
});

describe('ConfigSetInput', () => {
  it('should only accept known keys', () => {
    expect(ConfigSetInput.safeParse({ key: 'default_top_k', value: 3 }).success).toBe(true);
    expect(ConfigSetInput.safeParse({ key: 'storage_path', value: '/tmp' }).success).toBe(false);
  });
});
