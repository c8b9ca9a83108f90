/**
 * Unit tests for image feature query construction
 *
 * @module tests/unit/report/image-query
 */

import { describe, it, expect } from 'vitest';
import { buildImageQuery } from '../../../src/services/report/image-query.js';

describe('buildImageQuery', () => {
  it('should suggest pneumonia for a dark, asymmetric film', () => {
    expect(buildImageQuery({ brightness: 60, contrast: 55, edgeDensity: 0.05, asymmetry: 35 })).toBe(
      'chest X-ray dark opacity high contrast abnormality unilateral opacity possible pneumonia or atelectasis'
    );
  });

  it('should prefer the hyperlucent hint over structural abnormality', () => {
    expect(buildImageQuery({ brightness: 200, contrast: 30, edgeDensity: 0.15, asymmetry: 0 })).toBe(
      'chest X-ray hyperlucent structural abnormality possible pneumothorax or emphysema'
    );
  });

  it('should suggest a nodule for high edge density alone', () => {
    expect(buildImageQuery({ brightness: 100, contrast: 30, edgeDensity: 0.15, asymmetry: 0 })).toBe(
      'chest X-ray structural abnormality possible nodule or mass'
    );
  });

  it('should suggest normal findings for clear and smooth fields', () => {
    expect(buildImageQuery({ brightness: 100, contrast: 10, edgeDensity: 0.01, asymmetry: 0 })).toBe(
      'chest X-ray clear lung fields smooth lung fields normal findings'
    );
  });

  it('should add no hint for a dark film without asymmetry', () => {
    expect(buildImageQuery({ brightness: 60, contrast: 30, edgeDensity: 0.05, asymmetry: 0 })).toBe(
      'chest X-ray dark opacity'
    );
  });

  it('should treat threshold values as unremarkable', () => {
    expect(buildImageQuery({ brightness: 80, contrast: 20, edgeDensity: 0.1, asymmetry: 30 })).toBe('chest X-ray');
    expect(buildImageQuery({ brightness: 150, contrast: 50, edgeDensity: 0.02, asymmetry: 30 })).toBe(
      'chest X-ray'
    );
  });
});
