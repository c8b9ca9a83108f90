/**
 * Image feature → retrieval query
 *
 * @module services/report/image-query
 */

export interface ImageFeatures {
  /** Mean pixel intensity, 0-255 */
  brightness: number;
  /** Standard deviation of pixel intensity */
  contrast: number;
  /** Fraction of edge pixels, 0-1 */
  edgeDensity: number;
  /** Absolute difference between left and right half mean intensity */
  asymmetry: number;
}

const DARK_OPACITY = 'dark opacity';
const HYPERLUCENT = 'hyperlucent';
const CLEAR_LUNG_FIELDS = 'clear lung fields';
const STRUCTURAL_ABNORMALITY = 'structural abnormality';
const SMOOTH_LUNG_FIELDS = 'smooth lung fields';
const UNILATERAL_OPACITY = 'unilateral opacity';

/**
 * Describe image statistics as words the report corpus uses.
 * Each statistic contributes at most one term; one diagnostic hint is appended.
 */
export function buildImageQuery(features: ImageFeatures): string {
  const parts = ['chest X-ray'];

  if (features.brightness < 80) {
    parts.push(DARK_OPACITY);
  } else if (features.brightness > 150) {
    parts.push(HYPERLUCENT);
  }

  if (features.contrast < 20) {
    parts.push(CLEAR_LUNG_FIELDS);
  } else if (features.contrast > 50) {
    parts.push('high contrast abnormality');
  }

  if (features.edgeDensity > 0.1) {
    parts.push(STRUCTURAL_ABNORMALITY);
  } else if (features.edgeDensity < 0.02) {
    parts.push(SMOOTH_LUNG_FIELDS);
  }

  if (features.asymmetry > 30) {
    parts.push(UNILATERAL_OPACITY);
  }

  if (parts.includes(DARK_OPACITY) && parts.includes(UNILATERAL_OPACITY)) {
    parts.push('possible pneumonia or atelectasis');
  } else if (parts.includes(HYPERLUCENT)) {
    parts.push('possible pneumothorax or emphysema');
  } else if (parts.includes(STRUCTURAL_ABNORMALITY)) {
    parts.push('possible nodule or mass');
  } else if (parts.includes(CLEAR_LUNG_FIELDS) && parts.includes(SMOOTH_LUNG_FIELDS)) {
    parts.push('normal findings');
  }

  return parts.join(' ');
}
