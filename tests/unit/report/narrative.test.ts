/**
 * Unit tests for narrative report templates
 *
 * @module tests/unit/report/narrative
 */

import { describe, it, expect } from 'vitest';
import {
  collectCorrelatedFindings,
  generateNarrativeReport,
  getReportTemplates,
} from '../../../src/services/report/narrative.js';
import type { SimilarReport } from '../../../src/models/report.js';

function similar(text: string, score: number, position = 0): SimilarReport {
  return { id: `r${position}`, text, disease_label: '', score, position };
}

const EMPHYSEMA_REPORT =
  'IMPRESSION: Changes consistent with emphysema.\n\n' +
  'FINDINGS: Hyperinflation of lung fields with flattened diaphragms and increased anteroposterior ' +
  'chest diameter. Pulmonary vascularity appears attenuated with characteristic hyperlucency. ' +
  'Cardiac silhouette may appear elongated due to positional changes.\n\n' +
  'ASSESSMENT: Radiographic features consistent with emphysematous changes. ' +
  'Pulmonary function testing and clinical correlation recommended.';

describe('generateNarrativeReport', () => {
  it('should render the template for the label', () => {
    expect(generateNarrativeReport('Emphysema', [])).toBe(EMPHYSEMA_REPORT);
  });

  it('should use the catch-all template for labels without one', () => {
    const report = generateNarrativeReport('Tuberculosis', []);
    expect(report.split('\n\n')[0]).toBe(
      'IMPRESSION: Radiographic abnormality identified requiring further evaluation.'
    );
  });

  it('should append findings shared by close cases with the same label', () => {
    const report = generateNarrativeReport('Pneumonia', [
      similar('Acute bilateral pneumonia', 0.9, 1),
      similar('Chronic pneumonia changes', 0.8, 2),
    ]);

    expect(report.split('\n\n')[0]).toBe('IMPRESSION: Findings consistent with pneumonia.');
    expect(report.split('\n\n').at(-1)).toBe(
      'CLINICAL CORRELATION: Based on similar radiographic patterns, findings may demonstrate ' +
        'bilateral involvement, acute presentation, chronic changes. ' +
        'Correlation with patient history and clinical presentation recommended.'
    );
  });
});

describe('collectCorrelatedFindings', () => {
  it('should ignore cases at or below the score threshold', () => {
    expect(collectCorrelatedFindings('Pneumonia', [similar('Acute pneumonia', 0.7)])).toEqual([]);
  });

  it('should ignore cases with a different label', () => {
    expect(collectCorrelatedFindings('Pneumonia', [similar('Acute pleural effusion', 0.95)])).toEqual([]);
  });

  it('should only look at the first two cases', () => {
    const cases = [
      similar('Normal chest', 0.9, 1),
      similar('Normal chest', 0.9, 2),
      similar('Acute pneumonia', 0.9, 3),
    ];
    expect(collectCorrelatedFindings('Pneumonia', cases)).toEqual([]);
  });

  it('should list each finding once', () => {
    const cases = [similar('Bilateral pneumonia', 0.9, 1), similar('Bilateral lower lobe pneumonia', 0.9, 2)];
    expect(collectCorrelatedFindings('Pneumonia', cases)).toEqual(['bilateral involvement']);
  });
});

describe('getReportTemplates', () => {
  it('should carry a template for every label the classifier emits most often', () => {
    const labels = Object.keys(getReportTemplates().templates);
    expect(labels).toEqual([
      'Normal Findings',
      'Pneumonia',
      'Pleural Effusion',
      'Cardiomegaly',
      'Pneumothorax',
      'Atelectasis',
      'Emphysema',
      'Radiographic Abnormality',
    ]);
  });
});
