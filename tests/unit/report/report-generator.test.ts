/**
 * Unit tests for X-ray report synthesis
 *
 * @module tests/unit/report/report-generator
 */

import { describe, it, expect } from 'vitest';
import {
  buildClinicalContext,
  generateXrayReport,
  REPORT_SEARCH_K,
  type SimilarReportSearch,
} from '../../../src/services/report/report-generator.js';
import type { SimilarReport } from '../../../src/models/report.js';

class FakeSearcher implements SimilarReportSearch {
  readonly queries: Array<{ query: string; k: number }> = [];

  constructor(private readonly responses: Record<string, SimilarReport[]>) {}

  async search(query: string, k: number): Promise<SimilarReport[]> {
    this.queries.push({ query, k });
    return this.responses[query] ?? [];
  }
}

function hit(id: string, text: string, score: number, position: number): SimilarReport {
  return { id, text, disease_label: '', score, position };
}

const PRIMARY_HITS = [
  hit('r1', 'Bilateral pneumonia with consolidation', 0.92, 0),
  hit('r2', 'Acute pneumonia in the right lower lobe', 0.85, 1),
  hit('r3', 'Normal chest', 0.75, 2),
  hit('r4', 'Small left pleural effusion', 0.6, 3),
];

const CONTEXT_QUERY = 'Pneumonia findings symptoms treatment';

describe('generateXrayReport', () => {
  it('should build the report around the best match', async () => {
    const searcher = new FakeSearcher({
      'fever and cough': PRIMARY_HITS,
      [CONTEXT_QUERY]: [hit('c1', 'x'.repeat(250), 0.8, 0), hit('c2', 'short', 0.7, 1)],
    });

    const report = await generateXrayReport(searcher, { query: 'fever and cough' });

    expect(report.id).toBe('r1');
    expect(report.disease_label).toBe('Pneumonia');
    expect(report.confidence_score).toBe(0.92);
    expect(report.query_used).toBe('fever and cough');
    expect(report.similar_cases.map((c) => c.id)).toEqual(['r2', 'r3']);
    expect(report.clinical_context).toEqual(['x'.repeat(200) + '...']);
    expect(report.report.split('\n\n').at(-1)).toBe(
      'CLINICAL CORRELATION: Based on similar radiographic patterns, findings may demonstrate ' +
        'acute presentation. Correlation with patient history and clinical presentation recommended.'
    );
    expect(searcher.queries).toEqual([
      { query: 'fever and cough', k: REPORT_SEARCH_K },
      { query: CONTEXT_QUERY, k: REPORT_SEARCH_K },
    ]);
  });

  it('should leave patient fields null when no patient is given', async () => {
    const report = await generateXrayReport(new FakeSearcher({ q: PRIMARY_HITS }), { query: 'q' });

    expect(report.patient_name).toBeNull();
    expect(report.patient_age).toBeNull();
    expect(report.patient_gender).toBeNull();
    expect(Number.isNaN(Date.parse(report.generated_at))).toBe(false);
  });

  it('should copy patient details into the report', async () => {
    const report = await generateXrayReport(
      new FakeSearcher({ q: PRIMARY_HITS }),
      { query: 'q' },
      { name: 'Test Patient', age: 40, gender: 'Female' }
    );

    expect(report.patient_name).toBe('Test Patient');
    expect(report.patient_age).toBe(40);
    expect(report.patient_gender).toBe('Female');
  });

  it('should search with the query derived from image features', async () => {
    const searcher = new FakeSearcher({});
    const report = await generateXrayReport(searcher, {
      features: { brightness: 100, contrast: 30, edgeDensity: 0.15, asymmetry: 0 },
    });

    expect(report.query_used).toBe('chest X-ray structural abnormality possible nodule or mass');
    expect(searcher.queries[0].query).toBe('chest X-ray structural abnormality possible nodule or mass');
  });

  it('should return the unknown report when nothing matches', async () => {
    const searcher = new FakeSearcher({});
    const report = await generateXrayReport(searcher, { query: 'anything' });

    expect(report).toMatchObject({
      id: 'unknown',
      disease_label: 'Unknown',
      confidence_score: 0,
      similar_cases: [],
      clinical_context: [],
      report:
        'Unable to generate comprehensive report. Please consult a qualified radiologist for professional interpretation.',
    });
    expect(searcher.queries).toHaveLength(1);
  });
});

describe('buildClinicalContext', () => {
  it('should keep short snippets whole and mark them as excerpts', async () => {
    const searcher = new FakeSearcher({
      'Cardiomegaly findings symptoms treatment': [hit('c1', 'Enlarged heart', 0.9, 0)],
    });

    expect(await buildClinicalContext(searcher, 'Cardiomegaly')).toEqual(['Enlarged heart...']);
  });
});
