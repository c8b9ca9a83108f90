/**
 * X-ray report synthesis on top of similar-report retrieval
 *
 * @module services/report/report-generator
 */

import { classifyReport } from '../classification/disease-classifier.js';
import { buildImageQuery, type ImageFeatures } from './image-query.js';
import { generateNarrativeReport, getReportTemplates } from './narrative.js';
import type { SimilarReport } from '../../models/report.js';

/** Hits fetched for the primary query and for the clinical context query */
export const REPORT_SEARCH_K = 5;

const CONTEXT_MIN_SCORE = 0.7;
const CONTEXT_SNIPPET_CHARS = 200;

export interface SimilarReportSearch {
  search(queryText: string, k: number): Promise<SimilarReport[]>;
}

export type ReportInput = { query: string } | { features: ImageFeatures };

export interface PatientInfo {
  name: string;
  age: number;
  gender: string;
}

export interface XrayReport {
  /** Id of the best matching corpus record, or 'unknown' */
  id: string;
  report: string;
  disease_label: string;
  confidence_score: number;
  /** Second and third best matches */
  similar_cases: SimilarReport[];
  query_used: string;
  clinical_context: string[];
  patient_name: string | null;
  patient_age: number | null;
  patient_gender: string | null;
  generated_at: string;
}

/**
 * Snippets of strongly matching reports for the disease
 */
export async function buildClinicalContext(
  searcher: SimilarReportSearch,
  disease: string
): Promise<string[]> {
  const hits = await searcher.search(`${disease} findings symptoms treatment`, REPORT_SEARCH_K);
  return hits
    .filter((hit) => hit.score > CONTEXT_MIN_SCORE)
    .map((hit) => hit.text.substring(0, CONTEXT_SNIPPET_CHARS) + '...');
}

/**
 * Retrieve similar reports for a query (or image features turned into one)
 * and synthesize the narrative report around the best match.
 */
export async function generateXrayReport(
  searcher: SimilarReportSearch,
  input: ReportInput,
  patient?: PatientInfo
): Promise<XrayReport> {
  const query = 'query' in input ? input.query : buildImageQuery(input.features);
  const results = await searcher.search(query, REPORT_SEARCH_K);

  const patientFields = {
    patient_name: patient?.name ?? null,
    patient_age: patient?.age ?? null,
    patient_gender: patient?.gender ?? null,
    generated_at: new Date().toISOString(),
  };

  const best = results[0];
  if (!best) {
    return {
      id: 'unknown',
      report: getReportTemplates().noResultsReport,
      disease_label: 'Unknown',
      confidence_score: 0,
      similar_cases: [],
      query_used: query,
      clinical_context: [],
      ...patientFields,
    };
  }

  const disease = classifyReport(best.text);
  const similarCases = results.slice(1, 3);

  return {
    id: best.id,
    report: generateNarrativeReport(disease, similarCases),
    disease_label: disease,
    confidence_score: best.score,
    similar_cases: similarCases,
    query_used: query,
    clinical_context: await buildClinicalContext(searcher, disease),
    ...patientFields,
  };
}
