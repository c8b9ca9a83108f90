/**
 * Narrative report templates
 *
 * One IMPRESSION / FINDINGS / ASSESSMENT template per disease label, optionally
 * followed by a CLINICAL CORRELATION note drawn from closely matching cases.
 *
 * @module services/report/narrative
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { classifyReport } from '../classification/disease-classifier.js';
import type { SimilarReport } from '../../models/report.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const TEMPLATES_PATH = path.resolve(__dirname, '../../../resources/report-templates.json');

const ReportTemplateSchema = z.object({
  impression: z.string().min(1),
  findings: z.string().min(1),
  assessment: z.string().min(1),
});

export const ReportTemplatesSchema = z
  .object({
    fallbackLabel: z.string().min(1),
    noResultsReport: z.string().min(1),
    correlation: z.object({
      maxCases: z.number().int().min(0),
      minScore: z.number(),
      markers: z.array(z.object({ term: z.string().min(1), finding: z.string().min(1) })),
    }),
    templates: z.record(ReportTemplateSchema),
  })
  .refine((t) => t.fallbackLabel in t.templates, {
    message: 'fallbackLabel must name one of the templates',
  });

export type ReportTemplates = z.infer<typeof ReportTemplatesSchema>;
export type ReportTemplate = z.infer<typeof ReportTemplateSchema>;

let _templates: ReportTemplates | null = null;

export function getReportTemplates(): ReportTemplates {
  if (!_templates) {
    _templates = ReportTemplatesSchema.parse(JSON.parse(fs.readFileSync(TEMPLATES_PATH, 'utf-8')));
  }
  return _templates;
}

function renderTemplate(template: ReportTemplate): string {
  return [
    `IMPRESSION: ${template.impression}`,
    `FINDINGS: ${template.findings}`,
    `ASSESSMENT: ${template.assessment}`,
  ].join('\n\n');
}

/**
 * Findings shared by the closest cases that carry the same label.
 * Only the first `maxCases` cases are considered; each finding is listed once.
 */
export function collectCorrelatedFindings(
  disease: string,
  similarCases: SimilarReport[],
  templates: ReportTemplates = getReportTemplates()
): string[] {
  const { maxCases, minScore, markers } = templates.correlation;
  const findings: string[] = [];

  for (const similar of similarCases.slice(0, maxCases)) {
    if (classifyReport(similar.text) !== disease || similar.score <= minScore) continue;

    const lower = similar.text.toLowerCase();
    for (const { term, finding } of markers) {
      if (lower.includes(term) && !findings.includes(finding)) {
        findings.push(finding);
      }
    }
  }
  return findings;
}

/**
 * Render the narrative report for a disease label.
 * Labels without a template use the fallback template.
 */
export function generateNarrativeReport(
  disease: string,
  similarCases: SimilarReport[],
  templates: ReportTemplates = getReportTemplates()
): string {
  const template = templates.templates[disease] ?? templates.templates[templates.fallbackLabel];
  let report = renderTemplate(template);

  const findings = collectCorrelatedFindings(disease, similarCases, templates);
  if (findings.length > 0) {
    report +=
      '\n\nCLINICAL CORRELATION: Based on similar radiographic patterns, ' +
      `findings may demonstrate ${findings.join(', ')}. ` +
      'Correlation with patient history and clinical presentation recommended.';
  }
  return report;
}
