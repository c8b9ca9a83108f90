/**
 * Disease label extraction from report text
 *
 * Table-driven keyword scan. The condition table is walked in its fixed
 * order and the first keyword whose first occurrence is not negated wins,
 * wherever it sits in the text. A keyword counts as negated when one of the
 * negation markers appears in the lookback window right before it.
 *
 * With no positive hit the report is "Normal Findings" if it carries an
 * explicit normal phrase or enough distinct negative findings, otherwise
 * "Radiographic Abnormality".
 *
 * @module services/classification/disease-classifier
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const RULES_PATH = path.resolve(__dirname, '../../../resources/classifier-rules.json');

export const ClassifierRulesSchema = z.object({
  lookbackChars: z.number().int().min(0),
  conditions: z.array(z.object({ keyword: z.string().min(1), label: z.string().min(1) })).min(1),
  negationMarkers: z.array(z.string().min(1)),
  explicitNormalPhrases: z.array(z.string().min(1)),
  negativeFindingPhrases: z.array(z.string().min(1)),
  minNegativeFindings: z.number().int().min(1),
  normalLabel: z.string().min(1),
  fallbackLabel: z.string().min(1),
});

export type ClassifierRules = z.infer<typeof ClassifierRulesSchema>;

let _rules: ClassifierRules | null = null;

/**
 * Rules bundled with the package, parsed once
 */
export function getClassifierRules(): ClassifierRules {
  if (!_rules) {
    _rules = ClassifierRulesSchema.parse(JSON.parse(fs.readFileSync(RULES_PATH, 'utf-8')));
  }
  return _rules;
}

/**
 * Label of the first non-negated condition in table order, or null
 */
export function findPositiveCondition(reportText: string, rules: ClassifierRules): string | null {
  const lower = reportText.toLowerCase();

  for (const { keyword, label } of rules.conditions) {
    const pos = lower.indexOf(keyword);
    if (pos === -1) continue;

    const before = lower.slice(Math.max(0, pos - rules.lookbackChars), pos);
    const negated = rules.negationMarkers.some((marker) => before.includes(marker));
    if (!negated) {
      return label;
    }
  }
  return null;
}

/**
 * Classify a report into a single disease label. Deterministic.
 */
export function classifyReport(
  reportText: string,
  rules: ClassifierRules = getClassifierRules()
): string {
  const positive = findPositiveCondition(reportText, rules);
  if (positive !== null) return positive;

  const lower = reportText.toLowerCase();
  const hasExplicitNormal = rules.explicitNormalPhrases.some((phrase) => lower.includes(phrase));
  const negativeCount = rules.negativeFindingPhrases.filter((phrase) => lower.includes(phrase)).length;

  if (hasExplicitNormal || negativeCount >= rules.minNegativeFindings) {
    return rules.normalLabel;
  }
  return rules.fallbackLabel;
}
