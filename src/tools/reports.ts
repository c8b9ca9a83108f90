/**
 * Report MCP Tools
 *
 * Tools: cxr_report_generate
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/reports
 */

import { getRetrievalEngine } from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  ReportGenerateInput,
  ImageFeaturesSchema,
  PatientInfoSchema,
} from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { generateXrayReport, type ReportInput } from '../services/report/report-generator.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';
import { z } from 'zod';

export async function handleReportGenerate(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ReportGenerateInput, params);

    let reportInput: ReportInput;
    if (input.image_features) {
      reportInput = { features: input.image_features };
    } else if (input.query !== undefined) {
      reportInput = { query: input.query };
    } else {
      throw validationError('Provide exactly one of query or image_features');
    }

    const engine = getRetrievalEngine();
    await engine.ensureReady();
    const report = await generateXrayReport(engine, reportInput, input.patient);

    return formatResponse(
      successResult({
        ...report,
        next_steps: [
          { tool: 'cxr_search', description: 'Inspect more similar reports for the query used' },
          { tool: 'cxr_classify', description: 'Label another report text' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const reportTools: Record<string, ToolDefinition> = {
  cxr_report_generate: {
    description:
      '[ANALYSIS] Use to draft a chest X-ray report from a findings query or from image statistics (brightness, contrast, edgeDensity, asymmetry). Builds the index if needed. Returns disease label, confidence, narrative, similar cases and clinical context.',
    inputSchema: {
      query: z.string().min(1).optional().describe('Free-text findings; give this or image_features'),
      image_features: ImageFeaturesSchema.optional().describe('Coarse grayscale image statistics'),
      patient: PatientInfoSchema.optional().describe('Patient name, age and gender for the report header'),
    },
    handler: handleReportGenerate,
  },
};
