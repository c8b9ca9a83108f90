/**
 * Search MCP Tools
 *
 * Tools: cxr_search, cxr_classify
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/search
 */

import { getConfig, getRetrievalEngine } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, SearchInput, ClassifyInput, TopK } from '../utils/validation.js';
import { classifyReport } from '../services/classification/disease-classifier.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';
import { z } from 'zod';

export async function handleSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SearchInput, params);
    const k = input.k ?? getConfig().defaultTopK;
    const engine = getRetrievalEngine();
    const ready = engine.current !== null;
    const results = await engine.search(input.query, k);

    return formatResponse(
      successResult({
        query: input.query,
        k,
        ready,
        state: engine.state,
        snapshot_id: engine.current?.metadata.snapshot_id ?? null,
        total_results: results.length,
        results,
        next_steps: ready
          ? [{ tool: 'cxr_report_generate', description: 'Synthesize a report from the closest match' }]
          : [{ tool: 'cxr_index_build', description: 'Build the index; searches return nothing until it is ready' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleClassify(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ClassifyInput, params);
    return formatResponse(successResult({ disease_label: classifyReport(input.report_text) }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const searchTools: Record<string, ToolDefinition> = {
  cxr_search: {
    description:
      '[SEARCH] Use to find the k prior chest X-ray reports most similar to a free-text description. Returns id, text, disease label and cosine score, best first. Empty until the index is ready.',
    inputSchema: {
      query: z.string().min(1).describe('Free-text findings or question'),
      k: TopK.optional().describe('Number of results (1-100, default from config)'),
    },
    handler: handleSearch,
  },
  cxr_classify: {
    description:
      '[ANALYSIS] Use to label a report with one disease category by keyword rules (negation-aware). Returns disease_label.',
    inputSchema: {
      report_text: z.string().describe('Radiology report text'),
    },
    handler: handleClassify,
  },
};
