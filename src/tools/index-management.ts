/**
 * Index Management MCP Tools
 *
 * Tools: cxr_index_status, cxr_index_build, cxr_index_rebuild
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/index-management
 */

import { getRetrievalEngine } from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  IndexStatusInput,
  IndexBuildInput,
  IndexRebuildInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export async function handleIndexStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(IndexStatusInput, params);
    const status = getRetrievalEngine().getStatus();

    const nextSteps =
      status.state === 'READY'
        ? [{ tool: 'cxr_search', description: 'Find reports similar to a description' }]
        : [{ tool: 'cxr_index_build', description: 'Load or build the index' }];

    return formatResponse(successResult({ ...status, next_steps: nextSteps }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleIndexBuild(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(IndexBuildInput, params);
    const engine = getRetrievalEngine();
    await engine.ensureReady();

    return formatResponse(
      successResult({
        ...engine.getStatus(),
        next_steps: [
          { tool: 'cxr_search', description: 'Find reports similar to a description' },
          { tool: 'cxr_report_generate', description: 'Synthesize a report from the closest match' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleIndexRebuild(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(IndexRebuildInput, params);
    const engine = getRetrievalEngine();
    const previous = engine.current?.metadata.snapshot_id ?? null;
    await engine.rebuild();

    return formatResponse(
      successResult({
        ...engine.getStatus(),
        previous_snapshot_id: previous,
        next_steps: [{ tool: 'cxr_search', description: 'Search the rebuilt index' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const indexTools: Record<string, ToolDefinition> = {
  cxr_index_status: {
    description:
      '[STATUS] Use to check whether the report index is UNBUILT, BUILDING or READY, with record count, dimension and artifact paths.',
    inputSchema: {},
    handler: handleIndexStatus,
  },
  cxr_index_build: {
    description:
      '[SETUP] Use before searching. Loads the persisted index when both artifacts are valid, otherwise embeds the corpus and builds it.',
    inputSchema: {},
    handler: handleIndexBuild,
  },
  cxr_index_rebuild: {
    description:
      '[SETUP] Use after the corpus or model changed. Rebuilds the index from the corpus; the previous index keeps serving until the new one is committed.',
    inputSchema: {},
    handler: handleIndexRebuild,
  },
};
