/**
 * Configuration Management MCP Tools
 *
 * Tools: cxr_config_get, cxr_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/config
 */

import path from 'path';
import { z } from 'zod';
import { getConfig, updateConfig } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey, TopK } from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

type ConfigKeyName = z.infer<typeof ConfigKey>;

// ═══════════════════════════════════════════════════════════════════════════════
// KEY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

function configSnapshot(config: ServerConfig): Record<ConfigKeyName, string | number | null> {
  return {
    corpus_path: config.corpusPath,
    index_path: config.indexPath,
    metadata_path: config.metadataPath,
    embedding_model: config.embeddingModel,
    embedding_batch_size: config.embeddingBatchSize,
    python_path: config.pythonPath ?? null,
    default_top_k: config.defaultTopK,
  };
}

const PathValue = z.string().trim().min(1, 'must be a non-empty path');
const BatchSizeValue = z.number().int().min(1).max(1024);

/**
 * Validate a value for its key and turn it into a config update
 */
function toConfigUpdate(key: ConfigKeyName, value: string | number): Partial<ServerConfig> {
  const parse = <T>(schema: z.ZodType<T>): T => {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw validationError(`${key}: ${result.error.errors.map((e) => e.message).join('; ')}`, {
        key,
        value,
      });
    }
    return result.data;
  };

  switch (key) {
    case 'corpus_path':
      return { corpusPath: path.resolve(parse(PathValue)) };
    case 'index_path':
      return { indexPath: path.resolve(parse(PathValue)) };
    case 'metadata_path':
      return { metadataPath: path.resolve(parse(PathValue)) };
    case 'embedding_model':
      return { embeddingModel: parse(z.string().trim().min(1)) };
    case 'embedding_batch_size':
      return { embeddingBatchSize: parse(BatchSizeValue) };
    case 'python_path':
      return { pythonPath: parse(PathValue) };
    case 'default_top_k':
      return { defaultTopK: parse(TopK) };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const values = configSnapshot(getConfig());

    const nextSteps = [
      { tool: 'cxr_config_set', description: 'Change a configuration setting' },
      { tool: 'cxr_index_status', description: 'Check the index built from these settings' },
    ];

    if (input.key) {
      return formatResponse(
        successResult({ key: input.key, value: values[input.key], next_steps: nextSteps })
      );
    }

    return formatResponse(
      successResult({
        ...values,
        data_dir: getConfig().dataDir,
        hash_algorithm: 'sha256',
        next_steps: nextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    const update = toConfigUpdate(input.key, input.value);
    const engineInvalidated = updateConfig(update);

    return formatResponse(
      successResult({
        key: input.key,
        value: configSnapshot(getConfig())[input.key],
        updated: true,
        engine_invalidated: engineInvalidated,
        next_steps: [
          { tool: 'cxr_config_get', description: 'Verify the updated configuration' },
          { tool: 'cxr_index_build', description: 'Load or build the index with the new settings' },
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

export const configTools: Record<string, ToolDefinition> = {
  cxr_config_get: {
    description:
      '[STATUS] Use to view corpus/index paths, embedding model, batch size and default k. Returns all or one specific key.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  cxr_config_set: {
    description:
      '[SETUP] Use to change a configuration setting. Changing a path or the model makes the next index call reload or rebuild.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
