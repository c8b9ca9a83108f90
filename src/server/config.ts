/**
 * Environment configuration
 *
 * CXR_* variables are parsed once at startup. Blank values count as unset.
 *
 * @module server/config
 */

import path from 'path';
import { z } from 'zod';
import { configurationError } from './errors.js';
import { MAX_TOP_K } from '../utils/validation.js';
import { DEFAULT_MODEL_NAME } from '../services/embedding/minilm.js';
import { DEFAULT_BATCH_SIZE } from '../services/embedding/embedder.js';
import type { ServerConfig } from './types.js';

const DEFAULT_DATA_DIR = './data';
const DEFAULT_TOP_K = 5;

function blankAsUnset(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const OptionalPath = z.preprocess(blankAsUnset, z.string().optional());

const EnvSchema = z.object({
  CXR_DATA_DIR: z.preprocess(blankAsUnset, z.string().default(DEFAULT_DATA_DIR)),
  CXR_CORPUS_PATH: OptionalPath,
  CXR_INDEX_PATH: OptionalPath,
  CXR_METADATA_PATH: OptionalPath,
  CXR_EMBEDDING_MODEL: z.preprocess(blankAsUnset, z.string().default(DEFAULT_MODEL_NAME)),
  CXR_EMBEDDING_BATCH_SIZE: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().min(1).max(1024).default(DEFAULT_BATCH_SIZE)
  ),
  CXR_PYTHON_PATH: OptionalPath,
  CXR_DEFAULT_TOP_K: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().min(1).max(MAX_TOP_K).default(DEFAULT_TOP_K)
  ),
  CXR_BUILD_ON_START: z.preprocess(
    blankAsUnset,
    z
      .enum(['true', 'false', '1', '0'])
      .default('true')
      .transform((v) => v === 'true' || v === '1')
  ),
});

/**
 * Build the server configuration from environment variables.
 * Relative paths resolve against the working directory.
 *
 * @throws MCPError CONFIGURATION_ERROR naming every invalid variable
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw configurationError(`Invalid environment configuration: ${problems.join('; ')}`, {
      variables: result.error.errors.map((e) => e.path.join('.')),
    });
  }

  const vars = result.data;
  const dataDir = path.resolve(vars.CXR_DATA_DIR);
  const inDataDir = (override: string | undefined, fileName: string): string =>
    override ? path.resolve(override) : path.join(dataDir, fileName);

  return {
    dataDir,
    corpusPath: inDataDir(vars.CXR_CORPUS_PATH, 'cxr_df.csv'),
    indexPath: inDataDir(vars.CXR_INDEX_PATH, 'vector_index.bin'),
    metadataPath: inDataDir(vars.CXR_METADATA_PATH, 'metadata.db'),
    embeddingModel: vars.CXR_EMBEDDING_MODEL,
    embeddingBatchSize: vars.CXR_EMBEDDING_BATCH_SIZE,
    pythonPath: vars.CXR_PYTHON_PATH,
    defaultTopK: vars.CXR_DEFAULT_TOP_K,
    buildOnStart: vars.CXR_BUILD_ON_START,
  };
}
