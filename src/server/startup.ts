/**
 * Startup configuration
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import fs from 'fs';
import { loadConfigFromEnv } from './config.js';
import { getRetrievalEngine, updateConfig } from './state.js';
import type { ServerConfig } from './types.js';

/**
 * Apply environment configuration and report what the server will use.
 * Missing inputs are warnings: the corpus loader and engine degrade on their own.
 *
 * @throws MCPError CONFIGURATION_ERROR on invalid CXR_* values
 */
export function applyStartupConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const config = loadConfigFromEnv(env);
  updateConfig(config);

  console.error(`[Config] corpus=${config.corpusPath}`);
  console.error(`[Config] index=${config.indexPath} metadata=${config.metadataPath}`);
  console.error(
    `[Config] model=${config.embeddingModel} batch_size=${config.embeddingBatchSize} top_k=${config.defaultTopK}`
  );

  const warnings: string[] = [];
  if (!fs.existsSync(config.corpusPath)) {
    warnings.push(
      `Corpus not found at ${config.corpusPath}. Builds will index the built-in placeholder record.`
    );
  }
  if (!config.pythonPath) {
    warnings.push('CXR_PYTHON_PATH is not set. The embedding worker runs with the default python.');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  return config;
}

/**
 * Load or build the index without blocking the transport.
 * A failure is logged; tools report it again on their next call.
 */
export function warmIndexInBackground(): void {
  getRetrievalEngine()
    .ensureReady()
    .then((snapshot) => {
      console.error(
        `[ENGINE] Ready with snapshot ${snapshot.metadata.snapshot_id} (${snapshot.metadata.total_records} records)`
      );
    })
    .catch((error: unknown) => {
      console.error(
        '[ENGINE] Background index warm-up failed:',
        error instanceof Error ? error.message : String(error)
      );
    });
}
