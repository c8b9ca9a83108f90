/**
 * MCP Server State Management
 *
 * Holds the runtime configuration and the process-wide RetrievalEngine.
 * The engine is created lazily from config and dropped whenever a setting it
 * was built from changes, so the next tool call picks up the new paths/model.
 *
 * @module server/state
 */

import { loadConfigFromEnv } from './config.js';
import { RetrievalEngine } from '../services/retrieval/engine.js';
import { EmbeddingService } from '../services/embedding/embedder.js';
import { SentenceTransformerClient } from '../services/embedding/minilm.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Built-in defaults, independent of the process environment
 */
const defaultConfig: ServerConfig = loadConfigFromEnv({});

/** Settings the engine is constructed from */
const ENGINE_CONFIG_KEYS: ReadonlyArray<keyof ServerConfig> = [
  'corpusPath',
  'indexPath',
  'metadataPath',
  'embeddingModel',
  'embeddingBatchSize',
  'pythonPath',
];

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  config: { ...defaultConfig },
  engine: null,
};

export type EngineFactory = (config: ServerConfig) => RetrievalEngine;

export const createEngine: EngineFactory = (config) =>
  new RetrievalEngine({
    corpusPath: config.corpusPath,
    indexPath: config.indexPath,
    metadataPath: config.metadataPath,
    batchSize: config.embeddingBatchSize,
    embedding: new EmbeddingService(
      new SentenceTransformerClient({
        modelName: config.embeddingModel,
        pythonPath: config.pythonPath,
      })
    ),
  });

let _engineFactory: EngineFactory = createEngine;

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The engine for the current configuration, created on first use
 */
export function getRetrievalEngine(): RetrievalEngine {
  if (!state.engine) {
    state.engine = _engineFactory(state.config);
  }
  return state.engine;
}

/**
 * Swap how engines are constructed. Drops the current engine.
 */
export function setEngineFactory(factory: EngineFactory): void {
  _engineFactory = factory;
  state.engine = null;
}

/**
 * Forget the current engine; an in-flight build still completes against its own paths.
 */
export function invalidateEngine(): void {
  state.engine = null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Apply configuration changes. Returns true when the engine was invalidated.
 */
export function updateConfig(updates: Partial<ServerConfig>): boolean {
  const next = { ...state.config, ...updates };
  const engineChanged = ENGINE_CONFIG_KEYS.some((key) => next[key] !== state.config[key]);
  state.config = next;
  if (engineChanged && state.engine) {
    console.error('[Config] Engine settings changed, index will be reloaded on next use');
    invalidateEngine();
    return true;
  }
  return false;
}

/**
 * Reset configuration to built-in defaults
 */
export function resetConfig(): void {
  state.config = { ...defaultConfig };
  invalidateEngine();
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  _engineFactory = createEngine;
  state.config = { ...defaultConfig };
  state.engine = null;
}
