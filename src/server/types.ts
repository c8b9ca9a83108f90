/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { RetrievalEngine } from '../services/retrieval/engine.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerConfig {
  /** Directory the default artifact and corpus paths live in */
  dataDir: string;

  /** Report corpus CSV */
  corpusPath: string;

  /** Serialized vector index */
  indexPath: string;

  /** SQLite metadata artifact */
  metadataPath: string;

  /** sentence-transformers model id */
  embeddingModel: string;

  /** Texts per embedding batch during a build */
  embeddingBatchSize: number;

  /** Python interpreter for the embedding worker; python-shell default when unset */
  pythonPath?: string;

  /** k used by cxr_search when the caller gives none */
  defaultTopK: number;

  /** Load or build the index in the background at startup */
  buildOnStart: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  config: ServerConfig;

  /** Created on first use from config; dropped when engine-relevant config changes */
  engine: RetrievalEngine | null;
}
