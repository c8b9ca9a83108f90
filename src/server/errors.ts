/**
 * MCP Server Error Handling
 *
 * Tool handlers never let an exception escape: every failure is converted to
 * an MCPError with a category and a recovery hint. Recoverable conditions
 * (corpus unreadable, artifacts missing, engine not ready) are handled inside
 * the services and never reach this layer.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Embedding errors
  | 'EMBEDDING_FAILED'
  | 'EMBEDDING_MODEL_ERROR'

  // Index errors
  | 'INDEX_ERROR'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories so clients can tell
 * an embedding worker failure from a corrupt index or bad input.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  EmbeddingError: 'EMBEDDING_FAILED',
  VectorIndexError: 'INDEX_ERROR',
};

/**
 * EmbeddingError codes that point at the model rather than a single request
 */
const MODEL_ERROR_CODES = new Set(['MODEL_NOT_FOUND']);

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const customCode = readStringField(error, 'code');
      const customDetails = readRecordField(error, 'details');

      let category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      if (error.name === 'EmbeddingError' && customCode && MODEL_ERROR_CODES.has(customCode)) {
        category = 'EMBEDDING_MODEL_ERROR';
      }

      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(customCode && { errorCode: customCode }),
        ...(customDetails && { errorDetails: customDetails }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

function readStringField(error: Error, field: string): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

function readRecordField(error: Error, field: string): Record<string, unknown> | undefined {
  const value: unknown = Reflect.get(error, field);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for clients to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'cxr_config_get', hint: 'Check parameter types and required fields' },
  EMBEDDING_FAILED: {
    tool: 'cxr_index_status',
    hint: 'Check the Python embedding worker (python3, sentence-transformers) and retry',
  },
  EMBEDDING_MODEL_ERROR: {
    tool: 'cxr_config_set',
    hint: 'Verify CXR_EMBEDDING_MODEL names a sentence-transformers model that can be loaded',
  },
  INDEX_ERROR: {
    tool: 'cxr_index_rebuild',
    hint: 'Rebuild the index to replace unreadable or mismatched artifacts',
  },
  CONFIGURATION_ERROR: {
    tool: 'cxr_config_get',
    hint: 'Check CXR_* environment variables; see .env.example',
  },
  INTERNAL_ERROR: { tool: 'cxr_index_status', hint: 'Run cxr_index_status for diagnostics' },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response.
 * Always includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create configuration error for invalid environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
