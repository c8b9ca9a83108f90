/**
 * Unit tests for MCP Server Error Handling
 *
 * Tests MCPError class, category mapping of service errors, and response formatting.
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import {
  MCPError,
  formatErrorResponse,
  getRecoveryHint,
  validationError,
  configurationError,
  type ErrorCategory,
} from '../../../src/server/errors.js';
import { EmbeddingError } from '../../../src/services/embedding/provider.js';
import { VectorIndexError } from '../../../src/services/index/flat-index.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// MCPError CLASS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('MCPError', () => {
  describe('constructor', () => {
    it('should create error with category and message', () => {
      const error = new MCPError('VALIDATION_ERROR', 'Invalid input');

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('MCPError');
      expect(error.category).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('Invalid input');
      expect(error.details).toBeUndefined();
    });

    it('should keep details', () => {
      const error = new MCPError('INDEX_ERROR', 'Corrupt', { path: '/tmp/index.bin' });
      expect(error.details).toEqual({ path: '/tmp/index.bin' });
    });
  });

  describe('fromUnknown', () => {
    it('should return MCPError unchanged', () => {
      const original = validationError('bad k');
      expect(MCPError.fromUnknown(original)).toBe(original);
    });

    it('should map ValidationError to VALIDATION_ERROR', () => {
      const error = MCPError.fromUnknown(new ValidationError('query: Query text is required'));

      expect(error.category).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('query: Query text is required');
      expect(error.details?.originalName).toBe('ValidationError');
    });

    it('should map EmbeddingError to EMBEDDING_FAILED with code and details', () => {
      const error = MCPError.fromUnknown(
        new EmbeddingError('Worker exited with code 1', 'WORKER_ERROR', { exitCode: 1 })
      );

      expect(error.category).toBe('EMBEDDING_FAILED');
      expect(error.details?.errorCode).toBe('WORKER_ERROR');
      expect(error.details?.errorDetails).toEqual({ exitCode: 1 });
    });

    it('should map a missing model to EMBEDDING_MODEL_ERROR', () => {
      const error = MCPError.fromUnknown(new EmbeddingError('Model not found', 'MODEL_NOT_FOUND'));
      expect(error.category).toBe('EMBEDDING_MODEL_ERROR');
    });

    it('should map VectorIndexError to INDEX_ERROR', () => {
      const error = MCPError.fromUnknown(new VectorIndexError('Hash mismatch', 'ARTIFACT_CORRUPT'));

      expect(error.category).toBe('INDEX_ERROR');
      expect(error.details?.errorCode).toBe('ARTIFACT_CORRUPT');
    });

    it('should use the default category for plain errors', () => {
      expect(MCPError.fromUnknown(new Error('boom')).category).toBe('INTERNAL_ERROR');
      expect(MCPError.fromUnknown(new Error('boom'), 'INDEX_ERROR').category).toBe('INDEX_ERROR');
    });

    it('should wrap non-Error values', () => {
      const error = MCPError.fromUnknown('string failure');

      expect(error.category).toBe('INTERNAL_ERROR');
      expect(error.message).toBe('string failure');
      expect(error.details).toEqual({ originalValue: 'string failure' });
    });
  });

  describe('toJSON', () => {
    it('should serialize category and message', () => {
      const json = new MCPError('CONFIGURATION_ERROR', 'Bad env').toJSON();

      expect(json.name).toBe('MCPError');
      expect(json.category).toBe('CONFIGURATION_ERROR');
      expect(json.message).toBe('Bad env');
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('formatErrorResponse', () => {
  it('should include category, message and recovery hint', () => {
    const response = formatErrorResponse(new MCPError('INDEX_ERROR', 'Corrupt', { a: 1 }));

    expect(response).toEqual({
      success: false,
      error: {
        category: 'INDEX_ERROR',
        message: 'Corrupt',
        recovery: getRecoveryHint('INDEX_ERROR'),
        details: { a: 1 },
      },
    });
  });
});

describe('getRecoveryHint', () => {
  it('should point every category at an existing tool', () => {
    const categories: ErrorCategory[] = [
      'VALIDATION_ERROR',
      'EMBEDDING_FAILED',
      'EMBEDDING_MODEL_ERROR',
      'INDEX_ERROR',
      'CONFIGURATION_ERROR',
      'INTERNAL_ERROR',
    ];
    const tools = new Set([
      'cxr_index_status',
      'cxr_index_build',
      'cxr_index_rebuild',
      'cxr_search',
      'cxr_classify',
      'cxr_report_generate',
      'cxr_config_get',
      'cxr_config_set',
    ]);

    for (const category of categories) {
      expect(tools.has(getRecoveryHint(category).tool)).toBe(true);
    }
  });

  it('should suggest a rebuild for index errors', () => {
    expect(getRecoveryHint('INDEX_ERROR').tool).toBe('cxr_index_rebuild');
  });
});

describe('error factories', () => {
  it('should create categorized errors', () => {
    expect(validationError('x').category).toBe('VALIDATION_ERROR');
    expect(configurationError('y', { variables: ['CXR_DEFAULT_TOP_K'] }).details).toEqual({
      variables: ['CXR_DEFAULT_TOP_K'],
    });
  });
});
