/**
 * Unit tests for MCP Server Type Definitions
 *
 * @module tests/unit/server/types
 */

import { describe, it, expect } from 'vitest';
import { successResult } from '../../../src/server/types.js';

describe('successResult', () => {
  it('should wrap data without copying it', () => {
    const data = { state: 'READY', total_records: 2 };
    const result = successResult(data);

    expect(result.success).toBe(true);
    expect(result.data).toBe(data);
  });

  it('should accept arrays', () => {
    expect(successResult([1, 2, 3]).data).toEqual([1, 2, 3]);
  });
});
