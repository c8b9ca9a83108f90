/**
 * Unit tests for SHA-256 hash utilities
 *
 * @module tests/unit/hash/hash
 */

import { describe, it, expect } from 'vitest';
import { computeHash, isValidHashFormat } from '../../../src/utils/hash.js';

describe('computeHash', () => {
  it('should prefix the hex digest', () => {
    expect(computeHash('hello')).toBe(
      'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
  });

  it('should hash empty content', () => {
    expect(computeHash('')).toBe('sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('should give the same digest for a string and its UTF-8 buffer', () => {
    expect(computeHash(Buffer.from('CXRFLAT1', 'utf-8'))).toBe(computeHash('CXRFLAT1'));
  });

  it('should change when a single byte changes', () => {
    expect(computeHash(Buffer.from([0, 1, 2]))).not.toBe(computeHash(Buffer.from([0, 1, 3])));
  });
});

describe('isValidHashFormat', () => {
  it('should accept computed hashes', () => {
    expect(isValidHashFormat(computeHash('report'))).toBe(true);
  });

  it('should reject uppercase, short and unprefixed digests', () => {
    expect(isValidHashFormat('sha256:' + 'A'.repeat(64))).toBe(false);
    expect(isValidHashFormat('sha256:abc123')).toBe(false);
    expect(isValidHashFormat('a'.repeat(64))).toBe(false);
    expect(isValidHashFormat('')).toBe(false);
  });
});
