/**
 * Shared test helpers
 *
 * FakeEmbeddingProvider maps text to a bag-of-words count vector over a fixed
 * vocabulary, so similarity scores in tests can be worked out by hand.
 */

import { mkdtempSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { EmbeddingProvider } from '../../src/services/embedding/provider.js';

export const TEMP_DIR_PREFIX = 'cxr-test-';

export const VOCABULARY = [
  'normal',
  'chest',
  'clear',
  'lungs',
  'bilateral',
  'pneumonia',
  'consolidation',
  'symptoms',
  'effusion',
  'pleural',
  'cardiomegaly',
  'heart',
] as const;

export function bagOfWords(text: string): Float32Array {
  const vector = new Float32Array(VOCABULARY.length);
  for (const token of text.toLowerCase().match(/[a-z0-9-]+/g) ?? []) {
    const idx = VOCABULARY.findIndex((word) => word === token);
    if (idx >= 0) vector[idx] += 1;
  }
  return vector;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly modelName: string;

  /** Every encode() call, in order */
  readonly calls: string[][] = [];

  /** Thrown by the next encode() call, then cleared */
  failNext: Error | null = null;

  private held: Promise<void> | null = null;
  private releaseHeld: (() => void) | null = null;

  constructor(modelName = 'fake-bow') {
    this.modelName = modelName;
  }

  /** Number of calls that encoded more than one text (corpus batches) */
  get corpusCalls(): number {
    return this.calls.filter((texts) => texts.length > 1).length;
  }

  /**
   * Park multi-text calls until the returned function is invoked.
   * Single-text (query) calls are not held.
   */
  holdCorpusBatches(): () => void {
    this.held = new Promise<void>((resolve) => {
      this.releaseHeld = resolve;
    });
    return () => {
      this.releaseHeld?.();
      this.held = null;
      this.releaseHeld = null;
    };
  }

  async encode(texts: string[]): Promise<Float32Array[]> {
    this.calls.push([...texts]);
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
    if (texts.length > 1 && this.held) {
      await this.held;
    }
    return texts.map(bagOfWords);
  }
}

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), TEMP_DIR_PREFIX));
}

/**
 * Write an id,text CSV with every text quoted
 */
export function writeCorpus(filePath: string, records: Array<{ id: string; text: string }>): void {
  const lines = ['id,text', ...records.map((r) => `${r.id},"${r.text.replace(/"/g, '""')}"`)];
  writeFileSync(filePath, lines.join('\n') + '\n', 'utf-8');
}
