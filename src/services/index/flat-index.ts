/**
 * FlatInnerProductIndex - exact nearest-neighbor search over unit vectors
 *
 * Every stored vector is L2-normalized at build time and every query vector
 * is normalized before scoring, so the inner product is the cosine similarity.
 * Vectors live in one contiguous Float32Array in insertion order; position i
 * of the index is row i of the corpus the vectors were computed from.
 *
 * Persistence is a little-endian blob:
 *   magic "CXRFLAT1" | u32 version | u32 dimension | u32 count | f32[count * dimension]
 *
 * @module services/index/flat-index
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLING
// ═══════════════════════════════════════════════════════════════════════════════

export type VectorIndexErrorCode =
  | 'INVALID_VECTOR_DIMENSIONS'
  | 'INVALID_K'
  | 'ARTIFACT_MISSING'
  | 'ARTIFACT_CORRUPT'
  | 'WRITE_FAILED';

/**
 * Error for index construction, query and persistence failures
 */
export class VectorIndexError extends Error {
  constructor(
    message: string,
    public readonly code: VectorIndexErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VectorIndexError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Euclidean norm, accumulated in double precision
 */
export function l2Norm(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

/**
 * Divide a vector by its Euclidean norm, in place.
 * A zero vector stays a zero vector (similarity 0 against everything).
 */
export function normalizeL2(vector: Float32Array): Float32Array {
  const norm = l2Norm(vector);
  if (norm === 0) return vector;
  for (let i = 0; i < vector.length; i++) {
    vector[i] = vector[i] / norm;
  }
  return vector;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Top-k result. Both arrays have the same length, min(k, size), and are
 * sorted by descending score. Every position is in [0, size).
 */
export interface IndexQueryResult {
  scores: number[];
  positions: number[];
}

const MAGIC = Buffer.from('CXRFLAT1', 'ascii');
const FORMAT_VERSION = 1;
const HEADER_BYTES = MAGIC.length + 12;
const FLOAT_BYTES = 4;

/** Float32Array memory already matches the blob byte order */
const HOST_LITTLE_ENDIAN = os.endianness() === 'LE';

// ═══════════════════════════════════════════════════════════════════════════════
// FLAT INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export class FlatInnerProductIndex {
  readonly dimension: number;
  private readonly data: Float32Array;

  private constructor(dimension: number, data: Float32Array) {
    this.dimension = dimension;
    this.data = data;
  }

  /**
   * Build an index holding all vectors in input order.
   *
   * Inputs are copied and L2-normalized; the caller's arrays are not touched.
   *
   * @param vectors - N vectors of equal length
   * @param dimension - Required when N is 0; otherwise checked against the vectors
   * @throws VectorIndexError INVALID_VECTOR_DIMENSIONS on ragged or empty-width input
   */
  static build(vectors: ReadonlyArray<ArrayLike<number>>, dimension?: number): FlatInnerProductIndex {
    const dim = dimension ?? vectors[0]?.length;
    if (dim === undefined || !Number.isInteger(dim) || dim < 1) {
      throw new VectorIndexError(
        'Cannot infer index dimension: pass at least one vector or an explicit dimension',
        'INVALID_VECTOR_DIMENSIONS',
        { dimension: dim ?? null, count: vectors.length }
      );
    }

    const data = new Float32Array(vectors.length * dim);
    for (let i = 0; i < vectors.length; i++) {
      const vector = vectors[i];
      if (vector.length !== dim) {
        throw new VectorIndexError(
          `Vector ${i} has ${vector.length} dimensions, expected ${dim}`,
          'INVALID_VECTOR_DIMENSIONS',
          { position: i, actualDimensions: vector.length, expectedDimensions: dim }
        );
      }
      const row = data.subarray(i * dim, (i + 1) * dim);
      row.set(vector);
      normalizeL2(row);
    }

    return new FlatInnerProductIndex(dim, data);
  }

  /** Number of stored vectors */
  get size(): number {
    return this.data.length / this.dimension;
  }

  /**
   * Copy of the stored (normalized) vector at a position, or null when out of range
   */
  getVector(position: number): Float32Array | null {
    if (!Number.isInteger(position) || position < 0 || position >= this.size) return null;
    return this.data.slice(position * this.dimension, (position + 1) * this.dimension);
  }

  /**
   * Return the k highest inner-product matches, best first.
   *
   * When k exceeds the stored count the result holds exactly `size` entries.
   * Equal scores are ordered by ascending position so results are deterministic.
   *
   * @throws VectorIndexError INVALID_K if k is not a positive integer
   * @throws VectorIndexError INVALID_VECTOR_DIMENSIONS on a query of the wrong length
   */
  query(vector: ArrayLike<number>, k: number): IndexQueryResult {
    if (!Number.isInteger(k) || k < 1) {
      throw new VectorIndexError(`k must be a positive integer, got ${k}`, 'INVALID_K', { k });
    }
    if (vector.length !== this.dimension) {
      throw new VectorIndexError(
        `Query vector must be ${this.dimension} dimensions, got ${vector.length}`,
        'INVALID_VECTOR_DIMENSIONS',
        { actualDimensions: vector.length, expectedDimensions: this.dimension }
      );
    }

    const q = normalizeL2(Float32Array.from(vector));
    const size = this.size;
    const heap = new TopKHeap(Math.min(k, size));

    for (let pos = 0; pos < size; pos++) {
      const offset = pos * this.dimension;
      let dot = 0;
      for (let d = 0; d < this.dimension; d++) {
        dot += this.data[offset + d] * q[d];
      }
      heap.offer(dot, pos);
    }

    const ranked = heap.drainSorted();
    const scores: number[] = [];
    const positions: number[] = [];
    for (const entry of ranked) {
      // Positions outside the stored range never index metadata
      if (entry.position < 0 || entry.position >= size) continue;
      scores.push(entry.score);
      positions.push(entry.position);
    }
    return { scores, positions };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PERSISTENCE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Serialize to the on-disk blob format
   */
  toBuffer(): Buffer {
    const buffer = Buffer.alloc(HEADER_BYTES + this.data.length * FLOAT_BYTES);
    MAGIC.copy(buffer, 0);
    buffer.writeUInt32LE(FORMAT_VERSION, MAGIC.length);
    buffer.writeUInt32LE(this.dimension, MAGIC.length + 4);
    buffer.writeUInt32LE(this.size, MAGIC.length + 8);
    const body = buffer.subarray(HEADER_BYTES);
    if (HOST_LITTLE_ENDIAN) {
      Buffer.from(this.data.buffer, this.data.byteOffset, this.data.byteLength).copy(body);
    } else {
      const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
      for (let i = 0; i < this.data.length; i++) {
        view.setFloat32(i * FLOAT_BYTES, this.data[i], true);
      }
    }
    return buffer;
  }

  /**
   * Parse a blob produced by toBuffer(). Stored values are taken as-is.
   *
   * @throws VectorIndexError ARTIFACT_CORRUPT on bad magic, version or length
   */
  static fromBuffer(buffer: Buffer): FlatInnerProductIndex {
    if (buffer.length < HEADER_BYTES || !buffer.subarray(0, MAGIC.length).equals(MAGIC)) {
      throw new VectorIndexError('Vector index blob has an unrecognized header', 'ARTIFACT_CORRUPT', {
        byteLength: buffer.length,
      });
    }
    const version = buffer.readUInt32LE(MAGIC.length);
    if (version !== FORMAT_VERSION) {
      throw new VectorIndexError(
        `Unsupported vector index format version ${version}`,
        'ARTIFACT_CORRUPT',
        { version, supported: FORMAT_VERSION }
      );
    }
    const dimension = buffer.readUInt32LE(MAGIC.length + 4);
    const count = buffer.readUInt32LE(MAGIC.length + 8);
    const expectedBytes = HEADER_BYTES + dimension * count * FLOAT_BYTES;
    if (dimension < 1 || buffer.length !== expectedBytes) {
      throw new VectorIndexError(
        `Vector index blob length ${buffer.length} does not match header (${count} x ${dimension})`,
        'ARTIFACT_CORRUPT',
        { dimension, count, byteLength: buffer.length, expectedBytes }
      );
    }

    const data = new Float32Array(dimension * count);
    const body = buffer.subarray(HEADER_BYTES);
    if (HOST_LITTLE_ENDIAN) {
      // Copy bytes; the body may not be 4-byte aligned inside a pooled Buffer
      new Uint8Array(data.buffer).set(body);
    } else {
      const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
      for (let i = 0; i < data.length; i++) {
        data[i] = view.getFloat32(i * FLOAT_BYTES, true);
      }
    }
    return new FlatInnerProductIndex(dimension, data);
  }

  /**
   * Write the index to disk. The blob goes to a temporary sibling first and
   * is renamed into place, so a reader never sees a half-written file.
   *
   * @returns The serialized bytes, for hashing by the caller
   */
  save(filePath: string): Buffer {
    const buffer = this.toBuffer();
    const tmpPath = `${filePath}.tmp-${uuidv4()}`;
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(tmpPath, buffer);
      fs.renameSync(tmpPath, filePath);
    } catch (error) {
      if (fs.existsSync(tmpPath)) {
        fs.rmSync(tmpPath, { force: true });
      }
      throw new VectorIndexError(`Failed to write vector index to ${filePath}`, 'WRITE_FAILED', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return buffer;
  }

  /**
   * Read an index written by save().
   *
   * @throws VectorIndexError ARTIFACT_MISSING when the file is absent or unreadable
   * @throws VectorIndexError ARTIFACT_CORRUPT when the contents do not parse
   */
  static load(filePath: string): { index: FlatInnerProductIndex; buffer: Buffer } {
    let buffer: Buffer;
    try {
      buffer = fs.readFileSync(filePath);
    } catch (error) {
      throw new VectorIndexError(`Vector index not readable at ${filePath}`, 'ARTIFACT_MISSING', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return { index: FlatInnerProductIndex.fromBuffer(buffer), buffer };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOP-K SELECTION
// ═══════════════════════════════════════════════════════════════════════════════

interface ScoredPosition {
  score: number;
  position: number;
}

/** True when a ranks strictly below b (lower score, or same score and later position) */
function ranksBelow(a: ScoredPosition, b: ScoredPosition): boolean {
  return a.score < b.score || (a.score === b.score && a.position > b.position);
}

/**
 * Bounded min-heap keeping the best `capacity` entries seen so far.
 * The root is the weakest kept entry.
 */
class TopKHeap {
  private readonly items: ScoredPosition[] = [];

  constructor(private readonly capacity: number) {}

  offer(score: number, position: number): void {
    if (this.capacity === 0) return;
    const entry = { score, position };
    if (this.items.length < this.capacity) {
      this.items.push(entry);
      this.siftUp(this.items.length - 1);
      return;
    }
    if (ranksBelow(this.items[0], entry)) {
      this.items[0] = entry;
      this.siftDown(0);
    }
  }

  /** Entries best-first. Empties the heap. */
  drainSorted(): ScoredPosition[] {
    const out = this.items.splice(0, this.items.length);
    out.sort((a, b) => (ranksBelow(a, b) ? 1 : ranksBelow(b, a) ? -1 : 0));
    return out;
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!ranksBelow(this.items[i], this.items[parent])) break;
      [this.items[i], this.items[parent]] = [this.items[parent], this.items[i]];
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this.items.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let weakest = i;
      if (left < n && ranksBelow(this.items[left], this.items[weakest])) weakest = left;
      if (right < n && ranksBelow(this.items[right], this.items[weakest])) weakest = right;
      if (weakest === i) break;
      [this.items[i], this.items[weakest]] = [this.items[weakest], this.items[i]];
      i = weakest;
    }
  }
}
