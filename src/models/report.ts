/**
 * Report corpus and index snapshot models
 *
 * A ReportRecord is one row of the report corpus after column resolution.
 * An IndexSnapshot pairs the flat vector index with metadata that is
 * positionally aligned to the vectors it holds.
 *
 * @module models/report
 */

import type { FlatInnerProductIndex } from '../services/index/flat-index.js';

/**
 * One corpus row, normalized to (id, text)
 */
export interface ReportRecord {
  /** Unique within one load of one dataset file */
  id: string;
  text: string;
}

/**
 * How the loader chose the text of each record
 */
export type TextColumnResolution =
  | { kind: 'column'; column: string; via: 'text' | 'report' | 'longest_string_column' }
  | { kind: 'placeholder' };

/**
 * Result of loading the corpus. `source` is 'fallback' when the dataset
 * could not be read and the built-in placeholder record was used instead.
 */
export interface CorpusLoadResult {
  records: ReportRecord[];
  source: 'file' | 'fallback';
  textColumn: TextColumnResolution | null;
  idColumn: 'id' | 'row_position' | null;
  path: string;
  error?: string;
}

/**
 * Metadata persisted beside the vector index.
 *
 * INVARIANT: reports.length === ids.length === diseases.length === total_records,
 * and index entry i corresponds to position i of every array.
 */
export interface IndexMetadata {
  snapshot_id: string;
  reports: string[];
  ids: string[];
  diseases: string[];
  dimension: number;
  total_records: number;
  model_name: string;
  /** SHA-256 of the serialized vector index this metadata was written for */
  index_hash: string;
  built_at: string;
  corpus_path: string;
}

/**
 * Immutable pairing of vector index and metadata. Replaced wholesale on rebuild.
 */
export interface IndexSnapshot {
  readonly index: FlatInnerProductIndex;
  readonly metadata: Readonly<IndexMetadata>;
}

/**
 * One ranked search hit
 */
export interface SimilarReport {
  id: string;
  text: string;
  disease_label: string;
  /** Cosine similarity in [-1, 1] */
  score: number;
  /** Position of the record inside the snapshot */
  position: number;
}
