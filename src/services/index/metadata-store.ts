/**
 * Metadata artifact - SQLite file holding the records aligned to the vector index
 *
 * The file is built under a temporary name inside one transaction and renamed
 * into place only after the connection is closed, so the path either holds a
 * complete metadata set or nothing.
 *
 * @module services/index/metadata-store
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { VectorIndexError } from './flat-index.js';
import { isValidHashFormat } from '../../utils/hash.js';
import type { IndexMetadata } from '../../models/report.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const METADATA_SCHEMA_VERSION = 1;

const DATABASE_PRAGMAS = ['PRAGMA journal_mode = DELETE', 'PRAGMA synchronous = FULL'];

const CREATE_TABLES = `
  CREATE TABLE snapshot_metadata (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    schema_version INTEGER NOT NULL,
    snapshot_id TEXT NOT NULL,
    dimension INTEGER NOT NULL,
    total_records INTEGER NOT NULL,
    model_name TEXT NOT NULL,
    index_hash TEXT NOT NULL,
    built_at TEXT NOT NULL,
    corpus_path TEXT NOT NULL
  );

  CREATE TABLE records (
    position INTEGER PRIMARY KEY,
    record_id TEXT NOT NULL,
    report TEXT NOT NULL,
    disease TEXT NOT NULL
  );
`;

interface SnapshotMetadataRow {
  schema_version: number;
  snapshot_id: string;
  dimension: number;
  total_records: number;
  model_name: string;
  index_hash: string;
  built_at: string;
  corpus_path: string;
}

interface RecordRow {
  position: number;
  record_id: string;
  report: string;
  disease: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// WRITE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Assert the positional alignment invariant of IndexMetadata
 *
 * @throws VectorIndexError ARTIFACT_CORRUPT on any length mismatch
 */
export function assertAligned(metadata: IndexMetadata): void {
  const { reports, ids, diseases, total_records } = metadata;
  if (
    reports.length !== total_records ||
    ids.length !== total_records ||
    diseases.length !== total_records
  ) {
    throw new VectorIndexError('Metadata arrays are not aligned to total_records', 'ARTIFACT_CORRUPT', {
      total_records,
      reports: reports.length,
      ids: ids.length,
      diseases: diseases.length,
    });
  }
}

/**
 * Write the metadata artifact atomically (temp file + rename).
 *
 * @throws VectorIndexError WRITE_FAILED if the file cannot be produced
 */
export function writeMetadata(filePath: string, metadata: IndexMetadata): void {
  assertAligned(metadata);

  const tmpPath = `${filePath}.tmp-${uuidv4()}`;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  let db: Database.Database | null = null;
  try {
    db = new Database(tmpPath);
    for (const pragma of DATABASE_PRAGMAS) {
      db.exec(pragma);
    }
    db.exec(CREATE_TABLES);

    const conn = db;
    const insertMeta = conn.prepare(`
      INSERT INTO snapshot_metadata
        (id, schema_version, snapshot_id, dimension, total_records, model_name, index_hash, built_at, corpus_path)
      VALUES (1, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertRecord = conn.prepare(
      'INSERT INTO records (position, record_id, report, disease) VALUES (?, ?, ?, ?)'
    );

    conn.transaction(() => {
      insertMeta.run(
        METADATA_SCHEMA_VERSION,
        metadata.snapshot_id,
        metadata.dimension,
        metadata.total_records,
        metadata.model_name,
        metadata.index_hash,
        metadata.built_at,
        metadata.corpus_path
      );
      for (let i = 0; i < metadata.total_records; i++) {
        insertRecord.run(i, metadata.ids[i], metadata.reports[i], metadata.diseases[i]);
      }
    })();

    db.close();
    db = null;
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    if (db) {
      try {
        db.close();
      } catch (closeErr) {
        console.error(
          '[INDEX] Failed to close metadata database after write error:',
          closeErr instanceof Error ? closeErr.message : String(closeErr)
        );
      }
    }
    fs.rmSync(tmpPath, { force: true });
    throw new VectorIndexError(`Failed to write index metadata to ${filePath}`, 'WRITE_FAILED', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// READ
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Read a metadata artifact written by writeMetadata().
 *
 * @throws VectorIndexError ARTIFACT_MISSING when the file does not exist
 * @throws VectorIndexError ARTIFACT_CORRUPT when it cannot be read or is misaligned
 */
export function readMetadata(filePath: string): IndexMetadata {
  if (!fs.existsSync(filePath)) {
    throw new VectorIndexError(`Index metadata not found at ${filePath}`, 'ARTIFACT_MISSING', {
      path: filePath,
    });
  }

  let db: Database.Database | null = null;
  try {
    db = new Database(filePath, { readonly: true, fileMustExist: true });

    const meta = db
      .prepare(
        `SELECT schema_version, snapshot_id, dimension, total_records, model_name, index_hash, built_at, corpus_path
         FROM snapshot_metadata WHERE id = 1`
      )
      .get() as SnapshotMetadataRow | undefined;
    if (!meta) {
      throw new Error('snapshot_metadata row is missing');
    }
    if (meta.schema_version !== METADATA_SCHEMA_VERSION) {
      throw new Error(
        `metadata schema version ${meta.schema_version}, expected ${METADATA_SCHEMA_VERSION}`
      );
    }
    if (!isValidHashFormat(meta.index_hash)) {
      throw new Error('index_hash is not a sha256 digest');
    }

    const rows = db
      .prepare('SELECT position, record_id, report, disease FROM records ORDER BY position ASC')
      .all() as RecordRow[];

    const reports: string[] = [];
    const ids: string[] = [];
    const diseases: string[] = [];
    rows.forEach((row, i) => {
      if (row.position !== i) {
        throw new Error(`records table has a gap at position ${i}`);
      }
      reports.push(row.report);
      ids.push(row.record_id);
      diseases.push(row.disease);
    });

    const metadata: IndexMetadata = {
      snapshot_id: meta.snapshot_id,
      reports,
      ids,
      diseases,
      dimension: meta.dimension,
      total_records: meta.total_records,
      model_name: meta.model_name,
      index_hash: meta.index_hash,
      built_at: meta.built_at,
      corpus_path: meta.corpus_path,
    };
    assertAligned(metadata);
    return metadata;
  } catch (error) {
    if (error instanceof VectorIndexError) throw error;
    throw new VectorIndexError(`Index metadata unreadable at ${filePath}`, 'ARTIFACT_CORRUPT', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  } finally {
    db?.close();
  }
}
