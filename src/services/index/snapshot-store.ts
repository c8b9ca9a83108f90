/**
 * Snapshot persistence - the two on-disk artifacts of one IndexSnapshot
 *
 * Commit order: remove old metadata, write index blob, write metadata.
 * The metadata file is the commit marker. A crash anywhere before it lands
 * leaves no metadata on disk, which reads back as "not built".
 *
 * @module services/index/snapshot-store
 */

import fs from 'fs';
import { FlatInnerProductIndex, VectorIndexError } from './flat-index.js';
import { readMetadata, writeMetadata } from './metadata-store.js';
import { computeHash } from '../../utils/hash.js';
import type { IndexMetadata, IndexSnapshot } from '../../models/report.js';

export interface ArtifactPaths {
  indexPath: string;
  metadataPath: string;
}

/**
 * Both artifacts present. Neither alone is enough to load a snapshot.
 */
export function artifactsExist(paths: ArtifactPaths): boolean {
  return fs.existsSync(paths.indexPath) && fs.existsSync(paths.metadataPath);
}

/**
 * Persist a freshly built snapshot.
 *
 * @param metadata - Everything except index_hash, which is computed from the written blob
 * @returns The metadata as committed
 */
export function persistSnapshot(
  paths: ArtifactPaths,
  index: FlatInnerProductIndex,
  metadata: Omit<IndexMetadata, 'index_hash'>
): IndexMetadata {
  fs.rmSync(paths.metadataPath, { force: true });

  const blob = index.save(paths.indexPath);
  const committed: IndexMetadata = { ...metadata, index_hash: computeHash(blob) };
  writeMetadata(paths.metadataPath, committed);
  return committed;
}

/**
 * Load a snapshot from disk and cross-check the two artifacts.
 *
 * @throws VectorIndexError ARTIFACT_MISSING if either file is absent
 * @throws VectorIndexError ARTIFACT_CORRUPT if they do not belong together
 */
export function loadSnapshot(paths: ArtifactPaths): IndexSnapshot {
  const metadata = readMetadata(paths.metadataPath);
  const { index, buffer } = FlatInnerProductIndex.load(paths.indexPath);

  const hash = computeHash(buffer);
  if (hash !== metadata.index_hash) {
    throw new VectorIndexError(
      'Vector index blob does not match the hash recorded in metadata',
      'ARTIFACT_CORRUPT',
      { expected: metadata.index_hash, actual: hash, snapshotId: metadata.snapshot_id }
    );
  }
  if (index.dimension !== metadata.dimension || index.size !== metadata.total_records) {
    throw new VectorIndexError(
      `Vector index shape ${index.size}x${index.dimension} does not match metadata ` +
        `${metadata.total_records}x${metadata.dimension}`,
      'ARTIFACT_CORRUPT',
      { snapshotId: metadata.snapshot_id }
    );
  }

  return { index, metadata };
}
