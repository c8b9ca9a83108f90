/**
 * RetrievalEngine - owns the one live IndexSnapshot
 *
 * State machine: UNBUILT → BUILDING → READY, and READY → BUILDING on rebuild.
 * At most one build runs at a time; a second request while one is in flight
 * joins it. A finished build replaces the snapshot in a single assignment, so
 * searches issued during a rebuild keep answering from the previous snapshot
 * and a failed rebuild leaves it untouched.
 *
 * Builds are also serialized per artifact file across engines: an engine
 * created after a config change waits for any build still writing the same
 * index or metadata path before starting its own.
 *
 * @module services/retrieval/engine
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { loadCorpus } from '../corpus/loader.js';
import { classifyReport } from '../classification/disease-classifier.js';
import { EmbeddingService, DEFAULT_BATCH_SIZE } from '../embedding/embedder.js';
import { FlatInnerProductIndex, VectorIndexError } from '../index/flat-index.js';
import {
  artifactsExist,
  loadSnapshot,
  persistSnapshot,
  type ArtifactPaths,
} from '../index/snapshot-store.js';
import type { IndexSnapshot, SimilarReport } from '../../models/report.js';

/** Latest build writing each resolved artifact path, across all engines */
const buildsByArtifact = new Map<string, Promise<IndexSnapshot>>();

export type EngineState = 'UNBUILT' | 'BUILDING' | 'READY';

export interface RetrievalEngineOptions extends ArtifactPaths {
  corpusPath: string;
  embedding: EmbeddingService;
  /** Texts per embedding batch during a build */
  batchSize?: number;
  /** Disease label per report; defaults to the keyword classifier */
  classify?: (reportText: string) => string;
}

export interface EngineStatus {
  state: EngineState;
  snapshot_id: string | null;
  dimension: number | null;
  total_records: number;
  model_name: string;
  built_at: string | null;
  corpus_path: string;
  index_path: string;
  metadata_path: string;
  artifacts_on_disk: boolean;
}

export class RetrievalEngine {
  private readonly options: RetrievalEngineOptions;
  private snapshot: IndexSnapshot | null = null;
  private inflight: Promise<IndexSnapshot> | null = null;

  constructor(options: RetrievalEngineOptions) {
    this.options = options;
  }

  get state(): EngineState {
    if (this.inflight) return 'BUILDING';
    return this.snapshot ? 'READY' : 'UNBUILT';
  }

  /** The snapshot searches are answered from, if any */
  get current(): IndexSnapshot | null {
    return this.snapshot;
  }

  getStatus(): EngineStatus {
    const meta = this.snapshot?.metadata;
    return {
      state: this.state,
      snapshot_id: meta?.snapshot_id ?? null,
      dimension: meta?.dimension ?? null,
      total_records: meta?.total_records ?? 0,
      model_name: meta?.model_name ?? this.options.embedding.modelName,
      built_at: meta?.built_at ?? null,
      corpus_path: this.options.corpusPath,
      index_path: this.options.indexPath,
      metadata_path: this.options.metadataPath,
      artifacts_on_disk: artifactsExist(this.options),
    };
  }

  /**
   * Reach READY: load persisted artifacts when both are present and valid,
   * otherwise build from the corpus.
   *
   * @throws EmbeddingError when a build is needed and the provider fails
   */
  async ensureReady(): Promise<IndexSnapshot> {
    if (this.snapshot) return this.snapshot;
    if (this.inflight) return this.inflight;

    if (artifactsExist(this.options)) {
      const loaded = this.tryLoad();
      if (loaded) {
        this.snapshot = loaded;
        return loaded;
      }
    } else {
      console.error('[ENGINE] No persisted index found, building from corpus');
    }

    return this.startBuild();
  }

  /**
   * Build a new snapshot from the corpus and swap it in on success.
   * Joins the in-flight build when there is one.
   */
  async rebuild(): Promise<IndexSnapshot> {
    if (this.inflight) {
      console.error('[ENGINE] Build already in progress, joining it');
      return this.inflight;
    }
    return this.startBuild();
  }

  /**
   * Top-k reports most similar to the query, best first.
   * Empty when no snapshot has been loaded or built yet.
   *
   * @throws EmbeddingError when the query cannot be embedded
   * @throws VectorIndexError INVALID_K for a non-positive or fractional k
   */
  async search(queryText: string, k: number): Promise<SimilarReport[]> {
    const snapshot = this.snapshot;
    if (!snapshot) return [];

    const vector = await this.options.embedding.embedQuery(queryText);
    const { scores, positions } = snapshot.index.query(vector, k);
    const { reports, ids, diseases } = snapshot.metadata;

    const results: SimilarReport[] = [];
    positions.forEach((position, i) => {
      if (position < 0 || position >= reports.length) return;
      results.push({
        id: ids[position],
        text: reports[position],
        disease_label: diseases[position],
        score: scores[i],
        position,
      });
    });
    return results;
  }

  private tryLoad(): IndexSnapshot | null {
    try {
      const loaded = loadSnapshot(this.options);
      const modelName = this.options.embedding.modelName;
      if (loaded.metadata.model_name !== modelName) {
        console.error(
          `[ENGINE] Persisted index was built with ${loaded.metadata.model_name}, ` +
            `current model is ${modelName}; rebuilding`
        );
        return null;
      }
      console.error(
        `[ENGINE] Loaded snapshot ${loaded.metadata.snapshot_id} ` +
          `(${loaded.metadata.total_records} records, dim ${loaded.metadata.dimension})`
      );
      return loaded;
    } catch (error) {
      if (!(error instanceof VectorIndexError)) throw error;
      console.error(`[ENGINE] Persisted index unusable (${error.code}): ${error.message}; rebuilding`);
      return null;
    }
  }

  private startBuild(): Promise<IndexSnapshot> {
    const targets = [this.options.indexPath, this.options.metadataPath].map((p) => path.resolve(p));
    const pending = [...new Set(targets.map((t) => buildsByArtifact.get(t)))].filter(
      (b): b is Promise<IndexSnapshot> => b !== undefined
    );

    let run: Promise<IndexSnapshot>;
    if (pending.length > 0) {
      console.error(`[ENGINE] Waiting for the build already writing ${this.options.indexPath}`);
      // Only completion matters here; the earlier caller receives its outcome
      run = Promise.allSettled(pending).then(() => this.build());
    } else {
      run = this.build();
    }

    const build = run.finally(() => {
      this.inflight = null;
      for (const target of targets) {
        if (buildsByArtifact.get(target) === build) buildsByArtifact.delete(target);
      }
    });
    this.inflight = build;
    for (const target of targets) {
      buildsByArtifact.set(target, build);
    }
    return build;
  }

  private async build(): Promise<IndexSnapshot> {
    const { corpusPath, embedding } = this.options;
    const classify = this.options.classify ?? ((text: string) => classifyReport(text));
    const startMs = Date.now();

    const corpus = loadCorpus(corpusPath);
    const texts = corpus.records.map((r) => r.text);

    const vectors = await embedding.embedCorpus(texts, {
      batchSize: this.options.batchSize ?? DEFAULT_BATCH_SIZE,
      onProgress: (done, total) => {
        console.error(`[INDEX] Processing embeddings: ${done}/${total}`);
      },
    });

    const index = FlatInnerProductIndex.build(vectors);
    const metadata = persistSnapshot(this.options, index, {
      snapshot_id: uuidv4(),
      reports: texts,
      ids: corpus.records.map((r) => r.id),
      diseases: texts.map(classify),
      dimension: index.dimension,
      total_records: index.size,
      model_name: embedding.modelName,
      built_at: new Date().toISOString(),
      corpus_path: corpusPath,
    });

    const snapshot: IndexSnapshot = { index, metadata };
    this.snapshot = snapshot;
    console.error(
      `[INDEX] Built snapshot ${metadata.snapshot_id}: ${metadata.total_records} records, ` +
        `dim ${metadata.dimension}, ${Date.now() - startMs}ms`
    );
    return snapshot;
  }
}
