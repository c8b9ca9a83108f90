/**
 * SentenceTransformerClient - TypeScript bridge to python/embedding_worker.py
 *
 * Each call spawns the worker, sends the texts as a JSON array on stdin and
 * reads the last JSON line of stdout (sentence_transformers may print other
 * lines first). Vectors come back raw; normalization happens in the index.
 *
 * @module services/embedding/minilm
 */

import { PythonShell, Options as PythonShellOptions } from 'python-shell';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { EmbeddingError, type EmbeddingErrorCode, type EmbeddingProvider } from './provider.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_MODEL_NAME = 'sentence-transformers/all-MiniLM-L6-v2';

/** Worker reply, one JSON object per invocation */
const WorkerResultSchema = z.object({
  success: z.boolean(),
  embeddings: z.array(z.array(z.number())).default([]),
  count: z.number().int().optional(),
  dimension: z.number().int().nullable().optional(),
  model: z.string().optional(),
  device: z.string().optional(),
  elapsed_ms: z.number().optional(),
  error: z.string().nullable().optional(),
});

type WorkerResult = z.infer<typeof WorkerResultSchema>;

export interface SentenceTransformerClientOptions {
  modelName?: string;
  workerPath?: string;
  pythonPath?: string;
  /** Texts per forward pass inside the worker */
  batchSize?: number;
  timeoutMs?: number;
}

export class SentenceTransformerClient implements EmbeddingProvider {
  readonly modelName: string;
  private readonly workerPath: string;
  private readonly pythonPath: string | undefined;
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  /** Texts per worker process; bounds worker memory on large corpora */
  private static readonly MAX_TEXTS_PER_CALL = 100;

  /** Max stderr accumulation: 10KB */
  private static readonly MAX_STDERR_LENGTH = 10_240;

  /** Grace period between SIGTERM and SIGKILL on timeout */
  private static readonly KILL_GRACE_MS = 5000;

  constructor(options: SentenceTransformerClientOptions = {}) {
    this.modelName = options.modelName ?? DEFAULT_MODEL_NAME;
    this.workerPath =
      options.workerPath ?? path.resolve(__dirname, '../../../python/embedding_worker.py');
    this.pythonPath = options.pythonPath;
    this.batchSize = options.batchSize ?? 32;
    this.timeoutMs = options.timeoutMs ?? 300_000;
  }

  async encode(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }

    const maxPerCall = SentenceTransformerClient.MAX_TEXTS_PER_CALL;
    if (texts.length <= maxPerCall) {
      return this.encodeSingleCall(texts);
    }

    const all: Float32Array[] = [];
    const totalCalls = Math.ceil(texts.length / maxPerCall);
    for (let i = 0; i < texts.length; i += maxPerCall) {
      const slice = texts.slice(i, i + maxPerCall);
      console.error(
        `[EMBED] Worker call ${Math.floor(i / maxPerCall) + 1}/${totalCalls} (${slice.length} texts)`
      );
      all.push(...(await this.encodeSingleCall(slice)));
    }
    return all;
  }

  private async encodeSingleCall(texts: string[]): Promise<Float32Array[]> {
    const args = ['--stdin', '--model', this.modelName, '--batch-size', String(this.batchSize)];
    const result = await this.runWorker(args, JSON.stringify(texts));

    if (!result.success) {
      throw new EmbeddingError(
        result.error ?? 'Embedding generation failed with no error message',
        classifyWorkerError(result.error ?? null),
        { count: texts.length, model: this.modelName, device: result.device }
      );
    }

    if (result.embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Vector count mismatch: got ${result.embeddings.length}, expected ${texts.length}`,
        'EMBEDDING_FAILED',
        { vectorCount: result.embeddings.length, textCount: texts.length }
      );
    }

    const dimension = result.embeddings[0].length;
    result.embeddings.forEach((embedding, i) => {
      if (embedding.length !== dimension) {
        throw new EmbeddingError(
          `Embedding ${i} has ${embedding.length} dimensions, expected ${dimension}`,
          'DIMENSION_MISMATCH',
          { index: i, actualDim: embedding.length, expectedDim: dimension }
        );
      }
    });

    return result.embeddings.map((e) => new Float32Array(e));
  }

  private async runWorker(args: string[], stdin: string): Promise<WorkerResult> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const options: PythonShellOptions = {
        mode: 'text',
        pythonPath: this.pythonPath,
        pythonOptions: ['-u'],
        args,
      };

      const shell = new PythonShell(this.workerPath, options);
      let stderr = '';
      let sigkillTimer: ReturnType<typeof setTimeout> | null = null;

      const timer = setTimeout(() => {
        if (settled) return;
        try {
          shell.kill();
        } catch (error) {
          console.error(
            '[EMBED] Failed to kill worker on timeout:',
            error instanceof Error ? error.message : String(error)
          );
        }
        sigkillTimer = setTimeout(() => {
          if (settled) return;
          console.error(
            `[EMBED] Worker did not exit after SIGTERM, sending SIGKILL (pid: ${shell.childProcess?.pid})`
          );
          try {
            shell.childProcess?.kill('SIGKILL');
          } catch (error) {
            console.error(
              '[EMBED] Failed to SIGKILL worker (may already be gone):',
              error instanceof Error ? error.message : String(error)
            );
          }
          settled = true;
          reject(
            new EmbeddingError(`Embedding worker timeout after ${this.timeoutMs}ms`, 'WORKER_ERROR', {
              stderr: stderr.substring(0, 1000),
            })
          );
        }, SentenceTransformerClient.KILL_GRACE_MS);
      }, this.timeoutMs);

      const outputLines: string[] = [];
      shell.on('message', (msg: string) => {
        outputLines.push(msg);
      });

      shell.on('stderr', (line: string) => {
        if (stderr.length < SentenceTransformerClient.MAX_STDERR_LENGTH) {
          stderr += line + '\n';
        }
      });

      const handleEnd = (err?: Error) => {
        clearTimeout(timer);
        if (sigkillTimer) clearTimeout(sigkillTimer);
        if (settled) return;
        settled = true;

        const parsed = parseLastJsonLine(outputLines);

        // A failed worker still prints its result object before exiting non-zero
        if (parsed) {
          resolve(parsed);
          return;
        }

        if (err) {
          console.error('[EMBED] Worker error:', err.message);
          if (stderr) console.error('[EMBED] Worker stderr:', stderr.substring(0, 1000));
          reject(
            new EmbeddingError(`Worker error: ${err.message}`, classifyWorkerError(stderr || err.message), {
              stderr: stderr.substring(0, 1000),
            })
          );
          return;
        }

        const output = outputLines.join('\n');
        reject(
          new EmbeddingError(
            output.trim() ? 'Failed to parse worker output as JSON' : 'Worker produced no output',
            output.trim() ? 'PARSE_ERROR' : 'WORKER_ERROR',
            { output: output.substring(0, 1000), stderr: stderr.substring(0, 1000) }
          )
        );
      };

      shell.send(stdin);
      shell.end(handleEnd);
    });
  }
}

/**
 * Scan output lines from the end for the worker's JSON result
 */
export function parseLastJsonLine(lines: string[]): WorkerResult | null {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line.startsWith('{')) continue;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      console.error(
        '[EMBED] JSON parse failed for output line, trying previous:',
        error instanceof Error ? error.message : String(error)
      );
      continue;
    }
    const result = WorkerResultSchema.safeParse(value);
    if (result.success) return result.data;
  }
  return null;
}

export function classifyWorkerError(error: string | null): EmbeddingErrorCode {
  if (!error) return 'EMBEDDING_FAILED';
  const lower = error.toLowerCase();
  if (
    lower.includes('model not found') ||
    lower.includes('no such file') ||
    lower.includes('is not a valid model identifier')
  ) {
    return 'MODEL_NOT_FOUND';
  }
  return 'EMBEDDING_FAILED';
}
