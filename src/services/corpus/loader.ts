/**
 * Corpus Loader - reads the report CSV into (id, text) records
 *
 * Text column resolution, first match wins:
 *   1. a `text` column
 *   2. a `report` column
 *   3. the string-typed column with the greatest mean value length
 *   4. the placeholder "No report available" for every row
 *
 * A dataset that cannot be read never aborts the caller: the loader logs the
 * failure and returns the single built-in fallback record instead.
 *
 * @module services/corpus/loader
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { CorpusLoadResult, ReportRecord, TextColumnResolution } from '../../models/report.js';

export const PLACEHOLDER_TEXT = 'No report available';

/** Served when the dataset is unreadable so downstream stays non-empty */
export const FALLBACK_RECORD: Readonly<ReportRecord> = Object.freeze({
  id: '1',
  text: 'Sample chest X-ray report showing normal findings',
});

const CsvRows = z.array(z.array(z.string()));

/** Values a dataframe reader would infer as numeric */
const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface ParsedTable {
  header: string[];
  rows: string[][];
}

/**
 * Parse CSV text into a header and rows of equal width (short rows padded with '').
 *
 * @throws Error when the content is not CSV or has no header row
 */
export function parseCorpusCsv(content: string): ParsedTable {
  const parsed: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const table = CsvRows.parse(parsed);
  if (table.length === 0) {
    throw new Error('Dataset is empty (no header row)');
  }

  const header = table[0].map((name) => name.trim());
  const rows = table.slice(1).map((row) => header.map((_, col) => row[col] ?? ''));
  return { header, rows };
}

function isStringColumn(rows: string[][], col: number): boolean {
  return rows.some((row) => row[col] !== '' && !NUMERIC_PATTERN.test(row[col].trim()));
}

function meanValueLength(rows: string[][], col: number): number {
  let total = 0;
  let count = 0;
  for (const row of rows) {
    if (row[col] === '') continue;
    total += row[col].length;
    count++;
  }
  return count === 0 ? 0 : total / count;
}

/**
 * Choose where record text comes from. Pure: depends only on the table.
 * Ties on mean length go to the leftmost column.
 */
export function resolveTextColumn(header: string[], rows: string[][]): TextColumnResolution {
  if (header.includes('text')) {
    return { kind: 'column', column: 'text', via: 'text' };
  }
  if (header.includes('report')) {
    return { kind: 'column', column: 'report', via: 'report' };
  }

  let best: { column: string; meanLength: number } | null = null;
  for (let col = 0; col < header.length; col++) {
    const column = header[col];
    // Duplicate header names resolve to their first occurrence
    if (header.indexOf(column) !== col) continue;
    if (!isStringColumn(rows, col)) continue;
    const meanLength = meanValueLength(rows, col);
    if (best === null || meanLength > best.meanLength) {
      best = { column, meanLength };
    }
  }

  if (best === null) {
    return { kind: 'placeholder' };
  }
  return { kind: 'column', column: best.column, via: 'longest_string_column' };
}

/**
 * Turn a parsed table into records
 */
export function tableToRecords(table: ParsedTable): Omit<CorpusLoadResult, 'path' | 'source'> {
  const { header, rows } = table;
  const textColumn = resolveTextColumn(header, rows);
  const textIdx = textColumn.kind === 'column' ? header.indexOf(textColumn.column) : -1;
  const idIdx = header.indexOf('id');

  const records = rows.map((row, position) => ({
    id: idIdx >= 0 ? row[idIdx] : String(position),
    text: textIdx >= 0 ? row[textIdx] : PLACEHOLDER_TEXT,
  }));

  return { records, textColumn, idColumn: idIdx >= 0 ? 'id' : 'row_position' };
}

/**
 * Load the corpus, degrading to the fallback record on any read or parse failure.
 */
export function loadCorpus(filePath: string): CorpusLoadResult {
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    const table = parseCorpusCsv(content);
    if (table.rows.length === 0) {
      throw new Error('Dataset has a header but no rows');
    }

    const result = tableToRecords(table);
    const via =
      result.textColumn?.kind === 'column'
        ? `${result.textColumn.column} (${result.textColumn.via})`
        : 'placeholder';
    console.error(
      `[CORPUS] Loaded dataset with ${result.records.length} records from ${filePath}, text column: ${via}`
    );
    return { ...result, source: 'file', path: filePath };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[CORPUS] Error loading dataset ${filePath}: ${message}. Using fallback record.`);
    return {
      records: [{ ...FALLBACK_RECORD }],
      source: 'fallback',
      textColumn: null,
      idColumn: null,
      path: filePath,
      error: message,
    };
  }
}
