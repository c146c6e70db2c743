import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { compare } from '../analysis/compare.js';
import { computeStatistics } from '../analysis/statistics.js';
import { logger } from '../logger.js';
import { parseCsvRecords } from '../storage/csvReader.js';
import type { ComparisonTable } from '../types.js';

export const DEFAULT_SCORE_SUFFIX = '_wer.csv';

export interface ModelScores {
  modelName: string;
  csvFile: string;
  values: number[];
}

export interface AnalysisResult {
  table: ComparisonTable;
  /** Source CSV of each row of `table.rows`, by position. */
  sources: string[];
}

export function modelNameFromFile(file: string, suffix = DEFAULT_SCORE_SUFFIX): string {
  const base = path.basename(file);
  if (base.endsWith(suffix) && base.length > suffix.length) {
    return base.slice(0, -suffix.length);
  }
  return path.basename(base, path.extname(base));
}

export async function discoverScoreFiles(dir: string, suffix = DEFAULT_SCORE_SUFFIX): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(suffix))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Reads the `wer` column of a per-model score file. Returns null (after logging why)
 * when the file cannot be read, has no `wer` column or holds no numeric scores.
 */
export async function loadScoreFile(file: string, suffix = DEFAULT_SCORE_SUFFIX): Promise<ModelScores | null> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    logger.warn({ event: 'analysis_file_unreadable', file, message: (error as Error).message });
    return null;
  }

  const { header, records } = parseCsvRecords(content);
  if (!header.includes('wer')) {
    logger.warn({ event: 'analysis_file_missing_wer', file });
    return null;
  }

  const values: number[] = [];
  records.forEach((record, index) => {
    const raw = record.wer.trim();
    const value = raw === '' ? Number.NaN : Number(raw);
    if (Number.isFinite(value)) {
      values.push(value);
    } else {
      logger.warn({ event: 'analysis_row_skipped', file, row: index + 1, value: record.wer });
    }
  });

  if (values.length === 0) {
    logger.warn({ event: 'analysis_file_empty', file });
    return null;
  }
  return { modelName: modelNameFromFile(file, suffix), csvFile: file, values };
}

export async function analyzeScoreFiles(
  files: readonly string[],
  suffix = DEFAULT_SCORE_SUFFIX
): Promise<AnalysisResult | null> {
  const loaded: ModelScores[] = [];
  for (const file of files) {
    const scores = await loadScoreFile(file, suffix);
    if (scores) loaded.push(scores);
  }
  if (loaded.length === 0) {
    return null;
  }

  const statistics = loaded.map((scores) => computeStatistics(scores.values, scores.modelName));
  const sources = loaded.map((scores) => scores.csvFile);
  return { table: compare(statistics), sources };
}
