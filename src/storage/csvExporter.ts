import { roundStatistics } from '../analysis/statistics.js';
import type { ModelStatistics, ScoredPair } from '../types.js';

export type FlatStatisticsRecord = Record<string, string | number>;

export function csvEscape(value: unknown): string {
  const str = String(value ?? '');
  if (str.includes(',') || str.includes('\n') || str.includes('\r') || str.includes('"')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** Per-file scores of one model; the hypothesis column is named after the model. */
export function toScoresCsv(modelName: string, rows: readonly ScoredPair[]): string {
  const header = ['id', 'ground_truth', modelName, 'wer'].map(csvEscape);
  const lines = rows.map((row) =>
    [csvEscape(row.id), csvEscape(row.reference), csvEscape(row.hypothesis), row.wer].join(',')
  );
  return [header.join(','), ...lines].join('\n');
}

/**
 * Flat, snake_case view of a statistics record rounded for presentation.
 * Key order is the column order of the comparison table.
 */
export function flattenStatistics(stats: ModelStatistics, csvFile = ''): FlatStatisticsRecord {
  const s = roundStatistics(stats);
  return {
    model_name: s.modelName,
    count: s.sampleCount,
    mean: s.mean,
    median: s.median,
    std: s.std,
    min: s.min,
    max: s.max,
    variance: s.variance,
    range: s.range,
    q1: s.q1,
    q3: s.q3,
    iqr: s.iqr,
    p5: s.p5,
    p95: s.p95,
    skewness: s.skewness,
    kurtosis: s.kurtosis,
    cv: s.coefficientOfVariation,
    sem: s.standardErrorOfMean,
    ci_95_lower: s.confidenceInterval95[0],
    ci_95_upper: s.confidenceInterval95[1],
    excellent_count: s.bands.excellent.count,
    good_count: s.bands.good.count,
    fair_count: s.bands.fair.count,
    poor_count: s.bands.poor.count,
    excellent_pct: s.bands.excellent.percentage,
    good_pct: s.bands.good.percentage,
    fair_pct: s.bands.fair.percentage,
    poor_pct: s.bands.poor.percentage,
    csv_file: csvFile,
  };
}

export function toComparisonCsv(records: readonly FlatStatisticsRecord[]): string {
  if (records.length === 0) return '';
  const header = Object.keys(records[0]);
  const lines = records.map((record) => header.map((key) => csvEscape(record[key])).join(','));
  return [header.join(','), ...lines].join('\n');
}
