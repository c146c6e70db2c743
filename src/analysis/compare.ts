import { BAND_LIMITS, roundStatistics } from './statistics.js';
import type {
  ComparisonRow,
  ComparisonTable,
  Interpretation,
  ModelStatistics,
  OverallRating,
  SkewShape,
  VariabilityLevel,
} from '../types.js';

const CV_LOW_LIMIT = 15;
const CV_MODERATE_LIMIT = 30;
const SYMMETRY_LIMIT = 0.5;

export const VARIABILITY_LABELS: Record<VariabilityLevel, string> = {
  low: 'Low variability - highly consistent performance',
  moderate: 'Moderate variability - reasonably consistent',
  high: 'High variability - inconsistent performance',
};

export const SKEW_LABELS: Record<SkewShape, string> = {
  symmetric: 'Approximately symmetric distribution',
  'right-skewed': 'Right-skewed - more samples with low WER',
  'left-skewed': 'Left-skewed - more samples with high WER',
};

export function interpretVariability(cv: number): VariabilityLevel {
  if (cv < CV_LOW_LIMIT) return 'low';
  if (cv < CV_MODERATE_LIMIT) return 'moderate';
  return 'high';
}

export function interpretSkew(skewness: number): SkewShape {
  if (Math.abs(skewness) < SYMMETRY_LIMIT) return 'symmetric';
  return skewness > 0 ? 'right-skewed' : 'left-skewed';
}

export function rateMean(mean: number): OverallRating {
  if (mean <= BAND_LIMITS.excellent) return 'EXCELLENT';
  if (mean <= BAND_LIMITS.good) return 'GOOD';
  if (mean <= BAND_LIMITS.fair) return 'FAIR';
  return 'POOR';
}

/** Labels follow the values as presented, i.e. rounded to four decimals. */
export function interpret(stats: ModelStatistics): Interpretation {
  const shown = roundStatistics(stats);
  return {
    variability: interpretVariability(shown.coefficientOfVariation),
    skew: interpretSkew(shown.skewness),
    rating: rateMean(shown.mean),
  };
}

/**
 * Builds the cross-model table. `ranking` orders rows by ascending mean WER;
 * Array#sort is stable, so models with equal means keep their input order.
 */
export function compare(statistics: readonly ModelStatistics[]): ComparisonTable {
  const rows: ComparisonRow[] = statistics.map((stats) => ({
    statistics: stats,
    interpretation: interpret(stats),
  }));
  const ranking = [...rows]
    .sort((a, b) => a.statistics.mean - b.statistics.mean)
    .map((row, index) => ({ ...row, rank: index + 1 }));
  return { rows, ranking };
}
