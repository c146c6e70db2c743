import { roundTo } from '../utils/round.js';
import { InsufficientDataError, InvalidScoreError } from './errors.js';
import type {
  BandShare,
  ModelStatistics,
  PerformanceBand,
  PerformanceBreakdown,
} from '../types.js';

/** Upper WER bound (inclusive) of each band; anything above the last one is poor. */
export const BAND_LIMITS = {
  excellent: 10,
  good: 20,
  fair: 30,
} as const;

const Z_95 = 1.96;
const PRESENTATION_DIGITS = 4;

/** Linear interpolation between order statistics (R-7). `sorted` must be ascending and non-empty. */
export function quantile(sorted: readonly number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const base = Math.floor(pos);
  const rest = pos - base;
  if (sorted[base + 1] !== undefined) {
    return sorted[base] + rest * (sorted[base + 1] - sorted[base]);
  }
  return sorted[base];
}

export function bandOf(wer: number): PerformanceBand {
  if (wer <= BAND_LIMITS.excellent) return 'excellent';
  if (wer <= BAND_LIMITS.good) return 'good';
  if (wer <= BAND_LIMITS.fair) return 'fair';
  return 'poor';
}

export function mapBands(fn: (band: PerformanceBand) => BandShare): PerformanceBreakdown {
  return {
    excellent: fn('excellent'),
    good: fn('good'),
    fair: fn('fair'),
    poor: fn('poor'),
  };
}

function breakdown(values: readonly number[]): PerformanceBreakdown {
  const counts: Record<PerformanceBand, number> = { excellent: 0, good: 0, fair: 0, poor: 0 };
  values.forEach((value) => {
    counts[bandOf(value)] += 1;
  });
  return mapBands((band) => ({
    count: counts[band],
    percentage: (counts[band] / values.length) * 100,
  }));
}

function centralMomentSum(values: readonly number[], mean: number, power: number): number {
  return values.reduce((acc, value) => acc + (value - mean) ** power, 0);
}

// Adjusted Fisher-Pearson coefficient (G1). Needs three samples and some spread.
function sampleSkewness(values: readonly number[], mean: number, m2Sum: number): number {
  const n = values.length;
  if (n < 3 || m2Sum === 0) return 0;
  const m2 = m2Sum / n;
  const m3 = centralMomentSum(values, mean, 3) / n;
  const g1 = m3 / m2 ** 1.5;
  return (g1 * Math.sqrt(n * (n - 1))) / (n - 2);
}

// Bias-adjusted excess kurtosis (G2). Needs four samples and some spread.
function sampleKurtosis(values: readonly number[], mean: number, m2Sum: number): number {
  const n = values.length;
  if (n < 4 || m2Sum === 0) return 0;
  const m4Sum = centralMomentSum(values, mean, 4);
  const numerator = n * (n + 1) * (n - 1) * m4Sum;
  const denominator = (n - 2) * (n - 3) * m2Sum ** 2;
  const adjustment = (3 * (n - 1) ** 2) / ((n - 2) * (n - 3));
  return numerator / denominator - adjustment;
}

/**
 * Descriptive, distributional and reliability statistics for one model's WER column.
 *
 * Values are kept at full precision; use {@link roundStatistics} before presenting them.
 * Variance and std use the n-1 denominator, so a single sample reports zero spread.
 *
 * @throws InsufficientDataError when `werValues` is empty
 * @throws InvalidScoreError when a value is not a finite number
 */
export function computeStatistics(werValues: Iterable<number>, modelName = ''): ModelStatistics {
  const values = Array.from(werValues);
  if (values.length === 0) {
    throw new InsufficientDataError();
  }
  values.forEach((value, index) => {
    if (!Number.isFinite(value)) {
      throw new InvalidScoreError(`WER value at index ${index} is not a finite number`, index);
    }
  });

  const n = values.length;
  const sorted = [...values].sort((a, b) => a - b);
  const min = sorted[0];
  const max = sorted[n - 1];
  const mean = values.reduce((a, b) => a + b, 0) / n;
  // A constant column has no spread, whatever float noise the mean picked up.
  const m2Sum = min === max ? 0 : centralMomentSum(values, mean, 2);
  const variance = n > 1 ? m2Sum / (n - 1) : 0;
  const std = Math.sqrt(variance);
  const sem = std / Math.sqrt(n);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);

  return {
    modelName,
    sampleCount: n,
    mean,
    median: quantile(sorted, 0.5),
    std,
    variance,
    min,
    max,
    range: max - min,
    q1,
    q3,
    iqr: q3 - q1,
    p5: quantile(sorted, 0.05),
    p95: quantile(sorted, 0.95),
    skewness: sampleSkewness(values, mean, m2Sum),
    kurtosis: sampleKurtosis(values, mean, m2Sum),
    coefficientOfVariation: mean > 0 ? (std / mean) * 100 : 0,
    standardErrorOfMean: sem,
    confidenceInterval95: [mean - Z_95 * sem, mean + Z_95 * sem],
    bands: breakdown(values),
  };
}

export function roundStatistics(stats: ModelStatistics, digits = PRESENTATION_DIGITS): ModelStatistics {
  const r = (value: number) => roundTo(value, digits);
  const bands = mapBands((band) => ({
    count: stats.bands[band].count,
    percentage: r(stats.bands[band].percentage),
  }));

  return {
    modelName: stats.modelName,
    sampleCount: stats.sampleCount,
    mean: r(stats.mean),
    median: r(stats.median),
    std: r(stats.std),
    variance: r(stats.variance),
    min: r(stats.min),
    max: r(stats.max),
    range: r(stats.range),
    q1: r(stats.q1),
    q3: r(stats.q3),
    iqr: r(stats.iqr),
    p5: r(stats.p5),
    p95: r(stats.p95),
    skewness: r(stats.skewness),
    kurtosis: r(stats.kurtosis),
    coefficientOfVariation: r(stats.coefficientOfVariation),
    standardErrorOfMean: r(stats.standardErrorOfMean),
    confidenceInterval95: [r(stats.confidenceInterval95[0]), r(stats.confidenceInterval95[1])],
    bands,
  };
}
