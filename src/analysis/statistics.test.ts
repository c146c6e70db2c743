import { describe, expect, it } from 'vitest';
import { InsufficientDataError, InvalidScoreError } from './errors.js';
import { bandOf, computeStatistics, quantile, roundStatistics } from './statistics.js';
import { PERFORMANCE_BANDS } from '../types.js';

const bandTotals = (values: number[]) => {
  const stats = computeStatistics(values);
  const counts = PERFORMANCE_BANDS.reduce((acc, band) => acc + stats.bands[band].count, 0);
  const pct = PERFORMANCE_BANDS.reduce((acc, band) => acc + stats.bands[band].percentage, 0);
  return { stats, counts, pct };
};

describe('computeStatistics', () => {
  it('summarizes a five-file model', () => {
    const stats = computeStatistics([5, 8, 12, 22, 35], 'xtts');

    expect(stats.modelName).toBe('xtts');
    expect(stats.sampleCount).toBe(5);
    expect(stats.mean).toBeCloseTo(16.4, 10);
    expect(stats.median).toBe(12);
    expect(stats.min).toBe(5);
    expect(stats.max).toBe(35);
    expect(stats.range).toBe(30);
    expect(stats.variance).toBeCloseTo(149.3, 10);
    expect(stats.std).toBeCloseTo(12.21884, 4);
    expect(stats.q1).toBe(8);
    expect(stats.q3).toBe(22);
    expect(stats.iqr).toBe(14);
    expect(stats.p5).toBeCloseTo(5.6, 10);
    expect(stats.p95).toBeCloseTo(32.4, 10);
    expect(stats.standardErrorOfMean).toBeCloseTo(5.46443, 4);
    expect(stats.confidenceInterval95[0]).toBeCloseTo(5.6897, 3);
    expect(stats.confidenceInterval95[1]).toBeCloseTo(27.1103, 3);
    expect(stats.coefficientOfVariation).toBeCloseTo(74.5051, 3);
    expect(stats.bands).toEqual({
      excellent: { count: 2, percentage: 40 },
      good: { count: 1, percentage: 20 },
      fair: { count: 1, percentage: 20 },
      poor: { count: 1, percentage: 20 },
    });
  });

  it('fails on an empty sample set', () => {
    expect(() => computeStatistics([])).toThrow(InsufficientDataError);
  });

  it('rejects non-finite scores', () => {
    expect(() => computeStatistics([1, Number.NaN])).toThrow(InvalidScoreError);
  });

  it('uses bias-adjusted skewness and excess kurtosis', () => {
    expect(computeStatistics([1, 2, 3, 10]).skewness).toBeCloseTo(1.763632, 5);
    expect(computeStatistics([1, 2, 3, 4]).kurtosis).toBeCloseTo(-1.2, 10);
    expect(computeStatistics([1, 2, 3]).skewness).toBe(0);
  });

  it('reports zero spread and shape for a single sample', () => {
    const stats = computeStatistics([42]);
    expect(stats.std).toBe(0);
    expect(stats.variance).toBe(0);
    expect(stats.skewness).toBe(0);
    expect(stats.kurtosis).toBe(0);
    expect(stats.confidenceInterval95).toEqual([42, 42]);
    expect(stats.p5).toBe(42);
    expect(stats.p95).toBe(42);
  });

  it('treats constant columns as having no spread', () => {
    const cases: Array<[number, number]> = [
      [3, 0.1],
      [5, 14.29],
      [6, 33.33],
    ];
    cases.forEach(([n, value]) => {
      const stats = computeStatistics(new Array<number>(n).fill(value));
      expect(stats.variance).toBe(0);
      expect(stats.std).toBe(0);
      expect(stats.skewness).toBe(0);
      expect(stats.kurtosis).toBe(0);
      expect(stats.coefficientOfVariation).toBe(0);
    });
  });

  it('reports a coefficient of variation of 0 when every file is perfect', () => {
    const stats = computeStatistics([0, 0, 0]);
    expect(stats.mean).toBe(0);
    expect(stats.coefficientOfVariation).toBe(0);
    expect(stats.bands.excellent.count).toBe(3);
  });

  it('keeps band totals consistent with the sample count', () => {
    const samples = [[33.33], [10, 20, 30], [0, 10.01, 20.01, 30.01, 100], [1, 2, 3, 4, 5, 6, 7]];
    samples.forEach((values) => {
      const { stats, counts, pct } = bandTotals(values);
      expect(counts).toBe(stats.sampleCount);
      expect(Math.abs(pct - 100)).toBeLessThan(1e-6);
    });
  });

  it('keeps the mean inside its confidence interval', () => {
    [[3, 90, 45], [12.5, 12.5], [0, 100, 50, 25, 75, 5]].forEach((values) => {
      const stats = computeStatistics(values);
      expect(stats.confidenceInterval95[0]).toBeLessThanOrEqual(stats.mean);
      expect(stats.mean).toBeLessThanOrEqual(stats.confidenceInterval95[1]);
    });
  });
});

describe('bandOf', () => {
  it('puts thresholds in the lower band', () => {
    expect(bandOf(10)).toBe('excellent');
    expect(bandOf(10.01)).toBe('good');
    expect(bandOf(20)).toBe('good');
    expect(bandOf(30)).toBe('fair');
    expect(bandOf(30.01)).toBe('poor');
  });
});

describe('quantile', () => {
  it('interpolates between order statistics', () => {
    expect(quantile([100, 200, 300], 0.95)).toBeCloseTo(290, 10);
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
  });
});

describe('roundStatistics', () => {
  it('rounds every float to four decimals', () => {
    const rounded = roundStatistics(computeStatistics([1, 2, 4]));
    expect(rounded.mean).toBe(2.3333);
    expect(rounded.std).toBe(1.5275);
    expect(rounded.bands.excellent).toEqual({ count: 3, percentage: 100 });
    expect(rounded.confidenceInterval95).toEqual([0.6048, 4.0619]);
  });

  it('rounds exact halves to even', () => {
    expect(roundStatistics(computeStatistics([0.0625, 0])).mean).toBe(0.0312);
  });
});
