export const PERFORMANCE_BANDS = ['excellent', 'good', 'fair', 'poor'] as const;

export type PerformanceBand = (typeof PERFORMANCE_BANDS)[number];

export interface NormalizationConfig {
  nfkc?: boolean;
  lowercase?: boolean;
  stripPunct?: boolean;
}

/** One evaluated file: the reference text, a model's output for it and the resulting WER (%). */
export interface ScoredPair {
  readonly id: string;
  readonly reference: string;
  readonly hypothesis: string;
  readonly wer: number;
}

export type ScoreStatus = 'ok' | 'empty' | 'error';

export interface EditCounts {
  hits: number;
  substitutions: number;
  deletions: number;
  insertions: number;
}

export interface ScoreDetail extends EditCounts {
  wer: number;
  status: ScoreStatus;
  referenceWords: number;
  hypothesisWords: number;
  /** Set when status is 'error'. */
  message?: string;
}

export interface BandShare {
  count: number;
  percentage: number;
}

export type PerformanceBreakdown = Record<PerformanceBand, BandShare>;

export interface ModelStatistics {
  modelName: string;
  sampleCount: number;
  mean: number;
  median: number;
  std: number;
  variance: number;
  min: number;
  max: number;
  range: number;
  q1: number;
  q3: number;
  iqr: number;
  p5: number;
  p95: number;
  skewness: number;
  kurtosis: number;
  coefficientOfVariation: number;
  standardErrorOfMean: number;
  confidenceInterval95: readonly [number, number];
  bands: PerformanceBreakdown;
}

export type VariabilityLevel = 'low' | 'moderate' | 'high';

export type SkewShape = 'symmetric' | 'right-skewed' | 'left-skewed';

export type OverallRating = 'EXCELLENT' | 'GOOD' | 'FAIR' | 'POOR';

export interface Interpretation {
  variability: VariabilityLevel;
  skew: SkewShape;
  rating: OverallRating;
}

export interface ComparisonRow {
  statistics: ModelStatistics;
  interpretation: Interpretation;
}

export interface RankedRow extends ComparisonRow {
  /** 1-based position by ascending mean WER. */
  rank: number;
}

export interface ComparisonTable {
  /** Rows in the order the statistics were supplied. */
  rows: ComparisonRow[];
  ranking: RankedRow[];
}

export interface ModelSource {
  name: string;
  folder: string;
}

export interface ModelEvaluationSummary {
  modelName: string;
  count: number;
  meanWer: number | null;
  csvPath: string | null;
}

export interface AppConfig {
  normalization: NormalizationConfig;
  evaluation: {
    groundTruthDir: string;
    outputDir: string;
    models: ModelSource[];
  };
  analysis: {
    inputDir: string;
    outputDir: string;
    fileSuffix: string;
  };
  extract: {
    input: string;
    outputDir: string;
    delimiter: string;
    column: number;
  };
}
