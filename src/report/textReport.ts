import { SKEW_LABELS, VARIABILITY_LABELS } from '../analysis/compare.js';
import { roundStatistics } from '../analysis/statistics.js';
import type { ComparisonRow, ComparisonTable } from '../types.js';

const RULE = '='.repeat(80);
const SUB_RULE = '-'.repeat(40);

function fixed(value: number, digits: number, width = 0): string {
  return value.toFixed(digits).padStart(width);
}

function renderModel(row: ComparisonRow): string[] {
  const s = roundStatistics(row.statistics);
  const { bands } = s;
  const [ciLower, ciUpper] = s.confidenceInterval95;
  const band = (label: string, key: keyof typeof bands) =>
    `  ${label} ${String(bands[key].count).padStart(4)} samples (${fixed(bands[key].percentage, 1, 5)}%)`;

  return [
    '',
    RULE,
    `MODEL: ${s.modelName}`,
    RULE,
    '',
    'BASIC STATISTICS:',
    SUB_RULE,
    `  Sample Size:        ${s.sampleCount}`,
    `  Mean WER:           ${fixed(s.mean, 2)}%`,
    `  Median WER:         ${fixed(s.median, 2)}%`,
    `  Std Deviation:      ${fixed(s.std, 2)}%`,
    `  Min WER:            ${fixed(s.min, 2)}%`,
    `  Max WER:            ${fixed(s.max, 2)}%`,
    `  Range:              ${fixed(s.range, 2)}%`,
    '',
    'DISTRIBUTION:',
    SUB_RULE,
    `  Q1 (25th percentile):   ${fixed(s.q1, 2)}%`,
    `  Q3 (75th percentile):   ${fixed(s.q3, 2)}%`,
    `  IQR:                    ${fixed(s.iqr, 2)}%`,
    `  5th percentile:         ${fixed(s.p5, 2)}%`,
    `  95th percentile:        ${fixed(s.p95, 2)}%`,
    `  Skewness:               ${fixed(s.skewness, 4)}`,
    `  Kurtosis:               ${fixed(s.kurtosis, 4)}`,
    '',
    'RELIABILITY METRICS:',
    SUB_RULE,
    `  Coefficient of Variation (CV): ${fixed(s.coefficientOfVariation, 2)}%`,
    `  Standard Error of Mean (SEM):  ${fixed(s.standardErrorOfMean, 4)}`,
    `  95% Confidence Interval:       [${fixed(ciLower, 2)}%, ${fixed(ciUpper, 2)}%]`,
    '',
    'PERFORMANCE BREAKDOWN:',
    SUB_RULE,
    band('Excellent (WER ≤ 10%): ', 'excellent'),
    band('Good (10% < WER ≤ 20%):', 'good'),
    band('Fair (20% < WER ≤ 30%):', 'fair'),
    band('Poor (WER > 30%):      ', 'poor'),
    '',
    'INTERPRETATION:',
    SUB_RULE,
    `  CV: ${VARIABILITY_LABELS[row.interpretation.variability]}`,
    `  Skewness: ${SKEW_LABELS[row.interpretation.skew]}`,
    `  Overall Rating: ${row.interpretation.rating}`,
    '',
  ];
}

/** Plain-text report: one section per model, then the ranking when there is more than one model. */
export function renderReport(table: ComparisonTable): string {
  const lines = [RULE, 'WER ANALYSIS REPORT', RULE, ''];
  table.rows.forEach((row) => {
    lines.push(...renderModel(row));
  });

  if (table.ranking.length > 1) {
    lines.push('', RULE, 'MODEL COMPARISON (Ranked by Mean WER)', RULE, '');
    table.ranking.forEach((row) => {
      const s = roundStatistics(row.statistics);
      lines.push(
        `${row.rank}. ${s.modelName.padEnd(20)} - Mean WER: ${fixed(s.mean, 2, 6)}% (±${fixed(s.std, 2, 5)}%)`
      );
    });
  }

  return `${lines.join('\n')}\n`;
}
