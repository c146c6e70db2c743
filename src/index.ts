export { score, scoreDetailed, alignWords, WORST_WER } from './scoring/metrics.js';
export { normalizeText, tokenizeWords, TranscriptEncodingError } from './scoring/normalize.js';
export { computeStatistics, roundStatistics, quantile, bandOf, BAND_LIMITS } from './analysis/statistics.js';
export { compare, interpret, interpretSkew, interpretVariability, rateMean } from './analysis/compare.js';
export { InsufficientDataError, InvalidScoreError } from './analysis/errors.js';
export { renderReport } from './report/textReport.js';
export { toScoresCsv, toComparisonCsv, flattenStatistics } from './storage/csvExporter.js';
export { parseCsv, parseCsvRecords } from './storage/csvReader.js';
export { EvaluationRunner, scorePairs } from './jobs/evaluationRunner.js';
export { analyzeScoreFiles, loadScoreFile, discoverScoreFiles } from './jobs/analysisRunner.js';
export { ReportExportService } from './jobs/reportExportService.js';
export { extractTranscripts, parseTranscriptLines } from './utils/transcriptExtract.js';
export { loadConfig, parseConfig, reloadConfig } from './config.js';
export { PERFORMANCE_BANDS } from './types.js';
export type * from './types.js';
