import path from 'node:path';
import { loadConfig } from '../config.js';
import { analyzeScoreFiles, discoverScoreFiles } from '../jobs/analysisRunner.js';
import { EvaluationRunner, isDirectory } from '../jobs/evaluationRunner.js';
import { ReportExportService } from '../jobs/reportExportService.js';
import { logger } from '../logger.js';
import { extractTranscripts } from '../utils/transcriptExtract.js';
import { parseArgs, USAGE } from './args.js';
import type { Command, ParsedArgs } from './args.js';
import type { AppConfig } from '../types.js';

async function runEvaluate(args: ParsedArgs, config: AppConfig): Promise<number> {
  const models = args.models.length > 0 ? args.models : config.evaluation.models;
  if (models.length === 0) {
    logger.error({ event: 'evaluation_no_models' }, 'pass --model <name>=<folder> or list models in config.json');
    return 1;
  }
  const runner = new EvaluationRunner({
    groundTruthDir: args.groundTruth ?? config.evaluation.groundTruthDir,
    outputDir: args.output ?? config.evaluation.outputDir,
    normalization: config.normalization,
  });
  const summaries = await runner.run(models);
  return summaries.some((summary) => summary.count > 0) ? 0 : 1;
}

async function runAnalyze(args: ParsedArgs, config: AppConfig): Promise<number> {
  const { fileSuffix } = config.analysis;
  let files = args.files;
  if (files.length === 0) {
    const inputDir = args.inputDir ?? config.analysis.inputDir;
    if (!(await isDirectory(inputDir))) {
      logger.error({ event: 'analysis_input_missing', inputDir });
      return 1;
    }
    files = await discoverScoreFiles(inputDir, fileSuffix);
  }
  if (files.length === 0) {
    logger.error({ event: 'analysis_no_files' }, 'no score files found to analyze');
    return 1;
  }

  logger.info({ event: 'analysis_started', files: files.length });
  const result = await analyzeScoreFiles(files, fileSuffix);
  if (!result) {
    logger.error({ event: 'analysis_no_data' }, 'no valid data to analyze');
    return 1;
  }
  await new ReportExportService(args.output ?? config.analysis.outputDir).export(result);
  return 0;
}

async function runExtract(args: ParsedArgs, config: AppConfig): Promise<number> {
  const input = args.input ?? config.extract.input;
  const count = await extractTranscripts(path.resolve(input), args.output ?? config.extract.outputDir, {
    limit: args.numLines,
    delimiter: config.extract.delimiter,
    column: config.extract.column,
  });
  return count > 0 ? 0 : 1;
}

const handlers: Record<Command, (args: ParsedArgs, config: AppConfig) => Promise<number>> = {
  evaluate: runEvaluate,
  analyze: runAnalyze,
  extract: runExtract,
};

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    logger.error({ event: 'cli_invalid_arguments', message: (error as Error).message });
    console.error(USAGE);
    return 2;
  }

  if (args.help || !args.command) {
    console.log(USAGE);
    return args.help ? 0 : 2;
  }

  try {
    const config = await loadConfig(args.config ? path.resolve(args.config) : undefined);
    return await handlers[args.command](args, config);
  } catch (error) {
    logger.error({ event: 'cli_failed', command: args.command, message: (error as Error).message });
    return 1;
  }
}
