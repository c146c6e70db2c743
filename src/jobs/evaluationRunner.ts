import { mkdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../logger.js';
import { scoreDetailed } from '../scoring/metrics.js';
import { toScoresCsv } from '../storage/csvExporter.js';
import { commonIds, loadTextFiles } from '../utils/textFiles.js';
import type { ModelEvaluationSummary, ModelSource, NormalizationConfig, ScoredPair } from '../types.js';

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}

/** Scores every id present in both the reference set and the model output, in id order. */
export function scorePairs(
  groundTruth: Map<string, string>,
  modelOutput: Map<string, string>,
  modelName: string,
  normalization?: NormalizationConfig
): ScoredPair[] {
  return commonIds(groundTruth, modelOutput).map((id) => {
    const reference = groundTruth.get(id) ?? '';
    const hypothesis = modelOutput.get(id) ?? '';
    const detail = scoreDetailed(reference, hypothesis, normalization);
    if (detail.status === 'error') {
      logger.warn({ event: 'evaluation_pair_degraded', model: modelName, id, message: detail.message });
    }
    return { id, reference, hypothesis, wer: detail.wer };
  });
}

export interface EvaluationRunnerOptions {
  groundTruthDir: string;
  outputDir: string;
  normalization?: NormalizationConfig;
}

export class EvaluationRunner {
  constructor(private readonly options: EvaluationRunnerOptions) {}

  async evaluateModel(
    groundTruth: Map<string, string>,
    model: ModelSource
  ): Promise<ScoredPair[]> {
    const modelOutput = await loadTextFiles(model.folder);
    const pairs = scorePairs(groundTruth, modelOutput, model.name, this.options.normalization);
    if (pairs.length === 0) {
      logger.warn({
        event: 'evaluation_no_common_files',
        model: model.name,
        groundTruthDir: this.options.groundTruthDir,
        folder: model.folder,
      });
    }
    return pairs;
  }

  /**
   * Evaluates each model in turn and writes `<outputDir>/<name>_wer.csv`.
   * Models whose folder is missing or shares no ids with the references are skipped.
   */
  async run(models: readonly ModelSource[]): Promise<ModelEvaluationSummary[]> {
    if (!(await isDirectory(this.options.groundTruthDir))) {
      throw new Error(`Ground-truth folder not found: ${this.options.groundTruthDir}`);
    }
    const groundTruth = await loadTextFiles(this.options.groundTruthDir);
    await mkdir(this.options.outputDir, { recursive: true });

    const summaries: ModelEvaluationSummary[] = [];
    for (const model of models) {
      if (!(await isDirectory(model.folder))) {
        logger.warn({ event: 'evaluation_model_skipped', model: model.name, folder: model.folder });
        summaries.push({ modelName: model.name, count: 0, meanWer: null, csvPath: null });
        continue;
      }

      const pairs = await this.evaluateModel(groundTruth, model);
      if (pairs.length === 0) {
        summaries.push({ modelName: model.name, count: 0, meanWer: null, csvPath: null });
        continue;
      }

      const csvPath = path.resolve(this.options.outputDir, `${model.name}_wer.csv`);
      await writeFile(csvPath, `${toScoresCsv(model.name, pairs)}\n`, 'utf-8');
      const meanWer = pairs.reduce((acc, pair) => acc + pair.wer, 0) / pairs.length;
      logger.info({ event: 'evaluation_model_done', model: model.name, count: pairs.length, meanWer, csvPath });
      summaries.push({ modelName: model.name, count: pairs.length, meanWer, csvPath });
    }
    return summaries;
  }
}
