import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../logger.js';
import { renderReport } from '../report/textReport.js';
import { flattenStatistics, toComparisonCsv } from '../storage/csvExporter.js';
import type { AnalysisResult } from './analysisRunner.js';

export interface ExportedReport {
  comparisonCsv: string;
  reportText: string;
  statisticsJson: string;
}

export class ReportExportService {
  private readonly basePath: string;

  constructor(outputDir: string) {
    this.basePath = path.resolve(outputDir);
  }

  async export({ table, sources }: AnalysisResult): Promise<ExportedReport> {
    const records = table.rows.map((row, index) => flattenStatistics(row.statistics, sources[index] ?? ''));
    const paths: ExportedReport = {
      comparisonCsv: path.resolve(this.basePath, 'model_comparison.csv'),
      reportText: path.resolve(this.basePath, 'wer_analysis_report.txt'),
      statisticsJson: path.resolve(this.basePath, 'statistics.json'),
    };

    try {
      await mkdir(this.basePath, { recursive: true });
      await Promise.all([
        writeFile(paths.comparisonCsv, `${toComparisonCsv(records)}\n`, 'utf-8'),
        writeFile(paths.reportText, renderReport(table), 'utf-8'),
        writeFile(paths.statisticsJson, `${JSON.stringify(records, null, 2)}\n`, 'utf-8'),
      ]);
    } catch (error) {
      logger.error({ event: 'analysis_export_failed', outputDir: this.basePath, message: (error as Error).message });
      throw error;
    }

    logger.info({ event: 'analysis_exported', models: records.length, ...paths });
    return paths;
  }
}
