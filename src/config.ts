import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { AppConfig } from './types.js';

const normalizationSchema = z
  .object({
    nfkc: z.boolean().optional(),
    lowercase: z.boolean().optional(),
    stripPunct: z.boolean().optional(),
  })
  .default({});

const modelSchema = z.object({
  name: z.string().min(1),
  folder: z.string().min(1),
});

const configSchema = z.object({
  normalization: normalizationSchema,
  evaluation: z
    .object({
      groundTruthDir: z.string().default('ground-truth'),
      outputDir: z.string().default('wer_results'),
      models: z.array(modelSchema).default([]),
    })
    .default({}),
  analysis: z
    .object({
      inputDir: z.string().default('wer_results'),
      outputDir: z.string().default('wer_analysis'),
      fileSuffix: z.string().min(1).default('_wer.csv'),
    })
    .default({}),
  extract: z
    .object({
      input: z.string().default('transcriptAll.txt'),
      outputDir: z.string().default('ground-truth'),
      delimiter: z.string().min(1).default('|'),
      column: z.number().int().min(0).default(1),
    })
    .default({}),
});

let cachedConfig: AppConfig | null = null;

export function parseConfig(raw: unknown): AppConfig {
  return configSchema.parse(raw);
}

/** Reads and validates config.json; a missing file yields the defaults. */
export async function loadConfig(configPath = path.resolve('config.json')): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
  }
  cachedConfig = parseConfig(raw);
  return cachedConfig;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
