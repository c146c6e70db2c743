import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../logger.js';

export interface ExtractOptions {
  /** Stop after this many transcripts. */
  limit?: number;
  delimiter?: string;
  /** Zero-based field holding the transcript text. */
  column?: number;
}

/**
 * Pulls the transcript field out of delimited lines such as `audio.wav|text|speaker`.
 * Blank lines and lines without the requested field are skipped.
 */
export function parseTranscriptLines(content: string, options: ExtractOptions = {}): string[] {
  const delimiter = options.delimiter ?? '|';
  const column = options.column ?? 1;
  const transcripts: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const parts = line.split(delimiter);
    // at least two fields, as in `id|text`
    if (parts.length < Math.max(2, column + 1)) continue;
    transcripts.push(parts[column].trim());
    if (options.limit && transcripts.length >= options.limit) break;
  }
  return transcripts;
}

/** Writes each transcript to `<outputDir>/<n>.txt`, numbered from 1. Returns how many were written. */
export async function extractTranscripts(
  inputFile: string,
  outputDir: string,
  options: ExtractOptions = {}
): Promise<number> {
  const content = await readFile(inputFile, 'utf-8');
  const transcripts = parseTranscriptLines(content, options);
  await mkdir(outputDir, { recursive: true });
  // one file at a time: transcript lists can run to tens of thousands of lines
  for (const [index, text] of transcripts.entries()) {
    await writeFile(path.join(outputDir, `${index + 1}.txt`), text, 'utf-8');
  }
  logger.info({ event: 'transcripts_extracted', count: transcripts.length, outputDir });
  return transcripts.length;
}
