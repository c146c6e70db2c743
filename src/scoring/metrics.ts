import { logger } from '../logger.js';
import { roundTo } from '../utils/round.js';
import { tokenizeWords } from './normalize.js';
import type { EditCounts, NormalizationConfig, ScoreDetail } from '../types.js';

export const WORST_WER = 100;

function levenshtein(a: string[], b: string[]): number[][] {
  const dp = Array.from({ length: a.length + 1 }, () => new Array<number>(b.length + 1).fill(0));
  for (let i = 0; i <= a.length; i += 1) dp[i][0] = i;
  for (let j = 0; j <= b.length; j += 1) dp[0][j] = j;

  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      if (a[i - 1] === b[j - 1]) {
        dp[i][j] = dp[i - 1][j - 1];
      } else {
        dp[i][j] = Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]) + 1;
      }
    }
  }
  return dp;
}

/**
 * Word-level alignment of a hypothesis against a reference with unit costs.
 * Walks the edit-distance table back from the corner, preferring
 * match/substitution, then deletion, then insertion.
 */
export function alignWords(ref: string[], hyp: string[]): EditCounts {
  const dp = levenshtein(ref, hyp);
  const counts: EditCounts = { hits: 0, substitutions: 0, deletions: 0, insertions: 0 };
  let i = ref.length;
  let j = hyp.length;

  while (i > 0 || j > 0) {
    if (i > 0 && j > 0) {
      const same = ref[i - 1] === hyp[j - 1];
      if (dp[i][j] === dp[i - 1][j - 1] + (same ? 0 : 1)) {
        if (same) counts.hits += 1;
        else counts.substitutions += 1;
        i -= 1;
        j -= 1;
        continue;
      }
    }
    if (i > 0 && dp[i][j] === dp[i - 1][j] + 1) {
      counts.deletions += 1;
      i -= 1;
    } else {
      counts.insertions += 1;
      j -= 1;
    }
  }
  return counts;
}

function worstCase(status: 'empty' | 'error', message?: string): ScoreDetail {
  return {
    wer: WORST_WER,
    status,
    hits: 0,
    substitutions: 0,
    deletions: 0,
    insertions: 0,
    referenceWords: 0,
    hypothesisWords: 0,
    ...(message ? { message } : {}),
  };
}

/**
 * Scores a hypothesis against its reference and reports how the value came about.
 * Empty input yields status 'empty' and an internal failure status 'error'; both
 * carry the worst-case WER of 100.
 */
export function scoreDetailed(
  reference: string,
  hypothesis: string,
  config?: NormalizationConfig
): ScoreDetail {
  if (!reference.trim() || !hypothesis.trim()) {
    return worstCase('empty');
  }

  try {
    const refWords = tokenizeWords(reference, config);
    const hypWords = tokenizeWords(hypothesis, config);
    if (refWords.length === 0 || hypWords.length === 0) {
      return worstCase('empty');
    }
    const counts = alignWords(refWords, hypWords);
    const errors = counts.substitutions + counts.deletions + counts.insertions;
    const wer = Math.min(roundTo((errors / refWords.length) * 100, 2), WORST_WER);
    return {
      wer,
      status: 'ok',
      ...counts,
      referenceWords: refWords.length,
      hypothesisWords: hypWords.length,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ event: 'wer_score_failed', message });
    return worstCase('error', message);
  }
}

/** WER in percent (0-100, two decimals). Never throws. */
export function score(reference: string, hypothesis: string, config?: NormalizationConfig): number {
  return scoreDetailed(reference, hypothesis, config).wer;
}
