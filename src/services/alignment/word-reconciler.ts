import { logger } from '../../config/logger';
import type { RecognizedWord, WordTimestamp } from '../../types/alignment.types';
import { normalizeWord } from '../../utils/word-tokenizer';

/** How far ahead in the transcript a recognized word may match. */
export const MATCH_WINDOW = 10;

export interface ReconcileStats {
  matched: number;
  interpolated: number;
  ignored: number;
}

const clampTime = (t: number, durationSec: number): number =>
  durationSec > 0 ? Math.min(Math.max(t, 0), durationSec) : Math.max(t, 0);

/**
 * Map recognizer output onto the transcript. The result has exactly one entry
 * per transcript word, carries the transcript's own tokens, and has
 * non-decreasing starts with end >= start.
 */
export function reconcileWordTimestamps(
  transcriptWords: string[],
  recognized: RecognizedWord[],
  durationSec: number
): { words: WordTimestamp[]; stats: ReconcileStats } {
  const n = transcriptWords.length;
  const keys = transcriptWords.map(normalizeWord);
  const matched: Array<{ start: number; end: number } | null> = new Array(n).fill(null);
  const stats: ReconcileStats = { matched: 0, interpolated: 0, ignored: 0 };

  // Greedy in-order matching with bounded look-ahead
  let cursor = 0;
  for (const rec of recognized) {
    if (cursor >= n) {
      stats.ignored++;
      continue;
    }
    const key = normalizeWord(rec.word);
    if (!key || !Number.isFinite(rec.start) || !Number.isFinite(rec.end)) {
      stats.ignored++;
      continue;
    }
    const limit = Math.min(n, cursor + MATCH_WINDOW);
    let found = -1;
    for (let j = cursor; j < limit; j++) {
      if (keys[j] === key) {
        found = j;
        break;
      }
    }
    if (found === -1) {
      stats.ignored++;
      continue;
    }
    const start = clampTime(rec.start, durationSec);
    matched[found] = { start, end: Math.max(start, clampTime(rec.end, durationSec)) };
    stats.matched++;
    cursor = found + 1;
  }

  // Even interpolation across unmatched runs
  const timed: Array<{ start: number; end: number }> = new Array(n);
  let i = 0;
  while (i < n) {
    const hit = matched[i];
    if (hit) {
      timed[i] = hit;
      i++;
      continue;
    }
    let j = i;
    while (j < n && !matched[j]) j++;
    const lo = i > 0 ? timed[i - 1].end : 0;
    const next = j < n ? matched[j] : null;
    const hi = Math.max(lo, next ? next.start : durationSec);
    const step = (hi - lo) / (j - i);
    for (let k = i; k < j; k++) {
      const start = lo + step * (k - i);
      timed[k] = { start, end: start + step };
    }
    stats.interpolated += j - i;
    i = j;
  }

  // Monotonic starts, end never before start
  const words: WordTimestamp[] = [];
  let previousStart = 0;
  for (let k = 0; k < n; k++) {
    const start = Math.max(timed[k].start, previousStart);
    const end = Math.max(timed[k].end, start);
    words.push({ word: transcriptWords[k], start, end });
    previousStart = start;
  }

  if (stats.interpolated > 0) {
    logger.warn('Interpolated timestamps for unmatched words', {
      words: n,
      matched: stats.matched,
      interpolated: stats.interpolated,
    });
  }

  return { words, stats };
}
