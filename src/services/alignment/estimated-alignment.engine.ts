import type { RecognizedWord } from '../../types/alignment.types';
import { normalizeWord, tokenizeWords } from '../../utils/word-tokenizer';
import type { AlignmentEngine, AlignmentRequest } from './alignment-engine.interface';

/**
 * Offline fallback: spreads the transcript over the speech duration in
 * proportion to each word's length. No audio analysis.
 */
export class EstimatedAlignmentEngine implements AlignmentEngine {
  readonly name = 'estimate';
  readonly inputFormat = 'wav' as const;

  async recognize(request: AlignmentRequest): Promise<RecognizedWord[]> {
    const words = tokenizeWords(request.transcript);
    // +1 stands in for the gap after each word
    const weights = words.map((w) => Math.max(1, normalizeWord(w).length) + 1);
    const total = weights.reduce((sum, w) => sum + w, 0);
    if (total === 0) return [];

    const scale = request.durationSec / total;
    const result: RecognizedWord[] = [];
    let cursor = 0;
    words.forEach((word, i) => {
      const start = cursor;
      cursor += weights[i] * scale;
      result.push({ word, start, end: start + (weights[i] - 1) * scale });
    });
    return result;
  }
}
