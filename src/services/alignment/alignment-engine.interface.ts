import type { OutputFormat } from '../../types/audio.types';
import type { RecognizedWord } from '../../types/alignment.types';

export interface AlignmentRequest {
  /** Speech timeline already encoded in the engine's input format */
  audioPath: string;
  transcript: string;
  durationSec: number;
  signal?: AbortSignal;
}

/**
 * Acoustic word recognizer. Results may be partial, out of vocabulary or carry
 * extra words; reconciliation against the transcript happens afterwards.
 */
export interface AlignmentEngine {
  readonly name: string;
  readonly inputFormat: OutputFormat;
  recognize(request: AlignmentRequest): Promise<RecognizedWord[]>;
}
