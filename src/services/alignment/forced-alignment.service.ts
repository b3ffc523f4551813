import path from 'path';
import { logger } from '../../config/logger';
import { AlignmentError, isPipelineError } from '../../errors/pipeline.errors';
import type { AlignmentCache, RecognizedWord } from '../../types/alignment.types';
import type { AudioToolkit } from '../../types/audio.types';
import { withRetry, withTimeout, RetryOptions } from '../../utils/retry';
import { tokenizeWords } from '../../utils/word-tokenizer';
import type { AlignmentEngine } from './alignment-engine.interface';
import { reconcileWordTimestamps } from './word-reconciler';

export interface AlignmentTarget {
  filePath: string;
  durationSec: number;
  transcript: string;
}

export interface AlignOptions {
  signal?: AbortSignal;
  /**
   * When the speech inputs were read. Stamped on the cache so audio replaced
   * while the engine runs leaves the cache stale. Defaults to the clock.
   */
  alignedAt?: Date;
}

export interface ForcedAlignmentOptions {
  timeoutMs: number;
  retry: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>;
  now?: () => Date;
}

/**
 * Runs the configured engine over a rendered speech timeline and returns a
 * cache with one timestamp per transcript word.
 */
export class ForcedAlignmentService {
  private readonly now: () => Date;

  constructor(
    private readonly engine: AlignmentEngine,
    private readonly toolkit: AudioToolkit,
    private readonly options: ForcedAlignmentOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async align(target: AlignmentTarget, workDir: string, options: AlignOptions = {}): Promise<AlignmentCache> {
    const { signal } = options;
    const alignedAt = options.alignedAt ?? this.now();
    const transcriptWords = tokenizeWords(target.transcript);
    const log = logger.child({ stage: 'alignment', engine: this.engine.name });

    let audioPath = target.filePath;
    if (this.engine.inputFormat !== 'wav') {
      audioPath = path.join(workDir, `speech-align.${this.engine.inputFormat}`);
      try {
        await this.toolkit.transcode(target.filePath, audioPath, this.engine.inputFormat);
      } catch (error) {
        throw new AlignmentError('Could not prepare audio for alignment', { cause: error });
      }
    }

    let recognized: RecognizedWord[];
    try {
      recognized = await withRetry(
        () =>
          withTimeout(
            (callSignal) =>
              this.engine.recognize({
                audioPath,
                transcript: target.transcript,
                durationSec: target.durationSec,
                signal: callSignal,
              }),
            this.options.timeoutMs,
            'alignment',
            signal
          ),
        { ...this.options.retry, operation: 'alignment', signal }
      );
    } catch (error) {
      if (isPipelineError(error)) throw error;
      const msg = error instanceof Error ? error.message : String(error);
      throw new AlignmentError(`Alignment failed: ${msg}`, { cause: error });
    }

    const { words, stats } = reconcileWordTimestamps(transcriptWords, recognized, target.durationSec);
    log.info('Alignment reconciled', { words: words.length, ...stats });

    return { words, alignedAt };
  }
}
