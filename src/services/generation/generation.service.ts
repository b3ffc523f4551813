import { logger } from '../../config/logger';
import { PipelineCancelledError, throwIfCancelled } from '../../errors/pipeline.errors';
import type { ArtifactStore } from '../../store/artifact-store.interface';
import { settleInChunks } from '../../utils/batch';
import { withRetry, withTimeout, RetryOptions } from '../../utils/retry';
import { clampSoundDuration, MAX_SOUND_DURATION } from './elevenlabs-sound.provider';
import type { GenerationProviders } from './providers.interface';

export type GenerationUnitKind = 'speech' | 'effect' | 'music';

export type GenerationUnitResult =
  | { kind: GenerationUnitKind; id: string; status: 'succeeded' }
  | { kind: GenerationUnitKind; id: string; status: 'failed'; error: string };

export interface GenerationReport {
  units: GenerationUnitResult[];
  /** Sequence indices of segments still without speech */
  failedSpeechIndices: number[];
}

export interface GenerationOptions {
  concurrency: number;
  timeouts: { speechMs: number; musicMs: number; effectMs: number };
  retry: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>;
  defaultEffectDurationSec: number;
  /** Requested bed length; the mixer loops it under longer speech */
  musicDurationSec?: number;
}

interface GenerationUnit {
  kind: GenerationUnitKind;
  id: string;
  sequenceIndex?: number;
  timeoutMs: number;
  generate(signal: AbortSignal): Promise<Buffer>;
  commit(audio: Buffer): Promise<unknown>;
}

const message = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Fills in missing speech, effect and music audio for a text. Units run in
 * bounded parallel chunks; each result is committed only once its call has
 * succeeded and the run is still live.
 */
export class GenerationService {
  constructor(
    private readonly store: ArtifactStore,
    private readonly providers: GenerationProviders,
    private readonly options: GenerationOptions
  ) {}

  async fillMissing(textId: string, signal?: AbortSignal): Promise<GenerationReport> {
    const log = logger.child({ stage: 'generation', textId });
    const units = await this.collectUnits(textId);
    if (units.length === 0) {
      return { units: [], failedSpeechIndices: [] };
    }

    log.info('Generating missing audio', {
      units: units.length,
      speech: units.filter((u) => u.kind === 'speech').length,
      concurrency: this.options.concurrency,
    });

    const settled = await settleInChunks(units, this.options.concurrency, async (unit) => {
      throwIfCancelled(signal, 'generation');
      const audio = await withRetry(
        () => withTimeout((callSignal) => unit.generate(callSignal), unit.timeoutMs, `${unit.kind} generation`, signal),
        { ...this.options.retry, operation: `${unit.kind} generation ${unit.id}`, signal }
      );
      if (audio.length === 0) {
        throw new Error('provider returned no audio');
      }
      // A result that arrives after cancellation is dropped
      throwIfCancelled(signal, 'generation');
      await unit.commit(audio);
    });

    if (signal?.aborted) {
      throw new PipelineCancelledError('generation');
    }

    const results: GenerationUnitResult[] = settled.map((outcome, i) => {
      const unit = units[i];
      if (outcome.status === 'fulfilled') {
        return { kind: unit.kind, id: unit.id, status: 'succeeded' };
      }
      const error = message(outcome.reason);
      log.warn(`${unit.kind} generation failed`, { id: unit.id, error });
      return { kind: unit.kind, id: unit.id, status: 'failed', error };
    });

    const failedSpeechIndices = units
      .filter((unit, i) => unit.kind === 'speech' && settled[i].status === 'rejected')
      .map((unit) => unit.sequenceIndex ?? -1)
      .sort((a, b) => a - b);

    return { units: results, failedSpeechIndices };
  }

  private async collectUnits(textId: string): Promise<GenerationUnit[]> {
    const [segments, voices, effects, bed] = await Promise.all([
      this.store.getSegmentsOrdered(textId),
      this.store.getCharacterVoices(textId),
      this.store.getEffects(textId),
      this.store.getMusicBed(textId),
    ]);
    const { timeouts } = this.options;
    const units: GenerationUnit[] = [];

    for (const segment of segments) {
      if (segment.audio && segment.audio.length > 0) continue;
      const voice = voices.get(segment.characterId);
      units.push({
        kind: 'speech',
        id: segment.id,
        sequenceIndex: segment.sequenceIndex,
        timeoutMs: timeouts.speechMs,
        generate: (signal) => {
          if (!voice) {
            return Promise.reject(new Error(`No voice assigned to character ${segment.characterId}`));
          }
          return this.providers.speech.generateSpeech(segment.content, voice, signal);
        },
        commit: (audio) => this.store.putSegmentAudio(segment.id, audio),
      });
    }

    for (const effect of effects) {
      if (effect.audio && effect.audio.length > 0) continue;
      const span =
        effect.startTime != null && effect.endTime != null ? effect.endTime - effect.startTime : 0;
      const duration = clampSoundDuration(span > 0 ? span : this.options.defaultEffectDurationSec);
      units.push({
        kind: 'effect',
        id: effect.id,
        timeoutMs: timeouts.effectMs,
        generate: (signal) => this.providers.effects.generateEffectAudio(effect.prompt, duration, signal),
        commit: (audio) => this.store.putEffectAudio(effect.id, audio),
      });
    }

    if (bed && (!bed.audio || bed.audio.length === 0)) {
      const duration = this.options.musicDurationSec ?? MAX_SOUND_DURATION;
      units.push({
        kind: 'music',
        id: textId,
        timeoutMs: timeouts.musicMs,
        generate: (signal) => this.providers.music.generateMusic(bed.prompt, duration, signal),
        commit: (audio) => this.store.putMusicAudio(textId, audio),
      });
    }

    return units;
  }
}
