// ============================================================================
// Export Pipeline Orchestrator
//
// AWAITING_SPEECH → ALIGNING_SPEECH → RESOLVING_EFFECTS → MIXING → COMPLETE
//                                                   ↘ FAILED (speech missing)
//
// Each run starts from the earliest stage whose inputs changed (see
// decideRestart). Every transition is written to the export record, and the
// only layer that decides retry, abort or degrade is this one.
// ============================================================================

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { stageLogger } from '../../config/logger';
import {
  IncompleteSpeechError,
  PipelineCancelledError,
  PipelineError,
  TextNotFoundError,
  throwIfCancelled,
} from '../../errors/pipeline.errors';
import type { ArtifactStore } from '../../store/artifact-store.interface';
import type { AlignmentCache } from '../../types/alignment.types';
import {
  DEFAULT_MIX_CONFIGURATION,
  MixConfiguration,
  resolveMixConfiguration,
} from '../../types/audio.types';
import {
  AudioArtifactRef,
  ExportRecord,
  ExportStatus,
  InputFingerprints,
  PipelineFailure,
  PipelineState,
  SegmentRecord,
} from '../../types/production.types';
import type { PositionedEffect, SoundEffectRecord } from '../../types/sfx.types';
import { buildTranscript, tokenizeWords } from '../../utils/word-tokenizer';
import type { ForcedAlignmentService } from '../alignment/forced-alignment.service';
import type { MultiTrackMixer } from '../audio/multitrack-mixer.service';
import { checkSpeechReadiness, SpeechTimelineBuilder } from '../audio/speech-timeline.service';
import { resolveAll } from '../effects/effect-placement.resolver';
import type { GenerationService } from '../generation/generation.service';
import {
  computeFingerprints,
  decideRestart,
  isCacheFresh,
  RestartState,
  runsStage,
} from './pipeline-state';

// ----------------------------------------------------------------------------
// Types
// ----------------------------------------------------------------------------

export interface ExportOptions {
  force?: boolean;
  generateMissing?: boolean;
  signal?: AbortSignal;
}

export type ExportOutcome =
  | {
      ok: true;
      artifact: AudioArtifactRef;
      /** True when the previous artifact was returned without any work */
      reused: boolean;
      startedFrom: RestartState | null;
      omissions: string[];
    }
  | { ok: false; error: PipelineError };

export interface OrchestratorDeps {
  store: ArtifactStore;
  timelineBuilder: SpeechTimelineBuilder;
  alignment: ForcedAlignmentService;
  mixer: MultiTrackMixer;
  generation?: GenerationService;
  mixDefaults?: MixConfiguration;
  /** Parent directory for per-run scratch space */
  workRoot?: string;
  now?: () => Date;
}

const toFailure = (error: PipelineError): PipelineFailure => ({
  code: error.code,
  message: error.message,
  ...(error instanceof IncompleteSpeechError ? { missingSegmentIndices: [...error.missingIndices] } : {}),
});

// ----------------------------------------------------------------------------
// Orchestrator
// ----------------------------------------------------------------------------

export class ExportPipelineOrchestrator {
  private readonly store: ArtifactStore;
  private readonly mixDefaults: MixConfiguration;
  private readonly workRoot: string;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.store = deps.store;
    this.mixDefaults = deps.mixDefaults ?? { ...DEFAULT_MIX_CONFIGURATION };
    this.workRoot = deps.workRoot ?? os.tmpdir();
    this.now = deps.now ?? (() => new Date());
  }

  async export(
    textId: string,
    overrides: Partial<MixConfiguration> = {},
    options: ExportOptions = {}
  ): Promise<ExportOutcome> {
    const { signal, force = false } = options;
    const log = stageLogger('export', textId);

    const text = await this.store.getText(textId);
    if (!text) {
      return { ok: false, error: new TextNotFoundError(textId) };
    }

    const previous = await this.store.getExportRecord(textId);
    const config = resolveMixConfiguration(overrides, this.mixDefaults);
    let record: ExportRecord = previous
      ? { ...previous }
      : {
          textId,
          state: PipelineState.AWAITING_SPEECH,
          includedEffectIds: [],
          omissions: [],
          updatedAt: this.now(),
        };

    const persist = async (patch: Partial<ExportRecord>): Promise<void> => {
      record = { ...record, ...patch, updatedAt: this.now() };
      await this.store.putExportRecord(record);
    };

    try {
      // --- AWAITING_SPEECH ---------------------------------------------------
      if (options.generateMissing) {
        if (!this.deps.generation) {
          throw new Error('generateMissing requested but no generation service is configured');
        }
        await persist({ state: PipelineState.AWAITING_SPEECH, failure: null });
        const report = await this.deps.generation.fillMissing(textId, signal);
        if (report.units.length > 0) {
          log.info('Missing audio generation finished', {
            succeeded: report.units.filter((u) => u.status === 'succeeded').length,
            failed: report.units.filter((u) => u.status === 'failed').length,
            failedSpeechIndices: report.failedSpeechIndices,
          });
        }
      }
      throwIfCancelled(signal, PipelineState.AWAITING_SPEECH);

      // Anything written to a segment after this instant makes the new cache stale
      const speechReadAt = this.now();
      const segments = await this.store.getSegmentsOrdered(textId);
      const readiness = checkSpeechReadiness(segments);
      if (!readiness.ready) {
        log.error('Speech not ready, export failed', { error: readiness.error.message });
        await persist({ state: PipelineState.FAILED, failure: toFailure(readiness.error) });
        return { ok: false, error: readiness.error };
      }

      const [effects, musicBed, storedCache] = await Promise.all([
        this.store.getEffects(textId),
        this.store.getMusicBed(textId),
        this.store.getAlignmentCache(textId),
      ]);

      const transcript = buildTranscript(segments.map((s) => s.content));
      const wordCount = tokenizeWords(transcript).length;
      const cacheFresh = isCacheFresh(storedCache, segments, wordCount);
      if (storedCache && !cacheFresh) {
        log.warn('Alignment cache is stale, discarding', {
          alignedAt: storedCache.alignedAt.toISOString(),
          cachedWords: storedCache.words.length,
          wordCount,
        });
        await this.store.clearAlignmentCache(textId);
      }

      const fingerprints = computeFingerprints(segments, effects, musicBed, config);
      const decision = decideRestart({
        record: previous,
        cacheFresh,
        cache: cacheFresh ? storedCache : null,
        fingerprints,
        force,
      });

      if (decision.from === null && previous?.artifact) {
        log.info('Export is current, returning previous artifact');
        return {
          ok: true,
          artifact: previous.artifact,
          reused: true,
          startedFrom: null,
          omissions: previous.omissions ?? [],
        };
      }
      const from: RestartState = decision.from ?? PipelineState.MIXING;
      log.info('Starting export', { from, reason: decision.reason });

      const artifact = await this.runStages({
        textId,
        from,
        segments,
        effects,
        musicAudio: musicBed?.audio ?? null,
        cache: cacheFresh ? storedCache : null,
        speechReadAt,
        config,
        fingerprints,
        persist,
        signal,
      });

      return {
        ok: true,
        artifact,
        reused: false,
        startedFrom: from,
        omissions: record.omissions ?? [],
      };
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        log.warn('Export cancelled, restoring previous state');
        await this.store.putExportRecord(
          previous ?? { ...record, state: PipelineState.AWAITING_SPEECH, failure: null, updatedAt: this.now() }
        );
        return { ok: false, error };
      }
      if (error instanceof PipelineError) {
        log.error('Export stage failed', { state: record.state, code: error.code, error: error.message });
        await persist({ failure: toFailure(error) });
        return { ok: false, error };
      }
      const message = error instanceof Error ? error.message : String(error);
      log.error('Export failed unexpectedly', { state: record.state, error: message });
      await persist({ failure: { code: 'INTERNAL', message } });
      throw error;
    }
  }

  private async runStages(run: {
    textId: string;
    from: RestartState;
    segments: SegmentRecord[];
    effects: SoundEffectRecord[];
    musicAudio: Buffer | null;
    cache: AlignmentCache | null;
    speechReadAt: Date;
    config: MixConfiguration;
    fingerprints: InputFingerprints;
    persist: (patch: Partial<ExportRecord>) => Promise<void>;
    signal?: AbortSignal;
  }): Promise<AudioArtifactRef> {
    const { textId, from, config, persist, signal } = run;
    const workDir = await fs.mkdtemp(path.join(this.workRoot, 'scenecast-export-'));

    try {
      const timeline = await this.deps.timelineBuilder.build(run.segments, config, workDir);
      throwIfCancelled(signal, 'speech timeline');

      // --- ALIGNING_SPEECH ---------------------------------------------------
      let cache = run.cache;
      if (runsStage(from, PipelineState.ALIGNING_SPEECH) || !cache) {
        await persist({ state: PipelineState.ALIGNING_SPEECH, failure: null });
        if (cache) await this.store.clearAlignmentCache(textId);
        cache = await this.deps.alignment.align(timeline, workDir, { signal, alignedAt: run.speechReadAt });
        throwIfCancelled(signal, PipelineState.ALIGNING_SPEECH);
        await this.store.putAlignmentCache(textId, cache);
      }

      // --- RESOLVING_EFFECTS -------------------------------------------------
      const omissions: string[] = [];
      let positioned: PositionedEffect[];
      if (runsStage(from, PipelineState.RESOLVING_EFFECTS)) {
        await persist({ state: PipelineState.RESOLVING_EFFECTS, failure: null });
        positioned = await this.resolveEffects(textId, cache, run.effects, omissions);
      } else {
        positioned = this.positionFromStored(run.effects, omissions);
      }
      throwIfCancelled(signal, PipelineState.RESOLVING_EFFECTS);

      // --- MIXING ------------------------------------------------------------
      await persist({ state: PipelineState.MIXING, failure: null });
      const mix = await this.deps.mixer.mix({
        textId,
        speech: { filePath: timeline.filePath },
        music: run.musicAudio,
        effects: positioned,
        config,
        workDir,
      });
      throwIfCancelled(signal, PipelineState.MIXING);

      const data = await fs.readFile(mix.filePath);
      const artifact = await this.store.putFinalAudio({
        textId,
        data,
        format: config.outputFormat,
        durationSec: mix.durationSec,
      });

      await persist({
        state: PipelineState.COMPLETE,
        failure: null,
        artifact,
        fingerprints: run.fingerprints,
        alignedAt: cache.alignedAt,
        includedEffectIds: mix.includedEffectIds,
        omissions: [...omissions, ...mix.omissions],
      });
      return artifact;
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  /** Resolve every effect against the cache and persist its times. */
  private async resolveEffects(
    textId: string,
    cache: AlignmentCache,
    effects: SoundEffectRecord[],
    omissions: string[]
  ): Promise<PositionedEffect[]> {
    const log = stageLogger('effects', textId);
    const placements = resolveAll(cache.words, effects);
    const positioned: PositionedEffect[] = [];

    for (const [i, placement] of placements.entries()) {
      const effect = effects[i];
      switch (placement.status) {
        case 'placed':
          await this.store.putEffectResolvedTimes(effect.id, placement.startTime, placement.endTime);
          if (effect.audio && effect.audio.length > 0) {
            positioned.push({
              effectId: effect.id,
              name: effect.name,
              startTime: placement.startTime,
              endTime: placement.endTime,
              audio: effect.audio,
            });
          } else {
            omissions.push(`effect ${effect.id} skipped: no audio`);
            log.warn('Effect has no audio, excluded from mix', { effectId: effect.id });
          }
          break;
        case 'zero-duration':
          await this.store.putEffectResolvedTimes(effect.id, placement.startTime, placement.endTime);
          omissions.push(`effect ${effect.id} skipped: zero duration`);
          log.warn('Zero-duration effect excluded from mix', { effectId: effect.id, reason: placement.reason });
          break;
        case 'unresolvable':
          await this.store.putEffectResolvedTimes(effect.id, null, null);
          omissions.push(`effect ${effect.id} skipped: ${placement.reason}`);
          log.warn('Effect could not be placed', { effectId: effect.id, reason: placement.reason });
          break;
      }
    }

    log.info('Effects resolved', { effects: effects.length, positioned: positioned.length });
    return positioned;
  }

  /** Mix-only reruns reuse the times persisted by the last resolution. */
  private positionFromStored(effects: SoundEffectRecord[], omissions: string[]): PositionedEffect[] {
    const positioned: PositionedEffect[] = [];
    for (const effect of effects) {
      const { startTime, endTime } = effect;
      if (startTime == null || endTime == null || endTime <= startTime) {
        omissions.push(`effect ${effect.id} skipped: ${startTime == null ? 'not placed' : 'zero duration'}`);
        continue;
      }
      if (!effect.audio || effect.audio.length === 0) {
        omissions.push(`effect ${effect.id} skipped: no audio`);
        continue;
      }
      positioned.push({ effectId: effect.id, name: effect.name, startTime, endTime, audio: effect.audio });
    }
    return positioned;
  }

  async getExportStatus(textId: string): Promise<ExportStatus> {
    const text = await this.store.getText(textId);
    if (!text) throw new TextNotFoundError(textId);

    const [record, segments, effects, musicBed, cache] = await Promise.all([
      this.store.getExportRecord(textId),
      this.store.getSegmentsOrdered(textId),
      this.store.getEffects(textId),
      this.store.getMusicBed(textId),
      this.store.getAlignmentCache(textId),
    ]);
    const hasAudio = (audio: Buffer | null | undefined): boolean => !!audio && audio.length > 0;

    return {
      textId,
      state: record?.state ?? null,
      failure: record?.failure ?? null,
      artifact: record?.artifact ?? null,
      segments: { total: segments.length, withAudio: segments.filter((s) => hasAudio(s.audio)).length },
      effects: {
        total: effects.length,
        withAudio: effects.filter((e) => hasAudio(e.audio)).length,
        placed: effects.filter((e) => e.startTime != null && e.endTime != null && e.endTime > e.startTime).length,
      },
      hasMusic: hasAudio(musicBed?.audio),
      hasAlignment: !!cache && isCacheFresh(cache, segments, tokenizeWords(buildTranscript(segments.map((s) => s.content))).length),
      updatedAt: record?.updatedAt ?? null,
    };
  }
}
