import type { AlignmentCache } from '../../types/alignment.types';
import type { MixConfiguration } from '../../types/audio.types';
import type { SoundEffectRecord } from '../../types/sfx.types';
import {
  ExportRecord,
  InputFingerprints,
  MusicBedRecord,
  PipelineState,
  SegmentRecord,
} from '../../types/production.types';
import { fingerprint } from '../../utils/fingerprint';

/** States a run can (re)start from, earliest first. */
export type RestartState =
  | PipelineState.ALIGNING_SPEECH
  | PipelineState.RESOLVING_EFFECTS
  | PipelineState.MIXING;

export const STAGE_ORDER: readonly PipelineState[] = [
  PipelineState.AWAITING_SPEECH,
  PipelineState.ALIGNING_SPEECH,
  PipelineState.RESOLVING_EFFECTS,
  PipelineState.MIXING,
  PipelineState.COMPLETE,
];

/** True when a run starting at `from` executes `stage`. */
export const runsStage = (from: RestartState, stage: RestartState): boolean =>
  STAGE_ORDER.indexOf(from) <= STAGE_ORDER.indexOf(stage);

/**
 * A cache is usable when it was written strictly after the last change to
 * every segment and still covers every transcript word.
 */
export function isCacheFresh(
  cache: AlignmentCache | null,
  segments: Pick<SegmentRecord, 'updatedAt'>[],
  wordCount: number
): boolean {
  if (!cache) return false;
  if (cache.words.length !== wordCount) return false;
  const alignedAt = cache.alignedAt.getTime();
  return segments.every((segment) => alignedAt > segment.updatedAt.getTime());
}

export function computeFingerprints(
  segments: SegmentRecord[],
  effects: SoundEffectRecord[],
  musicBed: MusicBedRecord | null,
  config: MixConfiguration
): InputFingerprints {
  const speech = fingerprint(
    segments.map((s) => ({ id: s.id, index: s.sequenceIndex, content: s.content, audio: s.audio ?? null }))
  );
  const effectInputs = [...effects]
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((e) => ({
      id: e.id,
      start: e.startWordPosition,
      end: e.endWordPosition,
      audio: e.audio ?? null,
    }));
  const mix = fingerprint({ config, music: musicBed?.audio ?? null });
  return { speech, effects: fingerprint(effectInputs), mix };
}

export type RestartDecision =
  | { from: RestartState; reason: string }
  | { from: null; reason: string };

/**
 * Earliest stage whose inputs changed since the last run. `from: null` means
 * the last artifact is still current.
 */
export function decideRestart(input: {
  record: ExportRecord | null;
  cacheFresh: boolean;
  cache: AlignmentCache | null;
  fingerprints: InputFingerprints;
  force: boolean;
}): RestartDecision {
  const { record, cacheFresh, cache, fingerprints, force } = input;
  const previous = record?.fingerprints;

  if (!cacheFresh || !cache) {
    return { from: PipelineState.ALIGNING_SPEECH, reason: 'alignment cache missing or stale' };
  }
  if (previous && previous.speech !== fingerprints.speech) {
    return { from: PipelineState.ALIGNING_SPEECH, reason: 'speech changed' };
  }
  if (!record || !previous) {
    return { from: PipelineState.RESOLVING_EFFECTS, reason: 'no previous export' };
  }
  if (record.state !== PipelineState.COMPLETE || !record.artifact) {
    return { from: PipelineState.RESOLVING_EFFECTS, reason: 'previous export did not complete' };
  }
  if (record.alignedAt?.getTime() !== cache.alignedAt.getTime()) {
    return { from: PipelineState.RESOLVING_EFFECTS, reason: 'alignment refreshed since last export' };
  }
  if (previous.effects !== fingerprints.effects) {
    return { from: PipelineState.RESOLVING_EFFECTS, reason: 'effects changed' };
  }
  if (previous.mix !== fingerprints.mix) {
    return { from: PipelineState.MIXING, reason: 'mix configuration or music changed' };
  }
  if (force) {
    return { from: PipelineState.MIXING, reason: 'forced rebuild' };
  }
  return { from: null, reason: 'inputs unchanged' };
}
