import type { WordTimestamp } from './alignment.types';
import type { OutputFormat } from './audio.types';

export interface TextRecord {
  id: string;
  title?: string | null;
  content: string;
  analyzed: boolean;
  wordTimestamps?: WordTimestamp[] | null;
  alignedAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Provider voice used to synthesize a character's lines. */
export interface VoiceHandle {
  voiceId: string;
  provider?: string;
}

export interface CharacterRecord {
  id: string;
  textId: string;
  name: string;
  voiceId?: string | null;
  isNarrator?: boolean;
}

export interface SegmentRecord {
  id: string;
  textId: string;
  characterId: string;
  /** Playback order; contiguous from 0 and unique per text */
  sequenceIndex: number;
  content: string;
  audio?: Buffer | null;
  updatedAt: Date;
}

export interface MusicBedRecord {
  textId: string;
  prompt: string;
  audio?: Buffer | null;
  updatedAt: Date;
}

export enum PipelineState {
  AWAITING_SPEECH = 'AWAITING_SPEECH',
  ALIGNING_SPEECH = 'ALIGNING_SPEECH',
  RESOLVING_EFFECTS = 'RESOLVING_EFFECTS',
  MIXING = 'MIXING',
  COMPLETE = 'COMPLETE',
  FAILED = 'FAILED',
}

export interface AudioArtifactRef {
  textId: string;
  /** Opaque location understood by the store that wrote it */
  uri: string;
  format: OutputFormat;
  byteLength: number;
  durationSec: number;
  createdAt: Date;
}

export interface PipelineFailure {
  code: string;
  message: string;
  missingSegmentIndices?: number[];
}

/** Content hashes of the inputs the last run consumed. */
export interface InputFingerprints {
  speech: string;
  effects: string;
  mix: string;
}

export interface ExportRecord {
  textId: string;
  state: PipelineState;
  failure?: PipelineFailure | null;
  artifact?: AudioArtifactRef | null;
  fingerprints?: InputFingerprints | null;
  /** alignedAt of the cache the last resolution ran against */
  alignedAt?: Date | null;
  includedEffectIds?: string[];
  omissions?: string[];
  updatedAt: Date;
}

export interface ExportStatus {
  textId: string;
  state: PipelineState | null;
  failure: PipelineFailure | null;
  artifact: AudioArtifactRef | null;
  segments: { total: number; withAudio: number };
  effects: { total: number; withAudio: number; placed: number };
  hasMusic: boolean;
  hasAlignment: boolean;
  updatedAt: Date | null;
}
