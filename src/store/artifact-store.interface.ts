import type { AlignmentCache } from '../types/alignment.types';
import type { SoundEffectRecord } from '../types/sfx.types';
import type {
  AudioArtifactRef,
  ExportRecord,
  MusicBedRecord,
  SegmentRecord,
  TextRecord,
  VoiceHandle,
} from '../types/production.types';
import type { OutputFormat } from '../types/audio.types';

export interface FinalAudioInput {
  textId: string;
  data: Buffer;
  format: OutputFormat;
  durationSec: number;
}

/**
 * Persistence seen by the export pipeline. Implementations must write the
 * alignment cache and its timestamp together, and must clear the cache
 * whenever a segment's audio changes.
 */
export interface ArtifactStore {
  getText(textId: string): Promise<TextRecord | null>;
  /** Segments sorted by sequenceIndex ascending */
  getSegmentsOrdered(textId: string): Promise<SegmentRecord[]>;
  /** Voice per character id */
  getCharacterVoices(textId: string): Promise<Map<string, VoiceHandle>>;
  getEffects(textId: string): Promise<SoundEffectRecord[]>;
  getMusicBed(textId: string): Promise<MusicBedRecord | null>;

  getAlignmentCache(textId: string): Promise<AlignmentCache | null>;
  putAlignmentCache(textId: string, cache: AlignmentCache): Promise<void>;
  clearAlignmentCache(textId: string): Promise<void>;

  /** Returns the owning text id so callers can log against it */
  putSegmentAudio(segmentId: string, audio: Buffer): Promise<string>;
  putEffectAudio(effectId: string, audio: Buffer): Promise<string>;
  putEffectResolvedTimes(effectId: string, startTime: number | null, endTime: number | null): Promise<void>;
  putMusicAudio(textId: string, audio: Buffer): Promise<void>;

  putFinalAudio(input: FinalAudioInput): Promise<AudioArtifactRef>;
  readFinalAudio(ref: AudioArtifactRef): Promise<Buffer>;

  getExportRecord(textId: string): Promise<ExportRecord | null>;
  putExportRecord(record: ExportRecord): Promise<void>;
}

export class RecordNotFoundError extends Error {
  constructor(kind: string, id: string) {
    super(`${kind} ${id} not found`);
    this.name = 'RecordNotFoundError';
  }
}
