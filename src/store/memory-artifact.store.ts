import type { ArtifactStore, FinalAudioInput } from './artifact-store.interface';
import { RecordNotFoundError } from './artifact-store.interface';
import type { AlignmentCache } from '../types/alignment.types';
import type { SoundEffectRecord } from '../types/sfx.types';
import type {
  AudioArtifactRef,
  CharacterRecord,
  ExportRecord,
  MusicBedRecord,
  SegmentRecord,
  TextRecord,
  VoiceHandle,
} from '../types/production.types';

export interface MemorySeed {
  texts?: TextRecord[];
  characters?: CharacterRecord[];
  segments?: SegmentRecord[];
  effects?: SoundEffectRecord[];
  musicBeds?: MusicBedRecord[];
}

/**
 * In-process store used by tests and local tooling. Records are copied on the
 * way in and out so callers never share mutable state with the store.
 */
export class MemoryArtifactStore implements ArtifactStore {
  private texts = new Map<string, TextRecord>();
  private characters = new Map<string, CharacterRecord>();
  private segments = new Map<string, SegmentRecord>();
  private effects = new Map<string, SoundEffectRecord>();
  private musicBeds = new Map<string, MusicBedRecord>();
  private exportRecords = new Map<string, ExportRecord>();
  private finalAudio = new Map<string, Buffer>();

  /** Number of putFinalAudio calls, for idempotence checks */
  finalAudioWrites = 0;

  constructor(
    seed: MemorySeed = {},
    private readonly now: () => Date = () => new Date()
  ) {
    seed.texts?.forEach((t) => this.texts.set(t.id, { ...t }));
    seed.characters?.forEach((c) => this.characters.set(c.id, { ...c }));
    seed.segments?.forEach((s) => this.segments.set(s.id, { ...s }));
    seed.effects?.forEach((e) => this.effects.set(e.id, { ...e }));
    seed.musicBeds?.forEach((m) => this.musicBeds.set(m.textId, { ...m }));
  }

  async getText(textId: string): Promise<TextRecord | null> {
    const text = this.texts.get(textId);
    return text ? { ...text, wordTimestamps: text.wordTimestamps?.map((w) => ({ ...w })) } : null;
  }

  async getSegmentsOrdered(textId: string): Promise<SegmentRecord[]> {
    return [...this.segments.values()]
      .filter((s) => s.textId === textId)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex)
      .map((s) => ({ ...s }));
  }

  async getCharacterVoices(textId: string): Promise<Map<string, VoiceHandle>> {
    const voices = new Map<string, VoiceHandle>();
    for (const character of this.characters.values()) {
      if (character.textId === textId && character.voiceId) {
        voices.set(character.id, { voiceId: character.voiceId });
      }
    }
    return voices;
  }

  async getEffects(textId: string): Promise<SoundEffectRecord[]> {
    return [...this.effects.values()]
      .filter((e) => e.textId === textId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id))
      .map((e) => ({ ...e }));
  }

  async getMusicBed(textId: string): Promise<MusicBedRecord | null> {
    const bed = this.musicBeds.get(textId);
    return bed ? { ...bed } : null;
  }

  async getAlignmentCache(textId: string): Promise<AlignmentCache | null> {
    const text = this.texts.get(textId);
    if (!text?.wordTimestamps || !text.alignedAt) return null;
    return { words: text.wordTimestamps.map((w) => ({ ...w })), alignedAt: text.alignedAt };
  }

  async putAlignmentCache(textId: string, cache: AlignmentCache): Promise<void> {
    const text = this.requireText(textId);
    // Single assignment keeps words and timestamp consistent
    this.texts.set(textId, {
      ...text,
      wordTimestamps: cache.words.map((w) => ({ ...w })),
      alignedAt: cache.alignedAt,
    });
  }

  async clearAlignmentCache(textId: string): Promise<void> {
    const text = this.requireText(textId);
    this.texts.set(textId, { ...text, wordTimestamps: null, alignedAt: null });
  }

  async putSegmentAudio(segmentId: string, audio: Buffer): Promise<string> {
    const segment = this.segments.get(segmentId);
    if (!segment) throw new RecordNotFoundError('Segment', segmentId);
    this.segments.set(segmentId, { ...segment, audio: Buffer.from(audio), updatedAt: this.now() });
    await this.clearAlignmentCache(segment.textId);
    return segment.textId;
  }

  async putEffectAudio(effectId: string, audio: Buffer): Promise<string> {
    const effect = this.requireEffect(effectId);
    this.effects.set(effectId, { ...effect, audio: Buffer.from(audio) });
    return effect.textId;
  }

  async putEffectResolvedTimes(effectId: string, startTime: number | null, endTime: number | null): Promise<void> {
    const effect = this.requireEffect(effectId);
    this.effects.set(effectId, { ...effect, startTime, endTime });
  }

  async putMusicAudio(textId: string, audio: Buffer): Promise<void> {
    const bed = this.musicBeds.get(textId);
    if (!bed) throw new RecordNotFoundError('MusicBed', textId);
    this.musicBeds.set(textId, { ...bed, audio: Buffer.from(audio), updatedAt: this.now() });
  }

  async putFinalAudio(input: FinalAudioInput): Promise<AudioArtifactRef> {
    const uri = `memory://exports/${input.textId}.${input.format}`;
    this.finalAudio.set(uri, Buffer.from(input.data));
    this.finalAudioWrites++;
    return {
      textId: input.textId,
      uri,
      format: input.format,
      byteLength: input.data.length,
      durationSec: input.durationSec,
      createdAt: this.now(),
    };
  }

  async readFinalAudio(ref: AudioArtifactRef): Promise<Buffer> {
    const data = this.finalAudio.get(ref.uri);
    if (!data) throw new RecordNotFoundError('Export', ref.uri);
    return Buffer.from(data);
  }

  async getExportRecord(textId: string): Promise<ExportRecord | null> {
    const record = this.exportRecords.get(textId);
    return record ? { ...record } : null;
  }

  async putExportRecord(record: ExportRecord): Promise<void> {
    this.exportRecords.set(record.textId, { ...record });
  }

  /** Edit a segment outside the audio path (bumps updatedAt, keeps the cache). */
  touchSegment(segmentId: string, patch: Partial<Omit<SegmentRecord, 'id' | 'textId'>> = {}): void {
    const segment = this.segments.get(segmentId);
    if (!segment) throw new RecordNotFoundError('Segment', segmentId);
    this.segments.set(segmentId, { ...segment, ...patch, updatedAt: this.now() });
  }

  /** Replace an effect's anchoring without touching its audio. */
  updateEffect(effectId: string, patch: Partial<Omit<SoundEffectRecord, 'id' | 'textId'>>): void {
    const effect = this.requireEffect(effectId);
    this.effects.set(effectId, { ...effect, ...patch });
  }

  private requireText(textId: string): TextRecord {
    const text = this.texts.get(textId);
    if (!text) throw new RecordNotFoundError('Text', textId);
    return text;
  }

  private requireEffect(effectId: string): SoundEffectRecord {
    const effect = this.effects.get(effectId);
    if (!effect) throw new RecordNotFoundError('SoundEffect', effectId);
    return effect;
  }
}
