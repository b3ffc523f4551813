import fs from 'fs/promises';
import path from 'path';
import mongoose from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { Text } from '../models/Text';
import { Character } from '../models/Character';
import { Segment, ISegment } from '../models/Segment';
import { SoundEffect, ISoundEffect } from '../models/SoundEffect';
import { MusicBed } from '../models/MusicBed';
import { ExportRecordModel, IExportRecord } from '../models/ExportRecord';
import type { ArtifactStore, FinalAudioInput } from './artifact-store.interface';
import { RecordNotFoundError } from './artifact-store.interface';
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

const toObjectId = (id: string): mongoose.Types.ObjectId | null =>
  mongoose.isValidObjectId(id) ? new mongoose.Types.ObjectId(id) : null;

const copyAudio = (audio: Buffer | undefined): Buffer | null =>
  audio && audio.length > 0 ? Buffer.from(audio) : null;

function toSegmentRecord(doc: ISegment): SegmentRecord {
  return {
    id: doc.id,
    textId: doc.textId.toString(),
    characterId: doc.characterId.toString(),
    sequenceIndex: doc.sequenceIndex,
    content: doc.content,
    audio: copyAudio(doc.audio),
    updatedAt: doc.updatedAt,
  };
}

function toEffectRecord(doc: ISoundEffect): SoundEffectRecord {
  return {
    id: doc.id,
    textId: doc.textId.toString(),
    segmentId: doc.segmentId?.toString() ?? null,
    name: doc.name,
    startWord: doc.startWord,
    endWord: doc.endWord,
    startWordPosition: doc.startWordPosition,
    endWordPosition: doc.endWordPosition,
    prompt: doc.prompt,
    audio: copyAudio(doc.audio),
    startTime: doc.startTime ?? null,
    endTime: doc.endTime ?? null,
    rank: doc.rank ?? null,
    createdAt: doc.createdAt,
  };
}

function toExportRecord(doc: IExportRecord): ExportRecord {
  return {
    textId: doc.textId.toString(),
    state: doc.state,
    failure: doc.failure
      ? {
          code: doc.failure.code,
          message: doc.failure.message,
          missingSegmentIndices: doc.failure.missingSegmentIndices,
        }
      : null,
    artifact: doc.artifact
      ? {
          textId: doc.textId.toString(),
          uri: doc.artifact.uri,
          format: doc.artifact.format,
          byteLength: doc.artifact.byteLength,
          durationSec: doc.artifact.durationSec,
          createdAt: doc.artifact.createdAt,
        }
      : null,
    fingerprints: doc.fingerprints
      ? { speech: doc.fingerprints.speech, effects: doc.fingerprints.effects, mix: doc.fingerprints.mix }
      : null,
    alignedAt: doc.alignedAt ?? null,
    includedEffectIds: [...doc.includedEffectIds],
    omissions: [...doc.omissions],
    updatedAt: doc.updatedAt,
  };
}

/**
 * MongoDB-backed store. Audio blobs live on their records; final exports are
 * written under `exportsDir` and referenced by absolute path.
 */
export class MongoArtifactStore implements ArtifactStore {
  constructor(private readonly exportsDir: string) {}

  async getText(textId: string): Promise<TextRecord | null> {
    const id = toObjectId(textId);
    if (!id) return null;
    const doc = await Text.findById(id);
    if (!doc) return null;
    return {
      id: doc.id,
      title: doc.title ?? null,
      content: doc.content,
      analyzed: doc.analyzed,
      wordTimestamps: doc.wordTimestamps?.map((w) => ({ word: w.word, start: w.start, end: w.end })) ?? null,
      alignedAt: doc.alignedAt ?? null,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    };
  }

  async getSegmentsOrdered(textId: string): Promise<SegmentRecord[]> {
    const id = toObjectId(textId);
    if (!id) return [];
    const docs = await Segment.find({ textId: id }).sort({ sequenceIndex: 1 });
    return docs.map(toSegmentRecord);
  }

  async getCharacterVoices(textId: string): Promise<Map<string, VoiceHandle>> {
    const voices = new Map<string, VoiceHandle>();
    const id = toObjectId(textId);
    if (!id) return voices;
    const docs = await Character.find({ textId: id });
    for (const doc of docs) {
      if (doc.voiceId) voices.set(doc.id, { voiceId: doc.voiceId, provider: 'elevenlabs' });
    }
    return voices;
  }

  async getEffects(textId: string): Promise<SoundEffectRecord[]> {
    const id = toObjectId(textId);
    if (!id) return [];
    const docs = await SoundEffect.find({ textId: id }).sort({ createdAt: 1, _id: 1 });
    return docs.map(toEffectRecord);
  }

  async getMusicBed(textId: string): Promise<MusicBedRecord | null> {
    const id = toObjectId(textId);
    if (!id) return null;
    const doc = await MusicBed.findOne({ textId: id });
    if (!doc) return null;
    return {
      textId,
      prompt: doc.prompt,
      audio: copyAudio(doc.audio),
      updatedAt: doc.updatedAt,
    };
  }

  async getAlignmentCache(textId: string): Promise<AlignmentCache | null> {
    const text = await this.getText(textId);
    if (!text?.wordTimestamps || !text.alignedAt) return null;
    return { words: text.wordTimestamps, alignedAt: text.alignedAt };
  }

  async putAlignmentCache(textId: string, cache: AlignmentCache): Promise<void> {
    // One $set writes both fields so readers never see a half-updated cache
    const result = await Text.updateOne(
      { _id: this.requireId('Text', textId) },
      { $set: { wordTimestamps: cache.words, alignedAt: cache.alignedAt } }
    );
    if (result.matchedCount === 0) throw new RecordNotFoundError('Text', textId);
  }

  async clearAlignmentCache(textId: string): Promise<void> {
    await Text.updateOne(
      { _id: this.requireId('Text', textId) },
      { $unset: { wordTimestamps: 1, alignedAt: 1 } }
    );
  }

  async putSegmentAudio(segmentId: string, audio: Buffer): Promise<string> {
    const doc = await Segment.findByIdAndUpdate(
      this.requireId('Segment', segmentId),
      { $set: { audio } },
      { new: true }
    );
    if (!doc) throw new RecordNotFoundError('Segment', segmentId);
    const textId = doc.textId.toString();
    await this.clearAlignmentCache(textId);
    logger.debug('Segment audio stored, alignment cache cleared', { segmentId, textId });
    return textId;
  }

  async putEffectAudio(effectId: string, audio: Buffer): Promise<string> {
    const doc = await SoundEffect.findByIdAndUpdate(
      this.requireId('SoundEffect', effectId),
      { $set: { audio } },
      { new: true }
    );
    if (!doc) throw new RecordNotFoundError('SoundEffect', effectId);
    return doc.textId.toString();
  }

  async putEffectResolvedTimes(effectId: string, startTime: number | null, endTime: number | null): Promise<void> {
    const id = this.requireId('SoundEffect', effectId);
    if (startTime === null || endTime === null) {
      await SoundEffect.updateOne({ _id: id }, { $unset: { startTime: 1, endTime: 1 } });
    } else {
      await SoundEffect.updateOne({ _id: id }, { $set: { startTime, endTime } });
    }
  }

  async putMusicAudio(textId: string, audio: Buffer): Promise<void> {
    const result = await MusicBed.updateOne(
      { textId: this.requireId('Text', textId) },
      { $set: { audio } }
    );
    if (result.matchedCount === 0) throw new RecordNotFoundError('MusicBed', textId);
  }

  async putFinalAudio(input: FinalAudioInput): Promise<AudioArtifactRef> {
    await fs.mkdir(this.exportsDir, { recursive: true });
    const filePath = path.join(this.exportsDir, `${input.textId}.${input.format}`);
    // Write beside the target and rename so a reader never sees a partial file
    const tempPath = `${filePath}.${uuidv4()}.partial`;
    await fs.writeFile(tempPath, input.data);
    await fs.rename(tempPath, filePath);

    return {
      textId: input.textId,
      uri: filePath,
      format: input.format,
      byteLength: input.data.length,
      durationSec: input.durationSec,
      createdAt: new Date(),
    };
  }

  async readFinalAudio(ref: AudioArtifactRef): Promise<Buffer> {
    return fs.readFile(ref.uri);
  }

  async getExportRecord(textId: string): Promise<ExportRecord | null> {
    const id = toObjectId(textId);
    if (!id) return null;
    const doc = await ExportRecordModel.findOne({ textId: id });
    return doc ? toExportRecord(doc) : null;
  }

  async putExportRecord(record: ExportRecord): Promise<void> {
    const textId = this.requireId('Text', record.textId);
    const set: Record<string, unknown> = {
      state: record.state,
      includedEffectIds: record.includedEffectIds ?? [],
      omissions: record.omissions ?? [],
    };
    const unset: Record<string, 1> = {};

    const optional = {
      failure: record.failure,
      artifact: record.artifact
        ? {
            uri: record.artifact.uri,
            format: record.artifact.format,
            byteLength: record.artifact.byteLength,
            durationSec: record.artifact.durationSec,
            createdAt: record.artifact.createdAt,
          }
        : null,
      fingerprints: record.fingerprints,
      alignedAt: record.alignedAt,
    };
    for (const [key, value] of Object.entries(optional)) {
      if (value === null || value === undefined) unset[key] = 1;
      else set[key] = value;
    }

    await ExportRecordModel.updateOne(
      { textId },
      { $set: set, ...(Object.keys(unset).length > 0 ? { $unset: unset } : {}) },
      { upsert: true }
    );
  }

  private requireId(kind: string, id: string): mongoose.Types.ObjectId {
    const objectId = toObjectId(id);
    if (!objectId) throw new RecordNotFoundError(kind, id);
    return objectId;
  }
}
