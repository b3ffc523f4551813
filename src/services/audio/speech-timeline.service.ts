import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../config/logger';
import { IncompleteSpeechError, SegmentSequenceError } from '../../errors/pipeline.errors';
import type { AudioToolkit, MixConfiguration } from '../../types/audio.types';
import type { SegmentRecord } from '../../types/production.types';
import { buildTranscript } from '../../utils/word-tokenizer';
import { formatNumber } from './mix-graph';
import { SAMPLE_RATE } from './ffmpeg.service';

export interface SegmentOffset {
  segmentId: string;
  sequenceIndex: number;
  /** Inclusive start, exclusive end, seconds */
  start: number;
  end: number;
}

export interface TimelinePlan {
  offsets: Array<{ start: number; end: number }>;
  totalDurationSec: number;
}

export interface SpeechTimeline {
  filePath: string;
  durationSec: number;
  offsets: SegmentOffset[];
  transcript: string;
}

export type SpeechReadiness =
  | { ready: true }
  | { ready: false; error: SegmentSequenceError | IncompleteSpeechError };

const hasAudio = (segment: SegmentRecord): boolean => !!segment.audio && segment.audio.length > 0;

/**
 * Sequence indices must be exactly 0..n-1 and every segment needs audio.
 * Sequence problems are reported before missing audio.
 */
export function checkSpeechReadiness(segments: SegmentRecord[]): SpeechReadiness {
  if (segments.length === 0) {
    return { ready: false, error: new SegmentSequenceError('Text has no segments') };
  }

  const counts = new Map<number, number>();
  for (const s of segments) {
    counts.set(s.sequenceIndex, (counts.get(s.sequenceIndex) ?? 0) + 1);
  }
  const duplicates = [...counts.entries()]
    .filter(([, count]) => count > 1)
    .map(([index]) => index)
    .sort((a, b) => a - b);
  const maxIndex = Math.max(...segments.map((s) => s.sequenceIndex));
  const gaps: number[] = [];
  for (let i = 0; i <= maxIndex; i++) {
    if (!counts.has(i)) gaps.push(i);
  }
  const invalid = segments.some((s) => !Number.isInteger(s.sequenceIndex) || s.sequenceIndex < 0);

  if (invalid || duplicates.length > 0 || gaps.length > 0) {
    const parts: string[] = [];
    if (invalid) parts.push('indices must be non-negative integers');
    if (duplicates.length > 0) parts.push(`duplicate indices ${duplicates.join(', ')}`);
    if (gaps.length > 0) parts.push(`missing indices ${gaps.join(', ')}`);
    return {
      ready: false,
      error: new SegmentSequenceError(`Segment sequence is not contiguous from 0: ${parts.join('; ')}`, duplicates, gaps),
    };
  }

  const missing = segments
    .filter((s) => !hasAudio(s))
    .map((s) => s.sequenceIndex)
    .sort((a, b) => a - b);
  if (missing.length > 0) {
    return { ready: false, error: new IncompleteSpeechError(missing) };
  }

  return { ready: true };
}

/** Offsets for consecutive clips with `paddingSec` of silence between them (not after the last). */
export function planSpeechTimeline(durations: number[], paddingSec: number): TimelinePlan {
  const pad = Math.max(0, paddingSec);
  const offsets: TimelinePlan['offsets'] = [];
  let cursor = 0;
  durations.forEach((duration, i) => {
    const start = cursor;
    const end = start + duration;
    offsets.push({ start, end });
    cursor = end + (i < durations.length - 1 ? pad : 0);
  });
  return { offsets, totalDurationSec: cursor };
}

/** Concat filter for n inputs, padding every clip but the last. */
export function buildConcatFilter(count: number, paddingSec: number): string {
  const parts: string[] = [];
  const labels: string[] = [];
  for (let i = 0; i < count; i++) {
    let chain = `[${i}:a]aformat=sample_fmts=s16:channel_layouts=stereo,aresample=${SAMPLE_RATE}`;
    if (paddingSec > 0 && i < count - 1) {
      chain += `,apad=pad_dur=${formatNumber(paddingSec)}`;
    }
    parts.push(`${chain}[s${i}]`);
    labels.push(`[s${i}]`);
  }
  parts.push(`${labels.join('')}concat=n=${count}:v=0:a=1[speech]`);
  return parts.join(';');
}

export class SpeechTimelineBuilder {
  constructor(private readonly toolkit: AudioToolkit) {}

  /**
   * Concatenate ordered segment audio into one WAV under `workDir`.
   * Throws the readiness error when the segments cannot be assembled.
   */
  async build(
    segments: SegmentRecord[],
    config: Pick<MixConfiguration, 'segmentPaddingSec'>,
    workDir: string
  ): Promise<SpeechTimeline> {
    const readiness = checkSpeechReadiness(segments);
    if (!readiness.ready) throw readiness.error;

    const ordered = [...segments].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    await fs.mkdir(workDir, { recursive: true });

    const inputPaths: string[] = [];
    const durations: number[] = [];
    for (const segment of ordered) {
      const filePath = path.join(workDir, `segment-${segment.sequenceIndex}.audio`);
      await fs.writeFile(filePath, segment.audio ?? Buffer.alloc(0));
      const probe = await this.toolkit.probe(filePath);
      inputPaths.push(filePath);
      durations.push(probe.durationSec);
    }

    const plan = planSpeechTimeline(durations, config.segmentPaddingSec);
    const outputPath = path.join(workDir, 'speech.wav');
    await this.toolkit.renderGraph({
      inputs: inputPaths.map((filePath) => ({ filePath })),
      filterComplex: buildConcatFilter(inputPaths.length, config.segmentPaddingSec),
      outputLabel: 'speech',
      outputPath,
      format: 'wav',
    });

    logger.info('Speech timeline built', {
      segments: ordered.length,
      durationSec: plan.totalDurationSec,
      paddingSec: config.segmentPaddingSec,
    });

    return {
      filePath: outputPath,
      durationSec: plan.totalDurationSec,
      offsets: ordered.map((segment, i) => ({
        segmentId: segment.id,
        sequenceIndex: segment.sequenceIndex,
        start: plan.offsets[i].start,
        end: plan.offsets[i].end,
      })),
      transcript: buildTranscript(ordered.map((s) => s.content)),
    };
  }
}
