import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { IncompleteSpeechError, SegmentSequenceError } from '../../errors/pipeline.errors';
import type { SegmentRecord } from '../../types/production.types';
import { FakeAudioToolkit, fakeAudio } from '../../test-support/fakes';
import {
  SpeechTimelineBuilder,
  buildConcatFilter,
  checkSpeechReadiness,
  planSpeechTimeline,
} from './speech-timeline.service';

const segment = (sequenceIndex: number, content: string, audio?: Buffer | null): SegmentRecord => ({
  id: `seg-${sequenceIndex}`,
  textId: 'text-1',
  characterId: 'narrator',
  sequenceIndex,
  content,
  audio,
  updatedAt: new Date('2024-01-01T00:00:00Z'),
});

describe('planSpeechTimeline', () => {
  it('places clips back to back', () => {
    expect(planSpeechTimeline([2, 3, 2], 0)).toEqual({
      offsets: [
        { start: 0, end: 2 },
        { start: 2, end: 5 },
        { start: 5, end: 7 },
      ],
      totalDurationSec: 7,
    });
  });

  it('inserts padding between clips but not after the last', () => {
    expect(planSpeechTimeline([2, 3], 0.5)).toEqual({
      offsets: [
        { start: 0, end: 2 },
        { start: 2.5, end: 5.5 },
      ],
      totalDurationSec: 5.5,
    });
  });
});

describe('buildConcatFilter', () => {
  it('normalizes every input and concatenates them', () => {
    expect(buildConcatFilter(2, 0)).toBe(
      '[0:a]aformat=sample_fmts=s16:channel_layouts=stereo,aresample=48000[s0];' +
        '[1:a]aformat=sample_fmts=s16:channel_layouts=stereo,aresample=48000[s1];' +
        '[s0][s1]concat=n=2:v=0:a=1[speech]'
    );
  });

  it('pads all clips except the last', () => {
    expect(buildConcatFilter(2, 0.25)).toBe(
      '[0:a]aformat=sample_fmts=s16:channel_layouts=stereo,aresample=48000,apad=pad_dur=0.25[s0];' +
        '[1:a]aformat=sample_fmts=s16:channel_layouts=stereo,aresample=48000[s1];' +
        '[s0][s1]concat=n=2:v=0:a=1[speech]'
    );
  });
});

describe('checkSpeechReadiness', () => {
  it('accepts a contiguous sequence with audio', () => {
    expect(checkSpeechReadiness([segment(1, 'b', fakeAudio(1)), segment(0, 'a', fakeAudio(1))])).toEqual({
      ready: true,
    });
  });

  it('lists every segment without audio in order', () => {
    const readiness = checkSpeechReadiness([
      segment(0, 'a', null),
      segment(1, 'b', fakeAudio(1)),
      segment(2, 'c', Buffer.alloc(0)),
    ]);

    expect(readiness.ready).toBe(false);
    if (readiness.ready) return;
    expect(readiness.error).toBeInstanceOf(IncompleteSpeechError);
    expect(readiness.error.message).toBe('Speech audio missing for segment(s) 0, 2');
  });

  it('reports duplicate and missing indices before missing audio', () => {
    const readiness = checkSpeechReadiness([
      segment(0, 'a', null),
      segment(0, 'a again', fakeAudio(1)),
      segment(3, 'd', fakeAudio(1)),
    ]);

    expect(readiness.ready).toBe(false);
    if (readiness.ready) return;
    expect(readiness.error).toBeInstanceOf(SegmentSequenceError);
    expect(readiness.error.message).toBe(
      'Segment sequence is not contiguous from 0: duplicate indices 0; missing indices 1, 2'
    );
  });

  it('rejects a text with no segments', () => {
    const readiness = checkSpeechReadiness([]);
    expect(readiness.ready).toBe(false);
    if (readiness.ready) return;
    expect(readiness.error.message).toBe('Text has no segments');
  });
});

describe('SpeechTimelineBuilder', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'timeline-test-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('orders segments by sequence index and reports their offsets', async () => {
    const toolkit = new FakeAudioToolkit();
    const builder = new SpeechTimelineBuilder(toolkit);

    const timeline = await builder.build(
      [
        segment(2, 'The door creaked.', fakeAudio(2)),
        segment(0, 'It was late.', fakeAudio(2)),
        segment(1, '  Rain hammered the roof.  ', fakeAudio(3)),
      ],
      { segmentPaddingSec: 0 },
      workDir
    );

    expect(timeline.durationSec).toBe(7);
    expect(timeline.filePath).toBe(path.join(workDir, 'speech.wav'));
    expect(timeline.offsets).toEqual([
      { segmentId: 'seg-0', sequenceIndex: 0, start: 0, end: 2 },
      { segmentId: 'seg-1', sequenceIndex: 1, start: 2, end: 5 },
      { segmentId: 'seg-2', sequenceIndex: 2, start: 5, end: 7 },
    ]);
    expect(timeline.transcript).toBe('It was late. Rain hammered the roof. The door creaked.');

    expect(toolkit.renders).toHaveLength(1);
    expect(toolkit.renders[0].inputs.map((input) => path.basename(input.filePath))).toEqual([
      'segment-0.audio',
      'segment-1.audio',
      'segment-2.audio',
    ]);
    expect(toolkit.renders[0].format).toBe('wav');
  });

  it('throws the readiness error instead of rendering', async () => {
    const toolkit = new FakeAudioToolkit();
    const builder = new SpeechTimelineBuilder(toolkit);

    await expect(
      builder.build([segment(0, 'a', fakeAudio(1)), segment(1, 'b', null)], { segmentPaddingSec: 0 }, workDir)
    ).rejects.toBeInstanceOf(IncompleteSpeechError);
    expect(toolkit.renders).toHaveLength(0);
  });
});
