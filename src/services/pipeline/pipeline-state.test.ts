import { describe, expect, it } from '@jest/globals';
import type { AlignmentCache } from '../../types/alignment.types';
import { DEFAULT_MIX_CONFIGURATION } from '../../types/audio.types';
import { ExportRecord, InputFingerprints, PipelineState, SegmentRecord } from '../../types/production.types';
import type { SoundEffectRecord } from '../../types/sfx.types';
import { computeFingerprints, decideRestart, isCacheFresh, runsStage } from './pipeline-state';

const at = (iso: string): Date => new Date(iso);

const segment = (id: string, index: number, audio: string): SegmentRecord => ({
  id,
  textId: 'text-1',
  characterId: 'narrator',
  sequenceIndex: index,
  content: `line ${index}`,
  audio: Buffer.from(audio),
  updatedAt: at('2024-01-01T00:00:00Z'),
});

const effect = (id: string, start: number, end: number): SoundEffectRecord => ({
  id,
  textId: 'text-1',
  name: id,
  startWord: 'a',
  endWord: 'b',
  startWordPosition: start,
  endWordPosition: end,
  prompt: 'thunder',
  audio: Buffer.from(id),
  createdAt: at('2024-01-01T00:00:00Z'),
});

const cache: AlignmentCache = {
  words: [
    { word: 'line', start: 0, end: 1 },
    { word: '0', start: 1, end: 2 },
  ],
  alignedAt: at('2024-01-02T00:00:00Z'),
};

const prints: InputFingerprints = { speech: 'speech-1', effects: 'effects-1', mix: 'mix-1' };

const completed: ExportRecord = {
  textId: 'text-1',
  state: PipelineState.COMPLETE,
  artifact: {
    textId: 'text-1',
    uri: 'memory://exports/text-1.mp3',
    format: 'mp3',
    byteLength: 10,
    durationSec: 2,
    createdAt: at('2024-01-02T00:00:05Z'),
  },
  fingerprints: prints,
  alignedAt: cache.alignedAt,
  updatedAt: at('2024-01-02T00:00:05Z'),
};

describe('runsStage', () => {
  it('runs every stage at or after the restart point', () => {
    expect(runsStage(PipelineState.ALIGNING_SPEECH, PipelineState.MIXING)).toBe(true);
    expect(runsStage(PipelineState.RESOLVING_EFFECTS, PipelineState.RESOLVING_EFFECTS)).toBe(true);
    expect(runsStage(PipelineState.MIXING, PipelineState.ALIGNING_SPEECH)).toBe(false);
  });
});

describe('isCacheFresh', () => {
  const segments = [{ updatedAt: at('2024-01-01T00:00:00Z') }];

  it('accepts a cache written after every segment change', () => {
    expect(isCacheFresh(cache, segments, 2)).toBe(true);
  });

  it('rejects a cache written at the same instant as a segment change', () => {
    expect(isCacheFresh(cache, [{ updatedAt: cache.alignedAt }], 2)).toBe(false);
  });

  it('rejects a cache that no longer covers the transcript', () => {
    expect(isCacheFresh(cache, segments, 3)).toBe(false);
  });

  it('rejects a missing cache', () => {
    expect(isCacheFresh(null, segments, 0)).toBe(false);
  });
});

describe('computeFingerprints', () => {
  const segments = [segment('s0', 0, 'audio-0'), segment('s1', 1, 'audio-1')];
  const base = computeFingerprints(segments, [effect('fx-a', 1, 2)], null, DEFAULT_MIX_CONFIGURATION);

  it('is stable for the same inputs', () => {
    expect(computeFingerprints(segments, [effect('fx-a', 1, 2)], null, DEFAULT_MIX_CONFIGURATION)).toEqual(base);
  });

  it('changes only the speech print when segment audio changes', () => {
    const next = computeFingerprints(
      [segment('s0', 0, 'audio-0'), segment('s1', 1, 'audio-1b')],
      [effect('fx-a', 1, 2)],
      null,
      DEFAULT_MIX_CONFIGURATION
    );
    expect(next.speech).not.toBe(base.speech);
    expect(next.effects).toBe(base.effects);
    expect(next.mix).toBe(base.mix);
  });

  it('ignores effect ordering but not anchoring', () => {
    const reordered = computeFingerprints(
      segments,
      [effect('fx-b', 3, 3), effect('fx-a', 1, 2)],
      null,
      DEFAULT_MIX_CONFIGURATION
    );
    const original = computeFingerprints(
      segments,
      [effect('fx-a', 1, 2), effect('fx-b', 3, 3)],
      null,
      DEFAULT_MIX_CONFIGURATION
    );
    expect(reordered.effects).toBe(original.effects);

    const moved = computeFingerprints(segments, [effect('fx-a', 1, 3)], null, DEFAULT_MIX_CONFIGURATION);
    expect(moved.effects).not.toBe(base.effects);
  });

  it('folds mix configuration and music into the mix print', () => {
    const louder = computeFingerprints(segments, [effect('fx-a', 1, 2)], null, {
      ...DEFAULT_MIX_CONFIGURATION,
      backgroundGain: 0.4,
    });
    expect(louder.mix).not.toBe(base.mix);
    expect(louder.effects).toBe(base.effects);
  });
});

describe('decideRestart', () => {
  it('realigns when the cache is stale', () => {
    expect(
      decideRestart({ record: completed, cacheFresh: false, cache: null, fingerprints: prints, force: false }).from
    ).toBe(PipelineState.ALIGNING_SPEECH);
  });

  it('realigns when speech changed', () => {
    const decision = decideRestart({
      record: completed,
      cacheFresh: true,
      cache,
      fingerprints: { ...prints, speech: 'speech-2' },
      force: false,
    });
    expect(decision).toEqual({ from: PipelineState.ALIGNING_SPEECH, reason: 'speech changed' });
  });

  it('resolves effects on a first export with a fresh cache', () => {
    expect(decideRestart({ record: null, cacheFresh: true, cache, fingerprints: prints, force: false })).toEqual({
      from: PipelineState.RESOLVING_EFFECTS,
      reason: 'no previous export',
    });
  });

  it('resolves effects after an interrupted export', () => {
    const record: ExportRecord = { ...completed, state: PipelineState.MIXING };
    expect(decideRestart({ record, cacheFresh: true, cache, fingerprints: prints, force: false }).from).toBe(
      PipelineState.RESOLVING_EFFECTS
    );
  });

  it('resolves effects when the cache was rewritten since the export', () => {
    const record: ExportRecord = { ...completed, alignedAt: at('2024-01-01T12:00:00Z') };
    expect(decideRestart({ record, cacheFresh: true, cache, fingerprints: prints, force: false }).reason).toBe(
      'alignment refreshed since last export'
    );
  });

  it('resolves effects when effects changed', () => {
    expect(
      decideRestart({
        record: completed,
        cacheFresh: true,
        cache,
        fingerprints: { ...prints, effects: 'effects-2' },
        force: false,
      }).from
    ).toBe(PipelineState.RESOLVING_EFFECTS);
  });

  it('only remixes when the mix inputs changed', () => {
    expect(
      decideRestart({
        record: completed,
        cacheFresh: true,
        cache,
        fingerprints: { ...prints, mix: 'mix-2' },
        force: false,
      }).from
    ).toBe(PipelineState.MIXING);
  });

  it('remixes when forced', () => {
    expect(decideRestart({ record: completed, cacheFresh: true, cache, fingerprints: prints, force: true })).toEqual({
      from: PipelineState.MIXING,
      reason: 'forced rebuild',
    });
  });

  it('does nothing when all inputs match', () => {
    expect(
      decideRestart({ record: completed, cacheFresh: true, cache, fingerprints: prints, force: false }).from
    ).toBeNull();
  });
});
