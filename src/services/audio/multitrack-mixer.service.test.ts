import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { MixingError } from '../../errors/pipeline.errors';
import { DEFAULT_MIX_CONFIGURATION } from '../../types/audio.types';
import type { PositionedEffect } from '../../types/sfx.types';
import { CORRUPT_AUDIO, FakeAudioToolkit, fakeAudio } from '../../test-support/fakes';
import { MUSIC_UNAVAILABLE, MultiTrackMixer } from './multitrack-mixer.service';

const effect = (effectId: string, startTime: number, audio: Buffer): PositionedEffect => ({
  effectId,
  name: effectId,
  startTime,
  endTime: startTime + 1,
  audio,
});

describe('MultiTrackMixer', () => {
  let workDir: string;
  let speechPath: string;
  let toolkit: FakeAudioToolkit;
  let mixer: MultiTrackMixer;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mixer-test-'));
    speechPath = path.join(workDir, 'speech.wav');
    await fs.writeFile(speechPath, fakeAudio(10));
    toolkit = new FakeAudioToolkit();
    mixer = new MultiTrackMixer(toolkit);
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('mixes speech, music and effects into the configured format', async () => {
    const result = await mixer.mix({
      textId: 'text-1',
      speech: { filePath: speechPath },
      music: fakeAudio(22),
      effects: [effect('fx-1', 2, fakeAudio(1))],
      config: DEFAULT_MIX_CONFIGURATION,
      workDir,
    });

    expect(result).toEqual({
      filePath: path.join(workDir, 'mix.mp3'),
      durationSec: 10,
      includedEffectIds: ['fx-1'],
      omissions: [],
    });
    expect(toolkit.renders[0].inputs.map((input) => path.basename(input.filePath))).toEqual([
      'speech.wav',
      'music.audio',
      'effect-0.audio',
    ]);
    expect(toolkit.renders[0].format).toBe('mp3');
  });

  it('drops unusable tracks and reports each one', async () => {
    const result = await mixer.mix({
      textId: 'text-1',
      speech: { filePath: speechPath },
      music: CORRUPT_AUDIO,
      effects: [
        effect('fx-late', 12, fakeAudio(1)),
        effect('fx-broken', 3, CORRUPT_AUDIO),
        effect('fx-good', 2, fakeAudio(1)),
        effect('fx-silent', 1, Buffer.alloc(0)),
      ],
      config: DEFAULT_MIX_CONFIGURATION,
      workDir,
    });

    expect(result.includedEffectIds).toEqual(['fx-good']);
    expect(result.omissions).toEqual([
      `${MUSIC_UNAVAILABLE}: unreadable (Invalid data found when processing input ${path.join(workDir, 'music.audio')})`,
      'effect fx-silent skipped: no audio',
      `effect fx-broken skipped: unreadable (Invalid data found when processing input ${path.join(workDir, 'effect-2.audio')})`,
      'effect fx-late skipped: start 12s outside speech',
    ]);
    expect(toolkit.renders[0].filterComplex).not.toContain('[music]');
  });

  it('reports a missing music bed', async () => {
    const result = await mixer.mix({
      textId: 'text-1',
      speech: { filePath: speechPath },
      music: null,
      effects: [],
      config: DEFAULT_MIX_CONFIGURATION,
      workDir,
    });

    expect(result.omissions).toEqual([MUSIC_UNAVAILABLE]);
  });

  it('treats zero-length music as unavailable', async () => {
    const result = await mixer.mix({
      textId: 'text-1',
      speech: { filePath: speechPath },
      music: fakeAudio(0),
      effects: [],
      config: DEFAULT_MIX_CONFIGURATION,
      workDir,
    });

    expect(result.omissions).toEqual([`${MUSIC_UNAVAILABLE}: zero-length audio`]);
  });

  it('fails when the speech timeline cannot be read', async () => {
    await fs.writeFile(speechPath, CORRUPT_AUDIO);

    await expect(
      mixer.mix({
        textId: 'text-1',
        speech: { filePath: speechPath },
        effects: [],
        config: DEFAULT_MIX_CONFIGURATION,
        workDir,
      })
    ).rejects.toBeInstanceOf(MixingError);
    expect(toolkit.renders).toHaveLength(0);
  });
});
