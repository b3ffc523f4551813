import path from 'path';
import { describe, expect, it } from '@jest/globals';
import { DEFAULT_MIX_CONFIGURATION } from '../types/audio.types';
import { parseSettings, SettingsError } from './settings';

describe('parseSettings', () => {
  it('fills every default from an empty environment', () => {
    const settings = parseSettings({});

    expect(settings.port).toBe(5000);
    expect(settings.databaseUrl).toBe('mongodb://localhost:27017/scenecast_db');
    expect(settings.alignmentEngine).toBe('whisper');
    expect(settings.generationConcurrency).toBe(3);
    expect(settings.retry).toEqual({ attempts: 3, baseDelayMs: 1000 });
    expect(settings.exportsDir).toBe(path.join(path.resolve('./uploads'), 'exports'));
    expect(settings.mixDefaults).toEqual(DEFAULT_MIX_CONFIGURATION);
  });

  it('coerces numeric and enum values from strings', () => {
    const settings = parseSettings({
      PORT: '8080',
      ALIGNMENT_ENGINE: 'estimate',
      MIX_OUTPUT_FORMAT: 'wav',
      MIX_TARGET_LUFS: '-16',
      ELEVENLABS_API_KEY: 'test-secret',
    });

    expect(settings.port).toBe(8080);
    expect(settings.alignmentEngine).toBe('estimate');
    expect(settings.mixDefaults.outputFormat).toBe('wav');
    expect(settings.mixDefaults.targetLufs).toBe(-16);
    expect(settings.elevenLabs.apiKey).toBe('test-secret');
  });

  it('names every invalid key', () => {
    let caught: unknown;
    try {
      parseSettings({ PORT: 'not-a-port', MIX_OUTPUT_FORMAT: 'flac' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SettingsError);
    if (!(caught instanceof SettingsError)) return;
    expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual(['PORT', 'MIX_OUTPUT_FORMAT']);
  });
});
