import { describe, expect, it } from '@jest/globals';
import { schemas } from './validate';

describe('schemas.exportRequest', () => {
  it('defaults the flags', () => {
    const { error, value } = schemas.exportRequest.validate({});
    expect(error).toBeUndefined();
    expect(value).toEqual({ force: false, generateMissing: false });
  });

  it('accepts a partial mix configuration', () => {
    const { error, value } = schemas.exportRequest.validate({
      mixConfig: { outputFormat: 'wav', backgroundGain: 0.2 },
      force: true,
    });
    expect(error).toBeUndefined();
    expect(value).toEqual({
      mixConfig: { outputFormat: 'wav', backgroundGain: 0.2 },
      force: true,
      generateMissing: false,
    });
  });

  it('rejects out-of-range values and unknown formats', () => {
    const { error } = schemas.exportRequest.validate(
      { mixConfig: { targetLufs: 0, outputFormat: 'flac' } },
      { abortEarly: false }
    );
    expect(error?.details.map((detail) => detail.path.join('.'))).toEqual([
      'mixConfig.targetLufs',
      'mixConfig.outputFormat',
    ]);
  });
});

describe('schemas.artifactReady', () => {
  it('accepts a success with inline audio', () => {
    const { error } = schemas.artifactReady.validate({
      kind: 'speech',
      id: 'seg-1',
      status: 'succeeded',
      audioBase64: Buffer.from('dur:1').toString('base64'),
    });
    expect(error).toBeUndefined();
  });

  it('requires exactly one audio source on success', () => {
    expect(schemas.artifactReady.validate({ kind: 'speech', id: 'seg-1', status: 'succeeded' }).error).toBeDefined();
    expect(
      schemas.artifactReady.validate({
        kind: 'speech',
        id: 'seg-1',
        status: 'succeeded',
        audioBase64: Buffer.from('dur:1').toString('base64'),
        audioUrl: 'https://audio.example.test/seg-1.mp3',
      }).error
    ).toBeDefined();
  });

  it('accepts a failure without audio', () => {
    const { error } = schemas.artifactReady.validate({
      kind: 'music',
      id: 'text-1',
      status: 'failed',
      error: 'quota exceeded',
    });
    expect(error).toBeUndefined();
  });

  it('rejects unknown kinds and non-http urls', () => {
    expect(schemas.artifactReady.validate({ kind: 'video', id: 'x', status: 'failed' }).error).toBeDefined();
    expect(
      schemas.artifactReady.validate({ kind: 'effect', id: 'fx-1', status: 'succeeded', audioUrl: 'ftp://host/a.mp3' })
        .error
    ).toBeDefined();
  });
});
