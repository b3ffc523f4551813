import { describe, expect, it, jest } from '@jest/globals';
import { MemoryArtifactStore } from '../store/memory-artifact.store';
import { fakeAudio } from '../test-support/fakes';
import { AudioDownloader, processArtifactReady } from './artifactReady.worker';

const CREATED = new Date('2024-01-01T00:00:00Z');

const createStore = () =>
  new MemoryArtifactStore({
    texts: [{ id: 'text-1', content: 'hi', analyzed: true, createdAt: CREATED, updatedAt: CREATED }],
    segments: [{ id: 'seg-0', textId: 'text-1', characterId: 'narrator', sequenceIndex: 0, content: 'hi', updatedAt: CREATED }],
  });

describe('processArtifactReady', () => {
  it('decodes inline base64 audio', async () => {
    const store = createStore();
    const download = jest.fn<AudioDownloader>();

    const outcome = await processArtifactReady(
      store,
      { kind: 'speech', id: 'seg-0', status: 'succeeded', audioBase64: fakeAudio(2).toString('base64') },
      download
    );

    expect(outcome).toEqual({ applied: true, textId: 'text-1' });
    expect(download).not.toHaveBeenCalled();
    expect((await store.getSegmentsOrdered('text-1'))[0].audio?.toString()).toBe('dur:2');
  });

  it('downloads audio referenced by URL', async () => {
    const store = createStore();
    const download = jest.fn<AudioDownloader>().mockResolvedValue(fakeAudio(3));

    const outcome = await processArtifactReady(
      store,
      { kind: 'speech', id: 'seg-0', status: 'succeeded', audioUrl: 'https://audio.example.test/seg-0.mp3' },
      download
    );

    expect(outcome).toEqual({ applied: true, textId: 'text-1' });
    expect(download).toHaveBeenCalledWith('https://audio.example.test/seg-0.mp3');
  });

  it('does not fetch anything for a failed generation', async () => {
    const download = jest.fn<AudioDownloader>();

    const outcome = await processArtifactReady(
      createStore(),
      { kind: 'speech', id: 'seg-0', status: 'failed', audioUrl: 'https://audio.example.test/seg-0.mp3', error: 'timeout' },
      download
    );

    expect(outcome).toEqual({ applied: false, reason: 'timeout' });
    expect(download).not.toHaveBeenCalled();
  });
});
