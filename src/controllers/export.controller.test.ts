import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { createApp } from '../app';
import type { ArtifactReadyJobData, AudioExportJobData, JobQueue, QueuedJob } from '../config/redis';
import { ForcedAlignmentService } from '../services/alignment/forced-alignment.service';
import { MultiTrackMixer } from '../services/audio/multitrack-mixer.service';
import { SpeechTimelineBuilder } from '../services/audio/speech-timeline.service';
import { ExportPipelineOrchestrator } from '../services/pipeline/export-pipeline.orchestrator';
import { MemoryArtifactStore } from '../store/memory-artifact.store';
import { FakeAudioToolkit, ScriptedAlignmentEngine, fakeAudio, instantRetry, steppingClock } from '../test-support/fakes';
import { createExportController } from './export.controller';

const SEEDED_AT = new Date('2023-06-01T00:00:00Z');

/** Records what the HTTP layer queues; jobs keep whatever state a test gives them. */
class RecordingQueue<T> implements JobQueue<T> {
  readonly added: { name: string; data: T; jobId?: string }[] = [];
  readonly jobs = new Map<string, { state: string; removed: boolean }>();
  private counter = 0;

  async add(name: string, data: T, opts?: { jobId?: string }): Promise<{ id?: string }> {
    const id = opts?.jobId ?? String(++this.counter);
    if (id.includes(':')) {
      throw new Error('Custom Id cannot contain :');
    }
    this.added.push({ name, data, jobId: opts?.jobId });
    this.jobs.set(id, { state: 'waiting', removed: false });
    return { id };
  }

  async getJob(jobId: string): Promise<QueuedJob | undefined> {
    const job = this.jobs.get(jobId);
    if (!job || job.removed) return undefined;
    return {
      getState: async () => job.state,
      remove: async () => {
        job.removed = true;
      },
    };
  }
}

describe('export HTTP routes', () => {
  let workRoot: string;
  let server: Server;
  let http: AxiosInstance;
  let store: MemoryArtifactStore;
  let orchestrator: ExportPipelineOrchestrator;
  let exportQueue: RecordingQueue<AudioExportJobData>;
  let eventQueue: RecordingQueue<ArtifactReadyJobData>;

  beforeEach(async () => {
    workRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'controller-test-'));
    const clock = steppingClock();
    store = new MemoryArtifactStore(
      {
        texts: [{ id: 'text-1', content: 'Rain fell.', analyzed: true, createdAt: SEEDED_AT, updatedAt: SEEDED_AT }],
        segments: [
          {
            id: 'seg-0',
            textId: 'text-1',
            characterId: 'narrator',
            sequenceIndex: 0,
            content: 'Rain fell.',
            audio: fakeAudio(2),
            updatedAt: SEEDED_AT,
          },
        ],
      },
      clock
    );
    const toolkit = new FakeAudioToolkit();
    const engine = new ScriptedAlignmentEngine('wav', () => [
      { word: 'Rain', start: 0, end: 1 },
      { word: 'fell.', start: 1, end: 2 },
    ]);
    orchestrator = new ExportPipelineOrchestrator({
      store,
      timelineBuilder: new SpeechTimelineBuilder(toolkit),
      alignment: new ForcedAlignmentService(engine, toolkit, { timeoutMs: 1000, retry: instantRetry, now: clock }),
      mixer: new MultiTrackMixer(toolkit),
      workRoot,
      now: clock,
    });
    exportQueue = new RecordingQueue<AudioExportJobData>();
    eventQueue = new RecordingQueue<ArtifactReadyJobData>();

    const app = createApp(
      createExportController({ store, orchestrator, audioExportQueue: exportQueue, artifactReadyQueue: eventQueue }),
      '*'
    );
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server is not listening on a TCP port');
    http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await fs.rm(workRoot, { recursive: true, force: true });
  });

  it('queues one export job per text under a separator-free id', async () => {
    const res = await http.post('/api/texts/text-1/export', { force: true });

    expect(res.status).toBe(202);
    expect(res.data).toEqual({ success: true, message: 'Export started', data: { jobId: 'export-text-1' } });
    expect(exportQueue.added).toEqual([
      {
        name: 'export-text',
        data: { textId: 'text-1', mixConfig: undefined, force: true, generateMissing: false },
        jobId: 'export-text-1',
      },
    ]);
  });

  it('reports a pending job instead of queueing a second one', async () => {
    await http.post('/api/texts/text-1/export', {});
    const res = await http.post('/api/texts/text-1/export', {});

    expect(res.status).toBe(202);
    expect(res.data).toEqual({
      success: true,
      message: 'Export already queued',
      data: { jobId: 'export-text-1', state: 'waiting' },
    });
    expect(exportQueue.added).toHaveLength(1);
  });

  it('replaces a finished job with a new one', async () => {
    await http.post('/api/texts/text-1/export', {});
    const finished = exportQueue.jobs.get('export-text-1');
    if (finished) finished.state = 'completed';

    const res = await http.post('/api/texts/text-1/export', {});

    expect(res.status).toBe(202);
    expect(res.data.message).toBe('Export started');
    expect(exportQueue.added).toHaveLength(2);
  });

  it('rejects an export for an unknown text', async () => {
    const res = await http.post('/api/texts/missing/export', {});

    expect(res.status).toBe(404);
    expect(res.data).toEqual({
      success: false,
      error: { message: 'Text missing not found', code: 'TEXT_NOT_FOUND' },
    });
    expect(exportQueue.added).toEqual([]);
  });

  it('rejects an out-of-range mix config', async () => {
    const res = await http.post('/api/texts/text-1/export', { mixConfig: { backgroundGain: 5 } });

    expect(res.status).toBe(400);
    expect(res.data.success).toBe(false);
    expect(exportQueue.added).toEqual([]);
  });

  it('returns the export status of a text that was never exported', async () => {
    const res = await http.get('/api/texts/text-1/export/status');

    expect(res.status).toBe(200);
    expect(res.data.data).toMatchObject({
      textId: 'text-1',
      state: null,
      artifact: null,
      segments: { total: 1, withAudio: 1 },
      hasAlignment: false,
    });
  });

  it('has nothing to download before an export completes', async () => {
    const res = await http.get('/api/texts/text-1/export/download');

    expect(res.status).toBe(404);
    expect(res.data.error.message).toBe('No export available for this text');
  });

  it('downloads the finished export', async () => {
    const outcome = await orchestrator.export('text-1');
    if (!outcome.ok) throw outcome.error;

    const res = await http.get('/api/texts/text-1/export/download', { responseType: 'arraybuffer' });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('audio/mpeg');
    expect(res.headers['content-disposition']).toBe('attachment; filename="text-1.mp3"');
    expect(Number(res.headers['content-length'])).toBe(outcome.artifact.byteLength);
  });

  it('queues a valid completion event', async () => {
    const event = { kind: 'speech', id: 'seg-0', status: 'succeeded', audioBase64: fakeAudio(1).toString('base64') };
    const res = await http.post('/api/webhooks/artifact-ready', event);

    expect(res.status).toBe(202);
    expect(res.data).toEqual({ success: true, data: { jobId: '1' } });
    expect(eventQueue.added).toEqual([{ name: 'artifact-ready', data: event, jobId: undefined }]);
  });

  it('rejects a successful completion event without audio', async () => {
    const res = await http.post('/api/webhooks/artifact-ready', { kind: 'speech', id: 'seg-0', status: 'succeeded' });

    expect(res.status).toBe(400);
    expect(eventQueue.added).toEqual([]);
  });
});
