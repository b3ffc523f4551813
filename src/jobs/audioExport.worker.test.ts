import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { UnrecoverableError } from 'bullmq';
import { ForcedAlignmentService } from '../services/alignment/forced-alignment.service';
import { MultiTrackMixer } from '../services/audio/multitrack-mixer.service';
import { SpeechTimelineBuilder } from '../services/audio/speech-timeline.service';
import { ExportPipelineOrchestrator } from '../services/pipeline/export-pipeline.orchestrator';
import { MemoryArtifactStore } from '../store/memory-artifact.store';
import { FakeAudioToolkit, ScriptedAlignmentEngine, fakeAudio, instantRetry } from '../test-support/fakes';
import { processAudioExport } from './audioExport.worker';

const CREATED = new Date('2023-06-01T00:00:00Z');

describe('processAudioExport', () => {
  let workRoot: string;

  beforeEach(async () => {
    workRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'export-job-test-'));
  });

  afterEach(async () => {
    await fs.rm(workRoot, { recursive: true, force: true });
  });

  const createOrchestrator = (audio: Buffer | null) => {
    const store = new MemoryArtifactStore({
      texts: [{ id: 'text-1', content: 'Quiet now.', analyzed: true, createdAt: CREATED, updatedAt: CREATED }],
      segments: [
        { id: 'seg-0', textId: 'text-1', characterId: 'narrator', sequenceIndex: 0, content: 'Quiet now.', audio, updatedAt: CREATED },
      ],
    });
    const toolkit = new FakeAudioToolkit();
    return new ExportPipelineOrchestrator({
      store,
      timelineBuilder: new SpeechTimelineBuilder(toolkit),
      alignment: new ForcedAlignmentService(new ScriptedAlignmentEngine(), toolkit, {
        timeoutMs: 1000,
        retry: instantRetry,
      }),
      mixer: new MultiTrackMixer(toolkit),
      workRoot,
    });
  };

  it('returns the artifact summary', async () => {
    const result = await processAudioExport(createOrchestrator(fakeAudio(2)), {
      textId: 'text-1',
      mixConfig: { outputFormat: 'wav' },
    });

    expect(result).toEqual({
      uri: 'memory://exports/text-1.wav',
      format: 'wav',
      durationSec: 2,
      reused: false,
      omissions: ['background music unavailable'],
    });
  });

  it('marks missing speech as unrecoverable', async () => {
    const pending = processAudioExport(createOrchestrator(null), { textId: 'text-1' });

    await expect(pending).rejects.toBeInstanceOf(UnrecoverableError);
    await expect(pending).rejects.toThrow('INCOMPLETE_SPEECH: Speech audio missing for segment(s) 0');
  });

  it('marks unknown texts as unrecoverable', async () => {
    await expect(processAudioExport(createOrchestrator(fakeAudio(2)), { textId: 'text-9' })).rejects.toBeInstanceOf(
      UnrecoverableError
    );
  });
});
