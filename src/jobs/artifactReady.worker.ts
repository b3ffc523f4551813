import axios from 'axios';
import { Worker, Job } from 'bullmq';
import type Redis from 'ioredis';
import { logger } from '../config/logger';
import { QUEUE_NAMES, ArtifactReadyJobData } from '../config/redis';
import type { ArtifactStore } from '../store/artifact-store.interface';
import {
  applyArtifactReady,
  ArtifactReadyEvent,
  ArtifactReadyOutcome,
} from '../services/events/artifact-ready.handler';

export type AudioDownloader = (url: string) => Promise<Buffer>;

export const downloadAudio: AudioDownloader = async (url) => {
  const response = await axios.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    timeout: 60000,
  });
  return Buffer.from(response.data);
};

/** Resolve the event's audio payload, then commit it through the store. */
export async function processArtifactReady(
  store: ArtifactStore,
  data: ArtifactReadyJobData,
  download: AudioDownloader = downloadAudio
): Promise<ArtifactReadyOutcome> {
  let audio: Buffer | undefined;
  if (data.status === 'succeeded') {
    if (data.audioBase64) {
      audio = Buffer.from(data.audioBase64, 'base64');
    } else if (data.audioUrl) {
      audio = await download(data.audioUrl);
    }
  }

  const event: ArtifactReadyEvent = {
    kind: data.kind,
    id: data.id,
    status: data.status,
    audio,
    error: data.error,
  };
  return applyArtifactReady(store, event);
}

export const createArtifactReadyWorker = (connection: Redis, store: ArtifactStore) => {
  const worker = new Worker<ArtifactReadyJobData, ArtifactReadyOutcome>(
    QUEUE_NAMES.ARTIFACT_READY,
    async (job: Job<ArtifactReadyJobData>) => {
      logger.info(`Processing artifact-ready job ${job.id}`, { kind: job.data.kind, id: job.data.id });
      return processArtifactReady(store, job.data);
    },
    {
      connection,
      concurrency: 5,
    }
  );

  worker.on('completed', (job) => {
    logger.info(`Artifact-ready job ${job.id} completed successfully`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`Artifact-ready job ${job?.id} failed:`, {
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Artifact-ready worker error:', err);
  });

  return worker;
};
