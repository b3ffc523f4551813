import { Queue, QueueEvents, DefaultJobOptions } from 'bullmq';
import Redis from 'ioredis';
import { logger } from './logger';
import type { ArtifactReadyEvent } from '../services/events/artifact-ready.handler';
import type { MixConfiguration } from '../types/audio.types';

export const QUEUE_NAMES = {
  AUDIO_EXPORT: 'audio-export',
  ARTIFACT_READY: 'artifact-ready',
} as const;

export interface AudioExportJobData {
  textId: string;
  mixConfig?: Partial<MixConfiguration>;
  force?: boolean;
  generateMissing?: boolean;
}

/** Queue payload; audio arrives either inline (base64) or as a URL the worker downloads. */
export type ArtifactReadyJobData = Omit<ArtifactReadyEvent, 'audio'> & {
  audioBase64?: string;
  audioUrl?: string;
};

const defaultJobOptions: DefaultJobOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 2000,
  },
  removeOnComplete: {
    count: 100, // Keep last 100 completed jobs
    age: 24 * 3600, // Keep for 24 hours
  },
  removeOnFail: {
    count: 200,
  },
};

/**
 * Job id that keeps at most one queued export per text. BullMQ rejects custom
 * ids containing ':' (it reserves the separator for repeatable jobs).
 */
export const exportJobId = (textId: string): string => `export-${textId}`;

/** The part of a BullMQ queue the HTTP layer uses. */
export interface JobQueue<T> {
  add(name: string, data: T, opts?: { jobId?: string }): Promise<{ id?: string }>;
  getJob(jobId: string): Promise<QueuedJob | undefined>;
}

export interface QueuedJob {
  getState(): Promise<string>;
  remove(): Promise<void>;
}

export interface QueueBundle {
  connection: Redis;
  audioExportQueue: Queue<AudioExportJobData>;
  artifactReadyQueue: Queue<ArtifactReadyJobData>;
  close(): Promise<void>;
}

export function createRedisConnection(redisUrl: string): Redis {
  // BullMQ workers require maxRetriesPerRequest: null
  const connection = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });

  connection.on('connect', () => {
    logger.info('Redis connected successfully');
  });

  connection.on('error', (error) => {
    logger.error('Redis connection error:', error);
  });

  return connection;
}

const setupQueueEvents = (queueName: string, connection: Redis): QueueEvents => {
  const queueEvents = new QueueEvents(queueName, { connection });

  queueEvents.on('completed', ({ jobId }) => {
    logger.info(`Job ${jobId} in queue ${queueName} completed`);
  });

  queueEvents.on('failed', ({ jobId, failedReason }) => {
    logger.error(`Job ${jobId} in queue ${queueName} failed:`, failedReason);
  });

  return queueEvents;
};

export function createQueues(redisUrl: string): QueueBundle {
  const connection = createRedisConnection(redisUrl);

  const audioExportQueue = new Queue<AudioExportJobData>(QUEUE_NAMES.AUDIO_EXPORT, {
    connection,
    defaultJobOptions,
  });
  const artifactReadyQueue = new Queue<ArtifactReadyJobData>(QUEUE_NAMES.ARTIFACT_READY, {
    connection,
    defaultJobOptions,
  });
  const events = Object.values(QUEUE_NAMES).map((name) => setupQueueEvents(name, connection));

  return {
    connection,
    audioExportQueue,
    artifactReadyQueue,
    async close() {
      await Promise.all(events.map((e) => e.close()));
      await audioExportQueue.close();
      await artifactReadyQueue.close();
      await connection.quit();
    },
  };
}
