import { Worker, Job, UnrecoverableError } from 'bullmq';
import type Redis from 'ioredis';
import { logger } from '../config/logger';
import { QUEUE_NAMES, AudioExportJobData } from '../config/redis';
import type { PipelineErrorCode } from '../errors/pipeline.errors';
import type { ExportPipelineOrchestrator } from '../services/pipeline/export-pipeline.orchestrator';

export interface AudioExportJobResult {
  uri: string;
  format: string;
  durationSec: number;
  reused: boolean;
  omissions: string[];
}

// Retrying cannot fix these; the caller has to change inputs first
const PERMANENT_FAILURES: ReadonlySet<PipelineErrorCode> = new Set<PipelineErrorCode>([
  'INCOMPLETE_SPEECH',
  'SEGMENT_SEQUENCE',
  'TEXT_NOT_FOUND',
  'PIPELINE_CANCELLED',
]);

/**
 * Run one export. Transient failures rethrow so BullMQ applies the queue's
 * backoff; permanent ones are marked unrecoverable.
 */
export async function processAudioExport(
  orchestrator: ExportPipelineOrchestrator,
  data: AudioExportJobData,
  signal?: AbortSignal
): Promise<AudioExportJobResult> {
  const outcome = await orchestrator.export(data.textId, data.mixConfig ?? {}, {
    force: data.force,
    generateMissing: data.generateMissing,
    signal,
  });

  if (!outcome.ok) {
    if (PERMANENT_FAILURES.has(outcome.error.code)) {
      throw new UnrecoverableError(`${outcome.error.code}: ${outcome.error.message}`);
    }
    throw outcome.error;
  }

  return {
    uri: outcome.artifact.uri,
    format: outcome.artifact.format,
    durationSec: outcome.artifact.durationSec,
    reused: outcome.reused,
    omissions: outcome.omissions,
  };
}

export const createAudioExportWorker = (
  connection: Redis,
  orchestrator: ExportPipelineOrchestrator,
  concurrency = 2
) => {
  const worker = new Worker<AudioExportJobData, AudioExportJobResult>(
    QUEUE_NAMES.AUDIO_EXPORT,
    async (job: Job<AudioExportJobData>) => {
      logger.info(`Processing audio export job ${job.id}`, { textId: job.data.textId });
      return processAudioExport(orchestrator, job.data);
    },
    {
      connection,
      concurrency,
      limiter: {
        max: 5,
        duration: 60000, // 5 exports per minute
      },
    }
  );

  worker.on('completed', (job) => {
    logger.info(`Audio export job ${job.id} completed successfully`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`Audio export job ${job?.id} failed:`, {
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Audio export worker error:', err);
  });

  return worker;
};
