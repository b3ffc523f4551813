import { Request, Response } from 'express';
import { logger } from '../config/logger';
import { AudioExportJobData, ArtifactReadyJobData, JobQueue, exportJobId } from '../config/redis';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import type { ArtifactStore } from '../store/artifact-store.interface';
import type { ExportPipelineOrchestrator } from '../services/pipeline/export-pipeline.orchestrator';
import type { OutputFormat } from '../types/audio.types';

export interface ExportControllerDeps {
  store: ArtifactStore;
  orchestrator: ExportPipelineOrchestrator;
  audioExportQueue: JobQueue<AudioExportJobData>;
  artifactReadyQueue: JobQueue<ArtifactReadyJobData>;
}

const CONTENT_TYPES: Record<OutputFormat, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  aac: 'audio/aac',
};

export const createExportController = (deps: ExportControllerDeps) => {
  /**
   * Queue an export; at most one job per text is pending at a time
   */
  const requestExport = asyncHandler(async (req: Request, res: Response) => {
    const { textId } = req.params;
    // Throws TextNotFoundError (404) for unknown texts
    await deps.orchestrator.getExportStatus(textId);

    const jobId = exportJobId(textId);
    const existing = await deps.audioExportQueue.getJob(jobId);
    if (existing) {
      const state = await existing.getState();
      if (state === 'completed' || state === 'failed') {
        await existing.remove();
      } else {
        res.status(202).json({
          success: true,
          message: 'Export already queued',
          data: { jobId, state },
        });
        return;
      }
    }

    const job = await deps.audioExportQueue.add(
      'export-text',
      {
        textId,
        mixConfig: req.body.mixConfig,
        force: req.body.force,
        generateMissing: req.body.generateMissing,
      },
      { jobId }
    );

    logger.info(`Audio export job queued: ${job.id}`, { textId });

    res.status(202).json({
      success: true,
      message: 'Export started',
      data: { jobId: job.id },
    });
  });

  const getExportStatus = asyncHandler(async (req: Request, res: Response) => {
    const status = await deps.orchestrator.getExportStatus(req.params.textId);
    res.json({ success: true, data: status });
  });

  const downloadExport = asyncHandler(async (req: Request, res: Response) => {
    const status = await deps.orchestrator.getExportStatus(req.params.textId);
    if (!status.artifact) {
      throw new AppError('No export available for this text', 404);
    }

    const data = await deps.store.readFinalAudio(status.artifact);
    res.setHeader('Content-Type', CONTENT_TYPES[status.artifact.format]);
    res.setHeader('Content-Length', String(data.length));
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="${status.textId}.${status.artifact.format}"`
    );
    res.status(200).end(data);
  });

  /**
   * Completion notification from an external generation job
   */
  const artifactReady = asyncHandler(async (req: Request, res: Response) => {
    const job = await deps.artifactReadyQueue.add('artifact-ready', req.body);
    logger.info(`Artifact-ready event queued: ${job.id}`, { kind: req.body.kind, id: req.body.id });
    res.status(202).json({ success: true, data: { jobId: job.id } });
  });

  return { requestExport, getExportStatus, downloadExport, artifactReady };
};

export type ExportController = ReturnType<typeof createExportController>;
