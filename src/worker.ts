import { loadEnv } from './config/env';
loadEnv();

import { logger } from './config/logger';
import { getSettings } from './config/settings';
import { connectDB, disconnectDB } from './config/mongoose';
import { createQueues } from './config/redis';
import { MongoArtifactStore } from './store/mongo-artifact.store';
import { createServices } from './services/container';
import { createAudioExportWorker } from './jobs/audioExport.worker';
import { createArtifactReadyWorker } from './jobs/artifactReady.worker';

/** Standalone queue consumer for hosts that do not serve HTTP. */
const startWorkers = async () => {
  const settings = getSettings();
  await connectDB(settings.databaseUrl);

  const store = new MongoArtifactStore(settings.exportsDir);
  const { orchestrator } = createServices(settings, store);
  const queues = createQueues(settings.redisUrl);

  const workers = [
    createAudioExportWorker(queues.connection, orchestrator, settings.exportWorkerConcurrency),
    createArtifactReadyWorker(queues.connection, store),
  ];
  logger.info('Export workers started', { concurrency: settings.exportWorkerConcurrency });

  const shutdown = async () => {
    logger.info('Shutting down workers');
    await Promise.all(workers.map((w) => w.close()));
    await queues.close();
    await disconnectDB();
    process.exit(0);
  };
  process.once('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      logger.error('Worker shutdown failed:', error);
      process.exit(1);
    });
  });
};

startWorkers().catch((error: unknown) => {
  logger.error('Failed to start workers:', error);
  process.exit(1);
});
