import { loadEnv } from './config/env';
loadEnv();

import { logger } from './config/logger';
import { getSettings } from './config/settings';
import { connectDB } from './config/mongoose';
import { createQueues } from './config/redis';
import { MongoArtifactStore } from './store/mongo-artifact.store';
import { createServices } from './services/container';
import { createExportController } from './controllers/export.controller';
import { createAudioExportWorker } from './jobs/audioExport.worker';
import { createArtifactReadyWorker } from './jobs/artifactReady.worker';
import { createApp } from './app';

const startServer = async () => {
  try {
    const settings = getSettings();

    // Connect to MongoDB via Mongoose
    await connectDB(settings.databaseUrl);

    const store = new MongoArtifactStore(settings.exportsDir);
    const { orchestrator } = createServices(settings, store);
    const queues = createQueues(settings.redisUrl);

    // Start queue workers
    createAudioExportWorker(queues.connection, orchestrator, settings.exportWorkerConcurrency);
    createArtifactReadyWorker(queues.connection, store);

    const controller = createExportController({
      store,
      orchestrator,
      audioExportQueue: queues.audioExportQueue,
      artifactReadyQueue: queues.artifactReadyQueue,
    });
    const app = createApp(controller, settings.corsOrigin);

    app.listen(settings.port, () => {
      logger.info(`Server running on port ${settings.port}`);
      logger.info(`Environment: ${settings.nodeEnv}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

startServer().catch((error: unknown) => {
  logger.error('Server bootstrap failed:', error);
  process.exit(1);
});

// Handle unhandled rejections
process.on('unhandledRejection', (err: Error) => {
  logger.error('Unhandled Rejection:', err);
  process.exit(1);
});
