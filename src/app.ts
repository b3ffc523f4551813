import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './config/logger';
import { errorHandler } from './middleware/errorHandler';
import { createApiRoutes } from './routes';
import type { ExportController } from './controllers/export.controller';

export const createApp = (controller: ExportController, corsOrigin: string): Express => {
  const app = express();

  // Security headers with media playback support
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  app.use(cors({
    origin: corsOrigin,
    exposedHeaders: ['Content-Length', 'Content-Type', 'Content-Disposition'],
  }));
  // Completion events may carry base64 audio
  app.use(express.json({ limit: '50mb' }));

  // Request logging
  app.use((req, res, next) => {
    logger.info(`${req.method} ${req.path}`);
    next();
  });

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use('/api', createApiRoutes(controller));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      message: 'Route not found',
    });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
