import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './config/logger';
import { errorHandler } from './middleware/errorHandler';
import apiRoutes from './routes';

export interface AppOptions {
  corsOrigin: string;
  jsonBodyLimit: string;
}

export function createApp({ corsOrigin, jsonBodyLimit }: AppOptions): Express {
  const app = express();

  app.use(helmet()); // Security headers
  app.use(cors({
    origin: corsOrigin,
    credentials: true,
  }));
  // Transcripts with character-level fragments get large
  app.use(express.json({ limit: jsonBodyLimit }));

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

  // API routes
  app.use('/api', apiRoutes);

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
}
