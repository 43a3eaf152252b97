import express, { type Express, type Request, type Response } from 'express';
import { createDownloadRouter, type DownloadRouterOptions } from './routes/download.js';

export function createApp(options: DownloadRouterOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // API Routes
  app.use('/api/download', createDownloadRouter(options));

  // Health check
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Server is running' });
  });

  return app;
}
