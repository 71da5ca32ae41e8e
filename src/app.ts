import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from './config';
import { createDrawRoutes } from './routes/draws';
import { HistoryStore } from './services/historyStore';

export interface AppDependencies {
  historyStore: HistoryStore;
  config: AppConfig;
}

export function createApp({ historyStore, config }: AppDependencies) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // Routes
  app.use('/api', createDrawRoutes(historyStore, config));

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Malformed JSON body' });
    }
    // body-parser marks client errors such as an oversized body with their status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 400 && status < 500) {
      return res.status(status).json({ error: err.message });
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
