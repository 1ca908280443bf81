import express from 'express';
import cors from 'cors';
import { getConfig } from './config.js';
import { SessionStore } from './store.js';
import { createUploadRouter } from './routes/upload.js';
import { createSessionsRouter } from './routes/sessions.js';

export function createApp(store = new SessionStore(getConfig().sessionTtlMs)): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/api/upload', createUploadRouter());
  app.use('/api/sessions', createSessionsRouter(store));

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('[Server Error]', err.message);
    res.status(500).json({ error: err.message });
  });

  return app;
}
