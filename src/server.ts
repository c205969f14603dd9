import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';

import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createHealthRouter } from './routes/health';
import { createTranscribeRouter } from './routes/transcribe';
import type { TranscriptionProvider } from './stt/provider';

export interface ServerOptions {
  provider: TranscriptionProvider;
  maxAudioBytes: number;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  next();
}

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status =
    err && typeof err === 'object' && 'status' in err && typeof err.status === 'number' && err.status < 500
      ? err.status
      : 500;
  if (status >= 500) {
    log.error({ err }, 'unhandled error');
    res.status(status).json({ error: 'internal_server_error' });
    return;
  }
  // body-parser errors: payload too large, bad content length...
  res.status(status).json({ error: 'bad_request' });
}

export function buildServer(options: ServerOptions): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter(options.provider));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/transcribe', createTranscribeRouter(options.provider, { maxAudioBytes: options.maxAudioBytes }));

  app.use(errorHandler);

  const server = http.createServer(app);
  return { app, server };
}
