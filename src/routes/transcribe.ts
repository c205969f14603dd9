import express, { Router, type NextFunction, type Request, type Response } from 'express';

import { log } from '../log';
import type { TranscriptionProvider } from '../stt/provider';
import { isTranscriptionError, type TranscriptionErrorCode } from '../stt/errors';

const ERROR_STATUS: Record<TranscriptionErrorCode, number> = {
  auth: 502,
  transport: 502,
  protocol: 502,
  timeout: 504,
  transcode: 422,
};

export interface TranscribeRouterOptions {
  maxAudioBytes: number;
}

export function createTranscribeRouter(
  provider: TranscriptionProvider,
  options: TranscribeRouterOptions,
): Router {
  const router = Router();

  router.post(
    '/',
    express.raw({ type: ['audio/*', 'application/octet-stream'], limit: options.maxAudioBytes }),
    async (req: Request, res: Response, next: NextFunction) => {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        res.status(400).json({ error: 'empty_audio' });
        return;
      }

      const requestId = res.getHeader('x-request-id');
      try {
        const text = await provider.transcribe(body, {
          logContext: { http_request_id: typeof requestId === 'string' ? requestId : undefined },
        });
        res.status(200).json({ text });
      } catch (error) {
        if (isTranscriptionError(error)) {
          log.warn(
            { event: 'transcribe_request_failed', code: error.code, err: error, http_request_id: requestId },
            'transcribe request failed',
          );
          res.status(ERROR_STATUS[error.code]).json({ error: error.code });
          return;
        }
        next(error);
      }
    },
  );

  return router;
}
