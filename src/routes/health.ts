import { Router } from 'express';
import type { TranscriptionProvider } from '../stt/provider';

export function createHealthRouter(provider: TranscriptionProvider): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ ok: true, provider: provider.id });
  });

  return router;
}
