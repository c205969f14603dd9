import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * IMPORTANT NOTE:
 * prom-client Histogram.startTimer() measures SECONDS.
 * This module records TRUE milliseconds to match *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'clip_transcribe_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

// Transcription stage durations (upload/poll/transcode/session...)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Transcription stage duration in milliseconds',
  labelNames: ['stage', 'provider'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by transcription stage',
  labelNames: ['stage', 'provider', 'code'] as const,
  registers: [register],
});

const transcriptionOutcomesTotal = new client.Counter({
  name: `${METRICS_PREFIX}transcription_outcomes_total`,
  help: 'Transcription attempts by provider and outcome',
  labelNames: ['provider', 'outcome'] as const,
  registers: [register],
});

export type TranscriptionOutcome = 'text' | 'empty' | 'error';

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  if (route && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return req.baseUrl ? `${req.baseUrl}${route.path}` : route.path;
  }

  const raw = req.path || req.url || 'unknown';
  return raw.replace(/\b[0-9a-f]{16,}\b/gi, ':id').replace(/\b\d{6,}\b/g, ':n');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts a stage timer and returns an end() function.
 * Records TRUE milliseconds in stageDurationMs.
 */
export function startStageTimer(stage: string, provider: string): () => void {
  const start = nowNs();
  let ended = false;

  return () => {
    if (ended) return;
    ended = true;
    stageDurationMs.observe({ stage, provider }, nsToMs(nowNs() - start));
  };
}

export function observeStageDuration(stage: string, provider: string, durationMs: number): void {
  stageDurationMs.observe({ stage, provider }, durationMs);
}

export function incStageError(stage: string, provider: string, code = 'unknown'): void {
  stageErrorsTotal.inc({ stage, provider, code });
}

export function recordTranscriptionOutcome(provider: string, outcome: TranscriptionOutcome): void {
  transcriptionOutcomesTotal.inc({ provider, outcome });
}
