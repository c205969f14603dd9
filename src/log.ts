import pino from 'pino';

const level = process.env.LOG_LEVEL?.trim() || 'info';

export const log = pino({
  level,
  base: { service: 'clip-transcribe-runtime' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
