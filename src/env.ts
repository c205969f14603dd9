import { LanguageCode, MediaFormat } from '@aws-sdk/client-transcribe';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const DEFAULT_SPEECH_WS_URL =
  'wss://speech.platform.bing.com/speech/recognition/dictation/cognitiveservices/v1';

const EnvSchema = z
  .object({
    PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(3000)),
    STT_PROVIDER: z.preprocess(
      emptyToUndefined,
      z.enum(['batch_job', 'streaming', 'disabled']).default('streaming'),
    ),
    MAX_AUDIO_BYTES: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(5 * 1024 * 1024),
    ),

    AWS_REGION: z.preprocess(emptyToUndefined, z.string().min(1).default('us-east-1')),
    AWS_ACCESS_KEY_ID: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    AWS_SECRET_ACCESS_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    TRANSCRIBE_S3_BUCKET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    S3_PUBLIC_HOST: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    TRANSCRIBE_LANGUAGE_CODE: z.preprocess(emptyToUndefined, z.nativeEnum(LanguageCode).default(LanguageCode.EN_US)),
    TRANSCRIBE_MEDIA_FORMAT: z.preprocess(emptyToUndefined, z.nativeEnum(MediaFormat).default(MediaFormat.MP3)),
    TRANSCRIBE_POLL_INTERVAL_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(1000),
    ),
    TRANSCRIBE_TIMEOUT_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(60_000),
    ),

    SPEECH_WS_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_SPEECH_WS_URL)),
    SPEECH_SUBSCRIPTION_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    SPEECH_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(1).default('en-US')),
    SPEECH_CHUNK_BYTES: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(8192),
    ),
    SPEECH_RECEIVE_TIMEOUT_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(15_000),
    ),
    SPEECH_CONNECT_TIMEOUT_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(10_000),
    ),

    FFMPEG_PATH: z.preprocess(emptyToUndefined, z.string().min(1).default('ffmpeg')),
    TRANSCODE_CONCURRENCY: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(2),
    ),
    TRANSCODE_TIMEOUT_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(10_000),
    ),
  })
  .superRefine((value, ctx) => {
    if (value.STT_PROVIDER === 'batch_job') {
      for (const key of ['AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY', 'TRANSCRIBE_S3_BUCKET'] as const) {
        if (!value[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'required when STT_PROVIDER=batch_job',
            path: [key],
          });
        }
      }
    }
    if (value.STT_PROVIDER === 'streaming' && !value.SPEECH_SUBSCRIPTION_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'required when STT_PROVIDER=streaming',
        path: ['SPEECH_SUBSCRIPTION_KEY'],
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}

export const env: Env = parseEnv(process.env);
