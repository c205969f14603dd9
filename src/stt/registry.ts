// src/stt/registry.ts
import pLimit from 'p-limit';

import type { TranscriptionProvider } from './provider';
import type { BatchJobConfig, STTMode, StreamingConfig } from './types';

import { BatchJobProvider } from './providers/batchJob';
import { DisabledSttProvider } from './providers/disabled';
import { StreamingSpeechProvider } from './providers/streamingSpeech';

import { AwsTranscribeService } from '../cloud/awsTranscribe';
import { S3ObjectStore } from '../cloud/s3ObjectStore';
import type { AwsCredentialsConfig } from '../cloud/types';
import { FfmpegTranscoder } from '../audio/transcode';

import { env, type Env } from '../env';
import { log } from '../log';

// Transcribe media format -> uploaded object extension and content type
const MEDIA_CONTENT_TYPES: Record<string, string> = {
  mp3: 'audio/mpeg',
  mp4: 'audio/mp4',
  wav: 'audio/wav',
  flac: 'audio/flac',
  ogg: 'audio/ogg',
  webm: 'audio/webm',
  amr: 'audio/amr',
};

function required(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} is not set`);
  }
  return value;
}

export function buildAwsCredentials(source: Env = env): AwsCredentialsConfig {
  return Object.freeze({
    region: source.AWS_REGION,
    accessKeyId: required(source.AWS_ACCESS_KEY_ID, 'AWS_ACCESS_KEY_ID'),
    secretAccessKey: required(source.AWS_SECRET_ACCESS_KEY, 'AWS_SECRET_ACCESS_KEY'),
  });
}

export function buildBatchJobConfig(source: Env = env): BatchJobConfig {
  const mediaFormat = source.TRANSCRIBE_MEDIA_FORMAT;
  return Object.freeze({
    bucket: required(source.TRANSCRIBE_S3_BUCKET, 'TRANSCRIBE_S3_BUCKET'),
    objectExtension: mediaFormat,
    contentType: MEDIA_CONTENT_TYPES[mediaFormat] ?? 'application/octet-stream',
    mediaFormat,
    languageCode: source.TRANSCRIBE_LANGUAGE_CODE,
    pollIntervalMs: source.TRANSCRIBE_POLL_INTERVAL_MS,
    pollTimeoutMs: source.TRANSCRIBE_TIMEOUT_MS,
  });
}

export function buildStreamingConfig(source: Env = env): StreamingConfig {
  return Object.freeze({
    endpointUrl: source.SPEECH_WS_URL,
    subscriptionKey: required(source.SPEECH_SUBSCRIPTION_KEY, 'SPEECH_SUBSCRIPTION_KEY'),
    language: source.SPEECH_LANGUAGE,
    chunkBytes: source.SPEECH_CHUNK_BYTES,
    receiveTimeoutMs: source.SPEECH_RECEIVE_TIMEOUT_MS,
    connectTimeoutMs: source.SPEECH_CONNECT_TIMEOUT_MS,
  });
}

/**
 * Builds a provider for the given mode with its real collaborators
 * (S3 + Transcribe, or ffmpeg + the speech WebSocket).
 */
export function createProvider(mode: STTMode, source: Env = env): TranscriptionProvider {
  switch (mode) {
    case 'batch_job': {
      const config = buildBatchJobConfig(source);
      const credentials = buildAwsCredentials(source);
      return new BatchJobProvider(config, {
        store: new S3ObjectStore({ ...credentials, bucket: config.bucket, publicHost: source.S3_PUBLIC_HOST }),
        jobs: new AwsTranscribeService(credentials),
      });
    }
    case 'streaming': {
      const limit = pLimit(source.TRANSCODE_CONCURRENCY);
      return new StreamingSpeechProvider(buildStreamingConfig(source), {
        transcoder: new FfmpegTranscoder({
          ffmpegPath: source.FFMPEG_PATH,
          timeoutMs: source.TRANSCODE_TIMEOUT_MS,
          limit,
        }),
      });
    }
    case 'disabled':
      return new DisabledSttProvider();
  }
}

let selected: TranscriptionProvider | null = null;

/** Provider chosen by STT_PROVIDER, built once per process. */
export function getProvider(): TranscriptionProvider {
  if (!selected) {
    selected = createProvider(env.STT_PROVIDER);
    log.info({ event: 'stt_provider_selected', stt_mode: env.STT_PROVIDER, provider_id: selected.id }, 'stt provider selected');
  }
  return selected;
}
