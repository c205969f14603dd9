/** Compressed audio clip in the provider's source container format. Borrowed, never mutated. */
export type AudioPayload = Buffer;

export type STTMode = 'batch_job' | 'streaming' | 'disabled';

export interface TranscribeOptions {
  logContext?: Record<string, unknown>;
}

export type JobStatus = 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface TranscriptionJob {
  jobId: string;
  resourceKey: string;
  submittedAt: Date;
  status: JobStatus;
}

export type RecognitionResult =
  | { kind: 'success'; text: string }
  | { kind: 'end_of_input' }
  | { kind: 'in_progress'; status?: string }
  | { kind: 'malformed'; reason: string };

export interface BatchJobConfig {
  readonly bucket: string;
  readonly objectExtension: string;
  readonly contentType: string;
  readonly mediaFormat: string;
  readonly languageCode: string;
  readonly pollIntervalMs: number;
  readonly pollTimeoutMs: number;
}

export interface StreamingConfig {
  readonly endpointUrl: string;
  readonly subscriptionKey: string;
  readonly language: string;
  readonly chunkBytes: number;
  readonly receiveTimeoutMs: number;
  readonly connectTimeoutMs: number;
}
