import type { JobStatus } from '../stt/types';

export interface ObjectStore {
  put(key: string, body: Buffer, contentType: string): Promise<void>;
  delete(key: string): Promise<void>;
  /** Public URI the transcription service reads the object from. */
  uriFor(key: string): string;
}

export interface SubmitJobRequest {
  jobName: string;
  mediaUri: string;
  mediaFormat: string;
  languageCode: string;
}

export interface JobSnapshot {
  status: JobStatus;
  resultUri?: string;
  failureReason?: string;
}

export interface BatchTranscriptionService {
  submit(request: SubmitJobRequest): Promise<string>;
  getStatus(jobName: string): Promise<JobSnapshot>;
}

export interface AwsCredentialsConfig {
  readonly region: string;
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
}
