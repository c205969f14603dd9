// src/stt/providers/batchJob.ts
import { setTimeout as sleep } from 'timers/promises';

import { log } from '../../log';
import { incStageError, recordTranscriptionOutcome, startStageTimer } from '../../metrics';
import { assertAudioPayload } from '../../audio/payload';
import type { BatchTranscriptionService, JobSnapshot, ObjectStore } from '../../cloud/types';
import { getPage as defaultGetPage } from '../../http/getPage';

import type { TranscriptionProvider } from '../provider';
import type { AudioPayload, BatchJobConfig, TranscribeOptions, TranscriptionJob } from '../types';
import { TimeoutError, isTranscriptionError } from '../errors';
import { newToken } from '../ids';
import { normalizeTranscript, previewText } from '../normalize';
import { parseResultDocument } from '../resultDocument';

export interface BatchJobDeps {
  store: ObjectStore;
  jobs: BatchTranscriptionService;
  getPage?: (url: string) => Promise<string>;
}

const PROVIDER_ID = 'batch_job';

function isTerminal(snapshot: JobSnapshot): boolean {
  return snapshot.status === 'COMPLETED' || snapshot.status === 'FAILED';
}

function stageFailed(stage: string, error: unknown): void {
  incStageError(stage, PROVIDER_ID, isTranscriptionError(error) ? error.code : 'unknown');
}

/**
 * Uploads the clip, runs an asynchronous transcription job against it and
 * deletes the uploaded object once the job has been observed (or failed).
 */
export class BatchJobProvider implements TranscriptionProvider {
  public readonly id = PROVIDER_ID;

  private readonly getPage: (url: string) => Promise<string>;

  constructor(
    private readonly config: BatchJobConfig,
    private readonly deps: BatchJobDeps,
  ) {
    this.getPage = deps.getPage ?? ((url) => defaultGetPage(url));
  }

  public async transcribe(audio: AudioPayload, opts: TranscribeOptions = {}): Promise<string | null> {
    assertAudioPayload(audio);

    const resourceKey = `${newToken()}.${this.config.objectExtension}`;
    const logContext = { provider: PROVIDER_ID, resource_key: resourceKey, ...(opts.logContext ?? {}) };

    try {
      await this.upload(resourceKey, audio, logContext);

      let text: string | null;
      try {
        text = await this.runJob(resourceKey, logContext);
      } catch (error) {
        await this.removeObject(resourceKey, logContext, true);
        throw error;
      }
      await this.removeObject(resourceKey, logContext);

      recordTranscriptionOutcome(PROVIDER_ID, text === null ? 'empty' : 'text');
      return text;
    } catch (error) {
      recordTranscriptionOutcome(PROVIDER_ID, 'error');
      throw error;
    }
  }

  private async upload(resourceKey: string, audio: AudioPayload, logContext: Record<string, unknown>): Promise<void> {
    const end = startStageTimer('upload', PROVIDER_ID);
    try {
      await this.deps.store.put(resourceKey, audio, this.config.contentType);
    } catch (error) {
      stageFailed('upload', error);
      log.warn({ event: 'stt_batch_upload_failed', err: error, ...logContext }, 'audio upload failed');
      throw error;
    } finally {
      end();
    }
    log.debug({ event: 'stt_batch_uploaded', audio_bytes: audio.length, ...logContext }, 'audio uploaded');
  }

  private async runJob(resourceKey: string, logContext: Record<string, unknown>): Promise<string | null> {
    const jobName = newToken();
    const jobContext = { ...logContext, job_name: jobName };

    let jobId: string;
    try {
      jobId = await this.deps.jobs.submit({
        jobName,
        mediaUri: this.deps.store.uriFor(resourceKey),
        mediaFormat: this.config.mediaFormat,
        languageCode: this.config.languageCode,
      });
    } catch (error) {
      stageFailed('submit', error);
      throw error;
    }

    const job: TranscriptionJob = { jobId, resourceKey, submittedAt: new Date(), status: 'RUNNING' };
    log.info({ event: 'stt_batch_job_submitted', job_id: job.jobId, ...jobContext }, 'transcription job submitted');

    const snapshot = await this.waitForJob(job, jobContext);

    if (snapshot.status === 'FAILED') {
      log.warn(
        { event: 'stt_batch_job_failed', job_id: job.jobId, failure_reason: snapshot.failureReason, ...jobContext },
        'transcription job failed',
      );
      return null;
    }
    if (!snapshot.resultUri) {
      log.warn({ event: 'stt_batch_job_no_result', job_id: job.jobId, ...jobContext }, 'transcription job has no result');
      return null;
    }

    const end = startStageTimer('fetch_result', PROVIDER_ID);
    let transcript: string | null;
    try {
      transcript = parseResultDocument(await this.getPage(snapshot.resultUri));
    } catch (error) {
      stageFailed('fetch_result', error);
      throw error;
    } finally {
      end();
    }

    const text = transcript === null ? null : normalizeTranscript(transcript);
    log.info(
      {
        event: 'stt_batch_transcript',
        job_id: job.jobId,
        transcript_preview: text === null ? null : previewText(text),
        ...jobContext,
      },
      'transcription job result',
    );
    return text;
  }

  /**
   * Checks status immediately, then every pollIntervalMs, until the job is
   * terminal. Throws TimeoutError on the first non-terminal check made after
   * pollTimeoutMs, so the wait never exceeds timeout + interval.
   */
  private async waitForJob(job: TranscriptionJob, logContext: Record<string, unknown>): Promise<JobSnapshot> {
    const { pollIntervalMs, pollTimeoutMs } = this.config;
    const deadline = job.submittedAt.getTime() + pollTimeoutMs;
    const end = startStageTimer('poll', PROVIDER_ID);
    let polls = 0;

    try {
      for (;;) {
        const snapshot = await this.deps.jobs.getStatus(job.jobId);
        polls += 1;
        job.status = snapshot.status;

        if (isTerminal(snapshot)) {
          log.debug({ event: 'stt_batch_job_terminal', status: snapshot.status, polls, ...logContext }, 'job terminal');
          return snapshot;
        }

        if (Date.now() >= deadline) {
          throw new TimeoutError(`transcription job ${job.jobId} still ${snapshot.status} after ${pollTimeoutMs}ms`);
        }

        await sleep(pollIntervalMs);
      }
    } catch (error) {
      stageFailed('poll', error);
      if (error instanceof TimeoutError) {
        log.warn({ event: 'stt_batch_poll_timeout', polls, ...logContext }, 'transcription job poll timed out');
      }
      throw error;
    } finally {
      end();
    }
  }

  /**
   * Deletes the uploaded object. When another error is already propagating,
   * a delete failure is logged and the original error wins.
   */
  private async removeObject(
    resourceKey: string,
    logContext: Record<string, unknown>,
    propagating = false,
  ): Promise<void> {
    try {
      await this.deps.store.delete(resourceKey);
    } catch (error) {
      stageFailed('cleanup', error);
      log.error(
        { event: 'stt_batch_cleanup_failed', err: error, propagating_error: propagating, ...logContext },
        'uploaded audio delete failed',
      );
      if (!propagating) throw error;
      return;
    }
    log.debug({ event: 'stt_batch_cleanup_done', ...logContext }, 'uploaded audio deleted');
  }
}
