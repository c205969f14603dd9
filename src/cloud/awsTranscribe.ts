import {
  GetTranscriptionJobCommand,
  LanguageCode,
  MediaFormat,
  StartTranscriptionJobCommand,
  TranscribeClient,
  type TranscriptionJob as AwsTranscriptionJob,
} from '@aws-sdk/client-transcribe';
import { ProtocolError } from '../stt/errors';
import type { JobStatus } from '../stt/types';
import type { AwsCredentialsConfig, BatchTranscriptionService, JobSnapshot, SubmitJobRequest } from './types';
import { mapAwsError } from './awsErrors';

function isMediaFormat(value: string): value is MediaFormat {
  return Object.values(MediaFormat).some((format) => format === value);
}

function isLanguageCode(value: string): value is LanguageCode {
  return Object.values(LanguageCode).some((code) => code === value);
}

function toJobStatus(raw: string | undefined): JobStatus {
  switch (raw) {
    case 'COMPLETED':
      return 'COMPLETED';
    case 'FAILED':
      return 'FAILED';
    case 'QUEUED':
    case 'IN_PROGRESS':
      return 'RUNNING';
    default:
      throw new ProtocolError(`unexpected transcription job status: ${raw ?? 'missing'}`);
  }
}

export class AwsTranscribeService implements BatchTranscriptionService {
  private readonly client: TranscribeClient;

  constructor(options: AwsCredentialsConfig, client?: TranscribeClient) {
    this.client =
      client ??
      new TranscribeClient({
        region: options.region,
        credentials: {
          accessKeyId: options.accessKeyId,
          secretAccessKey: options.secretAccessKey,
        },
      });
  }

  public async submit(request: SubmitJobRequest): Promise<string> {
    if (!isMediaFormat(request.mediaFormat)) {
      throw new RangeError(`unsupported media format: ${request.mediaFormat}`);
    }
    if (!isLanguageCode(request.languageCode)) {
      throw new RangeError(`unsupported language code: ${request.languageCode}`);
    }

    try {
      const response = await this.client.send(
        new StartTranscriptionJobCommand({
          TranscriptionJobName: request.jobName,
          Media: { MediaFileUri: request.mediaUri },
          MediaFormat: request.mediaFormat,
          LanguageCode: request.languageCode,
        }),
      );
      return response.TranscriptionJob?.TranscriptionJobName ?? request.jobName;
    } catch (error) {
      throw mapAwsError(error, 'transcribe start_transcription_job');
    }
  }

  public async getStatus(jobName: string): Promise<JobSnapshot> {
    let job: AwsTranscriptionJob | undefined;
    try {
      const response = await this.client.send(new GetTranscriptionJobCommand({ TranscriptionJobName: jobName }));
      job = response.TranscriptionJob;
    } catch (error) {
      throw mapAwsError(error, 'transcribe get_transcription_job');
    }

    if (!job) {
      throw new ProtocolError(`transcription job ${jobName} missing from status response`);
    }

    return {
      status: toJobStatus(job.TranscriptionJobStatus),
      resultUri: job.Transcript?.TranscriptFileUri,
      failureReason: job.FailureReason,
    };
  }
}
