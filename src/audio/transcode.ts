// src/audio/transcode.ts
import { spawn } from 'child_process';
import type { Limit } from 'p-limit';
import { log } from '../log';
import { TranscodeError } from '../stt/errors';
import { observeStageDuration } from '../metrics';

export interface AudioTranscoder {
  /** Converts a compressed clip into a 16 kHz mono PCM16 WAV file image. */
  toWav(input: Buffer, logContext?: Record<string, unknown>): Promise<Buffer>;
}

export interface FfmpegTranscoderOptions {
  ffmpegPath: string;
  timeoutMs: number;
  /** Shared limiter bounding concurrent ffmpeg processes. */
  limit: Limit;
  sampleRateHz?: number;
}

const DEFAULT_SAMPLE_RATE_HZ = 16000;
const RIFF_HEADER_BYTES = 12;

export function isWavImage(buf: Buffer): boolean {
  return (
    buf.length >= RIFF_HEADER_BYTES &&
    buf.toString('ascii', 0, 4) === 'RIFF' &&
    buf.toString('ascii', 8, 12) === 'WAVE'
  );
}

/** Transcoder output must be a RIFF/WAVE image before it goes on the wire. */
export function assertWavImage(buf: Buffer, logContext: Record<string, unknown> = {}): void {
  if (isWavImage(buf)) return;

  log.error(
    {
      event: 'transcode_not_wav',
      wav_bytes: buf.length,
      first_bytes_hex: buf.subarray(0, 32).toString('hex'),
      ...logContext,
    },
    'transcoder output is not wav',
  );
  throw new TranscodeError('invalid_wav_payload');
}

export class FfmpegTranscoder implements AudioTranscoder {
  constructor(private readonly options: FfmpegTranscoderOptions) {}

  public toWav(input: Buffer, logContext: Record<string, unknown> = {}): Promise<Buffer> {
    return this.options.limit(() => this.runFfmpeg(input, logContext));
  }

  private runFfmpeg(input: Buffer, logContext: Record<string, unknown>): Promise<Buffer> {
    const { ffmpegPath, timeoutMs } = this.options;
    const sampleRate = this.options.sampleRateHz ?? DEFAULT_SAMPLE_RATE_HZ;
    const startedAtMs = Date.now();

    return new Promise<Buffer>((resolve, reject) => {
      const args = [
        '-hide_banner',
        '-loglevel',
        'error',
        '-i',
        'pipe:0',
        '-f',
        'wav',
        '-acodec',
        'pcm_s16le',
        '-ac',
        '1',
        '-ar',
        String(sampleRate),
        'pipe:1',
      ];
      const ffmpeg = spawn(ffmpegPath, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        ffmpeg.kill('SIGKILL');
      }, timeoutMs);

      ffmpeg.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      ffmpeg.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      ffmpeg.stdin.on('error', (error) => {
        // EPIPE when ffmpeg exits early; the close handler reports the real failure
        log.debug({ event: 'transcode_stdin_error', err: error, ...logContext }, 'ffmpeg stdin error');
      });
      ffmpeg.on('error', (error) => {
        clearTimeout(timeout);
        log.error({ event: 'transcode_spawn_failed', ffmpeg_path: ffmpegPath, err: error, ...logContext }, 'ffmpeg spawn failed');
        reject(new TranscodeError(`ffmpeg_spawn_failed: ${error.message}`, { cause: error }));
      });
      ffmpeg.on('close', (code) => {
        clearTimeout(timeout);
        const elapsedMs = Date.now() - startedAtMs;
        if (timedOut) {
          reject(new TranscodeError(`transcode_timeout after ${timeoutMs}ms len=${input.length}`));
          return;
        }
        if (code !== 0) {
          const detail = Buffer.concat(stderr).toString('utf8').trim();
          log.warn(
            { event: 'transcode_failed', code, stderr: detail.slice(0, 500), input_bytes: input.length, ...logContext },
            'ffmpeg transcode failed',
          );
          reject(new TranscodeError(`transcode_failed code=${code ?? 'null'} stderr=${detail}`));
          return;
        }
        const out = Buffer.concat(stdout);
        if (out.length === 0) {
          reject(new TranscodeError(`transcode_empty len=${input.length}`));
          return;
        }
        if (!isWavImage(out)) {
          log.warn(
            { event: 'transcode_not_wav', wav_bytes: out.length, first_bytes_hex: out.subarray(0, 32).toString('hex'), ...logContext },
            'ffmpeg output is not wav',
          );
          reject(new TranscodeError(`transcode_not_wav len=${out.length}`));
          return;
        }
        observeStageDuration('transcode', 'streaming', elapsedMs);
        log.debug(
          { event: 'transcode_done', input_bytes: input.length, wav_bytes: out.length, elapsed_ms: elapsedMs, ...logContext },
          'ffmpeg transcode done',
        );
        resolve(out);
      });

      ffmpeg.stdin.write(input);
      ffmpeg.stdin.end();
    });
  }
}
