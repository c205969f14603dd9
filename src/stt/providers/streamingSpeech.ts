// src/stt/providers/streamingSpeech.ts
import { log } from '../../log';
import { incStageError, recordTranscriptionOutcome, startStageTimer } from '../../metrics';
import { chunkAudio } from '../../audio/chunks';
import { assertAudioPayload } from '../../audio/payload';
import { assertWavImage, type AudioTranscoder } from '../../audio/transcode';

import type { TranscriptionProvider } from '../provider';
import type { AudioPayload, StreamingConfig, TranscribeOptions } from '../types';
import { ProtocolError, TimeoutError, isTranscriptionError } from '../errors';
import { encodeFrame } from '../frame';
import { newToken } from '../ids';
import { normalizeTranscript, previewText } from '../normalize';
import { classifyRecognition, parseInboundMessage } from '../recognition';
import type { InboundMessage } from '../recognition';
import { SpeechSession } from '../speechSession';

export interface StreamingDeps {
  transcoder: AudioTranscoder;
  now?: () => Date;
}

const PROVIDER_ID = 'streaming';

export function buildSpeechUrl(config: StreamingConfig, connectionId: string): string {
  const url = new URL(config.endpointUrl);
  url.searchParams.set('language', config.language);
  url.searchParams.set('Ocp-Apim-Subscription-Key', config.subscriptionKey);
  url.searchParams.set('X-ConnectionId', connectionId);
  url.searchParams.set('format', 'detailed');
  return url.toString();
}

export class StreamingSpeechProvider implements TranscriptionProvider {
  public readonly id = PROVIDER_ID;

  private readonly now: () => Date;

  constructor(
    private readonly config: StreamingConfig,
    private readonly deps: StreamingDeps,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  public async transcribe(audio: AudioPayload, opts: TranscribeOptions = {}): Promise<string | null> {
    assertAudioPayload(audio);

    const connectionId = newToken();
    const requestId = newToken();
    const logContext = {
      provider: PROVIDER_ID,
      connection_id: connectionId,
      request_id: requestId,
      ...(opts.logContext ?? {}),
    };

    let stage = 'transcode';
    try {
      const wav = await this.deps.transcoder.toWav(audio, logContext);
      assertWavImage(wav, logContext);

      stage = 'connect';
      const session = await SpeechSession.open(buildSpeechUrl(this.config, connectionId), {
        connectTimeoutMs: this.config.connectTimeoutMs,
        logContext,
      });

      const end = startStageTimer('session', PROVIDER_ID);
      let text: string | null;
      try {
        stage = 'send';
        await this.sendAudio(session, requestId, wav, logContext);
        stage = 'receive';
        text = await this.receiveTranscript(session, logContext);
      } finally {
        session.close();
        end();
      }

      recordTranscriptionOutcome(PROVIDER_ID, text === null ? 'empty' : 'text');
      return text;
    } catch (error) {
      incStageError(stage, PROVIDER_ID, isTranscriptionError(error) ? error.code : 'unknown');
      recordTranscriptionOutcome(PROVIDER_ID, 'error');
      log.warn({ event: 'stt_stream_failed', stage, err: error, ...logContext }, 'streaming transcription failed');
      throw error;
    }
  }

  private async sendAudio(
    session: SpeechSession,
    requestId: string,
    wav: Buffer,
    logContext: Record<string, unknown>,
  ): Promise<void> {
    let frames = 0;
    for (const chunk of chunkAudio(wav, this.config.chunkBytes)) {
      await session.send(encodeFrame({ requestId, timestamp: this.now().toISOString(), payload: chunk }));
      frames += 1;
    }
    log.debug({ event: 'stt_stream_sent', frames, wav_bytes: wav.length, ...logContext }, 'audio frames sent');
  }

  /**
   * Reads responses until Success (transcript), EndOfDictation (null) or the
   * receive budget runs out (TimeoutError).
   */
  private async receiveTranscript(session: SpeechSession, logContext: Record<string, unknown>): Promise<string | null> {
    const { receiveTimeoutMs } = this.config;
    const deadline = Date.now() + receiveTimeoutMs;
    let received = 0;

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError(`no terminal recognition event within ${receiveTimeoutMs}ms`);
      }

      let message: InboundMessage;
      try {
        message = await session.next(remaining);
      } catch (error) {
        if (error instanceof TimeoutError) {
          throw new TimeoutError(`no terminal recognition event within ${receiveTimeoutMs}ms`, { cause: error });
        }
        throw error;
      }
      received += 1;

      const result = classifyRecognition(parseInboundMessage(message));
      switch (result.kind) {
        case 'success': {
          const text = normalizeTranscript(result.text);
          log.info(
            {
              event: 'stt_stream_transcript',
              frames_received: received,
              transcript_preview: text === null ? null : previewText(text),
              ...logContext,
            },
            'streaming recognition succeeded',
          );
          return text;
        }
        case 'end_of_input':
          log.info({ event: 'stt_stream_end_of_input', frames_received: received, ...logContext }, 'no speech recognized');
          return null;
        case 'malformed':
          throw new ProtocolError(`malformed recognition response: ${result.reason}`);
        case 'in_progress':
          break;
      }
    }
  }
}
