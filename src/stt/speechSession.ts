// src/stt/speechSession.ts
import type { ClientRequest, IncomingMessage } from 'http';
import WebSocket from 'ws';

import { log } from '../log';
import { AuthError, TimeoutError, TransportError, errorMessage, isAuthStatus } from './errors';
import type { TranscriptionError } from './errors';
import type { InboundMessage } from './recognition';

export interface SpeechSessionOptions {
  connectTimeoutMs: number;
  logContext?: Record<string, unknown>;
}

// how long close() waits for the peer's close frame before dropping the socket
const CLOSE_GRACE_MS = 2000;

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * One WebSocket connection to the speech endpoint, bound to a single
 * transcription attempt. Inbound messages are queued and handed out by
 * next(); close() is idempotent.
 */
export class SpeechSession {
  private readonly inbox: InboundMessage[] = [];
  private waiter: (() => void) | null = null;
  private failure: TranscriptionError | null = null;
  private closing = false;

  private constructor(
    private readonly socket: WebSocket,
    private readonly logContext: Record<string, unknown>,
  ) {
    socket.on('message', (data, isBinary) => {
      this.inbox.push({ data: toBuffer(data), isBinary });
      this.wake();
    });

    socket.on('close', (code, reason) => {
      if (!this.closing && !this.failure) {
        this.failure = new TransportError(
          `speech session closed by peer code=${code} reason=${reason.toString('utf8') || 'none'}`,
        );
      }
      log.debug({ event: 'speech_session_closed', code, by_peer: !this.closing, ...this.logContext }, 'speech session closed');
      this.wake();
    });

    socket.on('error', (error) => {
      if (!this.failure) {
        this.failure = new TransportError(`speech session error: ${error.message}`, { cause: error });
      }
      this.wake();
    });
  }

  public static open(url: string, options: SpeechSessionOptions): Promise<SpeechSession> {
    const logContext = options.logContext ?? {};

    let socket: WebSocket;
    try {
      socket = new WebSocket(url);
    } catch (error) {
      return Promise.reject(new TransportError(`invalid speech endpoint: ${errorMessage(error)}`, { cause: error }));
    }

    return new Promise<SpeechSession>((resolve, reject) => {
      let settled = false;

      // stays attached for the socket's lifetime so a late error never goes unhandled
      socket.on('error', (error) => {
        log.debug({ event: 'speech_socket_error', err: error, ...logContext }, 'speech socket error');
      });

      const finish = (error: TranscriptionError | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.off('open', onOpen);
        socket.off('error', onError);
        socket.off('unexpected-response', onUnexpectedResponse);
        if (error) {
          socket.terminate();
          reject(error);
          return;
        }
        resolve(new SpeechSession(socket, logContext));
      };

      const onOpen = (): void => {
        log.debug({ event: 'speech_session_open', ...logContext }, 'speech session open');
        finish(null);
      };

      const onError = (error: Error): void => {
        finish(new TransportError(`speech connect failed: ${errorMessage(error)}`, { cause: error }));
      };

      const onUnexpectedResponse = (_req: ClientRequest, res: IncomingMessage): void => {
        const status = res.statusCode ?? 0;
        res.resume();
        const message = `speech handshake rejected with status ${status}`;
        log.warn({ event: 'speech_handshake_rejected', status, ...logContext }, 'speech handshake rejected');
        finish(isAuthStatus(status) ? new AuthError(message) : new TransportError(message));
      };

      const timer = setTimeout(() => {
        finish(new TimeoutError(`speech connect timed out after ${options.connectTimeoutMs}ms`));
      }, options.connectTimeoutMs);

      socket.on('open', onOpen);
      socket.on('error', onError);
      socket.on('unexpected-response', onUnexpectedResponse);
    });
  }

  public send(frame: Buffer): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);

    return new Promise<void>((resolve, reject) => {
      this.socket.send(frame, { binary: true }, (error) => {
        if (error) {
          reject(new TransportError(`speech send failed: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  /** Next queued inbound message; TimeoutError when none arrives within timeoutMs. */
  public async next(timeoutMs: number): Promise<InboundMessage> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const message = this.inbox.shift();
      if (message) return message;
      if (this.failure) throw this.failure;
      if (this.closing) throw new TransportError('speech session already closed');

      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await this.waitForActivity(remaining))) {
        throw new TimeoutError(`no speech message within ${timeoutMs}ms`);
      }
    }
  }

  public close(): void {
    if (this.closing) return;
    this.closing = true;
    this.wake();

    if (this.socket.readyState === WebSocket.CLOSED) return;
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(1000, 'done');
    }

    const force = setTimeout(() => {
      if (this.socket.readyState !== WebSocket.CLOSED) this.socket.terminate();
    }, CLOSE_GRACE_MS);
    force.unref();
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(false);
      }, timeoutMs);
      this.waiter = () => {
        clearTimeout(timer);
        resolve(true);
      };
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
