export type TranscriptionErrorCode = 'transport' | 'auth' | 'timeout' | 'protocol' | 'transcode';

export interface TranscriptionErrorOptions {
  cause?: unknown;
}

/**
 * Base class for every failure a provider surfaces to its caller.
 * Providers never retry; `code` lets the caller pick its own policy.
 */
export abstract class TranscriptionError extends Error {
  public abstract readonly code: TranscriptionErrorCode;

  constructor(message: string, options: TranscriptionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

export class TransportError extends TranscriptionError {
  public readonly code = 'transport';
}

export class AuthError extends TranscriptionError {
  public readonly code = 'auth';
}

export class TimeoutError extends TranscriptionError {
  public readonly code = 'timeout';
}

export class ProtocolError extends TranscriptionError {
  public readonly code = 'protocol';
}

export class TranscodeError extends TranscriptionError {
  public readonly code = 'transcode';
}

export function isTranscriptionError(value: unknown): value is TranscriptionError {
  return value instanceof TranscriptionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** HTTP statuses a remote service uses to reject credentials. */
export function isAuthStatus(status: number | undefined): boolean {
  return status === 401 || status === 403;
}
