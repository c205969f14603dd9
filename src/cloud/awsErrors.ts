import { AuthError, TransportError, errorMessage, isAuthStatus, isTranscriptionError } from '../stt/errors';
import type { TranscriptionError } from '../stt/errors';

const AUTH_ERROR_NAMES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'UnrecognizedClientException',
  'InvalidSignatureException',
  'ExpiredToken',
  'ExpiredTokenException',
  'CredentialsProviderError',
]);

function httpStatusOf(error: Error): number | undefined {
  if (!('$metadata' in error)) return undefined;
  const metadata = error.$metadata;
  if (metadata && typeof metadata === 'object' && 'httpStatusCode' in metadata) {
    return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}

/** Maps an AWS SDK failure onto the transcription error taxonomy. */
export function mapAwsError(error: unknown, operation: string): TranscriptionError {
  if (isTranscriptionError(error)) return error;

  if (error instanceof Error) {
    const status = httpStatusOf(error);
    if (AUTH_ERROR_NAMES.has(error.name) || isAuthStatus(status)) {
      return new AuthError(`${operation} rejected credentials: ${error.name}`, { cause: error });
    }
    const statusPart = status === undefined ? '' : ` status=${status}`;
    return new TransportError(`${operation} failed:${statusPart} ${error.name}: ${error.message}`, { cause: error });
  }

  return new TransportError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
}
