import assert from 'node:assert/strict';
import { test } from 'node:test';
import { mapAwsError } from '../src/cloud/awsErrors';
import { AuthError, ProtocolError, TransportError } from '../src/stt/errors';

function awsError(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(`${name} from service`), { name, $metadata: { httpStatusCode } });
}

test('credential rejections map to AuthError', () => {
  const byName = mapAwsError(awsError('InvalidAccessKeyId', 400), 's3 put_object');
  assert.ok(byName instanceof AuthError);
  assert.equal(byName.message, 's3 put_object rejected credentials: InvalidAccessKeyId');

  const byStatus = mapAwsError(awsError('Forbidden', 403), 's3 put_object');
  assert.ok(byStatus instanceof AuthError);
});

test('other service failures map to TransportError with the status', () => {
  const mapped = mapAwsError(awsError('InternalError', 500), 'transcribe get_transcription_job');
  assert.ok(mapped instanceof TransportError);
  assert.equal(mapped.message, 'transcribe get_transcription_job failed: status=500 InternalError: InternalError from service');
  assert.equal(mapped.code, 'transport');
});

test('network errors without metadata map to TransportError', () => {
  const mapped = mapAwsError(new Error('connect ECONNREFUSED'), 's3 delete_object');
  assert.ok(mapped instanceof TransportError);
  assert.equal(mapped.message, 's3 delete_object failed: Error: connect ECONNREFUSED');
  assert.ok(mapAwsError('boom', 's3 delete_object') instanceof TransportError);
});

test('taxonomy errors pass through unchanged', () => {
  const original = new ProtocolError('bad shape');
  assert.equal(mapAwsError(original, 'anything'), original);
});
