import { ProtocolError } from './errors';

export const FRAME_PATH = 'audio';
export const FRAME_CONTENT_TYPE = 'audio/x-wav';

const LENGTH_PREFIX_BYTES = 2;
const MAX_HEADER_BYTES = 0xffff;

export interface FrameHeader {
  requestId: string;
  /** ISO-8601 UTC timestamp. */
  timestamp: string;
  path: string;
  contentType: string;
}

export interface DecodedFrame {
  /** Value of the 2-byte length prefix. */
  headerLength: number;
  headerText: string;
  headers: Record<string, string>;
  payload: Buffer;
}

export function buildHeaderText(header: FrameHeader): string {
  return (
    `X-RequestId: ${header.requestId}\r\n` +
    `X-Timestamp: ${header.timestamp}\r\n` +
    `Path: ${header.path}\r\n` +
    `Content-Type: ${header.contentType}\r\n\r\n`
  );
}

/**
 * Binary speech message: big-endian uint16 header length, the header text,
 * then the audio bytes.
 */
export function encodeFrame(input: { requestId: string; timestamp: string; payload: Buffer }): Buffer {
  const header = Buffer.from(
    buildHeaderText({
      requestId: input.requestId,
      timestamp: input.timestamp,
      path: FRAME_PATH,
      contentType: FRAME_CONTENT_TYPE,
    }),
    'utf8',
  );
  if (header.length > MAX_HEADER_BYTES) {
    throw new RangeError(`frame header too long: ${header.length} bytes`);
  }

  const prefix = Buffer.alloc(LENGTH_PREFIX_BYTES);
  prefix.writeUInt16BE(header.length, 0);
  return Buffer.concat([prefix, header, input.payload]);
}

export function parseHeaderBlock(text: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    if (line === '') continue;
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new ProtocolError(`malformed header line: ${line.slice(0, 80)}`);
    }
    headers[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
  }
  return headers;
}

export function decodeFrame(frame: Buffer): DecodedFrame {
  if (frame.length < LENGTH_PREFIX_BYTES) {
    throw new ProtocolError(`frame shorter than its length prefix: ${frame.length} bytes`);
  }

  const headerLength = frame.readUInt16BE(0);
  const headerEnd = LENGTH_PREFIX_BYTES + headerLength;
  if (headerEnd > frame.length) {
    throw new ProtocolError(`frame header length ${headerLength} exceeds frame size ${frame.length}`);
  }

  const headerText = frame.toString('utf8', LENGTH_PREFIX_BYTES, headerEnd);
  return {
    headerLength,
    headerText,
    headers: parseHeaderBlock(headerText),
    payload: frame.subarray(headerEnd),
  };
}
