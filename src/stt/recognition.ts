import { z } from 'zod';
import { ProtocolError } from './errors';
import { decodeFrame } from './frame';
import type { RecognitionResult } from './types';

const HEADER_BODY_SEPARATOR = /\r?\n\r?\n/;

const RecognitionBodySchema = z
  .object({
    RecognitionStatus: z.string().optional(),
    DisplayText: z.string().optional(),
    NBest: z.array(z.object({ Display: z.string() }).passthrough()).optional(),
  })
  .passthrough();

export interface InboundMessage {
  data: Buffer;
  isBinary: boolean;
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`${what} is not valid JSON`, { cause: error });
  }
}

/** Text responses are a header block, an empty line, then a JSON body. */
export function extractJsonBody(message: string): unknown {
  const separator = HEADER_BODY_SEPARATOR.exec(message);
  if (!separator) {
    throw new ProtocolError('response has no header/body separator');
  }
  return parseJson(message.slice(separator.index + separator[0].length), 'response body');
}

export function parseInboundMessage(message: InboundMessage): unknown {
  if (message.isBinary) {
    return parseJson(decodeFrame(message.data).payload.toString('utf8'), 'binary frame payload');
  }
  return extractJsonBody(message.data.toString('utf8'));
}

export function classifyRecognition(body: unknown): RecognitionResult {
  const parsed = RecognitionBodySchema.safeParse(body);
  if (!parsed.success) {
    return { kind: 'malformed', reason: parsed.error.issues.map((issue) => issue.message).join(', ') };
  }

  const { RecognitionStatus: status, NBest: nBest, DisplayText: displayText } = parsed.data;
  switch (status) {
    case 'Success': {
      const text = nBest?.[0]?.Display ?? displayText;
      if (text === undefined) {
        return { kind: 'malformed', reason: 'Success without a transcript candidate' };
      }
      return { kind: 'success', text };
    }
    case 'EndOfDictation':
      return { kind: 'end_of_input' };
    default:
      return status === undefined ? { kind: 'in_progress' } : { kind: 'in_progress', status };
  }
}
