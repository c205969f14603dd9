import { z } from 'zod';
import { ProtocolError } from './errors';

const ResultDocumentSchema = z.object({
  results: z.object({
    transcripts: z.array(z.object({ transcript: z.string() })),
  }),
});

/**
 * Parses a batch transcription result document and returns the first
 * transcript candidate, or null when the job produced none.
 */
export function parseResultDocument(body: string): string | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new ProtocolError('result document is not valid JSON', { cause: error });
  }

  const parsed = ResultDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new ProtocolError(`unexpected result document shape: ${issues}`);
  }

  const first = parsed.data.results.transcripts[0];
  return first ? first.transcript : null;
}
