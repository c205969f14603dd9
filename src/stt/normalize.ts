const TRAILING_PUNCTUATION = /[\s.,!?;:…]+$/u;

/**
 * Lower-cases a recognizer transcript and strips the punctuation mark
 * recognizers append to a phrase ("Three one nine." -> "three one nine").
 */
export function normalizeTranscript(raw: string): string | null {
  const text = raw.trim().toLowerCase().replace(TRAILING_PUNCTUATION, '');
  return text === '' ? null : text;
}

export function previewText(text: string, max = 140): string {
  const t = text.replace(/\s+/g, ' ').trim();
  if (t.length <= max) return t;
  return `${t.slice(0, max)}…`;
}
