import type { AudioPayload, STTMode, TranscribeOptions } from './types';

export interface TranscriptionProvider {
  id: STTMode;
  /**
   * Resolves to the normalized transcript, or null when nothing was recognized.
   * Rejects with a TranscriptionError when the attempt itself failed.
   */
  transcribe(audio: AudioPayload, opts?: TranscribeOptions): Promise<string | null>;
}
