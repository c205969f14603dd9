import type { TranscriptionProvider } from '../provider';
import type { AudioPayload, TranscribeOptions } from '../types';

export class DisabledSttProvider implements TranscriptionProvider {
  public readonly id = 'disabled';

  public async transcribe(_audio: AudioPayload, _opts: TranscribeOptions = {}): Promise<string | null> {
    return null;
  }
}
