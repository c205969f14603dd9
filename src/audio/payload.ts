import { promises as fs } from 'fs';
import type { AudioPayload } from '../stt/types';

export async function loadAudioPayload(filePath: string): Promise<AudioPayload> {
  const data = await fs.readFile(filePath);
  assertAudioPayload(data);
  return data;
}

export function assertAudioPayload(audio: Buffer): void {
  if (audio.length === 0) {
    throw new RangeError('empty_audio_payload');
  }
}
