// scripts/transcribe_file.ts
import { loadAudioPayload } from '../src/audio/payload';
import { env } from '../src/env';
import { getProvider } from '../src/stt/registry';

async function main(): Promise<void> {
  const audioPath = process.argv[2];
  if (!audioPath) {
    console.error('Usage: tsx scripts/transcribe_file.ts <clip.mp3>');
    process.exit(2);
  }

  const audio = await loadAudioPayload(audioPath);
  const text = await getProvider().transcribe(audio, { logContext: { source: 'cli' } });

  console.log(`provider: ${env.STT_PROVIDER}`);
  console.log(text ?? '(no transcript)');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
