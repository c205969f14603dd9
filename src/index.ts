import { env } from './env';
import { log } from './log';
import { buildServer } from './server';
import { getProvider } from './stt/registry';

const { server } = buildServer({ provider: getProvider(), maxAudioBytes: env.MAX_AUDIO_BYTES });

server.listen(env.PORT, () => {
  log.info({ port: env.PORT, stt_mode: env.STT_PROVIDER }, 'server listening');
});
