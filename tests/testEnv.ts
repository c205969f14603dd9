const defaults: Record<string, string> = {
  LOG_LEVEL: 'silent',
  PORT: '3000',
  STT_PROVIDER: 'disabled',
  AWS_REGION: 'us-east-1',
  SPEECH_LANGUAGE: 'en-US',
  FFMPEG_PATH: 'ffmpeg',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
