import assert from 'node:assert/strict';
import net, { type AddressInfo } from 'node:net';
import { test } from 'node:test';
import WebSocket, { WebSocketServer } from 'ws';
import { setTestEnv } from './testEnv';

import type { AudioTranscoder } from '../src/audio/transcode';
import type { StreamingConfig } from '../src/stt/types';

setTestEnv();

const FIXED_NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
const PHRASE_HEADERS = 'X-RequestId: server\r\nPath: speech.phrase\r\nContent-Type: application/json; charset=utf-8\r\n\r\n';

interface SpeechServer {
  url: string;
  frames: Buffer[];
  requests: URL[];
  /** Resolves when the first client connection closes. */
  closed: Promise<void>;
  connections(): number;
  stop(): Promise<void>;
}

type FrameHandler = (socket: WebSocket, frame: Buffer, index: number) => void;

async function startSpeechServer(onFrame: FrameHandler, rejectStatus?: number): Promise<SpeechServer> {
  const wss = new WebSocketServer({
    host: '127.0.0.1',
    port: 0,
    verifyClient: rejectStatus
      ? (_info: unknown, callback: (res: boolean, code?: number) => void) => callback(false, rejectStatus)
      : undefined,
  });
  await new Promise<void>((resolve) => wss.once('listening', () => resolve()));

  const frames: Buffer[] = [];
  const requests: URL[] = [];
  let connections = 0;
  let markClosed: () => void = () => undefined;
  const closed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });

  wss.on('connection', (socket, request) => {
    connections += 1;
    requests.push(new URL(request.url ?? '/', 'ws://127.0.0.1'));
    socket.on('message', (data, isBinary) => {
      assert.equal(isBinary, true);
      const frame = Buffer.isBuffer(data) ? data : Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data);
      frames.push(frame);
      onFrame(socket, frame, frames.length - 1);
    });
    socket.on('close', () => markClosed());
  });

  const address = wss.address();
  assert.ok(typeof address !== 'string');
  const { port } = address satisfies AddressInfo;

  return {
    url: `ws://127.0.0.1:${port}/speech/recognition/dictation/cognitiveservices/v1`,
    frames,
    requests,
    closed,
    connections: () => connections,
    stop: () =>
      new Promise<void>((resolve) => {
        for (const client of wss.clients) client.terminate();
        wss.close(() => resolve());
      }),
  };
}

function wavImage(dataBytes: number): Buffer {
  const header = Buffer.alloc(12);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(4 + dataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  return Buffer.concat([header, Buffer.alloc(dataBytes, 0x11)]);
}

function fixedTranscoder(wav: Buffer): AudioTranscoder & { inputs: Buffer[] } {
  const inputs: Buffer[] = [];
  return {
    inputs,
    async toWav(input: Buffer) {
      inputs.push(input);
      return wav;
    },
  };
}

function config(url: string, overrides: Partial<StreamingConfig> = {}): StreamingConfig {
  return {
    endpointUrl: url,
    subscriptionKey: 'test-key',
    language: 'en-US',
    chunkBytes: 8192,
    receiveTimeoutMs: 2000,
    connectTimeoutMs: 2000,
    ...overrides,
  };
}

function phrase(body: Record<string, unknown>): string {
  return `${PHRASE_HEADERS}${JSON.stringify(body)}`;
}

const mp3 = Buffer.from('ID3-fake-mp3-bytes');

test('success frame yields the normalized top candidate', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { decodeFrame } = await import('../src/stt/frame');

  const wav = wavImage(20_000);
  const server = await startSpeechServer((socket, _frame, index) => {
    if (index === 2) {
      socket.send(phrase({ RecognitionStatus: 'Success', NBest: [{ Display: 'Three one nine.' }] }));
    }
  });

  try {
    const transcoder = fixedTranscoder(wav);
    const provider = new StreamingSpeechProvider(config(server.url), { transcoder, now: () => FIXED_NOW });

    assert.equal(await provider.transcribe(mp3), 'three one nine');
    await server.closed;

    assert.deepEqual(transcoder.inputs, [mp3]);
    assert.equal(server.frames.length, 3);

    const decoded = server.frames.map((frame) => decodeFrame(frame));
    const requestId = decoded[0].headers['X-RequestId'];
    assert.match(requestId, /^[0-9a-f]{32}$/);
    for (const frame of decoded) {
      assert.equal(frame.headerLength, Buffer.byteLength(frame.headerText));
      assert.equal(frame.headers['X-RequestId'], requestId);
      assert.equal(frame.headers['X-Timestamp'], '2024-01-02T03:04:05.000Z');
      assert.equal(frame.headers.Path, 'audio');
      assert.equal(frame.headers['Content-Type'], 'audio/x-wav');
    }
    assert.deepEqual(
      decoded.map((frame) => frame.payload.length),
      [8192, 8192, 20_012 - 2 * 8192],
    );
    assert.deepEqual(Buffer.concat(decoded.map((frame) => frame.payload)), wav);

    const request = server.requests[0];
    assert.equal(request.searchParams.get('language'), 'en-US');
    assert.equal(request.searchParams.get('Ocp-Apim-Subscription-Key'), 'test-key');
    assert.equal(request.searchParams.get('format'), 'detailed');
    const connectionId = request.searchParams.get('X-ConnectionId');
    assert.match(connectionId ?? '', /^[0-9a-f]{32}$/);
    assert.notEqual(connectionId, requestId);
  } finally {
    await server.stop();
  }
});

test('end of dictation after hypotheses yields no transcript', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const server = await startSpeechServer((socket) => {
    socket.send('X-RequestId: server\r\nPath: speech.hypothesis\r\n\r\n{"Text":"thr","Offset":0,"Duration":100}');
    socket.send(phrase({ RecognitionStatus: 'InitialSilenceTimeout' }));
    socket.send(phrase({ RecognitionStatus: 'EndOfDictation' }));
  });

  try {
    const provider = new StreamingSpeechProvider(config(server.url), { transcoder: fixedTranscoder(wavImage(100)) });

    assert.equal(await provider.transcribe(mp3), null);
    await server.closed;
  } finally {
    await server.stop();
  }
});

test('no terminal frame within the receive budget is a timeout', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { TimeoutError } = await import('../src/stt/errors');
  const server = await startSpeechServer(() => undefined);

  try {
    const provider = new StreamingSpeechProvider(config(server.url, { receiveTimeoutMs: 150 }), {
      transcoder: fixedTranscoder(wavImage(100)),
    });

    const startedAt = Date.now();
    await assert.rejects(provider.transcribe(mp3), TimeoutError);
    assert.ok(Date.now() - startedAt >= 150);
    await server.closed;
  } finally {
    await server.stop();
  }
});

test('a frame without the header/body separator is a protocol error', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { ProtocolError } = await import('../src/stt/errors');
  const server = await startSpeechServer((socket) => {
    socket.send('{"RecognitionStatus":"Success","NBest":[{"Display":"Seven."}]}');
  });

  try {
    const provider = new StreamingSpeechProvider(config(server.url), { transcoder: fixedTranscoder(wavImage(100)) });

    await assert.rejects(provider.transcribe(mp3), ProtocolError);
    await server.closed;
  } finally {
    await server.stop();
  }
});

test('a Success frame without candidates is a protocol error', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { ProtocolError } = await import('../src/stt/errors');
  const server = await startSpeechServer((socket) => {
    socket.send(phrase({ RecognitionStatus: 'Success' }));
  });

  try {
    const provider = new StreamingSpeechProvider(config(server.url), { transcoder: fixedTranscoder(wavImage(100)) });

    await assert.rejects(provider.transcribe(mp3), ProtocolError);
    await server.closed;
  } finally {
    await server.stop();
  }
});

test('handshake rejected with 401 is an auth error', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { AuthError } = await import('../src/stt/errors');
  const server = await startSpeechServer(() => undefined, 401);

  try {
    const provider = new StreamingSpeechProvider(config(server.url), { transcoder: fixedTranscoder(wavImage(100)) });

    await assert.rejects(provider.transcribe(mp3), AuthError);
    assert.equal(server.connections(), 0);
  } finally {
    await server.stop();
  }
});

test('handshake rejected with 503 is a transport error', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { TransportError } = await import('../src/stt/errors');
  const server = await startSpeechServer(() => undefined, 503);

  try {
    const provider = new StreamingSpeechProvider(config(server.url), { transcoder: fixedTranscoder(wavImage(100)) });

    await assert.rejects(provider.transcribe(mp3), TransportError);
  } finally {
    await server.stop();
  }
});

test('peer closing before a terminal frame is a transport error', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { TransportError } = await import('../src/stt/errors');
  const server = await startSpeechServer((socket) => {
    socket.close(1011, 'server error');
  });

  try {
    const provider = new StreamingSpeechProvider(config(server.url), { transcoder: fixedTranscoder(wavImage(100)) });

    await assert.rejects(provider.transcribe(mp3), TransportError);
  } finally {
    await server.stop();
  }
});

test('transcode failure never opens a session', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { TranscodeError } = await import('../src/stt/errors');
  const server = await startSpeechServer(() => undefined);

  try {
    const failing: AudioTranscoder = {
      async toWav() {
        throw new TranscodeError('transcode_failed code=1');
      },
    };
    const notWav: AudioTranscoder = {
      async toWav(input: Buffer) {
        return input;
      },
    };

    await assert.rejects(new StreamingSpeechProvider(config(server.url), { transcoder: failing }).transcribe(mp3), TranscodeError);
    await assert.rejects(new StreamingSpeechProvider(config(server.url), { transcoder: notWav }).transcribe(mp3), TranscodeError);
    assert.equal(server.connections(), 0);
  } finally {
    await server.stop();
  }
});

test('buildSpeechUrl keeps the endpoint path and adds the session parameters', async () => {
  const { buildSpeechUrl } = await import('../src/stt/providers/streamingSpeech');
  const url = new URL(
    buildSpeechUrl(config('wss://speech.example.test/speech/recognition/dictation/cognitiveservices/v1'), 'abc123'),
  );

  assert.equal(url.origin, 'wss://speech.example.test');
  assert.equal(url.pathname, '/speech/recognition/dictation/cognitiveservices/v1');
  assert.equal(url.searchParams.get('X-ConnectionId'), 'abc123');
  assert.equal(url.searchParams.get('format'), 'detailed');
});

test('an upgrade that never completes times out and drops the socket', async () => {
  const { StreamingSpeechProvider } = await import('../src/stt/providers/streamingSpeech');
  const { TimeoutError } = await import('../src/stt/errors');

  const sockets: net.Socket[] = [];
  let markDropped: () => void = () => undefined;
  const dropped = new Promise<void>((resolve) => {
    markDropped = resolve;
  });
  // accepts TCP and reads the upgrade request without ever answering it
  const silent = net.createServer((socket) => {
    sockets.push(socket);
    socket.resume();
    socket.on('error', () => markDropped());
    socket.on('close', () => markDropped());
  });
  await new Promise<void>((resolve) => silent.listen(0, '127.0.0.1', () => resolve()));
  const address = silent.address();
  assert.ok(address !== null && typeof address !== 'string');

  try {
    const provider = new StreamingSpeechProvider(
      config(`ws://127.0.0.1:${(address satisfies AddressInfo).port}/speech`, { connectTimeoutMs: 100 }),
      { transcoder: fixedTranscoder(wavImage(100)) },
    );

    const startedAt = Date.now();
    await assert.rejects(provider.transcribe(mp3), (error: unknown) => {
      assert.ok(error instanceof TimeoutError);
      assert.equal(error.message, 'speech connect timed out after 100ms');
      return true;
    });
    assert.ok(Date.now() - startedAt >= 100);
    assert.equal(sockets.length, 1);
    await dropped;
  } finally {
    for (const socket of sockets) socket.destroy();
    await new Promise<void>((resolve) => silent.close(() => resolve()));
  }
});
