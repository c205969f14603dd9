/**
 * Fixed-size views over an audio buffer. The returned iterable is lazy and
 * restartable: every iteration walks the buffer again from the start.
 */
export function chunkAudio(audio: Buffer, chunkBytes: number): Iterable<Buffer> {
  if (!Number.isInteger(chunkBytes) || chunkBytes <= 0) {
    throw new RangeError(`invalid chunk size: ${chunkBytes}`);
  }

  return {
    *[Symbol.iterator]() {
      for (let offset = 0; offset < audio.length; offset += chunkBytes) {
        yield audio.subarray(offset, Math.min(offset + chunkBytes, audio.length));
      }
    },
  };
}
