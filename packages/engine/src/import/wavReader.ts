import { InvalidInputError } from '../errors.js';

export interface DecodedWav {
  sampleRate: number;
  channels: number;
  /** First channel only, as floats (`value / 32767`). */
  samples: Float32Array;
}

/**
 * Decode a 16-bit PCM RIFF/WAVE buffer. Chunks other than `fmt ` and `data`
 * are skipped.
 */
export function readWAV(buf: Buffer): DecodedWav {
  if (buf.length < 12 || buf.toString('ascii', 0, 4) !== 'RIFF' || buf.toString('ascii', 8, 12) !== 'WAVE') {
    throw new InvalidInputError('Not a RIFF/WAVE file');
  }

  let format: { channels: number; sampleRate: number; bitDepth: number; audioFormat: number } | undefined;
  let offset = 12;
  while (offset + 8 <= buf.length) {
    const id = buf.toString('ascii', offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      if (size < 16 || body + 16 > buf.length) throw new InvalidInputError('WAV fmt chunk is truncated');
      format = {
        audioFormat: buf.readUInt16LE(body),
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        bitDepth: buf.readUInt16LE(body + 14),
      };
      if (format.channels === 0) throw new InvalidInputError('WAV fmt chunk declares no channels');
    } else if (id === 'data') {
      if (!format) throw new InvalidInputError('WAV data chunk appears before fmt chunk');
      if (format.audioFormat !== 1 || format.bitDepth !== 16) {
        throw new InvalidInputError(`Only 16-bit PCM WAV is supported (format ${format.audioFormat}, ${format.bitDepth}-bit)`);
      }
      const end = Math.min(body + size, buf.length);
      const frameBytes = 2 * format.channels;
      const frames = Math.floor((end - body) / frameBytes);
      const samples = new Float32Array(frames);
      for (let i = 0; i < frames; i++) {
        samples[i] = buf.readInt16LE(body + i * frameBytes) / 32767;
      }
      return { sampleRate: format.sampleRate, channels: format.channels, samples };
    }
    // chunks are word-aligned
    offset = body + size + (size % 2);
  }
  throw new InvalidInputError('WAV file has no data chunk');
}
