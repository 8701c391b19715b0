/**
 * Pure Node.js WAV file writer: mono, 16-bit PCM.
 */
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { SAMPLE_RATE } from '../audio/constants.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('export');

export interface WavOptions {
  sampleRate: number;
}

/**
 * Quantize floats to signed 16-bit as `round(clamp(s) * 32767)`.
 */
function floatTo16BitPCM(samples: Float32Array): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    buf.writeInt16LE(Math.round(s * 32767), i * 2);
  }
  return buf;
}

export function writeWAV(samples: Float32Array, opts: Partial<WavOptions> = {}): Buffer {
  const sampleRate = opts.sampleRate ?? SAMPLE_RATE;
  const channels = 1;
  const bitDepth = 16;

  const pcmData = floatTo16BitPCM(samples);
  const dataSize = pcmData.length;
  const headerSize = 44;
  const fileSize = headerSize + dataSize - 8;
  const byteRate = sampleRate * channels * (bitDepth / 8);
  const blockAlign = channels * (bitDepth / 8);

  const header = Buffer.alloc(headerSize);
  let offset = 0;

  // RIFF chunk descriptor
  header.write('RIFF', offset); offset += 4;
  header.writeUInt32LE(fileSize, offset); offset += 4;
  header.write('WAVE', offset); offset += 4;

  // fmt sub-chunk
  header.write('fmt ', offset); offset += 4;
  header.writeUInt32LE(16, offset); offset += 4; // Subchunk1Size (16 for PCM)
  header.writeUInt16LE(1, offset); offset += 2;  // AudioFormat (1 = PCM)
  header.writeUInt16LE(channels, offset); offset += 2;
  header.writeUInt32LE(sampleRate, offset); offset += 4;
  header.writeUInt32LE(byteRate, offset); offset += 4;
  header.writeUInt16LE(blockAlign, offset); offset += 2;
  header.writeUInt16LE(bitDepth, offset); offset += 2;

  // data sub-chunk
  header.write('data', offset); offset += 4;
  header.writeUInt32LE(dataSize, offset);

  return Buffer.concat([header, pcmData]);
}

export async function exportWAV(samples: Float32Array, outputPath: string, opts: Partial<WavOptions> = {}): Promise<void> {
  const wavBuffer = writeWAV(samples, opts);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, wavBuffer);
  log.debug(`WAV: ${samples.length} samples, ${wavBuffer.length} bytes -> ${outputPath}`);
}
