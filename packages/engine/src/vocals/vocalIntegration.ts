import { readFile } from 'fs/promises';
import { SAMPLE_RATE } from '../audio/constants.js';
import { normalizeBuffer } from '../audio/mixer.js';
import { InvalidInputError } from '../errors.js';
import { readWAV } from '../import/wavReader.js';
import type { SongProject } from '../song/songModel.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('vocals');

export interface VocalOptions {
  /** Hz; defaults to 440. */
  pitch?: number;
}

export interface BlendOptions {
  /** Vocal share in [0, 1]; defaults to 0.5. */
  mix?: number;
}

/**
 * Synthesized or loaded vocal lines blended onto a project.
 */
export class VocalIntegration {
  /**
   * One vibrato tone per word with a rising swell. Words share 2.5 seconds
   * (at least 0.25 s each).
   */
  generateVocals(lyrics: string, opts: VocalOptions = {}): Float32Array {
    const pitch = opts.pitch ?? 440;
    const words = lyrics.split(/\s+/).filter(Boolean);
    const durationPerWord = Math.max(0.25, 2.5 / Math.max(words.length, 1));
    const totalSamples = Math.floor(SAMPLE_RATE * durationPerWord);
    if (words.length === 0 || totalSamples <= 0) return new Float32Array(0);

    const segment = new Float32Array(totalSamples);
    for (let j = 0; j < totalSamples; j++) {
      const time = j / SAMPLE_RATE;
      const vibrato = Math.sin(Math.PI * 4 * time);
      const base = Math.sin(2 * Math.PI * pitch * time);
      const swell = 0.1 + 0.9 * (j / Math.max(totalSamples - 1, 1));
      segment[j] = base * (0.6 + 0.4 * vibrato) * swell;
    }

    const out = new Float32Array(totalSamples * words.length);
    words.forEach((_, index) => out.set(segment, index * totalSamples));
    log.debug(`Synthesized ${words.length} word(s) at ${pitch} Hz (${out.length} samples)`);
    return out;
  }

  async loadVocals(path: string): Promise<Float32Array> {
    const { samples, sampleRate } = readWAV(await readFile(path));
    if (sampleRate !== SAMPLE_RATE) {
      log.warn(`Vocal file ${path} is ${sampleRate} Hz; samples are used as-is at ${SAMPLE_RATE} Hz`);
    }
    return samples;
  }

  /**
   * Mix vocals into the project audio: zero-pad the shorter buffer,
   * `(1 - mix) * song + mix * vocal`, peak-normalize.
   */
  blend(project: SongProject, vocals: Float32Array, opts: BlendOptions = {}): void {
    const mix = opts.mix ?? 0.5;
    if (!(mix >= 0 && mix <= 1)) {
      throw new InvalidInputError(`Mix must be within [0, 1] (got ${mix})`);
    }
    if (vocals.length === 0) return;

    const song = project.audio;
    if (song.length === 0) {
      project.audio = Float32Array.from(vocals);
      return;
    }

    const blended = new Float32Array(Math.max(song.length, vocals.length));
    for (let i = 0; i < blended.length; i++) {
      const a = i < song.length ? song[i] : 0;
      const b = i < vocals.length ? vocals[i] : 0;
      blended[i] = (1 - mix) * a + mix * b;
    }
    project.audio = normalizeBuffer(blended);
  }
}
