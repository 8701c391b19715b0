import { SAMPLE_RATE } from './constants.js';
import type { Envelope } from '../song/songModel.js';

/**
 * Piecewise-linear attack/sustain/release gain curve.
 *
 * Attack ramps 0 -> 1 (exclusive of 1), sustain holds 1, release ramps
 * 1 -> 0 and always ends on exactly 0. The release window is anchored to the
 * end of the buffer and written last, so it wins over the attack when the two
 * overlap.
 */
export function envelopeGain(length: number, envelope: Envelope, sampleRate: number = SAMPLE_RATE): Float32Array {
  const gain = new Float32Array(length).fill(1);
  if (length === 0) return gain;

  const minTime = 1 / sampleRate;
  const attack = Math.max(envelope.attack, minTime);
  const release = Math.max(envelope.release, minTime);
  const attackSamples = Math.min(length, Math.round(sampleRate * attack));
  const releaseSamples = Math.min(length, Math.round(sampleRate * release));

  for (let i = 0; i < attackSamples; i++) {
    gain[i] = i / attackSamples;
  }

  const releaseStart = length - releaseSamples;
  for (let j = 0; j < releaseSamples; j++) {
    gain[releaseStart + j] = releaseSamples > 1 ? 1 - j / (releaseSamples - 1) : 0;
  }
  return gain;
}

export function applyEnvelope(audio: Float32Array, envelope: Envelope, sampleRate: number = SAMPLE_RATE): Float32Array {
  const gain = envelopeGain(audio.length, envelope, sampleRate);
  const out = new Float32Array(audio.length);
  for (let i = 0; i < audio.length; i++) {
    out[i] = audio[i] * gain[i];
  }
  return out;
}
