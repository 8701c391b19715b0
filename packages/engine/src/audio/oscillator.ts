import { SAMPLE_RATE } from './constants.js';

/**
 * Render one tone as a closed-form waveform.
 *
 * Saw and triangle are not band-limited; aliasing at high frequencies is
 * accepted. `noise` and unknown kinds fall back to sine (noise is rendered by
 * the layer renderer, which owns the random source).
 *
 * @returns `max(1, round(sampleRate * duration))` samples, or none when
 * duration is not positive.
 */
export function oscillator(waveform: string, frequency: number, duration: number, sampleRate: number = SAMPLE_RATE): Float32Array {
  if (duration <= 0) return new Float32Array(0);

  const length = Math.max(1, Math.round(sampleRate * duration));
  const out = new Float32Array(length);
  const dt = duration / length;

  for (let i = 0; i < length; i++) {
    const cycles = frequency * i * dt;
    switch (waveform) {
      case 'square':
        out[i] = Math.sign(Math.sin(2 * Math.PI * cycles));
        break;
      case 'saw':
        out[i] = 2 * (cycles - Math.floor(0.5 + cycles));
        break;
      case 'triangle':
        out[i] = 2 * Math.abs(2 * (cycles - Math.floor(cycles + 0.5))) - 1;
        break;
      default:
        out[i] = Math.sin(2 * Math.PI * cycles);
    }
  }
  return out;
}
