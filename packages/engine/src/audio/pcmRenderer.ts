import { SAMPLE_RATE } from './constants.js';
import { oscillator } from './oscillator.js';
import { applyEnvelope } from './envelope.js';
import { concatBuffers, mixLayers, normalizeBuffer } from './mixer.js';
import { SeededRandom } from '../random/seededRandom.js';
import type { SectionLayer, SongSection } from '../song/songModel.js';

/**
 * Render sections and layers to mono PCM samples. Everything here is
 * synchronous and allocation-only; no I/O.
 */

export interface RenderOptions {
  sampleRate?: number;
}

/**
 * Renders a single layer: one tone (or noise burst, or silence) per
 * note/duration pair, each shaped by the layer envelope and scaled by its
 * volume, concatenated in order.
 *
 * @returns An empty buffer when the layer has no notes.
 */
export function renderLayer(layer: SectionLayer, opts: RenderOptions = {}): Float32Array {
  const sampleRate = opts.sampleRate ?? SAMPLE_RATE;
  const rng = new SeededRandom(layer.seed ?? 0);
  const count = Math.min(layer.notes.length, layer.durations.length);
  const segments: Float32Array[] = [];

  for (let i = 0; i < count; i++) {
    const note = layer.notes[i];
    const duration = Math.max(layer.durations[i], 1 / sampleRate);

    let tone: Float32Array;
    if (layer.noise) {
      tone = new Float32Array(Math.max(1, Math.round(sampleRate * duration)));
      for (let s = 0; s < tone.length; s++) {
        tone[s] = rng.uniform(-1, 1);
      }
    } else if (note === null || note <= 0) {
      tone = new Float32Array(Math.max(1, Math.round(sampleRate * duration)));
    } else {
      tone = oscillator(layer.waveform, note, duration, sampleRate);
    }

    const shaped = applyEnvelope(tone, layer.envelope, sampleRate);
    for (let s = 0; s < shaped.length; s++) {
      shaped[s] *= layer.volume;
    }
    segments.push(shaped);
  }

  return concatBuffers(segments);
}

/**
 * Legacy single-voice rendering for sections saved before layers existed.
 * Each note gets an equal share of the section, a sine tone at half
 * amplitude and a linear fade from 1.0 to 0.05; the result is
 * peak-normalized. Kept sample-for-sample compatible with older projects.
 */
export function renderFallback(notes: readonly number[], duration: number, opts: RenderOptions = {}): Float32Array {
  const sampleRate = opts.sampleRate ?? SAMPLE_RATE;
  if (notes.length === 0) {
    return new Float32Array(Math.max(1, Math.floor(sampleRate * duration)));
  }

  const noteCount = notes.length;
  const samplesPerNote = Math.max(1, Math.floor((sampleRate * duration) / noteCount));
  const noteDuration = duration / noteCount;
  const audio = new Float32Array(samplesPerNote * noteCount);

  // Ramps evaluate as `j * step + start`; the last fade sample is pinned to 0.05.
  const timeStep = noteDuration / samplesPerNote;
  const fadeStep = samplesPerNote > 1 ? -0.95 / (samplesPerNote - 1) : 0;
  notes.forEach((freq, idx) => {
    const start = idx * samplesPerNote;
    for (let j = 0; j < samplesPerNote; j++) {
      const t = j * timeStep;
      const fade = samplesPerNote > 1 && j === samplesPerNote - 1 ? 0.05 : j * fadeStep + 1;
      audio[start + j] = Math.sin(2 * Math.PI * freq * t) * fade * 0.5;
    }
  });

  return normalizeBuffer(audio);
}

/**
 * Render one section, dispatching on its voicing.
 */
export function renderSection(section: SongSection, opts: RenderOptions = {}): Float32Array {
  switch (section.voicing.kind) {
    case 'layered':
      return mixLayers(section.voicing.layers.map(layer => renderLayer(layer, opts)));
    case 'flat':
      return renderFallback(section.leadNotes, section.duration, opts);
  }
}

/**
 * Render every section, join them sample-adjacent and peak-normalize.
 */
export function renderSections(sections: readonly SongSection[], opts: RenderOptions = {}): Float32Array {
  if (sections.length === 0) return new Float32Array(0);
  return normalizeBuffer(concatBuffers(sections.map(section => renderSection(section, opts))));
}
