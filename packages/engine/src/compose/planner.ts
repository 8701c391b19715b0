import { SAMPLE_RATE } from '../audio/constants.js';
import { InvalidInputError } from '../errors.js';
import { SeededRandom, deriveSeed } from '../random/seededRandom.js';
import { createSection } from '../song/songModel.js';
import type { InstrumentPreset, PatternStep, SectionLayer, SongSection, Template } from '../song/songModel.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('planner');

/** Floor applied to every drawn section length except the last one. */
export const SECTION_MIN_SECONDS = 4.0;
export const SECTION_DRAW_RANGE: readonly [number, number] = [6.0, 12.0];

/**
 * Voices used when a template defines no instrument presets.
 */
export const DEFAULT_PRESETS: readonly InstrumentPreset[] = [
  {
    name: 'lead',
    waveform: 'saw',
    pattern: [0, 2, 4, 5, 4, 2],
    rhythm: [1],
    volume: 0.5,
    octaveShift: 0,
    envelope: { attack: 0.01, release: 0.2 },
  },
  {
    name: 'bass',
    waveform: 'square',
    pattern: [0, 'rest', 4, 'rest'],
    rhythm: [2, 1, 1],
    volume: 0.4,
    octaveShift: -1,
    envelope: { attack: 0.01, release: 0.15 },
  },
  {
    name: 'percussion',
    waveform: 'noise',
    pattern: [0, 'rest', 0, 0],
    rhythm: [0.5],
    volume: 0.2,
    octaveShift: 0,
    envelope: { attack: 0.001, release: 0.05 },
  },
];

export interface PlanOptions {
  sampleRate?: number;
}

/**
 * Map a pattern step to a frequency. Indices wrap around the scale in both
 * directions; rests become null.
 */
export function resolvePatternStep(step: PatternStep, scale: readonly number[], octaveShift: number): number | null {
  if (step === 'rest') return null;
  const len = scale.length;
  const index = ((step % len) + len) % len;
  return scale[index] * Math.pow(2, octaveShift);
}

/**
 * Lay one preset over a section: walk pattern and rhythm cyclically until the
 * steps fill the section exactly. The last step is clipped; a step that would
 * leave less than one sample behind absorbs the remainder instead.
 */
export function scheduleLayer(
  preset: InstrumentPreset,
  scale: readonly number[],
  sectionDuration: number,
  tempo: number,
  seed: number,
  opts: PlanOptions = {}
): SectionLayer {
  const sampleRate = opts.sampleRate ?? SAMPLE_RATE;
  const beat = 60 / tempo;
  const minStep = 1 / sampleRate;
  const notes: (number | null)[] = [];
  const durations: number[] = [];

  let remaining = sectionDuration;
  for (let i = 0; remaining > 0; i++) {
    const step = preset.pattern[i % preset.pattern.length];
    const nominal = Math.max(beat * preset.rhythm[i % preset.rhythm.length], beat / 4);
    let duration = Math.min(nominal, remaining);
    if (remaining - duration < minStep) duration = remaining;

    notes.push(resolvePatternStep(step, scale, preset.octaveShift));
    durations.push(duration);
    remaining -= duration;
  }

  return {
    name: preset.name,
    notes,
    durations,
    waveform: preset.waveform,
    volume: preset.volume,
    envelope: { ...preset.envelope },
    seed,
    noise: preset.waveform === 'noise',
  };
}

/**
 * Fill `duration` seconds with randomly chosen, randomly sized sections, each
 * carrying one layer per instrument preset.
 *
 * Layer seeds come from `deriveSeed(rng.seed, sectionIndex, layerIndex)` so
 * rendering order never changes the result.
 */
export function planSections(
  template: Template,
  duration: number,
  tempo: number,
  rng: SeededRandom,
  opts: PlanOptions = {}
): SongSection[] {
  if (!(duration > 0)) throw new InvalidInputError(`Duration must be positive (got ${duration})`);
  if (!(tempo > 0)) throw new InvalidInputError(`Tempo must be positive (got ${tempo})`);

  const presets = template.instrumentPresets.length > 0 ? template.instrumentPresets : DEFAULT_PRESETS;
  if (template.instrumentPresets.length === 0) {
    log.debug(`Template '${template.genre}' has no instrument presets; using defaults`);
  }

  const sections: SongSection[] = [];
  let remaining = duration;
  while (remaining > 0) {
    const name = rng.choice(template.sections);
    const sectionDuration = Math.min(Math.max(SECTION_MIN_SECONDS, rng.uniform(...SECTION_DRAW_RANGE)), remaining);
    remaining -= sectionDuration;

    const sectionIndex = sections.length;
    const layers = presets.map((preset, layerIndex) =>
      scheduleLayer(preset, template.scale, sectionDuration, tempo, deriveSeed(rng.seed, sectionIndex, layerIndex), opts)
    );
    const leadNotes = layers[0].notes.filter((note): note is number => note !== null);

    log.debug({ section: sectionIndex, name, duration: sectionDuration, layers: layers.length });
    sections.push(createSection(name, leadNotes, sectionDuration, layers));
  }
  return sections;
}
