import {
  DEFAULT_PRESETS,
  SECTION_MIN_SECONDS,
  planSections,
  resolvePatternStep,
  scheduleLayer,
} from '../src/compose/planner';
import { SeededRandom, deriveSeed } from '../src/random/seededRandom';
import { builtinTemplates } from '../src/templates/templateStore';
import { InvalidInputError } from '../src/errors';
import type { InstrumentPreset, Template } from '../src/song/songModel';

function template(key: string): Template {
  const t = builtinTemplates().get(key);
  if (!t) throw new Error(`missing template ${key}`);
  return t;
}

function preset(overrides: Partial<InstrumentPreset> = {}): InstrumentPreset {
  return {
    name: 'lead',
    waveform: 'sine',
    pattern: [0],
    rhythm: [1],
    volume: 0.5,
    octaveShift: 0,
    envelope: { attack: 0.01, release: 0.1 },
    ...overrides,
  };
}

const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0);

describe('resolvePatternStep', () => {
  const scale = [100, 200, 300];

  test('indexes the scale and wraps in both directions', () => {
    expect(resolvePatternStep(2, scale, 0)).toBe(300);
    expect(resolvePatternStep(4, scale, 0)).toBe(200);
    expect(resolvePatternStep(-1, scale, 0)).toBe(300);
  });

  test('applies the octave shift', () => {
    expect(resolvePatternStep(0, scale, -1)).toBe(50);
    expect(resolvePatternStep(1, scale, 1)).toBe(400);
  });

  test('rests resolve to null', () => {
    expect(resolvePatternStep('rest', scale, 0)).toBeNull();
  });
});

describe('scheduleLayer', () => {
  test('walks pattern and rhythm cyclically and clips the last step', () => {
    const layer = scheduleLayer(preset({ pattern: [0, 1, 'rest'], rhythm: [1, 2] }), [100, 200], 2.3, 120, 9);
    expect(layer.notes).toEqual([100, 200, null, 100]);
    expect(layer.durations).toHaveLength(4);
    [0.5, 1, 0.5, 0.3].forEach((d, i) => expect(layer.durations[i]).toBeCloseTo(d, 9));
    expect(sum(layer.durations)).toBeCloseTo(2.3, 9);
    expect(layer.seed).toBe(9);
    expect(layer.noise).toBe(false);
  });

  test('steps are never shorter than a quarter beat, except the last', () => {
    const layer = scheduleLayer(preset({ rhythm: [0.1] }), [100], 1, 60, 0);
    expect(layer.durations).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  test('a sub-sample remainder is absorbed by the previous step', () => {
    const layer = scheduleLayer(preset(), [100], 0.500001, 120, 0);
    expect(layer.durations).toHaveLength(1);
    expect(layer.durations[0]).toBe(0.500001);
  });

  test('noise presets produce noise layers', () => {
    const layer = scheduleLayer(preset({ waveform: 'noise' }), [100], 1, 120, 0);
    expect(layer.noise).toBe(true);
    expect(layer.waveform).toBe('noise');
  });

  test('copies the preset envelope', () => {
    const p = preset();
    const layer = scheduleLayer(p, [100], 1, 120, 0);
    expect(layer.envelope).toEqual(p.envelope);
    expect(layer.envelope).not.toBe(p.envelope);
  });
});

describe('planSections', () => {
  test('sections fill the requested duration', () => {
    const pop = template('pop');
    const sections = planSections(pop, 20, 120, new SeededRandom(42));
    expect(sum(sections.map(s => s.duration))).toBeCloseTo(20, 9);
    sections.slice(0, -1).forEach(s => {
      expect(s.duration).toBeGreaterThanOrEqual(SECTION_MIN_SECONDS);
      expect(s.duration).toBeLessThan(12);
    });
    sections.forEach(s => expect(pop.sections).toContain(s.name));
  });

  test('each section carries one layer per preset, filling the section', () => {
    const pop = template('pop');
    const sections = planSections(pop, 15, 120, new SeededRandom(3));
    for (const section of sections) {
      if (section.voicing.kind !== 'layered') throw new Error('expected layers');
      expect(section.voicing.layers.map(l => l.name)).toEqual(['lead', 'bass', 'drums']);
      for (const layer of section.voicing.layers) {
        expect(layer.notes).toHaveLength(layer.durations.length);
        expect(sum(layer.durations)).toBeCloseTo(section.duration, 9);
        layer.durations.forEach(d => expect(d).toBeGreaterThanOrEqual(1 / 44100));
      }
    }
  });

  test('lead notes are the first layer without its rests', () => {
    const [section] = planSections(template('lofi'), 5, 85, new SeededRandom(11));
    if (section.voicing.kind !== 'layered') throw new Error('expected layers');
    const first = section.voicing.layers[0];
    expect(first.notes).toContain(null);
    expect(section.leadNotes).toEqual(first.notes.filter(n => n !== null));
  });

  test('bass layers sit an octave below the scale', () => {
    const pop = template('pop');
    const [section] = planSections(pop, 5, 120, new SeededRandom(1));
    if (section.voicing.kind !== 'layered') throw new Error('expected layers');
    expect(section.voicing.layers[1].notes[0]).toBeCloseTo(pop.scale[0] / 2, 9);
  });

  test('layer seeds are derived from section and layer index', () => {
    const sections = planSections(template('pop'), 20, 120, new SeededRandom(42));
    sections.forEach((section, i) => {
      if (section.voicing.kind !== 'layered') throw new Error('expected layers');
      section.voicing.layers.forEach((layer, j) => expect(layer.seed).toBe(deriveSeed(42, i, j)));
    });
  });

  test('templates without presets use the default voices', () => {
    const [section] = planSections(template('cinematic'), 5, 100, new SeededRandom(4));
    if (section.voicing.kind !== 'layered') throw new Error('expected layers');
    expect(section.voicing.layers.map(l => l.name)).toEqual(DEFAULT_PRESETS.map(p => p.name));
    expect(section.voicing.layers[2].noise).toBe(true);
  });

  test('a duration shorter than the minimum gives one short section', () => {
    const sections = planSections(template('jazz'), 3, 110, new SeededRandom(6));
    expect(sections).toHaveLength(1);
    expect(sections[0].duration).toBe(3);
  });

  test('the same seed plans the same song', () => {
    const a = planSections(template('edm'), 25, 128, new SeededRandom(77));
    const b = planSections(template('edm'), 25, 128, new SeededRandom(77));
    expect(a).toEqual(b);
  });

  test('rejects non-positive duration and tempo', () => {
    expect(() => planSections(template('pop'), 0, 120, new SeededRandom(1))).toThrow(InvalidInputError);
    expect(() => planSections(template('pop'), 10, 0, new SeededRandom(1))).toThrow(InvalidInputError);
  });
});
