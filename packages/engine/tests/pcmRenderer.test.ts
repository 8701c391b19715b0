import { renderFallback, renderLayer, renderSection, renderSections } from '../src/audio/pcmRenderer';
import { mixLayers, normalizeBuffer, peakOf } from '../src/audio/mixer';
import { createSection } from '../src/song/songModel';
import type { SectionLayer } from '../src/song/songModel';

/** Evenly spaced values from `start`, each computed as `j * step + start`. */
function linspace(start: number, stop: number, num: number, endpoint: boolean): number[] {
  const div = endpoint ? num - 1 : num;
  const step = div > 0 ? (stop - start) / div : 0;
  const out: number[] = [];
  for (let j = 0; j < num; j++) out.push(j * step + start);
  if (endpoint && num > 1) out[num - 1] = stop;
  return out;
}

function layer(overrides: Partial<SectionLayer> = {}): SectionLayer {
  return {
    name: 'test',
    notes: [5],
    durations: [1],
    waveform: 'sine',
    volume: 0.5,
    envelope: { attack: 0, release: 0 },
    seed: null,
    noise: false,
    ...overrides,
  };
}

describe('renderLayer', () => {
  test('renders a tone scaled by volume and shaped by the envelope', () => {
    const out = renderLayer(layer(), { sampleRate: 100 });
    expect(out.length).toBe(100);
    expect(out[0]).toBe(0);
    expect(out[25]).toBeCloseTo(0.5, 5);
    expect(Math.abs(out[99])).toBe(0);
  });

  test('a layer without notes renders nothing', () => {
    expect(renderLayer(layer({ notes: [], durations: [] })).length).toBe(0);
  });

  test('null and non-positive notes render silence of the step length', () => {
    const out = renderLayer(layer({ notes: [null, 0], durations: [0.1, 0.1] }), { sampleRate: 100 });
    expect(out.length).toBe(20);
    expect(peakOf(out)).toBe(0);
  });

  test('steps shorter than one sample still render one sample', () => {
    const out = renderLayer(layer({ notes: [440], durations: [0] }), { sampleRate: 100 });
    expect(out.length).toBe(1);
  });

  test('steps are concatenated in order', () => {
    const out = renderLayer(layer({ notes: [5, null], durations: [0.5, 0.25] }), { sampleRate: 100 });
    expect(out.length).toBe(75);
    expect(peakOf(out.subarray(50))).toBe(0);
  });

  test('noise layers are reproducible from their seed', () => {
    const noisy = layer({ waveform: 'noise', noise: true, notes: [100, 100], durations: [0.1, 0.1], seed: 7 });
    const a = renderLayer(noisy, { sampleRate: 1000 });
    const b = renderLayer(noisy, { sampleRate: 1000 });
    const c = renderLayer({ ...noisy, seed: 8 }, { sampleRate: 1000 });
    expect(a).toEqual(b);
    expect(a).not.toEqual(c);
    expect(peakOf(a)).toBeGreaterThan(0);
    expect(peakOf(a)).toBeLessThanOrEqual(0.5);
  });

  test('noise layers sound on rests too', () => {
    const out = renderLayer(layer({ waveform: 'noise', noise: true, notes: [null], durations: [0.1], seed: 3 }), { sampleRate: 1000 });
    expect(out.length).toBe(100);
    expect(peakOf(out)).toBeGreaterThan(0);
  });
});

describe('renderFallback', () => {
  test('splits the section evenly across notes and normalizes', () => {
    const out = renderFallback([5, 10], 1, { sampleRate: 100 });
    expect(out.length).toBe(100);
    expect(peakOf(out)).toBe(1);
    // each note starts at phase zero
    expect(out[0]).toBe(0);
    expect(out[50]).toBe(0);
    expect(out[52]).toBeCloseTo(1, 6);
    expect(out[5]).toBeCloseTo(0.98784, 4);
  });

  test('matches the linspace ramps sample for sample', () => {
    const notes = [440, 660];
    const duration = 0.01;
    const samplesPerNote = 220;
    const expected = new Float32Array(samplesPerNote * notes.length);
    const t = linspace(0, duration / notes.length, samplesPerNote, false);
    const fade = linspace(1, 0.05, samplesPerNote, true);
    notes.forEach((freq, idx) => {
      for (let j = 0; j < samplesPerNote; j++) {
        expected[idx * samplesPerNote + j] = Math.sin(2 * Math.PI * freq * t[j]) * fade[j] * 0.5;
      }
    });
    const out = renderFallback(notes, duration, { sampleRate: 44100 });
    expect(out.length).toBe(440);
    expect(Array.from(out)).toEqual(Array.from(normalizeBuffer(expected)));
  });

  test('a single-sample note renders without NaN', () => {
    const out = renderFallback([25], 0.01, { sampleRate: 100 });
    expect(out.length).toBe(1);
    expect(out[0]).toBe(0);
  });

  test('no notes renders silence of the section length', () => {
    const out = renderFallback([], 0.5, { sampleRate: 100 });
    expect(out.length).toBe(50);
    expect(peakOf(out)).toBe(0);
  });
});

describe('renderSection', () => {
  test('flat sections use the fallback renderer', () => {
    const section = createSection('intro', [5, 10], 1);
    expect(section.voicing.kind).toBe('flat');
    expect(renderSection(section, { sampleRate: 100 })).toEqual(renderFallback([5, 10], 1, { sampleRate: 100 }));
  });

  test('layered sections mix their rendered layers', () => {
    const a = layer();
    const b = layer({ notes: [3], waveform: 'triangle', volume: 0.2 });
    const section = createSection('verse', [5], 1, [a, b]);
    expect(section.voicing.kind).toBe('layered');
    const expected = mixLayers([renderLayer(a, { sampleRate: 100 }), renderLayer(b, { sampleRate: 100 })]);
    expect(renderSection(section, { sampleRate: 100 })).toEqual(expected);
  });
});

describe('renderSections', () => {
  test('joins sections back to back with a peak of 1', () => {
    const sections = [createSection('a', [5], 0.5), createSection('b', [10], 0.25)];
    const out = renderSections(sections, { sampleRate: 100 });
    expect(out.length).toBe(75);
    expect(peakOf(out)).toBe(1);
  });

  test('no sections renders nothing', () => {
    expect(renderSections([]).length).toBe(0);
  });
});
