import { SongGenerator } from '../src/compose/songGenerator';
import { peakOf } from '../src/audio/mixer';
import { TemplateStore } from '../src/templates/templateStore';
import { InvalidInputError } from '../src/errors';

const TITLE = /^(Crimson|Electric|Crystal|Midnight|Golden|Velvet) (Echo|Dream|Pulse|Canvas|Mirage|Cascade) \((.+) - (.+)\)$/;

describe('SongGenerator', () => {
  const generator = new SongGenerator();

  test('generates a normalized lofi song from a seed', () => {
    const project = generator.generate({ style: 'lofi', duration: 5, seed: 42 });
    expect(project.genre).toBe('Lo-Fi');
    expect(project.audio.length).toBeGreaterThan(0);
    const peak = peakOf(project.audio);
    expect(peak).toBeGreaterThanOrEqual(0.9);
    expect(peak).toBeLessThanOrEqual(1.0);
  });

  test('peak amplitude is exactly 1', () => {
    const project = generator.generate({ style: 'jazz', duration: 6, seed: 9 });
    expect(peakOf(project.audio)).toBe(1);
  });

  test('same seed and options give identical projects', () => {
    const a = generator.generate({ style: 'edm', duration: 8, seed: 123 });
    const b = generator.generate({ style: 'edm', duration: 8, seed: 123 });
    expect(a.title).toBe(b.title);
    expect(a.sections).toEqual(b.sections);
    expect(a.audio).toEqual(b.audio);
  });

  test('different seeds give different audio', () => {
    const a = generator.generate({ style: 'lofi', duration: 5, seed: 1 });
    const b = generator.generate({ style: 'lofi', duration: 5, seed: 2 });
    expect(a.audio).not.toEqual(b.audio);
  });

  test('title combines adjective, noun, genre and mood', () => {
    const project = generator.generate({ style: 'lofi', duration: 2, seed: 5 });
    const match = TITLE.exec(project.title);
    expect(match).not.toBeNull();
    expect(match?.[3]).toBe('Lo-Fi');
    expect(match?.[4]).toBe('chill');
  });

  test('tempo and mood default to the template and can be overridden', () => {
    const defaults = generator.generate({ style: 'pop', duration: 2, seed: 1 });
    expect(defaults.tempo).toBe(120);
    expect(defaults.mood).toBe('upbeat');

    const custom = generator.generate({ style: 'pop', duration: 2, seed: 1, tempo: 100, mood: 'moody' });
    expect(custom.tempo).toBe(100);
    expect(custom.mood).toBe('moody');
    expect(custom.title.endsWith('(Pop - moody)')).toBe(true);
  });

  test('sections cover the requested duration', () => {
    const project = generator.generate({ style: 'cinematic', duration: 30, seed: 7 });
    const total = project.sections.reduce((acc, s) => acc + s.duration, 0);
    expect(total).toBeCloseTo(30, 9);
    expect(Math.abs(project.audio.length - 30 * 44100)).toBeLessThan(200);
  });

  test('generated sections are layered', () => {
    const project = generator.generate({ style: 'ambient', duration: 10, seed: 3 });
    for (const section of project.sections) {
      expect(section.voicing.kind).toBe('layered');
      if (section.voicing.kind === 'layered') {
        expect(section.voicing.layers.length).toBeGreaterThan(0);
        section.voicing.layers.forEach(layer => expect(layer.notes.length).toBeGreaterThan(0));
      }
    }
  });

  test('a description picks the template when the style is unknown', () => {
    expect(generator.generate({ description: 'dance club', duration: 2, seed: 3 }).genre).toBe('EDM');
    expect(generator.generate({ style: 'polka', duration: 2, seed: 3 }).genre).toBe('Lo-Fi');
  });

  test('works without a seed', () => {
    const project = generator.generate({ style: 'pop', duration: 1 });
    expect(project.audio.length).toBeGreaterThan(0);
  });

  test('rejects non-positive duration or tempo', () => {
    expect(() => generator.generate({ duration: 0 })).toThrow(InvalidInputError);
    expect(() => generator.generate({ duration: 5, tempo: -5 })).toThrow(InvalidInputError);
  });

  test('uses an injected template store', () => {
    const store = new TemplateStore([
      ['drone', {
        genre: 'Drone',
        mood: 'still',
        tempo: 40,
        scale: [55],
        sections: ['hold'],
        instrumentPresets: [],
        keywords: [],
      }],
    ]);
    const project = new SongGenerator({ templates: store }).generate({ style: 'anything', duration: 3, seed: 1 });
    expect(project.genre).toBe('Drone');
    expect(project.tempo).toBe(40);
    expect(project.sections.map(s => s.name)).toEqual(['hold']);
  });
});
