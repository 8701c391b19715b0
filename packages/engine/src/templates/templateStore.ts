import genres from './genres.json';
import { InvalidInputError } from '../errors.js';
import { error } from '../util/diag.js';
import { WAVEFORMS, DEFAULT_ENVELOPE } from '../song/songModel.js';
import type { Envelope, InstrumentPreset, PatternStep, Template, Waveform } from '../song/songModel.js';

export interface ResolvedTemplate {
  key: string;
  template: Template;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWaveform(value: unknown): value is Waveform {
  return typeof value === 'string' && WAVEFORMS.some(w => w === value);
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function readStrings(value: unknown, field: string, errors: string[]): string[] {
  if (!Array.isArray(value)) {
    errors.push(`\`${field}\` must be an array of strings`);
    return [];
  }
  const out: string[] = [];
  value.forEach((v, i) => {
    if (typeof v === 'string') out.push(v);
    else errors.push(`\`${field}\` entry at ${i} is not a string`);
  });
  return out;
}

function readEnvelope(value: unknown, field: string, errors: string[]): Envelope {
  if (value === undefined) return { ...DEFAULT_ENVELOPE };
  if (!isRecord(value)) {
    errors.push(`\`${field}\` must be an object with attack and release`);
    return { ...DEFAULT_ENVELOPE };
  }
  const attack = value.attack ?? DEFAULT_ENVELOPE.attack;
  const release = value.release ?? DEFAULT_ENVELOPE.release;
  if (typeof attack !== 'number' || attack < 0) errors.push(`\`${field}.attack\` must be a non-negative number`);
  if (typeof release !== 'number' || release < 0) errors.push(`\`${field}.release\` must be a non-negative number`);
  return {
    attack: typeof attack === 'number' ? attack : DEFAULT_ENVELOPE.attack,
    release: typeof release === 'number' ? release : DEFAULT_ENVELOPE.release,
  };
}

function readPreset(value: unknown, field: string, errors: string[]): InstrumentPreset | undefined {
  if (!isRecord(value)) {
    errors.push(`\`${field}\` must be an object`);
    return undefined;
  }
  const before = errors.length;
  const { name, waveform, pattern, rhythm, volume, octaveShift } = value;
  if (typeof name !== 'string' || name.length === 0) errors.push(`\`${field}.name\` must be a non-empty string`);
  if (!isWaveform(waveform)) errors.push(`\`${field}.waveform\` must be one of ${WAVEFORMS.join(', ')}`);

  const steps: PatternStep[] = [];
  if (!Array.isArray(pattern) || pattern.length === 0) {
    errors.push(`\`${field}.pattern\` must be a non-empty array`);
  } else {
    pattern.forEach((step, i) => {
      if (step === 'rest' || (typeof step === 'number' && Number.isInteger(step))) steps.push(step);
      else errors.push(`\`${field}.pattern\` step at ${i} must be an integer or "rest"`);
    });
  }

  const beats: number[] = [];
  if (!Array.isArray(rhythm) || rhythm.length === 0) {
    errors.push(`\`${field}.rhythm\` must be a non-empty array`);
  } else {
    rhythm.forEach((r, i) => {
      if (isPositiveNumber(r)) beats.push(r);
      else errors.push(`\`${field}.rhythm\` entry at ${i} must be a positive number`);
    });
  }

  const vol = volume ?? 0.5;
  if (typeof vol !== 'number' || vol < 0 || vol > 1) errors.push(`\`${field}.volume\` must be within [0, 1]`);
  const shift = octaveShift ?? 0;
  if (typeof shift !== 'number' || !Number.isInteger(shift)) errors.push(`\`${field}.octaveShift\` must be an integer`);
  const envelope = readEnvelope(value.envelope, `${field}.envelope`, errors);

  if (errors.length > before || typeof name !== 'string' || !isWaveform(waveform) || typeof vol !== 'number' || typeof shift !== 'number') {
    return undefined;
  }
  return { name, waveform, pattern: steps, rhythm: beats, volume: vol, octaveShift: shift, envelope };
}

/**
 * Validate a raw template definition. Throws an InvalidInputError listing
 * every problem found.
 */
export function validateTemplate(key: string, raw: unknown): Template {
  const errors: string[] = [];
  if (!isRecord(raw)) {
    throw new InvalidInputError(`Template '${key}' must be an object`);
  }
  const { genre, mood, tempo, scale } = raw;
  if (typeof genre !== 'string' || genre.length === 0) errors.push('`genre` must be a non-empty string');
  if (typeof mood !== 'string') errors.push('`mood` must be a string');
  if (!isPositiveNumber(tempo) || !Number.isInteger(tempo)) errors.push('`tempo` must be a positive integer');

  const freqs: number[] = [];
  if (!Array.isArray(scale) || scale.length === 0) {
    errors.push('`scale` must be a non-empty array of frequencies');
  } else {
    scale.forEach((f, i) => {
      if (typeof f === 'number' && Number.isFinite(f)) freqs.push(f);
      else errors.push(`\`scale\` entry at ${i} is not a number`);
    });
  }

  const sections = readStrings(raw.sections, 'sections', errors);
  if (Array.isArray(raw.sections) && raw.sections.length === 0) errors.push('`sections` must not be empty');
  const keywords = raw.keywords === undefined ? [] : readStrings(raw.keywords, 'keywords', errors);

  const instrumentPresets: InstrumentPreset[] = [];
  const rawPresets = raw.instrumentPresets ?? [];
  if (!Array.isArray(rawPresets)) {
    errors.push('`instrumentPresets` must be an array');
  } else {
    rawPresets.forEach((p, i) => {
      const preset = readPreset(p, `instrumentPresets[${i}]`, errors);
      if (preset) instrumentPresets.push(preset);
    });
  }

  if (errors.length > 0 || typeof genre !== 'string' || typeof mood !== 'string' || typeof tempo !== 'number') {
    const message = `Template '${key}' is invalid:\n` + errors.map(e => ` - ${e}`).join('\n');
    error('templates', message);
    throw new InvalidInputError(message);
  }

  return { genre, mood, tempo, scale: freqs, sections, instrumentPresets, keywords };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Immutable, ordered lookup of style key -> template. Constructed once and
 * passed to the generator; never mutated afterwards.
 */
export class TemplateStore {
  private readonly templates: ReadonlyMap<string, Template>;
  private readonly fallback: ResolvedTemplate;

  constructor(templates: Iterable<readonly [string, Template]>) {
    const frozen = Array.from(templates, ([key, t]) => [key, deepFreeze(structuredClone(t))] as const);
    if (frozen.length === 0) {
      throw new InvalidInputError('A template store needs at least one template');
    }
    this.templates = new Map(frozen);
    this.fallback = { key: frozen[0][0], template: frozen[0][1] };
  }

  /** Build a store from raw (e.g. JSON) definitions, validating each one. */
  static fromJSON(raw: unknown): TemplateStore {
    if (!isRecord(raw)) {
      throw new InvalidInputError('Template definitions must be an object keyed by style');
    }
    return new TemplateStore(Object.entries(raw).map(([key, value]): [string, Template] => [key, validateTemplate(key, value)]));
  }

  get size(): number {
    return this.templates.size;
  }

  keys(): string[] {
    return Array.from(this.templates.keys());
  }

  has(key: string): boolean {
    return this.templates.has(key);
  }

  get(key: string): Template | undefined {
    return this.templates.get(key);
  }

  /**
   * Resolve a template from a style key, then description keywords, then
   * the first template in store order. Never fails.
   */
  resolve(style?: string, description?: string): ResolvedTemplate {
    if (style) {
      const exact = this.templates.get(style);
      if (exact) return { key: style, template: exact };
    }
    if (description) {
      const lowered = description.toLowerCase();
      for (const [key, template] of this.templates) {
        if (template.keywords.some(word => lowered.includes(word.toLowerCase()))) {
          return { key, template };
        }
      }
    }
    return this.fallback;
  }
}

let builtin: TemplateStore | undefined;

/** The bundled genre templates (lofi, pop, cinematic, edm, jazz, ambient). */
export function builtinTemplates(): TemplateStore {
  if (!builtin) builtin = TemplateStore.fromJSON(genres);
  return builtin;
}
