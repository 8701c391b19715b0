import { SAMPLE_RATE } from '../audio/constants.js';
import { renderSections } from '../audio/pcmRenderer.js';
import { InvalidInputError } from '../errors.js';
import { SeededRandom, randomSeed } from '../random/seededRandom.js';
import type { SongProject, Template } from '../song/songModel.js';
import { TemplateStore, builtinTemplates } from '../templates/templateStore.js';
import { createLogger } from '../util/logger.js';
import { planSections } from './planner.js';

const log = createLogger('generator');

const TITLE_ADJECTIVES = ['Crimson', 'Electric', 'Crystal', 'Midnight', 'Golden', 'Velvet'] as const;
const TITLE_NOUNS = ['Echo', 'Dream', 'Pulse', 'Canvas', 'Mirage', 'Cascade'] as const;

export interface GenerateOptions {
  /** Template key, e.g. 'lofi'. */
  style?: string;
  /** Free text matched against template keywords when style is unknown. */
  description?: string;
  /** Seconds; defaults to 30. */
  duration?: number;
  /** Beats per minute; defaults to the template tempo. */
  tempo?: number;
  mood?: string;
  /** Same seed and options always give the same samples. */
  seed?: number;
}

export interface SongGeneratorOptions {
  templates?: TemplateStore;
  sampleRate?: number;
}

/**
 * Generate songs from genre templates and a handful of high-level options.
 */
export class SongGenerator {
  readonly templates: TemplateStore;
  private readonly sampleRate: number;

  constructor(opts: SongGeneratorOptions = {}) {
    this.templates = opts.templates ?? builtinTemplates();
    this.sampleRate = opts.sampleRate ?? SAMPLE_RATE;
  }

  generate(opts: GenerateOptions = {}): SongProject {
    const duration = opts.duration ?? 30;
    if (!(duration > 0)) {
      throw new InvalidInputError(`Duration must be positive (got ${duration})`);
    }
    if (opts.tempo !== undefined && !(opts.tempo > 0)) {
      throw new InvalidInputError(`Tempo must be positive (got ${opts.tempo})`);
    }

    const seed = opts.seed ?? randomSeed();
    const rng = new SeededRandom(seed);
    const { key, template } = this.templates.resolve(opts.style, opts.description);
    const tempo = opts.tempo ?? template.tempo;
    const mood = opts.mood ?? template.mood;
    const title = deriveTitle(template, mood, rng);

    log.info(`Generating '${title}' from template '${key}' (${duration}s @ ${tempo} BPM, seed ${seed})`);

    const sections = planSections(template, duration, tempo, rng, { sampleRate: this.sampleRate });
    const audio = renderSections(sections, { sampleRate: this.sampleRate });

    log.debug({ sections: sections.length, samples: audio.length });
    return { title, genre: template.genre, mood, tempo, sections, audio };
  }
}

function deriveTitle(template: Template, mood: string, rng: SeededRandom): string {
  const adjective = rng.choice(TITLE_ADJECTIVES);
  const noun = rng.choice(TITLE_NOUNS);
  return `${adjective} ${noun} (${template.genre} - ${mood})`;
}
