/**
 * Plain-JSON representation of a project, used by the workspace. Silence is
 * stored as `null`; flat (legacy) sections store an empty `layers` array.
 */
import { InvalidInputError } from '../errors.js';
import { warn } from '../util/diag.js';
import { DEFAULT_ENVELOPE, WAVEFORMS, createSection, sectionLayers } from './songModel.js';
import type { Envelope, SectionLayer, SongProject, SongSection, Waveform } from './songModel.js';

export const PROJECT_FORMAT_VERSION = 1;

export interface SerializedLayer {
  name: string;
  notes: (number | null)[];
  durations: number[];
  waveform: string;
  volume: number;
  envelope: Envelope;
  seed: number | null;
  noise: boolean;
}

export interface SerializedSection {
  name: string;
  notes: number[];
  duration: number;
  layers: SerializedLayer[];
}

export interface ProjectMetadata {
  title: string;
  genre: string;
  mood: string;
  tempo: number;
  sections: SerializedSection[];
}

export interface SerializedProject {
  version: number;
  savedAt?: string;
  metadata: ProjectMetadata;
  audio: number[];
}

export function layerToJSON(layer: SectionLayer): SerializedLayer {
  return {
    name: layer.name,
    notes: [...layer.notes],
    durations: [...layer.durations],
    waveform: layer.waveform,
    volume: layer.volume,
    envelope: { ...layer.envelope },
    seed: layer.seed,
    noise: layer.noise,
  };
}

export function sectionToJSON(section: SongSection): SerializedSection {
  return {
    name: section.name,
    notes: [...section.leadNotes],
    duration: section.duration,
    layers: sectionLayers(section).map(layerToJSON),
  };
}

export function projectToJSON(project: SongProject): SerializedProject {
  return {
    version: PROJECT_FORMAT_VERSION,
    metadata: {
      title: project.title,
      genre: project.genre,
      mood: project.mood,
      tempo: project.tempo,
      sections: project.sections.map(sectionToJSON),
    },
    audio: Array.from(project.audio),
  };
}

// ---------- Decoding ----------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWaveform(value: unknown): value is Waveform {
  return typeof value === 'string' && WAVEFORMS.some(w => w === value);
}

function numberList(value: unknown, field: string, errors: string[]): number[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    errors.push(`${field} must be an array`);
    return [];
  }
  const out: number[] = [];
  value.forEach((v, i) => {
    if (typeof v === 'number') out.push(v);
    else errors.push(`${field}[${i}] is not a number`);
  });
  return out;
}

function layerFromJSON(raw: unknown, field: string, errors: string[], section: number): SectionLayer | undefined {
  if (!isRecord(raw) || typeof raw.name !== 'string') {
    errors.push(`${field} must be an object with a name`);
    return undefined;
  }
  const notes: (number | null)[] = [];
  if (Array.isArray(raw.notes)) {
    raw.notes.forEach((n, i) => {
      if (n === null || typeof n === 'number') notes.push(n);
      else errors.push(`${field}.notes[${i}] must be a number or null`);
    });
  } else if (raw.notes !== undefined) {
    errors.push(`${field}.notes must be an array`);
  }
  const durations = numberList(raw.durations, `${field}.durations`, errors);
  if (notes.length !== durations.length) {
    errors.push(`${field} has ${notes.length} notes but ${durations.length} durations`);
  }

  let waveform: Waveform = 'sine';
  if (isWaveform(raw.waveform)) {
    waveform = raw.waveform;
  } else if (raw.waveform !== undefined) {
    warn('codec', `Unknown waveform '${String(raw.waveform)}', rendering as sine`, { section, layer: raw.name });
  }

  const env: Record<string, unknown> = isRecord(raw.envelope) ? raw.envelope : {};
  const envelope: Envelope = {
    attack: typeof env.attack === 'number' ? env.attack : DEFAULT_ENVELOPE.attack,
    release: typeof env.release === 'number' ? env.release : DEFAULT_ENVELOPE.release,
  };

  return {
    name: raw.name,
    notes,
    durations,
    waveform,
    volume: typeof raw.volume === 'number' ? raw.volume : 0.5,
    envelope,
    seed: typeof raw.seed === 'number' ? raw.seed : null,
    noise: raw.noise === true,
  };
}

function sectionFromJSON(raw: unknown, field: string, errors: string[], index: number): SongSection | undefined {
  if (!isRecord(raw) || typeof raw.name !== 'string' || typeof raw.duration !== 'number') {
    errors.push(`${field} must be an object with a name and a numeric duration`);
    return undefined;
  }
  const leadNotes = numberList(raw.notes, `${field}.notes`, errors);
  const layers: SectionLayer[] = [];
  if (Array.isArray(raw.layers)) {
    raw.layers.forEach((l, i) => {
      const layer = layerFromJSON(l, `${field}.layers[${i}]`, errors, index);
      if (layer) layers.push(layer);
    });
  } else if (raw.layers !== undefined) {
    errors.push(`${field}.layers must be an array`);
  }
  return createSection(raw.name, leadNotes, raw.duration, layers);
}

/**
 * Rebuild a project from its JSON form. Throws InvalidInputError listing
 * every structural problem.
 */
export function projectFromJSON(raw: unknown): SongProject {
  const errors: string[] = [];
  if (!isRecord(raw) || !isRecord(raw.metadata)) {
    throw new InvalidInputError('Project JSON must contain a `metadata` object');
  }
  const { title, genre, mood, tempo } = raw.metadata;
  if (typeof title !== 'string') errors.push('metadata.title must be a string');
  if (typeof genre !== 'string') errors.push('metadata.genre must be a string');
  if (typeof mood !== 'string') errors.push('metadata.mood must be a string');
  if (typeof tempo !== 'number') errors.push('metadata.tempo must be a number');

  const sections: SongSection[] = [];
  const rawSections = raw.metadata.sections;
  if (!Array.isArray(rawSections)) {
    errors.push('metadata.sections must be an array');
  } else {
    rawSections.forEach((s, i) => {
      const section = sectionFromJSON(s, `sections[${i}]`, errors, i);
      if (section) sections.push(section);
    });
  }
  const audio = numberList(raw.audio, 'audio', errors);

  if (errors.length > 0 || typeof title !== 'string' || typeof genre !== 'string' || typeof mood !== 'string' || typeof tempo !== 'number') {
    throw new InvalidInputError('Project validation failed:\n' + errors.map(e => ` - ${e}`).join('\n'));
  }
  return { title, genre, mood, tempo, sections, audio: Float32Array.from(audio) };
}
