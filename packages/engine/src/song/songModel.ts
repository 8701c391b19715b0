/**
 * Song model: templates, sections, layers and the project aggregate.
 */

export type Waveform = 'sine' | 'square' | 'saw' | 'triangle' | 'noise';

export const WAVEFORMS: readonly Waveform[] = ['sine', 'square', 'saw', 'triangle', 'noise'];

export interface Envelope {
  attack: number; // seconds
  release: number; // seconds
}

export const DEFAULT_ENVELOPE: Readonly<Envelope> = { attack: 0.01, release: 0.3 };

/** A pattern step: an index into the template scale, or a rest. */
export type PatternStep = number | 'rest';

export interface InstrumentPreset {
  name: string;
  waveform: Waveform;
  pattern: PatternStep[];
  rhythm: number[]; // beat multipliers
  volume: number;
  octaveShift: number;
  envelope: Envelope;
}

export interface Template {
  genre: string;
  mood: string;
  tempo: number;
  scale: number[]; // Hz
  sections: string[];
  instrumentPresets: InstrumentPreset[];
  keywords: string[];
}

export interface SectionLayer {
  name: string;
  /** Frequency in Hz, or null for silence. */
  notes: (number | null)[];
  /** Seconds, same length as notes. */
  durations: number[];
  waveform: Waveform;
  volume: number;
  envelope: Envelope;
  seed: number | null;
  noise: boolean;
}

/**
 * How a section is voiced. Layered sections mix their layers; flat sections
 * come from projects that predate layers and render `leadNotes` directly.
 */
export type SectionVoicing =
  | { kind: 'layered'; layers: SectionLayer[] }
  | { kind: 'flat' };

export interface SongSection {
  name: string;
  leadNotes: number[];
  duration: number; // seconds
  voicing: SectionVoicing;
}

export interface SongProject {
  title: string;
  genre: string;
  mood: string;
  tempo: number;
  sections: SongSection[];
  audio: Float32Array;
}

/**
 * Build a section, choosing the voicing from whether any layers exist.
 */
export function createSection(name: string, leadNotes: number[], duration: number, layers: SectionLayer[] = []): SongSection {
  const voicing: SectionVoicing = layers.length > 0 ? { kind: 'layered', layers } : { kind: 'flat' };
  return { name, leadNotes, duration, voicing };
}

export function sectionLayers(section: SongSection): SectionLayer[] {
  return section.voicing.kind === 'layered' ? section.voicing.layers : [];
}

export default SongProject;
