import { renderSections } from '../audio/pcmRenderer.js';
import { normalizeBuffer } from '../audio/mixer.js';
import { InvalidInputError } from '../errors.js';
import type { SongProject } from '../song/songModel.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('editor');

export interface EditSummary {
  tempoChange: number;
  instrumentsChanged: boolean;
  structureModified: boolean;
}

function summary(partial: Partial<EditSummary>): EditSummary {
  return { tempoChange: 1.0, instrumentsChanged: false, structureModified: false, ...partial };
}

/**
 * Resample by `ratio` with linear interpolation at source positions
 * `k * ratio`. Output length is `round(length / ratio)`; positions past the
 * last sample hold its value.
 */
export function timeStretch(audio: Float32Array, ratio: number): Float32Array {
  if (!(ratio > 0)) {
    throw new InvalidInputError(`Stretch ratio must be positive (got ${ratio})`);
  }
  if (ratio === 1 || audio.length === 0) return audio;

  const last = audio.length - 1;
  const out = new Float32Array(Math.round(audio.length / ratio));
  for (let k = 0; k < out.length; k++) {
    const pos = k * ratio;
    if (pos >= last) {
      out[k] = audio[last];
      continue;
    }
    const i = Math.floor(pos);
    const frac = pos - i;
    out[k] = audio[i] + (audio[i + 1] - audio[i]) * frac;
  }
  return out;
}

/**
 * Multiply by a gain curve interpolated linearly between band gains spread
 * evenly from the first to the last sample, then peak-normalize.
 */
export function applyEqualizer(audio: Float32Array, profile: readonly number[]): Float32Array {
  if (audio.length === 0) return audio;
  if (profile.length === 0) {
    throw new InvalidInputError('Profile must contain at least one value');
  }

  const out = new Float32Array(audio.length);
  const bands = profile.length - 1;
  const span = Math.max(audio.length - 1, 1);
  for (let i = 0; i < audio.length; i++) {
    const pos = (i * bands) / span;
    const band = Math.min(Math.floor(pos), Math.max(bands - 1, 0));
    const frac = bands === 0 ? 0 : pos - band;
    const gain = bands === 0 ? profile[0] : profile[band] + (profile[band + 1] - profile[band]) * frac;
    out[i] = audio[i] * gain;
  }
  return normalizeBuffer(out);
}

function isPermutation(order: readonly number[], size: number): boolean {
  if (order.length !== size) return false;
  const seen = new Set<number>();
  for (const index of order) {
    if (!Number.isInteger(index) || index < 0 || index >= size || seen.has(index)) return false;
    seen.add(index);
  }
  return true;
}

/**
 * Editing operations on a generated project. Each mutates the project in
 * place and reports what changed.
 */
export class SongEditor {
  adjustTempo(project: SongProject, tempo: number): EditSummary {
    if (!(tempo > 0)) {
      throw new InvalidInputError(`Tempo must be positive (got ${tempo})`);
    }
    const ratio = tempo / Math.max(project.tempo, 1);
    project.audio = timeStretch(project.audio, ratio);
    project.tempo = tempo;
    log.debug(`Tempo -> ${tempo} BPM (ratio ${ratio.toFixed(4)}, ${project.audio.length} samples)`);
    return summary({ tempoChange: ratio });
  }

  applyInstrumentProfile(project: SongProject, profile: Iterable<number>): EditSummary {
    project.audio = applyEqualizer(project.audio, Array.from(profile));
    return summary({ instrumentsChanged: true });
  }

  rearrangeSections(project: SongProject, order: Iterable<number>): EditSummary {
    const indices = Array.from(order);
    if (!isPermutation(indices, project.sections.length)) {
      throw new InvalidInputError('Order must reference each section exactly once');
    }
    project.sections = indices.map(i => project.sections[i]);
    project.audio = renderSections(project.sections);
    log.debug(`Sections reordered: ${project.sections.map(s => s.name).join(', ')}`);
    return summary({ structureModified: true });
  }
}
