import { unlink } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { InvalidInputError } from '../errors.js';
import type { SongProject } from '../song/songModel.js';
import { error } from '../util/diag.js';
import { createLogger } from '../util/logger.js';
import { FfmpegEncoder } from './audioEncoder.js';
import type { AudioEncoder } from './audioEncoder.js';
import { exportWAV } from './wavWriter.js';

const log = createLogger('export');

export type ExportFormat = 'wav' | 'mp3';

export interface ExportOptions {
  format?: string;
  /** Used for mp3; defaults to an ffmpeg child process. */
  encoder?: AudioEncoder;
}

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'wav' || value === 'mp3';
}

function withSuffix(path: string, suffix: string): string {
  const ext = extname(path);
  const stem = ext ? basename(path, ext) : basename(path);
  return join(dirname(path), `${stem}${suffix}`);
}

/**
 * Write the project audio to `path`, replacing its extension with the
 * format's. Returns the path written.
 */
export async function exportProject(project: SongProject, path: string, opts: ExportOptions = {}): Promise<string> {
  const format = (opts.format ?? 'wav').toLowerCase();
  if (!isExportFormat(format)) {
    throw new InvalidInputError('Only wav and mp3 exports are supported');
  }

  const wavPath = withSuffix(path, '.wav');
  if (format === 'wav') {
    await exportWAV(project.audio, wavPath);
    log.info(`Exported WAV file ${wavPath}`);
    return wavPath;
  }

  const mp3Path = withSuffix(path, '.mp3');
  const encoder = opts.encoder ?? new FfmpegEncoder();
  await exportWAV(project.audio, wavPath);
  try {
    await encoder.encode(wavPath, mp3Path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    error('export', `MP3 encoding failed: ${message}`, { file: mp3Path });
    throw err;
  } finally {
    await unlink(wavPath).catch((err: unknown) => log.warn(`Could not remove temporary WAV ${wavPath}`, err));
  }
  log.info(`Exported MP3 file ${mp3Path}`);
  return mp3Path;
}
