import { spawn } from 'child_process';
import { EncoderUnavailableError, SongForgeError } from '../errors.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('export');

/**
 * Converts a WAV file on disk into a lossy format. The engine ships no codec
 * of its own.
 */
export interface AudioEncoder {
  encode(wavPath: string, outputPath: string): Promise<void>;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Runs an ffmpeg-compatible executable as a child process.
 */
export class FfmpegEncoder implements AudioEncoder {
  constructor(private readonly command: string = 'ffmpeg') {}

  encode(wavPath: string, outputPath: string): Promise<void> {
    const args = ['-y', '-loglevel', 'error', '-i', wavPath, outputPath];
    log.debug(`Running ${this.command} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      child.on('error', (err) => {
        if (isErrnoException(err) && err.code === 'ENOENT') {
          reject(new EncoderUnavailableError(`MP3 export requires an external encoder ('${this.command}' was not found)`, { cause: err }));
        } else {
          reject(err);
        }
      });
      child.on('close', (code) => {
        if (code === 0) resolve();
        else reject(new SongForgeError(`Encoder '${this.command}' exited with code ${code}: ${stderr.trim()}`));
      });
    });
  }
}
