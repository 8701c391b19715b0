/**
 * Error taxonomy for the engine.
 *
 * Only out-of-contract caller input and environment failures become errors.
 * Degenerate numeric cases (zero peak, empty buffers, tiny durations) have
 * defined outputs and never throw.
 */

export class SongForgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller-correctable input (bad tempo, empty EQ profile, bad permutation...). */
export class InvalidInputError extends SongForgeError {}

/** Lossy export was requested but no external encoder could be run. */
export class EncoderUnavailableError extends SongForgeError {}

/** A workspace file could not be read, parsed or written. */
export class WorkspaceError extends SongForgeError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}
