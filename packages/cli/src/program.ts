import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  InvalidInputError,
  ProjectWorkspace,
  SAMPLE_RATE,
  SongGenerator,
  VocalIntegration,
  FfmpegEncoder,
  configureLogging,
  exportProject,
  isExportFormat,
  loadEngineConfig,
  loadLoggingFromEnv,
  createLogger,
} from '@songforge/engine';

const log = createLogger('cli');

type GlobalOptions = {
  verbose?: boolean;
  debug?: boolean;
  workspace?: string;
};

type CreateOptions = {
  duration: number;
  tempo?: number;
  mood?: string;
  seed?: number;
  format: string;
  output: string;
};

type VocalsOptions = {
  pitch: number;
  mix: number;
  seed?: number;
  output: string;
};

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('Must be a positive number.');
  return n;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

function parseSeed(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Must be a non-negative integer.');
  return n;
}

function parseMix(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new InvalidArgumentError('Must be between 0 and 1.');
  return n;
}

function parseFormat(value: string): string {
  const format = value.toLowerCase();
  if (!isExportFormat(format)) throw new InvalidArgumentError('Format must be wav or mp3.');
  return format;
}

/**
 * Build the `songforge` command tree. Kept separate from the bin entry so
 * tests can drive it in-process.
 */
export function buildProgram(): Command {
  const program = new Command();
  const config = loadEngineConfig();

  program
    .name('songforge')
    .description('Generate short procedural songs from genre templates')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces)')
    .option('--workspace <dir>', 'Directory for saved projects', config.workspaceRoot);

  // Parse errors reject parseAsync instead of exiting; subcommands inherit this.
  program.exitOverride();

  program.hook('preAction', () => {
    loadLoggingFromEnv();
    const globalOpts = program.opts<GlobalOptions>();
    if (globalOpts.debug) configureLogging({ level: 'debug' });
    else if (globalOpts.verbose) configureLogging({ level: 'info' });
  });

  // Report failures and set the exit code instead of throwing out of commander.
  const run = <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (err) {
        const globalOpts = program.opts<GlobalOptions>();
        if (globalOpts.debug && err instanceof Error && err.stack) {
          console.error('Error:', err.stack);
        } else {
          console.error('Error:', err instanceof Error ? err.message : String(err));
        }
        process.exitCode = err instanceof InvalidInputError ? 2 : 1;
      }
    };

  program
    .command('create')
    .description('Generate a new song, save it to the workspace and export it')
    .argument('<style>', 'Genre template key (see `templates`)')
    .option('--duration <seconds>', 'Song length in seconds', parsePositive, 30)
    .option('--tempo <bpm>', 'Tempo override in BPM', parsePositiveInt)
    .option('--mood <mood>', 'Mood override')
    .option('--seed <n>', 'Random seed for reproducible output', parseSeed)
    .option('--format <format>', 'Export format: wav | mp3', parseFormat, 'wav')
    .option('-o, --output <path>', 'Output file path (extension is replaced)', 'output')
    .action(run(async (style: string, options: CreateOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const generator = new SongGenerator();
      if (!generator.templates.has(style)) {
        log.warn(`Unknown style '${style}'; falling back to '${generator.templates.resolve(style).key}'`);
      }
      const project = generator.generate({
        style,
        duration: options.duration,
        tempo: options.tempo,
        mood: options.mood,
        seed: options.seed,
      });

      const workspace = new ProjectWorkspace(globalOpts.workspace);
      await workspace.save(project);
      const exportPath = await exportProject(project, options.output, {
        format: options.format,
        encoder: new FfmpegEncoder(config.encoder),
      });
      console.log(`Generated ${project.title} -> ${exportPath}`);
    }));

  program
    .command('vocals')
    .description('Synthesize vocals for lyrics over an ambient backing track')
    .argument('<lyrics>', 'Lyrics; one tone is sung per word')
    .option('--pitch <hz>', 'Vocal pitch in Hz', parsePositive, 440)
    .option('--mix <amount>', 'Vocal share of the blend (0-1)', parseMix, 0.5)
    .option('--seed <n>', 'Random seed for the backing track', parseSeed)
    .option('-o, --output <path>', 'Output WAV path', 'vocals.wav')
    .action(run(async (lyrics: string, options: VocalsOptions) => {
      const vocals = new VocalIntegration();
      const audio = vocals.generateVocals(lyrics, { pitch: options.pitch });
      if (audio.length === 0) {
        throw new InvalidInputError('Lyrics must contain at least one word');
      }
      const project = new SongGenerator().generate({
        style: 'ambient',
        duration: audio.length / SAMPLE_RATE,
        seed: options.seed,
      });
      vocals.blend(project, audio, { mix: options.mix });
      const exportPath = await exportProject(project, options.output, { format: 'wav' });
      console.log(`Generated backing track with vocals -> ${exportPath}`);
    }));

  program
    .command('templates')
    .description('List the available genre templates')
    .action(run(async () => {
      const store = new SongGenerator().templates;
      for (const key of store.keys()) {
        const template = store.get(key);
        if (template) console.log(`${key}\t${template.genre}\t${template.tempo} BPM\t${template.mood}`);
      }
    }));

  program
    .command('list')
    .description('List projects saved in the workspace')
    .action(run(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const paths = await new ProjectWorkspace(globalOpts.workspace).list();
      if (paths.length === 0) {
        console.log('No saved projects.');
        return;
      }
      for (const p of paths) console.log(p);
    }));

  return program;
}

/**
 * Parse and run one command line. Usage errors (bad option values, unknown
 * options, missing arguments) set exit code 2; help and version output set 0.
 */
export async function runCli(argv: readonly string[], from: 'node' | 'user' = 'node'): Promise<void> {
  try {
    await buildProgram().parseAsync(argv, { from });
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode === 0 ? 0 : 2;
      return;
    }
    throw err;
  }
}
