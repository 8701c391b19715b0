/**
 * SongForge Engine Logger
 *
 * Centralized logging utility for the engine and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (generator, planner, editor, workspace, export, etc.)
 * - Optional ANSI colour output on a TTY
 * - Structured logging support
 * - Safe production defaults (error-only)
 *
 * Usage:
 * ```typescript
 * import { createLogger } from '@songforge/engine';
 *
 * const log = createLogger('generator');
 *
 * log.debug('Planning sections');
 * log.info({ event: 'rendered', sections: 4 });
 * log.warn('Template has no instrument presets');
 * log.error('Failed to export project', error);
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
  colorize?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
let config: LoggerConfig = {
  level: 'error', // Safe production default
  modules: undefined,
  timestamps: true,
  colorize: false,
};

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return levelOrder.some(level => level === value);
}

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({
 *   level: 'debug',
 *   modules: ['generator', 'editor'],
 *   timestamps: false
 * });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  if (shouldLog('info')) {
    console.info('[SongForge] Logging configured:', config);
  }
}

/**
 * Load logging configuration from environment variables.
 * Looks for: SONGFORGE_LOG_LEVEL, SONGFORGE_LOG_MODULES, SONGFORGE_LOG_COLOR
 */
export function loadLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const rawLevel = env.SONGFORGE_LOG_LEVEL?.trim().toLowerCase();
  const level = rawLevel && isLogLevel(rawLevel) ? rawLevel : undefined;
  const modulesStr = env.SONGFORGE_LOG_MODULES;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;
  const colorize = env.SONGFORGE_LOG_COLOR === '1';

  if (level || modules || colorize) {
    configureLogging({
      level: level ?? config.level,
      modules,
      colorize,
    });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

const colors: Record<Exclude<LogLevel, 'none'>, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[36m',
  debug: '\x1b[32m',
};

const RESET = '\x1b[0m';

function output(level: Exclude<LogLevel, 'none'>, module: string | undefined, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module ?? 'SongForge'}]`;
  const label = config.colorize ? `${colors[level]}${prefix}${RESET}` : prefix;

  switch (level) {
    case 'error':
      console.error(label, ...args);
      break;
    case 'warn':
      console.warn(label, ...args);
      break;
    case 'info':
      console.info(label, ...args);
      break;
    default:
      console.log(label, ...args);
  }
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'generator', 'planner', 'workspace')
 */
export function createLogger(module: string): Logger {
  return {
    error: (...args: unknown[]) => {
      if (shouldLog('error', module)) {
        output('error', module, args);
      }
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', module)) {
        output('warn', module, args);
      }
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', module)) {
        output('info', module, args);
      }
    },
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', module)) {
        output('debug', module, args);
      }
    },
  };
}

export default createLogger;
