/**
 * Utility modules for the SongForge engine.
 */

// Logger - centralized logging system
export {
  createLogger,
  configureLogging,
  loadLoggingFromEnv,
  getLoggingConfig,
  isLogLevel,
} from './logger.js';
export type { Logger, LogLevel, LoggerConfig } from './logger.js';

// Diagnostics - structured error/warning reporting
export { formatDiagnostic, warn, error } from './diag.js';
export type { DiagLevel, DiagMeta } from './diag.js';
