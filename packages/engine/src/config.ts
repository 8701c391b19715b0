import { homedir } from 'os';
import { join } from 'path';
import { SAMPLE_RATE } from './audio/constants.js';

export interface EngineConfig {
  sampleRate: number;
  /** Directory the workspace stores project JSON files in. */
  workspaceRoot: string;
  /** Executable used for lossy (MP3) export. */
  encoder: string;
}

/**
 * Resolve engine configuration from the environment.
 * Reads SONGFORGE_WORKSPACE and SONGFORGE_ENCODER; the sample rate is fixed.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const workspaceRoot = env.SONGFORGE_WORKSPACE?.trim() || join(homedir(), '.songforge_workspace');
  const encoder = env.SONGFORGE_ENCODER?.trim() || 'ffmpeg';
  return { sampleRate: SAMPLE_RATE, workspaceRoot, encoder };
}
