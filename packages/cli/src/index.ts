// Re-export the program builder and the engine entry points so the CLI
// package can serve as a single import for tools and scripts.
export { buildProgram, runCli } from './program.js';
export { SongGenerator, SongEditor, VocalIntegration, ProjectWorkspace, exportProject } from '@songforge/engine';
