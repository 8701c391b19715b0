/**
 * SongForge engine: template-driven song generation, offline synthesis,
 * editing transforms, vocals, export and workspace persistence.
 */

export { SAMPLE_RATE } from './audio/constants.js';
export { oscillator } from './audio/oscillator.js';
export { applyEnvelope, envelopeGain } from './audio/envelope.js';
export { peakOf, normalizeBuffer, concatBuffers, mixLayers } from './audio/mixer.js';
export { renderLayer, renderSection, renderSections, renderFallback } from './audio/pcmRenderer.js';
export type { RenderOptions } from './audio/pcmRenderer.js';

export { SeededRandom, deriveSeed, randomSeed } from './random/seededRandom.js';
export { TemplateStore, builtinTemplates, validateTemplate } from './templates/templateStore.js';
export type { ResolvedTemplate } from './templates/templateStore.js';

export { planSections, scheduleLayer, resolvePatternStep, DEFAULT_PRESETS, SECTION_MIN_SECONDS } from './compose/planner.js';
export type { PlanOptions } from './compose/planner.js';
export { SongGenerator } from './compose/songGenerator.js';
export type { GenerateOptions, SongGeneratorOptions } from './compose/songGenerator.js';

export { SongEditor, timeStretch, applyEqualizer } from './edit/songEditor.js';
export type { EditSummary } from './edit/songEditor.js';
export { VocalIntegration } from './vocals/vocalIntegration.js';
export type { VocalOptions, BlendOptions } from './vocals/vocalIntegration.js';
export { ProjectWorkspace } from './workspace/projectWorkspace.js';

export { SongForgeError, InvalidInputError, EncoderUnavailableError, WorkspaceError } from './errors.js';
export { loadEngineConfig } from './config.js';
export type { EngineConfig } from './config.js';

export * from './song/index.js';
export * from './export/index.js';
export * from './import/index.js';
export * from './util/index.js';
