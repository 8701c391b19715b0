/**
 * Song module exports
 */

export { WAVEFORMS, DEFAULT_ENVELOPE, createSection, sectionLayers } from './songModel.js';
export type {
  Waveform,
  Envelope,
  PatternStep,
  InstrumentPreset,
  Template,
  SectionLayer,
  SectionVoicing,
  SongSection,
  SongProject,
} from './songModel.js';
export { PROJECT_FORMAT_VERSION, projectToJSON, projectFromJSON, sectionToJSON, layerToJSON } from './projectCodec.js';
export type { SerializedProject, SerializedSection, SerializedLayer, ProjectMetadata } from './projectCodec.js';
