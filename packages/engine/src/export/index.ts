/**
 * Export module exports
 */

export { writeWAV, exportWAV } from './wavWriter.js';
export type { WavOptions } from './wavWriter.js';
export { FfmpegEncoder } from './audioEncoder.js';
export type { AudioEncoder } from './audioEncoder.js';
export { exportProject, isExportFormat } from './projectExport.js';
export type { ExportFormat, ExportOptions } from './projectExport.js';
