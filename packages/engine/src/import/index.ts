/**
 * Import module exports
 */

export { readWAV } from './wavReader.js';
export type { DecodedWav } from './wavReader.js';
