/** Fixed output rate: mono 32-bit float at 44.1 kHz. */
export const SAMPLE_RATE = 44100;
