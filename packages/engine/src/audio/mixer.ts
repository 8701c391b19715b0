/**
 * Buffer mixing helpers: peak detection, normalization, concatenation and
 * summing of unequal-length layers.
 */

export function peakOf(buffer: Float32Array): number {
  let max = 0;
  for (let i = 0; i < buffer.length; i++) {
    const abs = Math.abs(buffer[i]);
    if (abs > max) max = abs;
  }
  return max;
}

/**
 * Scale the buffer in place so its peak absolute value is exactly 1.0.
 * An all-zero buffer is left untouched.
 */
export function normalizeBuffer(buffer: Float32Array): Float32Array {
  const peak = peakOf(buffer) || 1;
  for (let i = 0; i < buffer.length; i++) {
    buffer[i] = buffer[i] / peak;
  }
  return buffer;
}

export function concatBuffers(buffers: readonly Float32Array[]): Float32Array {
  let total = 0;
  for (const b of buffers) total += b.length;
  const out = new Float32Array(total);
  let offset = 0;
  for (const b of buffers) {
    out.set(b, offset);
    offset += b.length;
  }
  return out;
}

/**
 * Sum layers sample-wise, zero-padding each to the longest, then
 * peak-normalize. Empty layers are skipped.
 */
export function mixLayers(layers: readonly Float32Array[]): Float32Array {
  const rendered = layers.filter(layer => layer.length > 0);
  if (rendered.length === 0) return new Float32Array(0);

  const maxLength = Math.max(...rendered.map(layer => layer.length));
  const mixture = new Float32Array(maxLength);
  for (const layer of rendered) {
    for (let i = 0; i < layer.length; i++) {
      mixture[i] += layer[i];
    }
  }
  return normalizeBuffer(mixture);
}
