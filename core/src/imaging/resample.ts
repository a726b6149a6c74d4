/**
 * Pure-JS separable resampler.
 * Operates on flat 4-channel byte buffers (R, G, B, A interleaved).
 */
import { ResizeFilter } from '../types';

// ---------------------------------------------------------------------------
// Filter configuration
// ---------------------------------------------------------------------------

/** Kernel support radius in source pixels, before downscale widening. */
export const FILTER_SUPPORT: Record<ResizeFilter, number> = {
  [ResizeFilter.POINT]: 0,
  [ResizeFilter.TRIANGLE]: 1,
  [ResizeFilter.CATMULL_ROM]: 2,
  [ResizeFilter.MITCHELL]: 2,
  [ResizeFilter.LANCZOS3]: 3,
};

const CHANNELS = 4;

export interface ResampleOptions {
  srcWidth: number;
  srcHeight: number;
  dstWidth: number;
  dstHeight: number;
  filter: ResizeFilter;
}

// ---------------------------------------------------------------------------
// Kernels
// ---------------------------------------------------------------------------

/** Mitchell-Netravali family; (b, c) = (0, 0.5) is Catmull-Rom. */
function cubic(x: number, b: number, c: number): number {
  const ax = Math.abs(x);
  if (ax < 1) {
    return ((12 - 9 * b - 6 * c) * ax * ax * ax + (-18 + 12 * b + 6 * c) * ax * ax + (6 - 2 * b)) / 6;
  }
  if (ax < 2) {
    return ((-b - 6 * c) * ax * ax * ax + (6 * b + 30 * c) * ax * ax + (-12 * b - 48 * c) * ax + (8 * b + 24 * c)) / 6;
  }
  return 0;
}

function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  return Math.sin(px) / px;
}

function kernel(filter: ResizeFilter, x: number): number {
  switch (filter) {
    case ResizeFilter.TRIANGLE:
      return Math.max(0, 1 - Math.abs(x));
    case ResizeFilter.CATMULL_ROM:
      return cubic(x, 0, 0.5);
    case ResizeFilter.MITCHELL:
      return cubic(x, 1 / 3, 1 / 3);
    case ResizeFilter.LANCZOS3:
      return Math.abs(x) < 3 ? sinc(x) * sinc(x / 3) : 0;
    default:
      return Math.abs(x) < 0.5 ? 1 : 0;
  }
}

// ---------------------------------------------------------------------------
// Weight tables
// ---------------------------------------------------------------------------

interface Contribution {
  start: number;
  weights: Float64Array;
}

/**
 * For each destination sample along one axis, the first contributing source
 * index and its normalised weights.
 */
function contributions(srcLen: number, dstLen: number, filter: ResizeFilter): Contribution[] {
  const ratio = srcLen / dstLen;
  const out: Contribution[] = new Array(dstLen);

  if (filter === ResizeFilter.POINT) {
    for (let i = 0; i < dstLen; i++) {
      const start = Math.min(Math.floor((i + 0.5) * ratio), srcLen - 1);
      out[i] = { start, weights: Float64Array.of(1) };
    }
    return out;
  }

  // Widen the kernel when shrinking.
  const scale = Math.max(ratio, 1);
  const support = FILTER_SUPPORT[filter] * scale;

  for (let i = 0; i < dstLen; i++) {
    const center = (i + 0.5) * ratio;
    const left = Math.max(0, Math.floor(center - support));
    const right = Math.min(srcLen, Math.ceil(center + support));
    const weights = new Float64Array(right - left);
    let sum = 0;
    for (let j = left; j < right; j++) {
      const w = kernel(filter, (j + 0.5 - center) / scale);
      weights[j - left] = w;
      sum += w;
    }
    if (sum === 0) {
      // Degenerate window: fall back to the nearest sample.
      const start = Math.min(Math.floor(center), srcLen - 1);
      out[i] = { start, weights: Float64Array.of(1) };
      continue;
    }
    for (let k = 0; k < weights.length; k++) weights[k] /= sum;
    out[i] = { start: left, weights };
  }
  return out;
}

function toByte(v: number): number {
  return v <= 0 ? 0 : v >= 255 ? 255 : Math.round(v);
}

// ---------------------------------------------------------------------------
// Resample
// ---------------------------------------------------------------------------

/**
 * Resample `src` into `dst` with a horizontal pass followed by a vertical
 * pass. Throws when the buffers disagree with the dimensions or when there
 * is nothing to sample from.
 */
export function resample(src: Uint8Array, dst: Uint8Array, options: ResampleOptions): void {
  const { srcWidth, srcHeight, dstWidth, dstHeight, filter } = options;

  if (!(filter in FILTER_SUPPORT)) {
    throw new Error(`unknown resize filter: ${String(filter)}`);
  }
  if (src.length !== srcWidth * srcHeight * CHANNELS) {
    throw new Error(`source holds ${src.length} bytes, expected ${srcWidth * srcHeight * CHANNELS}`);
  }
  if (dst.length !== dstWidth * dstHeight * CHANNELS) {
    throw new Error(`destination holds ${dst.length} bytes, expected ${dstWidth * dstHeight * CHANNELS}`);
  }
  if (dstWidth === 0 || dstHeight === 0) return;
  if (srcWidth === 0 || srcHeight === 0) {
    throw new Error(`cannot resample an empty ${srcWidth}x${srcHeight} source`);
  }

  const cols = contributions(srcWidth, dstWidth, filter);
  const rows = contributions(srcHeight, dstHeight, filter);

  // Horizontal pass: srcHeight rows of dstWidth samples
  const tmp = new Float64Array(srcHeight * dstWidth * CHANNELS);
  for (let y = 0; y < srcHeight; y++) {
    const srcRow = y * srcWidth;
    const tmpRow = y * dstWidth;
    for (let x = 0; x < dstWidth; x++) {
      const { start, weights } = cols[x];
      let r = 0, g = 0, b = 0, a = 0;
      for (let k = 0; k < weights.length; k++) {
        const off = (srcRow + start + k) * CHANNELS;
        const w = weights[k];
        r += src[off] * w;
        g += src[off + 1] * w;
        b += src[off + 2] * w;
        a += src[off + 3] * w;
      }
      const out = (tmpRow + x) * CHANNELS;
      tmp[out] = r;
      tmp[out + 1] = g;
      tmp[out + 2] = b;
      tmp[out + 3] = a;
    }
  }

  // Vertical pass
  for (let y = 0; y < dstHeight; y++) {
    const { start, weights } = rows[y];
    for (let x = 0; x < dstWidth; x++) {
      let r = 0, g = 0, b = 0, a = 0;
      for (let k = 0; k < weights.length; k++) {
        const off = ((start + k) * dstWidth + x) * CHANNELS;
        const w = weights[k];
        r += tmp[off] * w;
        g += tmp[off + 1] * w;
        b += tmp[off + 2] * w;
        a += tmp[off + 3] * w;
      }
      const out = (y * dstWidth + x) * CHANNELS;
      dst[out] = toByte(r);
      dst[out + 1] = toByte(g);
      dst[out + 2] = toByte(b);
      dst[out + 3] = toByte(a);
    }
  }
}
