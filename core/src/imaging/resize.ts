import { ImageErrorKind, ResizeFilter } from '../types';
import { ImageError, describeError, isValidSize } from '../errors';
import { packColors, unpackColors } from './color';
import { resample } from './resample';

export interface PixelSource {
  width(): number;
  height(): number;
  data(): Uint32Array;
}

/**
 * Resample `source` to `width`×`height` and return the new pixel array.
 * The destination starts zero-filled. Every failure surfaces as a
 * `ResizeFailure`.
 */
export function resizePixels(
  source: PixelSource,
  width: number,
  height: number,
  filter: ResizeFilter
): Uint32Array {
  const srcWidth = source.width();
  const srcHeight = source.height();
  const context = `${srcWidth}x${srcHeight} to ${width}x${height} (${filter})`;

  if (!isValidSize(width, height)) {
    throw new ImageError(
      ImageErrorKind.RESIZE_FAILURE,
      `failed to resize ${context}: invalid target dimensions`
    );
  }

  try {
    const dstColors = new Uint32Array(width * height);
    const src = packColors(source.data());
    const dst = new Uint8Array(dstColors.length * 4);
    resample(src, dst, { srcWidth, srcHeight, dstWidth: width, dstHeight: height, filter });
    return unpackColors(dst, dstColors);
  } catch (err) {
    throw new ImageError(
      ImageErrorKind.RESIZE_FAILURE,
      `failed to resize ${context}: ${describeError(err)}`,
      { cause: err }
    );
  }
}
