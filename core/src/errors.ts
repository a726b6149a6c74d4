import { ImageErrorKind } from './types';
import { IMAGE_LIMITS } from './config';

/**
 * Error raised by every failing pixelbuf operation. `kind` says what went
 * wrong; `cause` carries the underlying decoder, engine or fs error.
 */
export class ImageError extends Error {
  readonly kind: ImageErrorKind;

  constructor(kind: ImageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageError';
    this.kind = kind;
  }
}

export function isImageError(err: unknown, kind?: ImageErrorKind): err is ImageError {
  return err instanceof ImageError && (kind === undefined || err.kind === kind);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Dimensions are non-negative safe integers; zero is allowed. The pixel
 * count may not exceed `IMAGE_LIMITS.MAX_PIXELS`.
 */
export function assertDimensions(width: number, height: number): void {
  if (!isValidSize(width, height)) {
    throw new ImageError(
      ImageErrorKind.INVALID_DIMENSIONS,
      `invalid image dimensions ${width}x${height}`
    );
  }
}

export function isDimension(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function isValidSize(width: number, height: number): boolean {
  return isDimension(width) && isDimension(height) && width * height <= IMAGE_LIMITS.MAX_PIXELS;
}
