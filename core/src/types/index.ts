/**
 * A packed 32-bit color, `0xAARRGGBB`. Four 8-bit channels, no padding.
 */
export type Color = number;

/**
 * The display capability contract. Anything that can receive a blit of
 * packed colors implements it, and so does {@link PixelBuffer} itself.
 */
export interface Renderer {
  width(): number;
  height(): number;
  data(): Uint32Array;
  dataMut(): Uint32Array;
  sync(): boolean;
  /**
   * Copy a `w`×`h` block of colors to the surface with its top-left corner
   * at (`x`, `y`). Rows in `pixels` are `w` apart; anything past `w*h` is
   * ignored.
   */
  image(x: number, y: number, w: number, h: number, pixels: Uint32Array): void;
}

export enum ResizeFilter {
  POINT = 'point',
  TRIANGLE = 'triangle',
  CATMULL_ROM = 'catmull-rom',
  MITCHELL = 'mitchell',
  LANCZOS3 = 'lanczos3'
}

export enum ImageErrorKind {
  DIMENSION_MISMATCH = 'DimensionMismatch',
  INVALID_DIMENSIONS = 'InvalidDimensions',
  IO_ERROR = 'IOError',
  UNSUPPORTED_FORMAT = 'UnsupportedFormat',
  INVALID_PATH = 'InvalidPath',
  DECODE_ERROR = 'DecodeError',
  RESIZE_FAILURE = 'ResizeFailure'
}

/** Decoder output before it is wrapped into a PixelBuffer. */
export interface DecodedImage {
  width: number;
  height: number;
  data: Uint32Array;
}

export type ImageDecoder = (bytes: Uint8Array) => DecodedImage;
