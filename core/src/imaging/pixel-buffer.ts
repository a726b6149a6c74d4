import fs from 'fs';
import { Color, DecodedImage, ImageErrorKind, Renderer, ResizeFilter } from '../types';
import { ImageError, assertDimensions, describeError } from '../errors';
import { DEFAULT_COLOR } from './color';
import { decodeWith, resolveDecoder, resolveExtension } from './decode';
import { RegionView } from './region';
import { resizePixels } from './resize';

/**
 * An owned, row-major array of packed colors.
 * `data().length === width() * height()` holds for every instance.
 */
export class PixelBuffer implements Renderer {
  private w: number;
  private h: number;
  private pixels: Uint32Array;

  private constructor(width: number, height: number, pixels: Uint32Array) {
    this.w = width;
    this.h = height;
    this.pixels = pixels;
  }

  /** A buffer filled with opaque black. */
  static create(width: number, height: number): PixelBuffer {
    return PixelBuffer.fromColor(width, height, DEFAULT_COLOR);
  }

  static empty(): PixelBuffer {
    return PixelBuffer.create(0, 0);
  }

  static fromColor(width: number, height: number, color: Color): PixelBuffer {
    assertDimensions(width, height);
    return new PixelBuffer(width, height, new Uint32Array(width * height).fill(color));
  }

  /**
   * Take ownership of `data`. A typed array is adopted as is, so the caller
   * must not keep writing to it; a plain array is copied.
   */
  static fromData(width: number, height: number, data: Uint32Array | readonly Color[]): PixelBuffer {
    assertDimensions(width, height);
    if (data.length !== width * height) {
      throw new ImageError(
        ImageErrorKind.DIMENSION_MISMATCH,
        `not enough or too much data given compared to width and height: ` +
          `${data.length} pixels for ${width}x${height}`
      );
    }
    const pixels = data instanceof Uint32Array ? data : Uint32Array.from(data);
    return new PixelBuffer(width, height, pixels);
  }

  /**
   * Load a BMP, JPEG or PNG file. The format is chosen from the extension,
   * case-insensitively; the whole file is read before decoding.
   */
  static fromPath(filePath: string): PixelBuffer {
    const decoder = resolveDecoder(filePath);
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(filePath);
    } catch (err) {
      throw new ImageError(
        ImageErrorKind.IO_ERROR,
        `failed to read image ${filePath}: ${describeError(err)}`,
        { cause: err }
      );
    }
    return PixelBuffer.fromDecoded(decodeWith(decoder, bytes, filePath));
  }

  /** Decode bytes already in memory, dispatching on `extension` (no dot). */
  static fromBytes(bytes: Uint8Array, extension: string): PixelBuffer {
    const decoder = resolveExtension(extension);
    return PixelBuffer.fromDecoded(decodeWith(decoder, bytes, `.${extension} data`));
  }

  private static fromDecoded(image: DecodedImage): PixelBuffer {
    return PixelBuffer.fromData(image.width, image.height, image.data);
  }

  width(): number {
    return this.w;
  }

  height(): number {
    return this.h;
  }

  data(): Uint32Array {
    return this.pixels;
  }

  dataMut(): Uint32Array {
    return this.pixels;
  }

  /** Nothing to flush for a software buffer. */
  sync(): boolean {
    return true;
  }

  pixel(x: number, y: number): Color | undefined {
    if (!this.contains(x, y)) return undefined;
    return this.pixels[y * this.w + x];
  }

  /** Out-of-bounds writes are dropped. */
  setPixel(x: number, y: number, color: Color): void {
    if (this.contains(x, y)) {
      this.pixels[y * this.w + x] = color;
    }
  }

  /**
   * Copy a `w`×`h` block onto this buffer at (`x`, `y`), clipping whatever
   * falls outside. Source rows are `w` apart.
   */
  image(x: number, y: number, w: number, h: number, pixels: Uint32Array): void {
    const startCol = Math.max(0, -x);
    const endCol = Math.min(w, this.w - x);
    if (startCol >= endCol) return;

    for (let row = 0; row < h; row++) {
      const dy = y + row;
      if (dy < 0) continue;
      if (dy >= this.h) break;
      const srcRow = row * w;
      const end = Math.min(srcRow + endCol, pixels.length);
      if (end <= srcRow + startCol) break;
      this.pixels.set(pixels.subarray(srcRow + startCol, end), dy * this.w + x + startCol);
    }
  }

  /** Blit the whole buffer onto `surface` with its top-left at (`x`, `y`). */
  draw(surface: Renderer, x: number, y: number): void {
    surface.image(x, y, this.w, this.h, this.pixels);
  }

  /** A clamped view of part of the buffer; never fails. */
  roi(x: number, y: number, w: number, h: number): RegionView {
    return new RegionView(this, x, y, w, h);
  }

  /** An owned copy of the clamped region. */
  crop(x: number, y: number, w: number, h: number): PixelBuffer {
    const region = this.roi(x, y, w, h);
    const { w: width, h: height } = region.bounds();
    return PixelBuffer.fromData(width, height, region.copyPixels());
  }

  resize(width: number, height: number, filter: ResizeFilter): PixelBuffer {
    return PixelBuffer.fromData(width, height, resizePixels(this, width, height, filter));
  }

  /** Hand the backing array to the caller; the buffer becomes 0×0. */
  intoData(): Uint32Array {
    const pixels = this.pixels;
    this.w = 0;
    this.h = 0;
    this.pixels = new Uint32Array(0);
    return pixels;
  }

  private contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.w && y < this.h;
  }
}
