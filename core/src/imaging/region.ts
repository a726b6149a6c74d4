import type { Renderer } from '../types';
import type { PixelBuffer } from './pixel-buffer';

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

function toUnsigned(value: number): number {
  return Number.isNaN(value) ? 0 : Math.max(0, Math.floor(value));
}

/**
 * A clamped rectangular window into a PixelBuffer.
 *
 * The view borrows its source: create it, use it, drop it. It is not a
 * copy, so pixel writes to the source show through. The rectangle is
 * clamped against the source's current size on every use, so a source
 * that shrinks (or hands off its storage) shrinks the view with it.
 */
export class RegionView {
  private readonly requested: Rect;

  constructor(private readonly source: PixelBuffer, x: number, y: number, w: number, h: number) {
    this.requested = { x: toUnsigned(x), y: toUnsigned(y), w: toUnsigned(w), h: toUnsigned(h) };
  }

  get x(): number {
    return this.bounds().x;
  }

  get y(): number {
    return this.bounds().y;
  }

  get w(): number {
    return this.bounds().w;
  }

  get h(): number {
    return this.bounds().h;
  }

  /** The requested rectangle clamped into the source as it is now. */
  bounds(): Rect {
    const width = this.source.width();
    const height = this.source.height();
    const { x, y, w, h } = this.requested;

    const x1 = Math.min(x, width);
    const y1 = Math.min(y, height);
    const x2 = Math.max(x1, Math.min(x + w, width));
    const y2 = Math.max(y1, Math.min(y + h, height));

    return { x: x1, y: y1, w: x2 - x1, h: y2 - y1 };
  }

  /**
   * Blit the region one scan line at a time. Each line hands the surface
   * the rest of the source array from the row's offset; the offset then
   * moves by the source stride, not by `w`.
   */
  draw(surface: Renderer, x: number, y: number): void {
    const region = this.bounds();
    const data = this.source.data();
    const stride = this.source.width();
    let offset = region.y * stride + region.x;
    const lastOffset = Math.min((region.y + region.h) * stride + region.x, data.length);
    let row = y;
    while (offset < lastOffset) {
      surface.image(x, row, region.w, 1, data.subarray(offset));
      offset += stride;
      row++;
    }
  }

  /** Copy the region's pixels into a compact `w*h` array. */
  copyPixels(): Uint32Array {
    const { x, y, w, h } = this.bounds();
    const data = this.source.data();
    const stride = this.source.width();
    const out = new Uint32Array(w * h);
    for (let row = 0; row < h; row++) {
      const start = (y + row) * stride + x;
      out.set(data.subarray(start, start + w), row * w);
    }
    return out;
  }
}
