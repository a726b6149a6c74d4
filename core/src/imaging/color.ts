/**
 * Packed color helpers.
 * A Color is `0xAARRGGBB`; byte views are always R, G, B, A order and are
 * produced channel by channel, never by reinterpreting memory.
 */
import { Color } from '../types';

export const BLACK: Color = 0xff000000;
export const DEFAULT_COLOR: Color = BLACK;

export function rgba(r: number, g: number, b: number, a: number): Color {
  return (((a & 0xff) << 24) | ((r & 0xff) << 16) | ((g & 0xff) << 8) | (b & 0xff)) >>> 0;
}

export function rgb(r: number, g: number, b: number): Color {
  return rgba(r, g, b, 0xff);
}

export function red(color: Color): number {
  return (color >>> 16) & 0xff;
}

export function green(color: Color): number {
  return (color >>> 8) & 0xff;
}

export function blue(color: Color): number {
  return color & 0xff;
}

export function alpha(color: Color): number {
  return (color >>> 24) & 0xff;
}

/** Pack colors into a `len*4` R,G,B,A byte array. */
export function packColors(colors: Uint32Array): Uint8Array {
  const bytes = new Uint8Array(colors.length * 4);
  for (let i = 0; i < colors.length; i++) {
    const c = colors[i];
    const off = i * 4;
    bytes[off] = (c >>> 16) & 0xff;
    bytes[off + 1] = (c >>> 8) & 0xff;
    bytes[off + 2] = c & 0xff;
    bytes[off + 3] = (c >>> 24) & 0xff;
  }
  return bytes;
}

/**
 * Unpack R,G,B,A bytes into colors. Writes into `out` when given, which
 * must hold `bytes.length / 4` entries.
 */
export function unpackColors(
  bytes: Uint8Array,
  out: Uint32Array = new Uint32Array(bytes.length >> 2)
): Uint32Array {
  const count = Math.min(out.length, bytes.length >> 2);
  for (let i = 0; i < count; i++) {
    const off = i * 4;
    out[i] = rgba(bytes[off], bytes[off + 1], bytes[off + 2], bytes[off + 3]);
  }
  return out;
}
