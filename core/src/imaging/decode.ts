/**
 * Image decoding and extension dispatch.
 * Supports BMP (via bmp-js), JPEG (via jpeg-js) and PNG (via pngjs).
 */
import path from 'path';
import * as bmp from 'bmp-js';
import jpeg from 'jpeg-js';
import { PNG } from 'pngjs';
import { DecodedImage, ImageDecoder, ImageErrorKind } from '../types';
import { ImageError, describeError } from '../errors';
import { rgba, unpackColors } from './color';

const decoders = new Map<string, ImageDecoder>();

// A lone UTF-16 surrogate cannot be represented as text.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Register `decoder` for one or more extensions (without the dot).
 * Extensions are stored lower-cased; a later registration replaces an
 * earlier one.
 */
export function registerDecoder(extensions: string | string[], decoder: ImageDecoder): void {
  for (const ext of Array.isArray(extensions) ? extensions : [extensions]) {
    decoders.set(ext.toLowerCase(), decoder);
  }
}

export function decoderFor(extension: string): ImageDecoder | undefined {
  return decoders.get(extension.toLowerCase());
}

export function registeredExtensions(): string[] {
  return [...decoders.keys()];
}

/**
 * Pick the decoder for `filePath` by its extension alone. No bytes are read
 * here, so a rejected path never touches the file.
 */
export function resolveDecoder(filePath: unknown): ImageDecoder {
  if (typeof filePath !== 'string') {
    throw new ImageError(ImageErrorKind.INVALID_PATH, 'image path is not a string');
  }
  const ext = path.extname(filePath);
  if (ext.length <= 1) {
    throw new ImageError(ImageErrorKind.UNSUPPORTED_FORMAT, `no image extension: ${filePath}`);
  }
  return resolveExtension(ext.slice(1));
}

export function resolveExtension(extension: string): ImageDecoder {
  if (LONE_SURROGATE.test(extension)) {
    throw new ImageError(ImageErrorKind.INVALID_PATH, 'image extension not valid unicode');
  }
  const decoder = decoderFor(extension);
  if (!decoder) {
    throw new ImageError(
      ImageErrorKind.UNSUPPORTED_FORMAT,
      `unknown image extension: ${extension.toLowerCase()}`
    );
  }
  return decoder;
}

/** Run a decoder, reporting any failure as a `DecodeError` naming `source`. */
export function decodeWith(decoder: ImageDecoder, bytes: Uint8Array, source: string): DecodedImage {
  try {
    return decoder(bytes);
  } catch (err) {
    throw new ImageError(
      ImageErrorKind.DECODE_ERROR,
      `failed to decode ${source}: ${describeError(err)}`,
      { cause: err }
    );
  }
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function decodeBmp(bytes: Uint8Array): DecodedImage {
  const decoded = bmp.decode(toBuffer(bytes));
  const { width, height } = decoded;
  const src = decoded.data;
  const data = new Uint32Array(width * height);
  for (let i = 0; i < data.length; i++) {
    const off = i * 4;
    // A, B, G, R; bmp-js leaves A at 0 for most depths, so pixels are opaque
    data[i] = rgba(src[off + 3], src[off + 2], src[off + 1], 0xff);
  }
  return { width, height, data };
}

export function decodeJpeg(bytes: Uint8Array): DecodedImage {
  const decoded = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: true });
  return {
    width: decoded.width,
    height: decoded.height,
    data: unpackColors(decoded.data),
  };
}

export function decodePng(bytes: Uint8Array): DecodedImage {
  const png = PNG.sync.read(toBuffer(bytes));
  return {
    width: png.width,
    height: png.height,
    data: unpackColors(png.data),
  };
}

registerDecoder('bmp', decodeBmp);
registerDecoder(['jpg', 'jpeg'], decodeJpeg);
registerDecoder('png', decodePng);
