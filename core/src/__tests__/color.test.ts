import { alpha, blue, green, packColors, red, rgb, rgba, unpackColors } from '../imaging/color';
import { ImageError, assertDimensions, describeError, isImageError } from '../errors';
import { ImageErrorKind } from '../types';

describe('color', () => {
    it('should pack channels as 0xAARRGGBB', () => {
        expect(rgba(0x11, 0x22, 0x33, 0x44)).toBe(0x44112233);
        expect(rgb(1, 2, 3)).toBe(0xff010203);
    });

    it('should read channels back', () => {
        const c = rgba(200, 150, 100, 50);

        expect([red(c), green(c), blue(c), alpha(c)]).toEqual([200, 150, 100, 50]);
    });

    it('should convert colors to R, G, B, A bytes and back', () => {
        const colors = Uint32Array.of(rgba(1, 2, 3, 4), rgba(250, 251, 252, 253));
        const bytes = packColors(colors);

        expect(Array.from(bytes)).toEqual([1, 2, 3, 4, 250, 251, 252, 253]);
        expect(Array.from(unpackColors(bytes))).toEqual(Array.from(colors));
    });

    it('should unpack into a caller-supplied array', () => {
        const out = new Uint32Array(1);

        expect(unpackColors(Uint8Array.of(9, 8, 7, 6), out)).toBe(out);
        expect(out[0]).toBe(rgba(9, 8, 7, 6));
    });
});

describe('ImageError', () => {
    it('should carry its kind and cause', () => {
        const cause = new Error('disk on fire');
        const err = new ImageError(ImageErrorKind.IO_ERROR, 'failed to read image x.png', { cause });

        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe('ImageError');
        expect(err.cause).toBe(cause);
        expect(isImageError(err)).toBe(true);
        expect(isImageError(err, ImageErrorKind.IO_ERROR)).toBe(true);
        expect(isImageError(err, ImageErrorKind.DECODE_ERROR)).toBe(false);
        expect(isImageError(cause)).toBe(false);
    });

    it('should describe non-Error values', () => {
        expect(describeError(new Error('boom'))).toBe('boom');
        expect(describeError('plain')).toBe('plain');
    });

    it('should accept zero and reject negative dimensions', () => {
        expect(() => assertDimensions(0, 0)).not.toThrow();
        expect(() => assertDimensions(3, -1)).toThrow('invalid image dimensions 3x-1');
    });
});
