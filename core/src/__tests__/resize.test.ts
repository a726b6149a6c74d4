import { PixelBuffer } from '../imaging/pixel-buffer';
import { resample, FILTER_SUPPORT } from '../imaging/resample';
import { resizePixels } from '../imaging/resize';
import { rgb, rgba } from '../imaging/color';
import { ImageError } from '../errors';
import { ImageErrorKind, ResizeFilter } from '../types';

const ALL_FILTERS = Object.values(ResizeFilter);

function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    return undefined;
}

describe('resize', () => {
    describe('output size', () => {
        const src = PixelBuffer.fromColor(5, 3, rgb(40, 80, 120));
        const targets: Array<[number, number]> = [[0, 0], [1, 1], [5, 3], [10, 6], [2, 7], [0, 4], [4, 0]];

        it.each(ALL_FILTERS)('should return exactly w*h pixels with %s', filter => {
            for (const [w, h] of targets) {
                const out = src.resize(w, h, filter);
                expect(out.width()).toBe(w);
                expect(out.height()).toBe(h);
                expect(out.data()).toHaveLength(w * h);
            }
        });

        it('should return an empty buffer for 0x0 even from an empty source', () => {
            const out = PixelBuffer.empty().resize(0, 0, ResizeFilter.LANCZOS3);

            expect(out.data()).toHaveLength(0);
        });
    });

    describe('pixel values', () => {
        it.each(ALL_FILTERS)('should preserve a solid color with %s', filter => {
            const c = rgba(12, 200, 77, 180);
            const out = PixelBuffer.fromColor(4, 4, c).resize(7, 3, filter);

            expect(Array.from(out.data()).every(v => v === c)).toBe(true);
        });

        it('should pick nearest samples when shrinking with point', () => {
            const a = rgb(1, 0, 0), b = rgb(2, 0, 0), c = rgb(3, 0, 0), d = rgb(4, 0, 0);
            const out = PixelBuffer.fromData(4, 1, [a, b, c, d]).resize(2, 1, ResizeFilter.POINT);

            expect(Array.from(out.data())).toEqual([b, d]);
        });

        it('should duplicate pixels when doubling with point', () => {
            const a = rgb(10, 0, 0), b = rgb(20, 0, 0);
            const out = PixelBuffer.fromData(2, 1, [a, b]).resize(4, 2, ResizeFilter.POINT);

            expect(Array.from(out.data())).toEqual([a, a, b, b, a, a, b, b]);
        });

        it('should average two pixels when halving with triangle', () => {
            const out = PixelBuffer.fromData(2, 1, [rgb(0, 0, 0), rgb(100, 50, 200)])
                .resize(1, 1, ResizeFilter.TRIANGLE);

            expect(out.data()[0]).toBe(rgb(50, 25, 100));
        });

        it('should keep an identity resize unchanged', () => {
            const data = Uint32Array.of(rgb(1, 2, 3), rgb(4, 5, 6), rgb(7, 8, 9), rgb(10, 11, 12));
            const out = PixelBuffer.fromData(2, 2, data.slice()).resize(2, 2, ResizeFilter.TRIANGLE);

            expect(Array.from(out.data())).toEqual(Array.from(data));
        });

        it('should leave the source untouched', () => {
            const src = PixelBuffer.fromColor(3, 3, rgb(5, 5, 5));
            src.resize(6, 6, ResizeFilter.MITCHELL);

            expect(src.width()).toBe(3);
            expect(Array.from(src.data()).every(v => v === rgb(5, 5, 5))).toBe(true);
        });
    });

    describe('failures', () => {
        it('should fail with ResizeFailure from an empty source to a non-empty target', () => {
            const err = catchError(() => PixelBuffer.create(0, 4).resize(2, 2, ResizeFilter.TRIANGLE));

            expect(err).toBeInstanceOf(ImageError);
            expect(err instanceof ImageError && err.kind).toBe(ImageErrorKind.RESIZE_FAILURE);
            expect(err instanceof ImageError && err.message).toBe(
                'failed to resize 0x4 to 2x2 (triangle): cannot resample an empty 0x4 source'
            );
        });

        it('should fail with ResizeFailure for negative target dimensions', () => {
            const err = catchError(() => PixelBuffer.create(2, 2).resize(-1, 2, ResizeFilter.POINT));

            expect(err instanceof ImageError && err.kind).toBe(ImageErrorKind.RESIZE_FAILURE);
        });

        it('should keep the engine error as the cause', () => {
            const err = catchError(() =>
                resizePixels(PixelBuffer.create(0, 0), 1, 1, ResizeFilter.POINT)
            );

            expect(err instanceof ImageError && err.cause).toBeInstanceOf(Error);
        });
    });

    describe('limits and unknown filters', () => {
        it('should fail with ResizeFailure for an unknown filter', () => {
            const buf = PixelBuffer.create(2, 2);
            const err = catchError(() => Reflect.apply(buf.resize, buf, [1, 1, 'bogus']));

            expect(err instanceof ImageError && err.kind).toBe(ImageErrorKind.RESIZE_FAILURE);
            expect(err instanceof ImageError && err.message).toBe(
                'failed to resize 2x2 to 1x1 (bogus): unknown resize filter: bogus'
            );
        });

        it('should fail with ResizeFailure for a target past the pixel limit', () => {
            const err = catchError(() =>
                PixelBuffer.create(1, 1).resize(100000, 100000, ResizeFilter.POINT)
            );

            expect(err instanceof ImageError && err.kind).toBe(ImageErrorKind.RESIZE_FAILURE);
            expect(err instanceof ImageError && err.message).toBe(
                'failed to resize 1x1 to 100000x100000 (point): invalid target dimensions'
            );
        });
    });
});

describe('resample', () => {
    it('should know a support radius for every filter', () => {
        for (const filter of ALL_FILTERS) {
            expect(FILTER_SUPPORT[filter]).toBeGreaterThanOrEqual(0);
        }
    });

    it('should reject buffers that disagree with the dimensions', () => {
        const opts = { srcWidth: 2, srcHeight: 2, dstWidth: 1, dstHeight: 1, filter: ResizeFilter.POINT };

        expect(() => resample(new Uint8Array(15), new Uint8Array(4), opts)).toThrow(
            'source holds 15 bytes, expected 16'
        );
        expect(() => resample(new Uint8Array(16), new Uint8Array(3), opts)).toThrow(
            'destination holds 3 bytes, expected 4'
        );
    });

    it('should write channels in R, G, B, A order', () => {
        const src = Uint8Array.of(1, 2, 3, 4);
        const dst = new Uint8Array(8);

        resample(src, dst, { srcWidth: 1, srcHeight: 1, dstWidth: 2, dstHeight: 1, filter: ResizeFilter.LANCZOS3 });

        expect(Array.from(dst)).toEqual([1, 2, 3, 4, 1, 2, 3, 4]);
    });
});
