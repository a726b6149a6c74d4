import path from 'path';
import { PixelBuffer, ResizeFilter, isImageError, red, green, blue } from '../core/src/index';

function main() {
    console.log('--- Loading and resizing an image ---');

    const imagePath = process.argv[2];
    if (!imagePath) {
        console.error('Usage: 01-resize-image <image.{bmp,png,jpg}>');
        process.exitCode = 1;
        return;
    }

    try {
        const image = PixelBuffer.fromPath(imagePath);
        console.log('Image:', path.basename(imagePath));
        console.log('Size:', `${image.width()}x${image.height()}`);

        const thumb = image.resize(32, 32, ResizeFilter.LANCZOS3);

        // Centre crop of the original, pasted into the thumbnail's corner
        const canvas = PixelBuffer.create(64, 64);
        thumb.draw(canvas, 0, 0);
        image
            .roi(Math.floor(image.width() / 2) - 16, Math.floor(image.height() / 2) - 16, 32, 32)
            .draw(canvas, 32, 32);
        canvas.sync();

        const c = canvas.data()[0];
        console.log('\n--- Result ---');
        console.log('Canvas:', `${canvas.width()}x${canvas.height()}`);
        console.log('Top-left pixel:', `rgb(${red(c)}, ${green(c)}, ${blue(c)})`);
    } catch (error) {
        if (isImageError(error)) {
            console.error(`[${error.kind}]`, error.message);
        } else {
            console.error('Unexpected failure:', error);
        }
        process.exitCode = 1;
    }
}

main();
