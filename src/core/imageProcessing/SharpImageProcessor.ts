// src/core/imageProcessing/SharpImageProcessor.ts

import sharp from 'sharp';
import type { ICropRegion, ImageProcessor, IPngOptions, IRasterImage, ResizeKernel } from '../../@types';

const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Decodes an image file into 8-bit sRGB pixels with an alpha channel, adding an opaque
     * alpha channel when the source has none.
     *
     * @param {string} imagePath - The file path to the image to be decoded.
     * @return {Promise<IRasterImage>} The decoded RGBA raster.
     */
    public async loadImageData(imagePath: string): Promise<IRasterImage> {
        const { data, info } = await sharp(imagePath)
            .toColourspace('srgb')
            .ensureAlpha()
            .raw()
            .toBuffer({ resolveWithObject: true });
        return { data, width: info.width, height: info.height, channels: 4 };
    }

    /**
     * Resizes the whole image to a `side × side` square, ignoring its aspect ratio.
     */
    public async resizeToSquare(image: IRasterImage, side: number, kernel: ResizeKernel): Promise<IRasterImage> {
        return this.toRaster(
            this.fromRaster(image).resize(side, side, { fit: 'fill', kernel }),
        );
    }

    public async extractRegion(image: IRasterImage, region: ICropRegion): Promise<IRasterImage> {
        if (region.left === 0 && region.top === 0 && region.width === image.width && region.height === image.height) {
            return image;
        }
        return this.toRaster(this.fromRaster(image).extract(region));
    }

    /**
     * Pastes the image onto a fully transparent `side × side` canvas, blending with the image's own alpha.
     */
    public async compositeOnCanvas(
        image: IRasterImage,
        side: number,
        offset: { left: number; top: number },
    ): Promise<IRasterImage> {
        const canvas = sharp({
            create: { width: side, height: side, channels: 4, background: TRANSPARENT },
        }).composite([
            {
                input: image.data,
                raw: { width: image.width, height: image.height, channels: image.channels },
                left: offset.left,
                top: offset.top,
                blend: 'over',
            },
        ]);
        return this.toRaster(canvas);
    }

    /**
     * Encodes the raster as PNG and writes it, replacing any existing file.
     *
     * @param {IRasterImage} image - The pixels to encode.
     * @param {string} outputPngPath - The path where the PNG file will be saved.
     * @param {IPngOptions} options - zlib compression settings.
     * @return {Promise<void>} A promise that resolves when the file has been written.
     */
    public async writePng(image: IRasterImage, outputPngPath: string, options: IPngOptions): Promise<void> {
        await this.fromRaster(image)
            .png({
                compressionLevel: options.compressionLevel,
                adaptiveFiltering: options.adaptiveFiltering,
                palette: false,
            })
            .toFile(outputPngPath);
    }

    private fromRaster(image: IRasterImage): sharp.Sharp {
        return sharp(image.data, {
            raw: { width: image.width, height: image.height, channels: image.channels },
        });
    }

    private async toRaster(pipeline: sharp.Sharp): Promise<IRasterImage> {
        const { data, info } = await pipeline.ensureAlpha().raw().toBuffer({ resolveWithObject: true });
        return { data, width: info.width, height: info.height, channels: 4 };
    }
}
