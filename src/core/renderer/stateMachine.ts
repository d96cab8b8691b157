// src/core/renderer/stateMachine.ts

import type { IconSizeEntry, IGeneratedIcon, ImageProcessor, IRasterImage, IRenderOptions, IRenderSummary } from '../../@types';
import path from 'node:path';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine';
import { RenderStates } from '../../stateMachine/definedStates';
import { SharpImageProcessor } from '../imageProcessing/SharpImageProcessor';
import { RenderFailureError, SourceUnavailableError } from '../errors';
import { computePlacement, describeScaleFactor } from './lib/geometry';
import { isRenderable, resolveOutputFiles } from './lib/sizeTable';
import { config } from '../../config';

export class RenderStateMachine extends AbstractStateMachine<RenderStates, IRenderOptions> {
    private readonly imageProcessor: ImageProcessor;
    private source: IRasterImage | null = null;
    private readonly generated: IGeneratedIcon[] = [];
    private readonly skipped: number[] = [];

    constructor(options: IRenderOptions) {
        super(RenderStates.INIT, options);
        this.imageProcessor = options.imageProcessor ?? new SharpImageProcessor();

        this.stateTransitions = [
            { state: RenderStates.LOAD_SOURCE, handler: this.loadSource },
            { state: RenderStates.RENDER_ICONS, handler: this.renderIcons },
        ];
    }

    get summary(): IRenderSummary {
        return { generated: [...this.generated], skipped: [...this.skipped] };
    }

    protected getCompletionState(): RenderStates {
        return RenderStates.COMPLETED;
    }

    protected getErrorState(): RenderStates {
        return RenderStates.ERROR;
    }

    protected getTotalSteps(): number {
        return super.getTotalSteps() + this.options.sizeTable.filter(isRenderable).length;
    }

    /**
     * Decodes the source image once; every size is rendered from this raster.
     *
     * @return {Promise<void>} A promise that resolves when the source has been decoded.
     * @throws {SourceUnavailableError} If the file cannot be read or decoded as an image.
     */
    private async loadSource(): Promise<void> {
        const { logger, sourcePath, scaleFactor } = this.options;
        let source: IRasterImage;
        try {
            source = await this.imageProcessor.loadImageData(sourcePath);
        } catch (error) {
            const failure = new SourceUnavailableError(sourcePath, error);
            logger.error(failure.message);
            throw failure;
        }
        this.source = source;
        logger.info(`Source image: ${source.width}x${source.height} pixels, scale factor ${describeScaleFactor(scaleFactor)}`);
    }

    /**
     * Walks the size table in order. The first failing size stops the run; later entries are not attempted.
     */
    private async renderIcons(): Promise<void> {
        const { logger, progressBar, sizeTable } = this.options;
        const renderable = sizeTable.filter(isRenderable).length;
        const files = resolveOutputFiles(sizeTable).size;
        if (files < renderable) {
            logger.debug(`${renderable} sizes share ${files} file names; later sizes overwrite earlier ones`);
        }
        for (const entry of sizeTable) {
            if (!isRenderable(entry)) {
                logger.debug(`Skipping ${entry.size}x${entry.size}: no output file assigned`);
                this.skipped.push(entry.size);
                continue;
            }
            try {
                this.generated.push(await this.renderIcon(entry));
            } catch (error) {
                const failure = new RenderFailureError(entry.size, error);
                logger.error(`✗ ${failure.message}`);
                throw failure;
            }
            logger.success(`✓ Generated ${entry.size}x${entry.size} -> ${entry.filename}`);
            progressBar?.increment({ state: RenderStates.RENDER_ICONS, icon: entry.filename });
        }
    }

    private async renderIcon({ size, filename }: IconSizeEntry & { filename: string }): Promise<IGeneratedIcon> {
        if (!Number.isInteger(size) || size <= 0) {
            throw new Error(`icon size must be a positive integer, got ${size}`);
        }
        if (!this.source) {
            throw new Error('source image has not been loaded');
        }
        const placement = computePlacement(size, this.options.scaleFactor);
        if (placement.contentSize < 1) {
            throw new Error(`scaled content for ${size}px is empty`);
        }

        const resized = await this.imageProcessor.resizeToSquare(this.source, placement.contentSize, config.resampleKernel);
        const cropped = await this.imageProcessor.extractRegion(resized, placement.crop);
        const canvas = await this.imageProcessor.compositeOnCanvas(cropped, size, placement.offset);

        const outputPath = path.join(this.options.outputFolder, filename);
        await this.imageProcessor.writePng(canvas, outputPath, config.imageCompression);
        this.options.logger.debug(`Wrote ${outputPath} (content ${placement.contentSize}px, crop ${placement.crop.left},${placement.crop.top})`);
        return { size, filename, outputPath };
    }
}
