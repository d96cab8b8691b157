// src/core/renderer/index.ts

import type { IRenderOptions, IRenderSummary } from '../../@types';

import { InvalidOptionError } from '../errors';
import { RenderStateMachine } from './stateMachine';

/**
 * Renders every icon of the size table from the source image into the output folder.
 * The output folder must already exist.
 *
 * @param {IRenderOptions} options - The options to configure the render.
 * @return {Promise<IRenderSummary>} The files written and the sizes skipped.
 * @throws {IconRenderError} On the first failure; files written before it stay on disk.
 */
export async function renderIcons(options: IRenderOptions): Promise<IRenderSummary> {
    if (!Number.isFinite(options.scaleFactor) || options.scaleFactor <= 0) {
        throw new InvalidOptionError(`Scale factor must be a positive number, got ${options.scaleFactor}`);
    }
    const stateMachine = new RenderStateMachine(options);
    await stateMachine.run();
    return stateMachine.summary;
}
