// src/cli/runIconGeneration.ts

import type { ILogFacility, ILogger, ImageProcessor, IProgressBar, SizeTable } from '../@types';
import { renderIcons } from '../core/renderer';
import {
    OutputDirMissingError,
    RenderFailureError,
    SourceMissingError,
    SourceUnavailableError,
    describeError,
} from '../core/errors';
import { directoryExists, filePathExists } from '../utils/storage/storageUtils';

export interface IIconGenerationOptions {
    sourcePath: string;
    outputFolder: string;
    scaleFactor: number;
    sizeTable: SizeTable;
    verbose: boolean;
    logger: ILogger;
    progressBar?: IProgressBar;
    imageProcessor?: ImageProcessor;
}

export type ExitCode = 0 | 1;

export const SUCCESS_SUMMARY = '✓ All icons generated successfully!';
export const FAILURE_SUMMARY = '✗ Failed to generate some icons';

/**
 * Checks both configured paths, renders the icons and reports the outcome.
 * Never creates the output folder.
 *
 * @param {IIconGenerationOptions} options - Paths, scale factor and size table of the run.
 * @return {Promise<ExitCode>} 0 when every icon was written, 1 otherwise.
 */
export async function runIconGeneration(options: IIconGenerationOptions): Promise<ExitCode> {
    const { logger, sourcePath, outputFolder } = options;

    if (!filePathExists(sourcePath)) {
        logger.error(new SourceMissingError(sourcePath).message);
        return 1;
    }
    if (!directoryExists(outputFolder)) {
        logger.error(new OutputDirMissingError(outputFolder).message);
        return 1;
    }

    logger.info(`Generating app icons from ${sourcePath}...`);
    try {
        await renderIcons(options);
    } catch (error) {
        // the renderer already reported where these happened
        if (!(error instanceof SourceUnavailableError || error instanceof RenderFailureError)) {
            logger.error(describeError(error));
        }
        logger.error(FAILURE_SUMMARY);
        return 1;
    }
    logger.success(SUCCESS_SUMMARY);
    return 0;
}

/**
 * Prints the outcome of a run whose log lines were hidden behind a progress bar.
 *
 * @param {ILogger} logger - The logger the run reported to.
 * @param {ExitCode} exitCode - The result of `runIconGeneration`.
 * @param {ILogFacility} [output=console] - Where the outcome is printed.
 */
export function printProgressSummary(logger: ILogger, exitCode: ExitCode, output: ILogFacility = console): void {
    if (exitCode === 0) {
        output.log(`\n${SUCCESS_SUMMARY}`);
    } else {
        output.error(`\n\nFailed reason :: ${logger.errorMessages.join('\n')}`);
    }
}
