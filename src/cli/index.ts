#!/usr/bin/env node
// src/cli/index.ts

import { Command, InvalidArgumentError } from 'commander';
import path from 'node:path';
import { Presets, SingleBar } from 'cli-progress';
import { config } from '../config';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils';
import { printProgressSummary, runIconGeneration } from './runIconGeneration';
import type { IProgressBar } from '../@types';

type CliOptions = {
    source: string;
    output: string;
    scale?: number;
    progress?: boolean;
    verbose?: boolean;
};

function parseScaleFactor(value: string): number {
    const parsed = Number.parseFloat(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Scale factor must be a positive number.');
    }
    return parsed;
}

export const program = new Command();
program
    .name('icon-render')
    .description('Render full-bleed app icon PNGs from a single source image')
    .version('1.0.0')
    .option('-s, --source <file>', 'Source image', config.sourceImage)
    .option('-o, --output <folder>', 'Existing folder the icons are written to', config.outputFolder)
    .option('--scale <factor>', `How much bigger the content is rendered before cropping (Default: ${config.scaleFactor})`, parseScaleFactor)
    .option('-p, --progress', 'Show a progress bar instead of log lines')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async () => {
        const options = program.opts<CliOptions>();
        const verbose = options.verbose || false;
        const showProgress = options.progress || false;
        const scaleFactor = options.scale ?? config.scaleFactor;

        const logger = getLogger('icons', showProgress ? NoopLogFacility : console, verbose);
        let progressBar: IProgressBar | undefined;
        if (showProgress) {
            progressBar = new SingleBar({
                format: 'Rendering |{bar}| {percentage}% || {value}/{total} state: {state}',
                barCompleteChar: '█',
                barIncompleteChar: '░',
                hideCursor: true,
            }, Presets.shades_grey);
        }

        const exitCode = await runIconGeneration({
            sourcePath: path.resolve(options.source),
            outputFolder: path.resolve(options.output),
            scaleFactor,
            sizeTable: config.sizeTable,
            verbose,
            logger,
            progressBar,
        });
        if (showProgress) {
            printProgressSummary(logger, exitCode);
        }
        process.exit(exitCode);
    });

if (require.main === module) {
    program.parseAsync(process.argv).catch((error: unknown) => {
        console.error(error);
        process.exit(1);
    });
}
