import fs from 'node:fs';
import path from 'node:path';
import type { ILogFacility } from '../src/@types';
import { printProgressSummary, runIconGeneration } from '../src/cli/runIconGeneration';
import { createTempDir, writeSolidPng } from './helpers/imageFixtures';
import { MockLogger } from './helpers/mockLogger';

describe('runIconGeneration', () => {
    let workDir: string;
    let sourcePath: string;
    let outputFolder: string;
    let logger: MockLogger;

    beforeEach(() => {
        workDir = createTempDir();
        sourcePath = path.join(workDir, 'app_icon_source.png');
        outputFolder = path.join(workDir, 'AppIcon.appiconset');
        logger = new MockLogger();
    });

    afterEach(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
    });

    it('exits 1 without touching the output folder when the source is missing', async () => {
        fs.mkdirSync(outputFolder);
        fs.writeFileSync(path.join(outputFolder, 'Contents.json'), '{}');

        const exitCode = await runIconGeneration({
            sourcePath,
            outputFolder,
            scaleFactor: 1.2,
            sizeTable: [{ size: 29, filename: 'a.png' }],
            verbose: false,
            logger,
        });

        expect(exitCode).toBe(1);
        expect(logger.errorMessages).toEqual([`Source image '${sourcePath}' not found`]);
        expect(fs.readdirSync(outputFolder)).toEqual(['Contents.json']);
    });

    it('exits 1 when a parent of the source path is a file', async () => {
        fs.mkdirSync(outputFolder);
        const parentFile = path.join(workDir, 'not-a-folder');
        fs.writeFileSync(parentFile, 'text');
        const nestedSource = path.join(parentFile, 'app_icon_source.png');

        const exitCode = await runIconGeneration({
            sourcePath: nestedSource,
            outputFolder,
            scaleFactor: 1.2,
            sizeTable: [{ size: 29, filename: 'a.png' }],
            verbose: false,
            logger,
        });

        expect(exitCode).toBe(1);
        expect(logger.errorMessages).toEqual([`Source image '${nestedSource}' not found`]);
        expect(fs.readdirSync(outputFolder)).toEqual([]);
    });

    it('exits 1 and does not create a missing output folder', async () => {
        await writeSolidPng(sourcePath, 32, 32, { r: 0, g: 0, b: 255, alpha: 1 });

        const exitCode = await runIconGeneration({
            sourcePath,
            outputFolder,
            scaleFactor: 1.2,
            sizeTable: [{ size: 29, filename: 'a.png' }],
            verbose: false,
            logger,
        });

        expect(exitCode).toBe(1);
        expect(logger.errorMessages).toEqual([`Output directory '${outputFolder}' not found`]);
        expect(fs.existsSync(outputFolder)).toBe(false);
    });

    it('exits 0 once every icon is written', async () => {
        await writeSolidPng(sourcePath, 32, 32, { r: 0, g: 0, b: 255, alpha: 1 });
        fs.mkdirSync(outputFolder);

        const exitCode = await runIconGeneration({
            sourcePath,
            outputFolder,
            scaleFactor: 1.2,
            sizeTable: [
                { size: 20, filename: null },
                { size: 29, filename: 'a.png' },
                { size: 40, filename: 'b.png' },
            ],
            verbose: false,
            logger,
        });

        expect(exitCode).toBe(0);
        expect(fs.readdirSync(outputFolder).sort()).toEqual(['a.png', 'b.png']);
        expect(logger.infoMessages[0]).toBe(`Generating app icons from ${sourcePath}...`);
        expect(logger.successMessages).toEqual([
            '✓ Generated 29x29 -> a.png',
            '✓ Generated 40x40 -> b.png',
            '✓ All icons generated successfully!',
        ]);
    });

    it('exits 1 when a size fails to render', async () => {
        await writeSolidPng(sourcePath, 32, 32, { r: 0, g: 0, b: 255, alpha: 1 });
        fs.mkdirSync(outputFolder);

        const exitCode = await runIconGeneration({
            sourcePath,
            outputFolder,
            scaleFactor: 1.2,
            sizeTable: [
                { size: 0, filename: 'zero.png' },
                { size: 29, filename: 'a.png' },
            ],
            verbose: false,
            logger,
        });

        expect(exitCode).toBe(1);
        expect(fs.readdirSync(outputFolder)).toEqual([]);
        expect(logger.errorMessages).toEqual([
            '✗ Error generating 0x0: icon size must be a positive integer, got 0',
            '✗ Failed to generate some icons',
        ]);
    });

    it('reports an invalid scale factor', async () => {
        await writeSolidPng(sourcePath, 32, 32, { r: 0, g: 0, b: 255, alpha: 1 });
        fs.mkdirSync(outputFolder);

        const exitCode = await runIconGeneration({
            sourcePath,
            outputFolder,
            scaleFactor: -1,
            sizeTable: [{ size: 29, filename: 'a.png' }],
            verbose: false,
            logger,
        });

        expect(exitCode).toBe(1);
        expect(logger.errorMessages).toEqual([
            'Scale factor must be a positive number, got -1',
            '✗ Failed to generate some icons',
        ]);
    });

    describe('printProgressSummary', () => {
        function recordingFacility(): ILogFacility & { logged: string[]; errors: string[] } {
            const logged: string[] = [];
            const errors: string[] = [];
            return {
                logged,
                errors,
                log: (...input: unknown[]) => {
                    logged.push(input.map(String).join(' '));
                },
                warn: () => {},
                error: (...input: unknown[]) => {
                    errors.push(input.map(String).join(' '));
                },
            };
        }

        it('prints the success line after a successful run', () => {
            const output = recordingFacility();
            printProgressSummary(logger, 0, output);
            expect(output.logged).toEqual(['\n✓ All icons generated successfully!']);
            expect(output.errors).toEqual([]);
        });

        it('prints the collected errors after a failed run', () => {
            const output = recordingFacility();
            logger.error('✗ Error generating 0x0: icon size must be a positive integer, got 0');
            logger.error('✗ Failed to generate some icons');
            printProgressSummary(logger, 1, output);
            expect(output.logged).toEqual([]);
            expect(output.errors).toEqual([
                '\n\nFailed reason :: ✗ Error generating 0x0: icon size must be a positive integer, got 0\n✗ Failed to generate some icons',
            ]);
        });
    });
});
