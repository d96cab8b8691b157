// src/index.ts

export * from './@types';
export { config, DEFAULT_SIZE_TABLE } from './config';
export { renderIcons } from './core/renderer';
export { computeContentSize, computePlacement } from './core/renderer/lib/geometry';
export { resolveOutputFiles } from './core/renderer/lib/sizeTable';
export { SharpImageProcessor } from './core/imageProcessing/SharpImageProcessor';
export * from './core/errors';
export { FAILURE_SUMMARY, printProgressSummary, runIconGeneration, SUCCESS_SUMMARY } from './cli/runIconGeneration';
export type { ExitCode, IIconGenerationOptions } from './cli/runIconGeneration';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils';
