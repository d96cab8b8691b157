// src/utils/storage/storageUtils.ts

import fs from 'node:fs';

/**
 * Stats a path, treating every "cannot stat" outcome (missing entry, a parent that is a file,
 * no permission) as absent.
 *
 * @param {string} filePath - The path to stat.
 * @return {fs.Stats | undefined} The stats, or undefined when the path cannot be reached.
 */
function statPath(filePath: string): fs.Stats | undefined {
    try {
        return fs.statSync(filePath, { throwIfNoEntry: false });
    } catch (error) {
        if (hasErrorCode(error)) {
            return undefined;
        }
        throw error;
    }
}

/**
 * Checks if a file or directory exists at the given file path.
 *
 * @param {string} filePath - The path to the file or directory.
 * @return {boolean} Returns true if the file or directory exists, otherwise false.
 */
export function filePathExists(filePath: string): boolean {
    return statPath(filePath) !== undefined;
}

/**
 * Checks whether the given path points at an existing directory.
 *
 * @param {string} dirPath - The path to check.
 * @return {boolean} True if the path exists and is a directory.
 */
export function directoryExists(dirPath: string): boolean {
    return statPath(dirPath)?.isDirectory() ?? false;
}

// fs errors may come from another realm, so `instanceof Error` is not reliable here
function hasErrorCode(error: unknown): error is NodeJS.ErrnoException {
    return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
