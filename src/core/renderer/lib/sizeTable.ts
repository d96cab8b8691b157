// src/core/renderer/lib/sizeTable.ts

import type { IconSizeEntry, SizeTable } from '../../../@types';

export function isRenderable(entry: IconSizeEntry): entry is IconSizeEntry & { filename: string } {
    return entry.filename !== null;
}

/**
 * Maps each output file to the size that ends up written there. Later entries win,
 * matching the order in which files are overwritten during a run.
 *
 * @param {SizeTable} sizeTable - The ordered size table.
 * @return {Map<string, number>} File name to the size of its final render.
 */
export function resolveOutputFiles(sizeTable: SizeTable): Map<string, number> {
    const files = new Map<string, number>();
    for (const entry of sizeTable) {
        if (isRenderable(entry)) {
            files.set(entry.filename, entry.size);
        }
    }
    return files;
}
