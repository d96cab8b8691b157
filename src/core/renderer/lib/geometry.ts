// src/core/renderer/lib/geometry.ts

import type { IIconPlacement } from '../../../@types';

/**
 * Side length the source is resized to before it is cropped back to `size`.
 *
 * @param {number} size - Target side length in pixels.
 * @param {number} scaleFactor - Enlargement factor, e.g. 1.2 for 20% bigger content.
 * @return {number} `floor(size * scaleFactor)`.
 */
export function computeContentSize(size: number, scaleFactor: number): number {
    return Math.floor(size * scaleFactor);
}

/**
 * Works out how resized content of side `contentSize` lands on a `size` canvas.
 *
 * Enlarged content is center-cropped to exactly `size` and pasted at the origin, so the
 * artwork bleeds to every edge. Content that is not larger than the canvas is kept whole
 * and centered, leaving a transparent border.
 *
 * @param {number} size - Canvas side length.
 * @param {number} scaleFactor - Enlargement factor applied to the source.
 * @return {IIconPlacement} The crop region in content coordinates and the paste offset on the canvas.
 */
export function computePlacement(size: number, scaleFactor: number): IIconPlacement {
    const contentSize = computeContentSize(size, scaleFactor);
    if (contentSize > size) {
        const margin = Math.floor((contentSize - size) / 2);
        return {
            contentSize,
            crop: { left: margin, top: margin, width: size, height: size },
            offset: { left: 0, top: 0 },
        };
    }
    const inset = Math.floor((size - contentSize) / 2);
    return {
        contentSize,
        crop: { left: 0, top: 0, width: contentSize, height: contentSize },
        offset: { left: inset, top: inset },
    };
}

/**
 * Human readable description of how much the content grows, as printed at the start of a run.
 */
export function describeScaleFactor(scaleFactor: number): string {
    if (scaleFactor === 1) {
        return `${scaleFactor}x (content size unchanged)`;
    }
    const percent = Number((Math.abs(scaleFactor - 1) * 100).toFixed(1));
    return `${scaleFactor}x (content will be ${percent}% ${scaleFactor > 1 ? 'bigger' : 'smaller'})`;
}
