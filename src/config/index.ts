// src/config/index.ts

import type { ResizeKernel, SizeTable } from '../@types';

/**
 * Icon sizes rendered by default, in the order they are written.
 * A `null` filename marks a size the app currently has no slot for.
 */
export const DEFAULT_SIZE_TABLE: SizeTable = [
    { size: 20, filename: null },
    { size: 29, filename: 'icon-settings.png' },
    { size: 40, filename: 'icon-spotlight.png' },
    { size: 58, filename: 'icon-settings@2x.png' },
    { size: 60, filename: 'icon-notification@3x.png' },
    { size: 76, filename: 'icon-ipad.png' },
    { size: 80, filename: 'icon-spotlight@2x.png' },
    { size: 87, filename: 'icon-settings@3x.png' },
    { size: 120, filename: 'icon-iphone@2x.png' },
    { size: 152, filename: 'icon-ipad@2x.png' },
    { size: 167, filename: 'icon-ipad-pro@2x.png' },
    { size: 180, filename: 'icon-iphone@3x.png' },
    { size: 1024, filename: 'icon-marketing.png' },
];

const RESAMPLE_KERNEL: ResizeKernel = 'lanczos3';

export const config = {
    sourceImage: 'app_icon_source.png',
    outputFolder: 'Assets.xcassets/AppIcon.appiconset',
    scaleFactor: 1.2, // 1.2 = content rendered 20% bigger, then cropped
    resampleKernel: RESAMPLE_KERNEL,
    imageCompression: {
        compressionLevel: 9,
        adaptiveFiltering: true,
    },
    sizeTable: DEFAULT_SIZE_TABLE,
};
