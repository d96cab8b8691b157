// src/core/errors.ts

export type IconRenderErrorCode =
    | 'SOURCE_MISSING'
    | 'OUTPUT_DIR_MISSING'
    | 'SOURCE_UNAVAILABLE'
    | 'RENDER_FAILURE'
    | 'INVALID_OPTION';

export class IconRenderError extends Error {
    constructor(
        message: string,
        readonly code: IconRenderErrorCode,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class SourceMissingError extends IconRenderError {
    constructor(readonly sourcePath: string) {
        super(`Source image '${sourcePath}' not found`, 'SOURCE_MISSING');
    }
}

export class OutputDirMissingError extends IconRenderError {
    constructor(readonly outputFolder: string) {
        super(`Output directory '${outputFolder}' not found`, 'OUTPUT_DIR_MISSING');
    }
}

export class SourceUnavailableError extends IconRenderError {
    constructor(
        readonly sourcePath: string,
        cause: unknown,
    ) {
        super(`Error opening source image: ${describeError(cause)}`, 'SOURCE_UNAVAILABLE', { cause });
    }
}

export class RenderFailureError extends IconRenderError {
    constructor(
        readonly size: number,
        cause: unknown,
    ) {
        super(`Error generating ${size}x${size}: ${describeError(cause)}`, 'RENDER_FAILURE', { cause });
    }
}

export class InvalidOptionError extends IconRenderError {
    constructor(message: string) {
        super(message, 'INVALID_OPTION');
    }
}

/**
 * Returns the message of an error-like value, or its string form.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
