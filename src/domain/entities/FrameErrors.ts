/**
 * Raised when a template key or path does not resolve to a readable file.
 */
export class TemplateNotFoundError extends Error {
    constructor(public readonly template: string) {
        super(`Template not found: ${template}`);
        this.name = 'TemplateNotFoundError';
    }
}

/**
 * Any failure of the headless rendering surface: launch, rasterization or
 * moving the produced file. The underlying error is kept as `cause`.
 */
export class FrameRenderError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'FrameRenderError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
