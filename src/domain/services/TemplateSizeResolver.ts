import { FrameSize } from '../entities/Template';

const SIZE_TOKEN = /^(\d+)x(\d+)$/;

/**
 * Parses a "WIDTHxHEIGHT" token. Returns null for anything else,
 * including zero dimensions.
 */
export function parseFrameSize(token: string): FrameSize | null {
    const match = SIZE_TOKEN.exec(token.trim());
    if (!match) {
        return null;
    }
    const width = parseInt(match[1], 10);
    const height = parseInt(match[2], 10);
    if (width <= 0 || height <= 0) {
        return null;
    }
    return { width, height };
}

/**
 * Derives the frame size from a template path.
 *
 * Templates live in size-named directories ("templates/1080x1920/default.html").
 * The directory closest to the file wins; paths without a size directory get
 * the fallback.
 */
export function resolveTemplateSize(templatePath: string, fallback: FrameSize): FrameSize {
    const directories = templatePath.split(/[\\/]/).slice(0, -1);

    for (let i = directories.length - 1; i >= 0; i--) {
        const size = parseFrameSize(directories[i]);
        if (size) {
            return size;
        }
    }

    return { width: fallback.width, height: fallback.height };
}
