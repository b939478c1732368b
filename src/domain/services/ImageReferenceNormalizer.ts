import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';

export interface ImageReferenceOptions {
    /** Root for relative paths. Defaults to the process working directory. */
    workingRoot?: string;
    /** Existence check, replaceable in tests */
    fileExists?: (filePath: string) => boolean;
}

export type ImageReferenceKind = 'url' | 'data-uri' | 'file-uri' | 'path' | 'empty';

export function classifyImageReference(image: string): ImageReferenceKind {
    if (image === '') return 'empty';
    if (image.startsWith('http://') || image.startsWith('https://')) return 'url';
    if (image.startsWith('data:')) return 'data-uri';
    if (image.startsWith('file://')) return 'file-uri';
    return 'path';
}

/**
 * Turns the `image` argument into something the browser can load.
 *
 * URLs and data/file URIs pass through. Filesystem paths are made absolute
 * and rewritten as file:// URIs. A missing file only logs a warning: the
 * frame renders with a broken image rather than failing.
 */
export function normalizeImageReference(image: string, options: ImageReferenceOptions = {}): string {
    if (classifyImageReference(image) !== 'path') {
        return image;
    }

    const workingRoot = options.workingRoot ?? process.cwd();
    const fileExists = options.fileExists ?? fs.existsSync;
    const absolutePath = path.isAbsolute(image) ? image : path.resolve(workingRoot, image);

    if (!fileExists(absolutePath)) {
        console.warn(`[ImageReference] Image file not found: ${absolutePath}`);
    }

    return pathToFileURL(absolutePath).href;
}
