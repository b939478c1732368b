/**
 * File Template Repository
 *
 * Templates are HTML files under a built-in directory, laid out by frame size
 * ("1080x1920/default.html"). A second, user-writable directory with the same
 * layout shadows built-in templates of the same key.
 *
 * Keys are always relative to those directories; absolute paths and `..`
 * segments never resolve. Loading an arbitrary file is left to
 * HtmlFrameGenerator.fromFile.
 */

import fs from 'fs';
import path from 'path';
import { FrameConfig } from '../../config';
import { TemplateNotFoundError } from '../../domain/entities/FrameErrors';
import { Template, TemplateSource, TemplateSummary } from '../../domain/entities/Template';
import { ITemplateRepository } from '../../domain/ports/ITemplateRepository';
import { resolveTemplateSize } from '../../domain/services/TemplateSizeResolver';

type TemplateRepositoryConfig = Pick<FrameConfig, 'templatesDir' | 'customTemplatesDir' | 'defaultSize'>;

export class FileTemplateRepository implements ITemplateRepository {
    private readonly builtinDir: string;
    private readonly customDir: string;

    constructor(private readonly config: TemplateRepositoryConfig, rootDir: string = process.cwd()) {
        this.builtinDir = path.resolve(rootDir, config.templatesDir);
        this.customDir = path.resolve(rootDir, config.customTemplatesDir);
    }

    async resolveTemplatePath(key: string): Promise<string> {
        const normalized = key.replace(/\\/g, '/');
        if (path.posix.isAbsolute(normalized) || path.win32.isAbsolute(key) || normalized.split('/').includes('..')) {
            throw new TemplateNotFoundError(key);
        }

        for (const dir of [this.customDir, this.builtinDir]) {
            const candidate = path.join(dir, normalized);
            if (await isFile(candidate)) {
                return candidate;
            }
        }

        throw new TemplateNotFoundError(key);
    }

    async loadTemplate(key: string): Promise<Template> {
        const templatePath = await this.resolveTemplatePath(key);
        const body = await readTemplateFile(templatePath);
        const size = resolveTemplateSize(templatePath, this.config.defaultSize);

        console.log(`[Templates] Loaded ${key} -> ${templatePath} (${size.width}x${size.height}, ${body.length} chars)`);
        return { key, path: templatePath, body, size };
    }

    async listTemplates(): Promise<TemplateSummary[]> {
        const byKey = new Map<string, TemplateSummary>();

        // Built-ins first so custom entries overwrite them
        const sources: Array<[string, TemplateSource]> = [[this.builtinDir, 'builtin'], [this.customDir, 'custom']];
        for (const [dir, source] of sources) {
            for (const key of await listHtmlFiles(dir)) {
                const size = resolveTemplateSize(key, this.config.defaultSize);
                byKey.set(key, { key, width: size.width, height: size.height, source });
            }
        }

        return [...byKey.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    }
}

/**
 * Reads a template file by path.
 * @throws TemplateNotFoundError when the file does not exist
 */
export async function readTemplateFile(templatePath: string): Promise<string> {
    try {
        return await fs.promises.readFile(templatePath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
            throw new TemplateNotFoundError(templatePath);
        }
        throw error;
    }
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await fs.promises.stat(filePath)).isFile();
    } catch {
        return false;
    }
}

/**
 * Relative keys ("1080x1920/default.html") of every .html file below dir.
 */
async function listHtmlFiles(dir: string, prefix = ''): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
        entries = await fs.promises.readdir(path.join(dir, prefix), { withFileTypes: true });
    } catch {
        return [];
    }

    const keys: string[] = [];
    for (const entry of entries) {
        const key = prefix ? `${prefix}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
            keys.push(...await listHtmlFiles(dir, key));
        } else if (entry.isFile() && entry.name.endsWith('.html')) {
            keys.push(key);
        }
    }
    return keys;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
