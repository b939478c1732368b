import { Router, Request, Response } from 'express';
import { FrameRenderService } from '../../application/FrameRenderService';
import { ContextValue, FrameContent, VariableContext } from '../../domain/entities/Frame';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

/**
 * Creates frame rendering routes with dependency injection.
 */
export function createFrameRoutes(frameService: FrameRenderService): Router {
    const router = Router();

    /**
     * POST /frame/render
     *
     * Renders a single frame and returns the path of the PNG.
     */
    router.post(
        '/frame/render',
        asyncHandler(async (req: Request, res: Response) => {
            const body: unknown = req.body;
            const template = readTemplateKey(body);
            const content = parseFrameContent(body, 'body');

            const frame = await frameService.renderFrame({ template, ...content });

            res.json({
                success: true,
                message: 'Success',
                framePath: frame.framePath,
                width: frame.width,
                height: frame.height,
            });
        })
    );

    /**
     * POST /frame/render-batch
     *
     * Renders several frames of one template on a single browser session.
     */
    router.post(
        '/frame/render-batch',
        asyncHandler(async (req: Request, res: Response) => {
            const body: unknown = req.body;
            const template = readTemplateKey(body);
            const frames = isRecord(body) ? body.frames : undefined;

            if (!Array.isArray(frames) || frames.length === 0) {
                throw new BadRequestError('frames is required and must be a non-empty array');
            }

            const contents = frames.map((frame: unknown, index: number) => parseFrameContent(frame, `frames[${index}]`));
            const rendered = await frameService.renderFrames(template, contents);

            res.json({
                success: true,
                frames: rendered,
            });
        })
    );

    return router;
}

function readTemplateKey(body: unknown): string | undefined {
    const template = isRecord(body) ? body.template : undefined;
    if (template === undefined) {
        return undefined;
    }
    if (typeof template !== 'string' || template.trim() === '') {
        throw new BadRequestError('template must be a non-empty string');
    }
    return template;
}

/**
 * Validates one frame's fields.
 */
export function parseFrameContent(input: unknown, label: string): FrameContent {
    if (!isRecord(input)) {
        throw new BadRequestError(`${label} must be an object`);
    }

    const { text, title, image, ext } = input;

    if (typeof text !== 'string') {
        throw new BadRequestError(`${label}.text is required and must be a string`);
    }
    // Frames are always written under the configured output directory
    if (input.outputPath !== undefined) {
        throw new BadRequestError(`${label}.outputPath is not accepted`);
    }

    return {
        text,
        title: optionalString(title, `${label}.title`),
        image: optionalString(image, `${label}.image`),
        ext: parseExt(ext, `${label}.ext`),
    };
}

function optionalString(value: unknown, label: string): string | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new BadRequestError(`${label} must be a string`);
    }
    return value;
}

function parseExt(value: unknown, label: string): VariableContext | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (!isRecord(value)) {
        throw new BadRequestError(`${label} must be an object`);
    }

    const entries: Array<[string, ContextValue]> = [];
    for (const [key, entry] of Object.entries(value)) {
        if (!isContextValue(entry)) {
            throw new BadRequestError(`${label}.${key} must be a string, number, boolean or null`);
        }
        entries.push([key, entry]);
    }
    // fromEntries defines own keys, so "__proto__" stays a placeholder name
    return Object.fromEntries(entries);
}

function isContextValue(value: unknown): value is ContextValue {
    return value === null
        || typeof value === 'string'
        || typeof value === 'number'
        || typeof value === 'boolean';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
