import { Router, Request, Response } from 'express';
import { FrameRenderService } from '../../application/FrameRenderService';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

/**
 * Creates template discovery routes with dependency injection.
 */
export function createTemplateRoutes(frameService: FrameRenderService): Router {
    const router = Router();

    /**
     * GET /templates
     *
     * Lists built-in and custom templates with their frame sizes.
     */
    router.get(
        '/templates',
        asyncHandler(async (_req: Request, res: Response) => {
            const templates = await frameService.listTemplates();
            res.json({ templates });
        })
    );

    /**
     * GET /templates/parameters?template=1080x1920/default.html
     *
     * Returns the custom parameters a template declares, so a UI can
     * generate input controls for them.
     */
    router.get(
        '/templates/parameters',
        asyncHandler(async (req: Request, res: Response) => {
            const { template } = req.query;
            if (typeof template !== 'string' || template.trim() === '') {
                throw new BadRequestError('template query parameter is required');
            }

            const result = await frameService.getTemplateParameters(template);
            res.json(result);
        })
    );

    return router;
}
