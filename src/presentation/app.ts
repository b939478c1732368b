import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { FrameRenderService } from '../application/FrameRenderService';
import { FileTemplateRepository } from '../infrastructure/templates/FileTemplateRepository';
import { createPlaywrightSurfaceFactory } from '../infrastructure/rendering/PlaywrightRenderSurface';
import { getSharedRendererDiscovery } from '../infrastructure/rendering/ChromeExecutableDiscovery';

// Route imports
import { createFrameRoutes } from './routes/frameRoutes';
import { createTemplateRoutes } from './routes/templateRoutes';
import { errorHandler } from './middleware/errorHandler';

export const APP_VERSION = '1.0.0';

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, frameService: FrameRenderService = createDependencies(config).frameService): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '5mb' }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: APP_VERSION,
        });
    });

    // Routes
    app.use('/api', createTemplateRoutes(frameService));
    app.use('/api', createFrameRoutes(frameService));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): {
    templates: FileTemplateRepository;
    frameService: FrameRenderService;
} {
    const templates = new FileTemplateRepository(config.frame);
    const discovery = getSharedRendererDiscovery(config.frame.probeTimeoutMs);

    if (config.frame.browserExecutablePath) {
        console.log(`🖥️ Browser: ${config.frame.browserExecutablePath} (configured)`);
    } else if (config.frame.discoveryEnabled) {
        console.log('🖥️ Browser: probing system installs on first render');
    } else {
        console.log('🖥️ Browser: Playwright default');
    }

    const frameService = new FrameRenderService({
        config: config.frame,
        templates,
        surfaceFactory: createPlaywrightSurfaceFactory(),
        discovery,
    });

    return { templates, frameService };
}
