import path from 'path';
import { Application } from 'express';
import { FrameRenderService } from '../../src/application/FrameRenderService';
import { Config } from '../../src/config';
import { FileTemplateRepository } from '../../src/infrastructure/templates/FileTemplateRepository';
import { createApp } from '../../src/presentation/app';
import { createFakeSurfaceFactory, FakeSurfaceRecorder } from './fakeRenderSurface';
import { createFrameConfig } from './frameConfig';

const PROJECT_ROOT = path.resolve(__dirname, '../..');

export interface TestFrameApp {
    app: Application;
    service: FrameRenderService;
    surfaces: FakeSurfaceRecorder;
    config: Config;
}

/**
 * The real app over the shipped templates, with an in-process render surface.
 */
export function createTestFrameApp(root: string): TestFrameApp {
    const config: Config = {
        port: 0,
        environment: 'test',
        frame: createFrameConfig(root),
    };
    const surfaces = createFakeSurfaceFactory();
    const service = new FrameRenderService({
        config: config.frame,
        templates: new FileTemplateRepository(config.frame, PROJECT_ROOT),
        surfaceFactory: surfaces.factory,
        discovery: { findExecutable: jest.fn().mockResolvedValue(null) },
        workingRoot: root,
    });

    return { app: createApp(config, service), service, surfaces, config };
}
