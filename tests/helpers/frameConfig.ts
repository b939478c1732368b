import path from 'path';
import { FrameConfig } from '../../src/config';

export function createFrameConfig(root: string, overrides: Partial<FrameConfig> = {}): FrameConfig {
    return {
        templatesDir: 'templates',
        customTemplatesDir: 'data/templates',
        defaultTemplate: '1080x1920/default.html',
        defaultSize: { width: 1080, height: 1920 },
        outputDir: path.join(root, 'output'),
        workDir: path.join(root, 'work'),
        renderTimeoutMs: 5000,
        probeTimeoutMs: 1000,
        renderConcurrency: 1,
        discoveryEnabled: false,
        ...overrides,
    };
}
