/**
 * Frame Render Service
 *
 * Entry point for callers that think in template keys rather than files:
 * resolves the template, runs a generator for the request and releases it.
 * The number of live browser sessions is capped by renderConcurrency.
 */

import { FrameConfig } from '../config';
import { FrameContent, RenderedFrame } from '../domain/entities/Frame';
import { TemplateSummary } from '../domain/entities/Template';
import { TemplateParameters } from '../domain/entities/TemplateParameter';
import { RenderSurfaceFactory } from '../domain/ports/IRenderSurface';
import { IRendererDiscovery } from '../domain/ports/IRendererDiscovery';
import { ITemplateRepository } from '../domain/ports/ITemplateRepository';
import { parseTemplateParameters } from '../domain/services/PlaceholderParser';
import { HtmlFrameGenerator } from './HtmlFrameGenerator';

export interface FrameRenderRequest extends FrameContent {
    /** Template key; the configured default template when omitted */
    template?: string;
}

export interface TemplateParametersResult {
    template: string;
    width: number;
    height: number;
    parameters: TemplateParameters;
}

export interface FrameRenderServiceDependencies {
    config: FrameConfig;
    templates: ITemplateRepository;
    surfaceFactory: RenderSurfaceFactory;
    discovery: IRendererDiscovery;
    workingRoot?: string;
}

/**
 * Simple semaphore for limiting concurrent operations.
 */
export class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        this.permits = permits;
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }
}

export class FrameRenderService {
    private readonly semaphore: Semaphore;

    constructor(private readonly deps: FrameRenderServiceDependencies) {
        this.semaphore = new Semaphore(Math.max(1, deps.config.renderConcurrency));
    }

    /**
     * Renders a single frame on a fresh generator.
     * @throws TemplateNotFoundError, FrameRenderError
     */
    async renderFrame(request: FrameRenderRequest): Promise<RenderedFrame> {
        const { template: key, ...content } = request;
        const [frame] = await this.renderFrames(key, [content]);
        return frame;
    }

    /**
     * Renders several frames of the same template on one browser session,
     * one after another, in input order.
     * @throws TemplateNotFoundError, FrameRenderError
     */
    async renderFrames(templateKey: string | undefined, frames: FrameContent[]): Promise<RenderedFrame[]> {
        const key = templateKey ?? this.deps.config.defaultTemplate;
        console.log(`[FrameRender] Render request: template=${key}, frames=${frames.length}`);

        const template = await this.deps.templates.loadTemplate(key);

        await this.semaphore.acquire();
        const generator = new HtmlFrameGenerator(template, {
            config: this.deps.config,
            surfaceFactory: this.deps.surfaceFactory,
            discovery: this.deps.discovery,
            workingRoot: this.deps.workingRoot,
        });

        try {
            const results: RenderedFrame[] = [];
            for (const frame of frames) {
                const framePath = await generator.generateFrame(frame);
                results.push({ framePath, width: generator.width, height: generator.height });
            }
            return results;
        } finally {
            await generator.dispose();
            this.semaphore.release();
        }
    }

    /**
     * Parameter schema of a template, for building input controls.
     * @throws TemplateNotFoundError
     */
    async getTemplateParameters(key: string): Promise<TemplateParametersResult> {
        const template = await this.deps.templates.loadTemplate(key);

        return {
            template: key,
            width: template.size.width,
            height: template.size.height,
            parameters: parseTemplateParameters(template.body),
        };
    }

    listTemplates(): Promise<TemplateSummary[]> {
        return this.deps.templates.listTemplates();
    }
}
