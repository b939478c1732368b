import { FrameConfig } from '../config';
import { FrameContent, VariableContext } from '../domain/entities/Frame';
import { Template } from '../domain/entities/Template';
import { TemplateParameters } from '../domain/entities/TemplateParameter';
import { RenderSurfaceFactory } from '../domain/ports/IRenderSurface';
import { IRendererDiscovery } from '../domain/ports/IRendererDiscovery';
import { normalizeImageReference } from '../domain/services/ImageReferenceNormalizer';
import { parseTemplateParameters } from '../domain/services/PlaceholderParser';
import { replaceParameters } from '../domain/services/SubstitutionEngine';
import { resolveTemplateSize } from '../domain/services/TemplateSizeResolver';
import { readTemplateFile } from '../infrastructure/templates/FileTemplateRepository';
import { FrameRenderDriver } from './FrameRenderDriver';

export interface FrameGeneratorDependencies {
    config: FrameConfig;
    surfaceFactory: RenderSurfaceFactory;
    discovery: IRendererDiscovery;
    /** Root for relative image paths. Defaults to the process working directory. */
    workingRoot?: string;
}

/**
 * Renders one HTML template into frame images.
 *
 * The frame size comes from the template path and is fixed for the lifetime
 * of the generator; the browser session behind it is started on the first
 * frame and released by dispose().
 *
 * Usage:
 *     const generator = await HtmlFrameGenerator.fromFile('templates/1080x1920/default.html', deps);
 *     const framePath = await generator.generateFrame({
 *         title: 'Why reading matters',
 *         text: 'Reading builds new neural pathways...',
 *         image: 'output/scene_1.png',
 *         ext: { content_author: 'Author Name' },
 *     });
 *     await generator.dispose();
 */
export class HtmlFrameGenerator {
    private readonly driver: FrameRenderDriver;

    constructor(
        readonly template: Template,
        private readonly deps: FrameGeneratorDependencies
    ) {
        this.driver = new FrameRenderDriver(template.size, deps);
    }

    /**
     * Loads a template directly from a file path.
     * @throws TemplateNotFoundError
     */
    static async fromFile(templatePath: string, deps: FrameGeneratorDependencies): Promise<HtmlFrameGenerator> {
        const body = await readTemplateFile(templatePath);
        const size = resolveTemplateSize(templatePath, deps.config.defaultSize);
        return new HtmlFrameGenerator({ key: templatePath, path: templatePath, body, size }, deps);
    }

    get width(): number {
        return this.template.size.width;
    }

    get height(): number {
        return this.template.size.height;
    }

    /**
     * Custom parameters declared by the template, for building input controls.
     */
    parseTemplateParameters(): TemplateParameters {
        return parseTemplateParameters(this.template.body);
    }

    /**
     * Builds the variable context and substitutes it into the template.
     * title and image are always present, so an omitted one renders empty
     * rather than falling back to an inline default.
     */
    buildHtml(content: FrameContent): string {
        const image = content.image === undefined
            ? undefined
            : normalizeImageReference(content.image, { workingRoot: this.deps.workingRoot });

        const context: VariableContext = {
            title: content.title,
            text: content.text,
            image,
            ...content.ext,
        };

        return replaceParameters(this.template.body, context);
    }

    /**
     * Renders one frame.
     * @returns Path of the generated PNG
     * @throws FrameRenderError
     */
    async generateFrame(content: FrameContent): Promise<string> {
        const html = this.buildHtml(content);
        return this.driver.render(html, content.outputPath);
    }

    async dispose(): Promise<void> {
        await this.driver.dispose();
    }
}
