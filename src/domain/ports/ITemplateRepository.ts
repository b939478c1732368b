import { Template, TemplateSummary } from '../entities/Template';

/**
 * Template Repository Port Interface
 *
 * Maps template keys such as "1080x1920/default.html" to template files.
 */
export interface ITemplateRepository {
    /**
     * Resolve a template key to an absolute file path.
     * @throws TemplateNotFoundError when no file matches
     */
    resolveTemplatePath(key: string): Promise<string>;

    /**
     * Resolve and read a template.
     * @throws TemplateNotFoundError when no file matches
     */
    loadTemplate(key: string): Promise<Template>;

    /**
     * List all available templates.
     */
    listTemplates(): Promise<TemplateSummary[]>;
}
