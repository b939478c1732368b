/**
 * Pixel dimensions of a rendered frame.
 */
export interface FrameSize {
    width: number;
    height: number;
}

/**
 * A loaded HTML template. Immutable once loaded.
 */
export interface Template {
    /** Key the template was requested by (e.g. "1080x1920/default.html") */
    key: string;
    /** Absolute path of the template file */
    path: string;
    /** Raw HTML with placeholders */
    body: string;
    /** Frame size derived from the template path */
    size: FrameSize;
}

export type TemplateSource = 'builtin' | 'custom';

export interface TemplateSummary {
    key: string;
    width: number;
    height: number;
    source: TemplateSource;
}
