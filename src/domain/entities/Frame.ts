export type ContextValue = string | number | boolean | null | undefined;

/**
 * Values used to fill placeholders for one render call.
 * A present key always wins over the inline default; null and undefined
 * render as the empty string.
 */
export type VariableContext = Record<string, ContextValue>;

/**
 * Content of a single frame.
 */
export interface FrameContent {
    title?: string;
    /** Narration / body text for this frame */
    text: string;
    /** Local path (absolute or relative to the working root), http(s) URL, data URI or file:// URI */
    image?: string;
    /** Extra values for template-specific placeholders (content_title, accent colours, ...) */
    ext?: VariableContext;
    /** Where to write the PNG. Generated under the output directory when omitted. */
    outputPath?: string;
}

export interface RenderedFrame {
    framePath: string;
    width: number;
    height: number;
}
