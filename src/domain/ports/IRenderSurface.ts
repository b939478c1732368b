import { FrameSize } from '../entities/Template';

export interface RenderSurfaceOptions {
    /** Viewport and screenshot size, fixed for the lifetime of the surface */
    size: FrameSize;
    /** Browser binary to launch. When omitted the surface uses its own default. */
    executablePath?: string;
    /** Extra command-line flags for the browser process */
    flags: string[];
    /** Directory the surface writes screenshots into */
    workDir: string;
    /** Upper bound for loading and capturing one frame */
    timeoutMs: number;
}

/**
 * IRenderSurface - Port for a headless browser session that rasterizes markup.
 * Implementations: PlaywrightRenderSurface
 */
export interface IRenderSurface {
    /**
     * Renders the HTML and writes a PNG named `fileName` into the work directory.
     * @returns Absolute path of the written file
     */
    capture(html: string, fileName: string): Promise<string>;

    /**
     * Releases the browser process.
     */
    close(): Promise<void>;
}

export type RenderSurfaceFactory = (options: RenderSurfaceOptions) => Promise<IRenderSurface>;
