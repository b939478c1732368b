import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { FrameConfig } from '../config';
import { describeError, FrameRenderError } from '../domain/entities/FrameErrors';
import { FrameSize } from '../domain/entities/Template';
import { IRenderSurface, RenderSurfaceFactory } from '../domain/ports/IRenderSurface';
import { IRendererDiscovery } from '../domain/ports/IRendererDiscovery';

/**
 * Chromium flags for headless rendering on servers and containers:
 * transparent background, no GPU, no sandbox, no first-run UI.
 */
export const RENDER_SURFACE_FLAGS: readonly string[] = [
    '--default-background-color=00000000',
    '--no-sandbox',
    '--disable-dev-shm-usage',
    '--disable-gpu',
    '--disable-software-rasterizer',
    '--disable-extensions',
    '--disable-setuid-sandbox',
    '--disable-dbus',
    '--hide-scrollbars',
    '--mute-audio',
    '--disable-background-networking',
    '--disable-features=TranslateUI',
    '--disable-ipc-flooding-protection',
    '--no-first-run',
    '--no-default-browser-check',
    '--disable-backgrounding-occluded-windows',
    '--disable-renderer-backgrounding',
];

export type DriverState = 'uninitialized' | 'session-ready' | 'disposed';

type DriverConfig = Pick<
    FrameConfig,
    'outputDir' | 'workDir' | 'renderTimeoutMs' | 'browserExecutablePath' | 'discoveryEnabled'
>;

export interface FrameRenderDriverDependencies {
    config: DriverConfig;
    surfaceFactory: RenderSurfaceFactory;
    discovery: IRendererDiscovery;
}

/**
 * Owns one headless render surface, bound to a single frame size.
 *
 * The surface is launched on the first render and reused afterwards. One
 * render at a time: the surface writes into a shared work directory before
 * the file is moved to its destination.
 */
export class FrameRenderDriver {
    private session: Promise<IRenderSurface> | null = null;
    private disposed = false;

    constructor(
        readonly size: FrameSize,
        private readonly deps: FrameRenderDriverDependencies
    ) { }

    get state(): DriverState {
        if (this.disposed) return 'disposed';
        return this.session ? 'session-ready' : 'uninitialized';
    }

    /**
     * Rasterizes fully substituted markup.
     * @param outputPath Destination PNG; generated under the output directory when omitted
     * @returns Path of the written frame
     * @throws FrameRenderError on any launch, capture or file move failure
     */
    async render(html: string, outputPath?: string): Promise<string> {
        if (this.disposed) {
            throw new FrameRenderError('HTML rendering failed: renderer has been disposed');
        }

        const destination = path.resolve(outputPath ?? this.generateOutputPath());
        const fileName = path.basename(destination);

        try {
            await fs.promises.mkdir(path.dirname(destination), { recursive: true });
            const surface = await this.acquireSession();

            console.log(`[FrameDriver] Rendering HTML to ${destination} (size: ${this.size.width}x${this.size.height})`);
            const written = path.resolve(await surface.capture(html, fileName));

            if (written !== destination) {
                await moveFile(written, destination);
            }

            console.log(`[FrameDriver] Frame generated: ${destination}`);
            return destination;
        } catch (error) {
            console.error(`[FrameDriver] Failed to render HTML template: ${describeError(error)}`);
            throw new FrameRenderError(`HTML rendering failed: ${describeError(error)}`, error);
        }
    }

    /**
     * Closes the surface. Safe to call more than once.
     */
    async dispose(): Promise<void> {
        if (this.disposed) {
            return;
        }
        this.disposed = true;

        const session = this.session;
        this.session = null;
        if (!session) {
            return;
        }

        try {
            const surface = await session;
            await surface.close();
            console.log('[FrameDriver] Session closed');
        } catch (error) {
            // A session that never launched has nothing to close
            console.warn(`[FrameDriver] Failed to close session: ${describeError(error)}`);
        }
    }

    private acquireSession(): Promise<IRenderSurface> {
        if (!this.session) {
            const launching = this.launch();
            this.session = launching;
            // Let the next render retry a failed launch
            launching.catch(() => {
                if (this.session === launching) {
                    this.session = null;
                }
            });
        }
        return this.session;
    }

    private async launch(): Promise<IRenderSurface> {
        const { config } = this.deps;
        const executablePath = config.browserExecutablePath
            ?? (config.discoveryEnabled ? await this.deps.discovery.findExecutable() : null)
            ?? undefined;

        return this.deps.surfaceFactory({
            size: this.size,
            executablePath,
            flags: [...RENDER_SURFACE_FLAGS],
            workDir: path.resolve(config.workDir),
            timeoutMs: config.renderTimeoutMs,
        });
    }

    private generateOutputPath(): string {
        const suffix = uuidv4().replace(/-/g, '').slice(0, 16);
        return path.join(this.deps.config.outputDir, `frame_${suffix}.png`);
    }
}

/**
 * rename, falling back to copy + unlink across devices.
 */
async function moveFile(source: string, destination: string): Promise<void> {
    try {
        await fs.promises.rename(source, destination);
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
            await fs.promises.copyFile(source, destination);
            await fs.promises.unlink(source);
            return;
        }
        throw error;
    }
}
