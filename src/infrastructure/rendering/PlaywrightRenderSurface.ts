import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import { chromium, Browser, Page } from 'playwright';
import { IRenderSurface, RenderSurfaceFactory, RenderSurfaceOptions } from '../../domain/ports/IRenderSurface';
import { checkFontconfig } from './FontconfigCheck';

/**
 * Headless Chromium session with one page sized to the frame.
 *
 * Each capture writes the markup next to the screenshot and navigates to it,
 * because an about:blank page filled through setContent() may not load
 * file:// images.
 */
export class PlaywrightRenderSurface implements IRenderSurface {
    constructor(
        private readonly browser: Browser,
        private readonly page: Page,
        private readonly options: RenderSurfaceOptions
    ) { }

    async capture(html: string, fileName: string): Promise<string> {
        const target = path.join(this.options.workDir, path.basename(fileName));
        const markupPath = `${target.slice(0, target.length - path.extname(target).length)}.html`;

        await fs.promises.mkdir(this.options.workDir, { recursive: true });
        await fs.promises.writeFile(markupPath, html, 'utf-8');

        try {
            await this.page.goto(pathToFileURL(markupPath).href, { waitUntil: 'load', timeout: this.options.timeoutMs });
            await this.page.screenshot({
                path: target,
                type: 'png',
                omitBackground: true,
                timeout: this.options.timeoutMs,
            });
        } finally {
            await fs.promises.rm(markupPath, { force: true });
        }

        return target;
    }

    async close(): Promise<void> {
        await this.browser.close();
    }
}

export interface PlaywrightSurfaceFactoryOptions {
    headless?: boolean;
    platform?: NodeJS.Platform;
    /** Runs before the first launch on Linux. Defaults to the fc-list check. */
    checkFonts?: () => Promise<unknown>;
}

/**
 * Creates a factory that launches Chromium through Playwright.
 */
export function createPlaywrightSurfaceFactory(factoryOptions: PlaywrightSurfaceFactoryOptions = {}): RenderSurfaceFactory {
    const checkFonts = factoryOptions.checkFonts ?? (() => checkFontconfig());
    const platform = factoryOptions.platform ?? process.platform;
    let fontsChecked = false;

    return async (options: RenderSurfaceOptions): Promise<IRenderSurface> => {
        if (!fontsChecked && platform === 'linux') {
            fontsChecked = true;
            await checkFonts();
        }

        const browser = await chromium.launch({
            headless: factoryOptions.headless ?? true,
            executablePath: options.executablePath,
            args: options.flags,
            timeout: options.timeoutMs,
        });

        try {
            const page = await browser.newPage({
                viewport: { width: options.size.width, height: options.size.height },
                deviceScaleFactor: 1,
            });
            page.setDefaultTimeout(options.timeoutMs);

            console.log(
                `[Playwright] Session ready (${options.size.width}x${options.size.height}, ` +
                `${options.flags.length} flags${options.executablePath ? `, browser: ${options.executablePath}` : ''})`
            );
            return new PlaywrightRenderSurface(browser, page, options);
        } catch (error) {
            await browser.close();
            throw error;
        }
    };
}
