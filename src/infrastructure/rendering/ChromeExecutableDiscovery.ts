import fs from 'fs';
import { IRendererDiscovery } from '../../domain/ports/IRendererDiscovery';

/**
 * System browser installs, in order of preference.
 */
export const DEFAULT_BROWSER_CANDIDATES = [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/usr/local/bin/chrome',
    '/usr/local/bin/chromium',
];

export interface ProbeFileSystem {
    isExecutable(filePath: string): Promise<boolean>;
    realpath(filePath: string): Promise<string>;
}

export interface ChromeDiscoveryOptions {
    candidates?: string[];
    platform?: NodeJS.Platform;
    /** Upper bound for resolving one candidate's real path */
    probeTimeoutMs?: number;
    fileSystem?: ProbeFileSystem;
}

const nodeFileSystem: ProbeFileSystem = {
    async isExecutable(filePath: string): Promise<boolean> {
        try {
            await fs.promises.access(filePath, fs.constants.X_OK);
            return true;
        } catch {
            return false;
        }
    },
    realpath: (filePath: string) => fs.promises.realpath(filePath),
};

/**
 * Finds a Chrome/Chromium binary that is not a snap package.
 *
 * Snap confinement (AppArmor) blocks flags such as --no-sandbox, so snap
 * installs are skipped even when they are the only browser on the host.
 * The probe runs once per instance; later calls reuse the result.
 */
export class ChromeExecutableDiscovery implements IRendererDiscovery {
    private readonly candidates: string[];
    private readonly platform: NodeJS.Platform;
    private readonly probeTimeoutMs: number;
    private readonly fileSystem: ProbeFileSystem;
    private probe: Promise<string | null> | null = null;

    constructor(options: ChromeDiscoveryOptions = {}) {
        this.candidates = options.candidates ?? DEFAULT_BROWSER_CANDIDATES;
        this.platform = options.platform ?? process.platform;
        this.probeTimeoutMs = options.probeTimeoutMs ?? 1000;
        this.fileSystem = options.fileSystem ?? nodeFileSystem;
    }

    findExecutable(): Promise<string | null> {
        if (!this.probe) {
            this.probe = this.runProbe();
        }
        return this.probe;
    }

    private async runProbe(): Promise<string | null> {
        if (this.platform === 'win32') {
            return null;
        }

        for (const candidate of this.candidates) {
            if (!(await this.fileSystem.isExecutable(candidate))) {
                continue;
            }

            try {
                const realPath = await this.resolveWithTimeout(candidate);
                if (realPath.includes('/snap/')) {
                    console.log(`[RendererDiscovery] Skipping snap browser: ${candidate}`);
                    continue;
                }
                console.log(`[RendererDiscovery] Found non-snap browser: ${candidate} -> ${realPath}`);
                return candidate;
            } catch (error) {
                console.log(`[RendererDiscovery] Error checking ${candidate}: ${error instanceof Error ? error.message : String(error)}`);
            }
        }

        console.warn(
            '[RendererDiscovery] No non-snap Chrome/Chromium found. Falling back to the bundled browser. ' +
            'Install google-chrome-stable or chromium if the bundled one is missing.'
        );
        return null;
    }

    private resolveWithTimeout(candidate: string): Promise<string> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(
                () => reject(new Error(`realpath timed out after ${this.probeTimeoutMs}ms`)),
                this.probeTimeoutMs
            );
        });

        return Promise.race([this.fileSystem.realpath(candidate), timeout]).finally(() => clearTimeout(timer));
    }
}

/**
 * For hosts without the snap heuristic: always defer to the surface's default.
 */
export class NoopRendererDiscovery implements IRendererDiscovery {
    async findExecutable(): Promise<string | null> {
        return null;
    }
}

let sharedDiscovery: IRendererDiscovery | null = null;

/**
 * Process-wide discovery instance, so the host is probed at most once.
 */
export function getSharedRendererDiscovery(probeTimeoutMs?: number): IRendererDiscovery {
    if (!sharedDiscovery) {
        sharedDiscovery = process.platform === 'linux' || process.platform === 'darwin'
            ? new ChromeExecutableDiscovery({ probeTimeoutMs })
            : new NoopRendererDiscovery();
    }
    return sharedDiscovery;
}
