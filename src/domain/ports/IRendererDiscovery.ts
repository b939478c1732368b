/**
 * IRendererDiscovery - Locates a browser executable on the host.
 * Implementations: ChromeExecutableDiscovery, NoopRendererDiscovery
 */
export interface IRendererDiscovery {
    /**
     * @returns Path of a usable executable, or null to let the render surface
     * fall back to its own default
     */
    findExecutable(): Promise<string | null>;
}
