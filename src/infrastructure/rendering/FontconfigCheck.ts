import { execFile } from 'child_process';

/**
 * Warns when the host has no usable fonts. Headless Chromium on a bare
 * Linux image renders text as empty boxes without fontconfig.
 *
 * @returns Number of fonts reported by fc-list, or null when it could not run
 */
export function checkFontconfig(timeoutMs = 2000): Promise<number | null> {
    return new Promise((resolve) => {
        execFile('fc-list', [], { timeout: timeoutMs }, (error, stdout) => {
            if (error) {
                console.warn(
                    `[Fontconfig] fc-list failed (${error.message}). ` +
                    'Install with: sudo apt-get install -y fontconfig fonts-liberation fonts-noto-cjk'
                );
                resolve(null);
                return;
            }

            const fontCount = String(stdout).split('\n').filter((line) => line.trim() !== '').length;
            if (fontCount === 0) {
                console.warn('[Fontconfig] No fonts detected. Install with: sudo apt-get install -y fonts-liberation fonts-noto-cjk');
            } else {
                console.log(`[Fontconfig] Detected ${fontCount} fonts`);
            }
            resolve(fontCount);
        });
    });
}
