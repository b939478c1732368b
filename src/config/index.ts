
import dotenv from 'dotenv';
import { FrameSize } from '../domain/entities/Template';
import { parseFrameSize } from '../domain/services/TemplateSizeResolver';

// Load environment variables
dotenv.config();

/**
 * Settings for template lookup and frame rendering.
 * Passed explicitly to the repository, driver and service constructors.
 */
export interface FrameConfig {
    // Template lookup
    templatesDir: string;
    customTemplatesDir: string; // Checked before templatesDir
    defaultTemplate: string;

    // Output
    defaultSize: FrameSize; // Used when a template path carries no WIDTHxHEIGHT directory
    outputDir: string;
    workDir: string; // Where the browser writes screenshots before they are moved

    // Renderer
    renderTimeoutMs: number;
    probeTimeoutMs: number;
    renderConcurrency: number;
    browserExecutablePath?: string; // Skips discovery when set
    discoveryEnabled: boolean;
}

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    frame: FrameConfig;
}

export const DEFAULT_FRAME_SIZE: FrameSize = { width: 1080, height: 1920 };

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

function getEnvVarSize(key: string, defaultValue: FrameSize): FrameSize {
    const value = getEnvVar(key, `${defaultValue.width}x${defaultValue.height}`);
    const size = parseFrameSize(value);
    if (!size) {
        throw new Error(`Environment variable ${key} must look like WIDTHxHEIGHT, got: ${value}`);
    }
    return size;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const browserExecutablePath = getEnvVar('BROWSER_EXECUTABLE_PATH', '');

    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        frame: {
            templatesDir: getEnvVar('TEMPLATES_DIR', 'templates'),
            customTemplatesDir: getEnvVar('CUSTOM_TEMPLATES_DIR', 'data/templates'),
            defaultTemplate: getEnvVar('DEFAULT_TEMPLATE', '1080x1920/default.html'),

            defaultSize: getEnvVarSize('FRAME_DEFAULT_SIZE', DEFAULT_FRAME_SIZE),
            outputDir: getEnvVar('FRAME_OUTPUT_DIR', 'output'),
            workDir: getEnvVar('RENDERER_WORK_DIR', process.cwd()),

            renderTimeoutMs: getEnvVarNumber('RENDER_TIMEOUT_MS', 30000),
            probeTimeoutMs: getEnvVarNumber('RENDERER_PROBE_TIMEOUT_MS', 1000),
            renderConcurrency: getEnvVarNumber('RENDER_CONCURRENCY', 1),
            browserExecutablePath: browserExecutablePath || undefined,
            discoveryEnabled: getEnvVarBoolean('RENDERER_DISCOVERY', true),
        },
    };
}

/**
 * Validates configuration values that loadConfig cannot reject on its own.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];
    const { frame } = config;

    if (!Number.isInteger(config.port) || config.port <= 0) {
        errors.push('PORT must be a positive integer');
    }
    if (!frame.templatesDir) {
        errors.push('TEMPLATES_DIR must not be empty');
    }
    if (!frame.outputDir) {
        errors.push('FRAME_OUTPUT_DIR must not be empty');
    }
    if (!Number.isInteger(frame.renderConcurrency) || frame.renderConcurrency < 1) {
        errors.push('RENDER_CONCURRENCY must be an integer of at least 1');
    }
    if (frame.renderTimeoutMs <= 0) {
        errors.push('RENDER_TIMEOUT_MS must be positive');
    }
    if (frame.probeTimeoutMs <= 0) {
        errors.push('RENDERER_PROBE_TIMEOUT_MS must be positive');
    }

    return errors;
}
