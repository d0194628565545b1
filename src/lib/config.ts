import 'dotenv/config';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';

function getEnv(key: string, defaultValue?: string): string {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (value === undefined) {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number`);
    }
    return parsed;
}

// Bundled dictionaries live at <package root>/dictionaries, one level further up once compiled into dist/
function findBundledDictionaryDir(): string {
    const candidates = ['../../dictionaries/', '../../../dictionaries/'];
    for (const candidate of candidates) {
        const dir = fileURLToPath(new URL(candidate, import.meta.url));
        if (existsSync(dir)) {
            return dir;
        }
    }
    return fileURLToPath(new URL(candidates[0], import.meta.url));
}

export const BUNDLED_DICTIONARY_DIR = findBundledDictionaryDir();

export const config = {
    // Environment
    env: getEnv('NODE_ENV', 'development'),
    isDev: getEnv('NODE_ENV', 'development') === 'development',
    isProd: getEnv('NODE_ENV', 'development') === 'production',

    // Logging
    logLevel: getEnv('LOG_LEVEL', 'info'),

    // Dictionary loading
    dictionary: {
        path: getEnv('DICTIONARY_PATH', `${BUNDLED_DICTIONARY_DIR}default.dict`),
        maxIncludeDepth: getEnvNumber('DICTIONARY_MAX_INCLUDE_DEPTH', 32),
    },
} as const;

export type Config = typeof config;
