/**
 * Configuration file path utilities
 * Provides cross-platform paths for the persisted settings file
 */

import envPaths from 'env-paths';
import { join } from 'node:path';

// suffix: '' removes the default '-nodejs' suffix
const paths = envPaths('mcp-host-runtime', { suffix: '' });

/**
 * Directory holding settings.json; MCP_HOST_DATA_DIR overrides the platform default
 */
export function getDataDir(): string {
    return process.env.MCP_HOST_DATA_DIR ?? paths.data;
}

/**
 * Full path to the key-value settings file
 */
export function getSettingsPath(): string {
    return join(getDataDir(), 'settings.json');
}
