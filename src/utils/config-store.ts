/**
 * Persisted server configuration
 *
 * Settings live in a small key-value JSON file. The server configuration is the
 * JSON-encoded string stored under CONFIG_RECORD_KEY; other keys are preserved
 * on save. Loading never fails: a missing file, a missing record, invalid JSON or
 * invalid values all produce defaults.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { makeDirectory } from 'make-dir';
import _ from 'lodash';
import { ServerConfig } from '../server/server-config.js';
import { SettingsRecordsSchema } from '../types/config.js';
import { getSettingsPath } from './config-paths.js';
import { toErrorMessage } from './errors.js';
import { logger } from './logger.js';

export const CONFIG_RECORD_KEY = 'mcp_server_config';

export interface ConfigStore {
    load(): Promise<ServerConfig>
    /** Resolves false instead of throwing when the write fails */
    save(config: ServerConfig): Promise<boolean>
}

export class FileConfigStore implements ConfigStore {
    readonly path: string;

    constructor(path: string = getSettingsPath()) {
        this.path = path;
    }

    async load(): Promise<ServerConfig> {
        try {
            const records = await this.readRecords();
            const encoded = records[CONFIG_RECORD_KEY];
            if(encoded === undefined) {
                logger.debug({ path: this.path }, 'No persisted server config, using defaults');
                return ServerConfig.defaults();
            }
            return ServerConfig.fromJSON(JSON.parse(encoded));
        } catch (error) {
            logger.warn({ path: this.path, error: toErrorMessage(error) }, 'Persisted server config is unreadable, using defaults');
            return ServerConfig.defaults();
        }
    }

    async save(config: ServerConfig): Promise<boolean> {
        try {
            const records = await this.readRecords();
            records[CONFIG_RECORD_KEY] = JSON.stringify(config.toJSON());

            await makeDirectory(dirname(this.path));
            await writeFile(this.path, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
            logger.debug({ path: this.path }, 'Server config saved');
            return true;
        } catch (error) {
            logger.error({ path: this.path, error: toErrorMessage(error) }, 'Failed to save server config');
            return false;
        }
    }

    /**
     * Read every record in the settings file. A missing or corrupted file reads as
     * empty; other I/O errors propagate.
     */
    private async readRecords(): Promise<Record<string, string>> {
        let content: string;
        try {
            content = await readFile(this.path, 'utf-8');
        } catch (error) {
            if(_.isError(error) && 'code' in error && error.code === 'ENOENT') {
                return {};
            }
            throw error;
        }

        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch{
            logger.warn({ path: this.path }, 'Settings file is not valid JSON, ignoring its contents');
            return {};
        }

        const parsed = SettingsRecordsSchema.safeParse(data);
        if(!parsed.success) {
            logger.warn({ path: this.path }, 'Settings file has an unexpected shape, ignoring its contents');
            return {};
        }
        return parsed.data;
    }
}
