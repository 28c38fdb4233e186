/**
 * Argument parsing for the CLI commands
 */

import _ from 'lodash';
import { z } from 'zod';
import { ServerConfig } from '../server/server-config.js';
import { DEFAULT_SERVER_CONFIG } from '../types/config.js';

const ToolArgumentsSchema = z.record(z.string(), z.unknown());

/**
 * @throws Error when `json` is not a JSON object
 */
export function parseToolArguments(json: string): Record<string, unknown> {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch{
        throw new Error(`Tool arguments are not valid JSON: ${json}`);
    }

    const parsed = ToolArgumentsSchema.safeParse(raw);
    if(!parsed.success) {
        throw new Error('Tool arguments must be a JSON object');
    }
    return parsed.data;
}

/**
 * Return `config` with `key` set from its command-line form. `true`/`false` and
 * numbers are decoded; anything else stays a string and fails validation.
 *
 * @throws Error for an unknown key
 * @throws RangeError for an invalid value
 */
export function applyConfigValue(config: ServerConfig, key: string, value: string): ServerConfig {
    if(!_.has(DEFAULT_SERVER_CONFIG, key)) {
        throw new Error(`Unknown configuration key: ${key}. Known keys: ${_.keys(DEFAULT_SERVER_CONFIG).join(', ')}`);
    }

    return ServerConfig.parse({
        ...config.toJSON(),
        [key]: decodeValue(value),
    });
}

function decodeValue(value: string): unknown {
    const trimmed = _.trim(value);
    if(trimmed === 'true') {
        return true;
    }
    if(trimmed === 'false') {
        return false;
    }
    if(trimmed !== '' && _.isFinite(Number(trimmed))) {
        return Number(trimmed);
    }
    return value;
}
