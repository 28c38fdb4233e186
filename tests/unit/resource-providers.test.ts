/**
 * Built-in resource providers
 */

import { describe, it, expect } from 'vitest';
import _ from 'lodash';
import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import {
    ConfigResourceProvider,
    SystemInfoResourceProvider,
    TimeResourceProvider,
    createBuiltinResourceProviders
} from '../../src/resources/resource-providers.js';
import { ServerConfig } from '../../src/server/server-config.js';

function readJson(result: ReadResourceResult): unknown {
    const [content] = result.contents;
    expect(content?.mimeType).toBe('application/json');
    const text = content?.text;
    if(!_.isString(text)) {
        throw new Error('expected a text resource');
    }
    return JSON.parse(text);
}

describe('ConfigResourceProvider', () => {
    it('should serve the configuration current at read time', async () => {
        let config = ServerConfig.defaults();
        const provider = new ConfigResourceProvider(() => config);

        config = config.copyWith({ runInBackground: true });
        const json = readJson(await provider.read('config://app'));

        expect(json).toEqual(config.toJSON());
    });

    it('should reject other config URIs', async () => {
        const provider = new ConfigResourceProvider(() => ServerConfig.defaults());

        await expect(provider.read('config://secrets')).rejects.toThrow(new RangeError('Unknown config URI: config://secrets'));
    });
});

describe('SystemInfoResourceProvider', () => {
    it('should describe the platform without exposing the environment', async () => {
        const json = readJson(await new SystemInfoResourceProvider().read('system://info'));

        expect(_.keys(json)).toEqual(['platform', 'memory', 'executable', 'version', 'uptimeSeconds']);
        expect(json).toMatchObject({
            platform: { operatingSystem: process.platform, architecture: process.arch },
            version:  process.version,
        });
    });
});

describe('TimeResourceProvider', () => {
    it('should report the current instant in UTC and local parts', async () => {
        const instant = new Date(Date.UTC(2024, 2, 5, 7, 8, 9, 45));
        const provider = new TimeResourceProvider(() => instant);

        const json = readJson(await provider.read('time://current'));

        expect(json).toMatchObject({
            timestamp: instant.getTime(),
            iso8601:   '2024-03-05T07:08:09.045Z',
            utc:       { hour: 7, minute: 8, second: 9 },
        });
    });

    it('should number Sunday as the seventh weekday', async () => {
        const sunday = new Date(2024, 2, 10, 12, 0, 0);
        const json = readJson(await new TimeResourceProvider(() => sunday).read('time://current'));

        expect(json).toMatchObject({ date: { year: 2024, month: 3, day: 10, weekday: 7 } });
    });

    it('should list UTC first among unique time zones', async () => {
        const json = readJson(await new TimeResourceProvider().read('time://zones'));

        expect(json).toMatchObject({ timeZones: expect.arrayContaining(['UTC']) });
        const zones: unknown = _.get(json, 'timeZones');
        expect(_.isArray(zones) ? zones[0] : undefined).toBe('UTC');
        expect(_.isArray(zones) ? _.uniq(zones).length === zones.length : false).toBe(true);
    });

    it('should reject unknown time URIs', async () => {
        await expect(new TimeResourceProvider().read('time://tomorrow')).rejects.toBeInstanceOf(RangeError);
    });
});

describe('createBuiltinResourceProviders', () => {
    it('should register one resource per listed URI with working handlers', async () => {
        const registrations = _.flatMap(createBuiltinResourceProviders(() => ServerConfig.defaults()), provider => provider.toRegistrations());

        expect(_.map(registrations, 'uri')).toEqual(['config://app', 'system://info', 'time://current', 'time://zones']);

        const config = _.find(registrations, { uri: 'config://app' });
        const read = await config?.handler('config://app');
        expect(read ? readJson(read) : undefined).toEqual(ServerConfig.defaults().toJSON());
    });
});
