/**
 * Resource providers
 *
 * A provider owns one URI scheme and lists the resources it serves. Built-ins:
 * config://app, system://info, time://current and time://zones.
 */

import os from 'node:os';
import _ from 'lodash';
import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import type { ResourceRegistration } from '../server/protocol.js';
import type { ServerConfig } from '../server/server-config.js';

export interface ResourceDescriptor {
    uri:         string
    name:        string
    description: string
    mimeType:    string
}

export abstract class ResourceProvider {
    abstract readonly uriScheme: string;
    abstract readonly description: string;

    abstract listResources(): ResourceDescriptor[];

    abstract read(uri: string): Promise<ReadResourceResult>;

    toRegistrations(): ResourceRegistration[] {
        return _.map(this.listResources(), resource => ({
            ...resource,
            handler: async (uri: string) => this.read(uri),
        }));
    }
}

/**
 * Provider whose resources are JSON documents
 */
export abstract class JsonResourceProvider extends ResourceProvider {
    abstract getJsonContent(uri: string): Promise<unknown>;

    override async read(uri: string): Promise<ReadResourceResult> {
        const content = await this.getJsonContent(uri);
        return {
            contents: [{
                uri,
                mimeType: 'application/json',
                text:     JSON.stringify(content, null, 2),
            }],
        };
    }
}

export class ConfigResourceProvider extends JsonResourceProvider {
    override readonly uriScheme = 'config';
    override readonly description = 'Application configuration data';

    /** `currentConfig` is read on every request so edits show up without re-registering */
    constructor(private readonly currentConfig: () => ServerConfig) {
        super();
    }

    override listResources(): ResourceDescriptor[] {
        return [{
            uri:         'config://app',
            name:        'Application Configuration',
            description: 'Current application configuration settings',
            mimeType:    'application/json',
        }];
    }

    override async getJsonContent(uri: string): Promise<unknown> {
        if(uri === 'config://app') {
            return this.currentConfig().toJSON();
        }
        throw new RangeError(`Unknown config URI: ${uri}`);
    }
}

export class SystemInfoResourceProvider extends JsonResourceProvider {
    override readonly uriScheme = 'system';
    override readonly description = 'System information';

    override listResources(): ResourceDescriptor[] {
        return [{
            uri:         'system://info',
            name:        'System Information',
            description: 'Current system information',
            mimeType:    'application/json',
        }];
    }

    override async getJsonContent(uri: string): Promise<unknown> {
        if(uri !== 'system://info') {
            throw new RangeError(`Unknown system URI: ${uri}`);
        }

        // No environment variables
        return {
            platform: {
                operatingSystem:        os.platform(),
                operatingSystemVersion: os.release(),
                architecture:           os.arch(),
                localHostname:          os.hostname(),
                numberOfProcessors:     os.availableParallelism(),
            },
            memory: {
                totalMB: _.round(os.totalmem() / 1024 / 1024),
                freeMB:  _.round(os.freemem() / 1024 / 1024),
            },
            executable:    process.execPath,
            version:       process.version,
            uptimeSeconds: _.round(process.uptime()),
        };
    }
}

export class TimeResourceProvider extends JsonResourceProvider {
    override readonly uriScheme = 'time';
    override readonly description = 'Date and time information';

    constructor(private readonly now: () => Date = () => new Date()) {
        super();
    }

    override listResources(): ResourceDescriptor[] {
        return [
            {
                uri:         'time://current',
                name:        'Current Time',
                description: 'Current date and time information',
                mimeType:    'application/json',
            },
            {
                uri:         'time://zones',
                name:        'Time Zones',
                description: 'List of time zones',
                mimeType:    'application/json',
            },
        ];
    }

    override async getJsonContent(uri: string): Promise<unknown> {
        switch(uri) {
            case 'time://current': {
                const now = this.now();
                return {
                    timestamp: now.getTime(),
                    iso8601:   now.toISOString(),
                    utc:       {
                        hour:   now.getUTCHours(),
                        minute: now.getUTCMinutes(),
                        second: now.getUTCSeconds(),
                    },
                    local: {
                        hour:     now.getHours(),
                        minute:   now.getMinutes(),
                        second:   now.getSeconds(),
                        timeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
                    },
                    date: {
                        year:    now.getFullYear(),
                        month:   now.getMonth() + 1,
                        day:     now.getDate(),
                        // ISO weekday, Monday = 1
                        weekday: now.getDay() === 0 ? 7 : now.getDay(),
                    },
                };
            }

            case 'time://zones':
                return { timeZones: _.uniq(['UTC', ...Intl.supportedValuesOf('timeZone')]) };

            default:
                throw new RangeError(`Unknown time URI: ${uri}`);
        }
    }
}

export function createBuiltinResourceProviders(currentConfig: () => ServerConfig): ResourceProvider[] {
    return [
        new ConfigResourceProvider(currentConfig),
        new SystemInfoResourceProvider(),
        new TimeResourceProvider(),
    ];
}
