/**
 * Immutable server configuration value
 */

import _ from 'lodash';
import {
    DEFAULT_SERVER_CONFIG,
    PersistedServerConfigSchema,
    ServerConfigValuesSchema,
    type ServerConfigValues
} from '../types/config.js';
import { formatZodIssues } from '../utils/errors.js';

export class ServerConfig implements ServerConfigValues {
    /** Keep serving while the host application is in the background */
    readonly runInBackground:              boolean;
    /** Milliseconds a single tool, resource or prompt handler may run */
    readonly requestHandlerTimeout:        number;
    readonly maxConcurrentRequests:        number;
    readonly monitorResourceUsage:         boolean;
    /** Milliseconds between resource stats samples */
    readonly resourceStatsUpdateInterval:  number;
    /** Keep the process alive while background running is enabled */
    readonly useForegroundServiceOnMobile: boolean;
    /** Expose a status surface (SIGUSR2 status dump in the CLI host) */
    readonly registerWithSystemTray:       boolean;

    /**
     * @throws RangeError when a field is out of range (non-positive duration,
     * fewer than one concurrent request)
     */
    constructor(values: Partial<ServerConfigValues> = {}) {
        const parsed = ServerConfigValuesSchema.safeParse({
            ...DEFAULT_SERVER_CONFIG,
            ..._.omitBy(values, _.isUndefined),
        });
        if(!parsed.success) {
            throw new RangeError(`Invalid server configuration: ${formatZodIssues(parsed.error)}`);
        }

        this.runInBackground = parsed.data.runInBackground;
        this.requestHandlerTimeout = parsed.data.requestHandlerTimeout;
        this.maxConcurrentRequests = parsed.data.maxConcurrentRequests;
        this.monitorResourceUsage = parsed.data.monitorResourceUsage;
        this.resourceStatsUpdateInterval = parsed.data.resourceStatsUpdateInterval;
        this.useForegroundServiceOnMobile = parsed.data.useForegroundServiceOnMobile;
        this.registerWithSystemTray = parsed.data.registerWithSystemTray;
        Object.freeze(this);
    }

    static defaults(): ServerConfig {
        return new ServerConfig();
    }

    /**
     * Decode persisted data. Never throws: anything that is not an object yields the
     * defaults, and every missing or invalid field falls back to its own default.
     */
    static fromJSON(data: unknown): ServerConfig {
        const parsed = PersistedServerConfigSchema.safeParse(data);
        if(!parsed.success) {
            return ServerConfig.defaults();
        }
        return new ServerConfig(parsed.data);
    }

    /**
     * Strict counterpart of fromJSON for user edits
     *
     * @throws RangeError listing every invalid field
     */
    static parse(data: unknown): ServerConfig {
        const parsed = ServerConfigValuesSchema.safeParse(data);
        if(!parsed.success) {
            throw new RangeError(`Invalid server configuration: ${formatZodIssues(parsed.error)}`);
        }
        return new ServerConfig(parsed.data);
    }

    toJSON(): ServerConfigValues {
        return {
            runInBackground:              this.runInBackground,
            requestHandlerTimeout:        this.requestHandlerTimeout,
            maxConcurrentRequests:        this.maxConcurrentRequests,
            monitorResourceUsage:         this.monitorResourceUsage,
            resourceStatsUpdateInterval:  this.resourceStatsUpdateInterval,
            useForegroundServiceOnMobile: this.useForegroundServiceOnMobile,
            registerWithSystemTray:       this.registerWithSystemTray,
        };
    }

    copyWith(changes: Partial<ServerConfigValues>): ServerConfig {
        return new ServerConfig({
            ...this.toJSON(),
            ..._.omitBy(changes, _.isUndefined),
        });
    }

    equals(other: ServerConfig): boolean {
        return _.isEqual(this.toJSON(), other.toJSON());
    }
}
