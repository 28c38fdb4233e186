/**
 * Configuration type definitions for the MCP host runtime
 */

import { z } from 'zod';

/**
 * Defaults for every ServerConfig field. Durations are in milliseconds.
 */
export const DEFAULT_SERVER_CONFIG = {
    runInBackground:              false,
    requestHandlerTimeout:        30_000,
    maxConcurrentRequests:        5,
    monitorResourceUsage:         true,
    resourceStatsUpdateInterval:  5_000,
    useForegroundServiceOnMobile: true,
    registerWithSystemTray:       true,
} as const;

// Strict shape used when a config value is constructed or edited
export const ServerConfigValuesSchema = z.object({
    runInBackground:              z.boolean(),
    requestHandlerTimeout:        z.number().int().positive('Duration must be greater than zero'),
    maxConcurrentRequests:        z.number().int().min(1, 'At least one concurrent request is required'),
    monitorResourceUsage:         z.boolean(),
    resourceStatsUpdateInterval:  z.number().int().positive('Duration must be greater than zero'),
    useForegroundServiceOnMobile: z.boolean(),
    registerWithSystemTray:       z.boolean(),
});

export type ServerConfigValues = z.infer<typeof ServerConfigValuesSchema>;

/**
 * Lenient shape used when reading persisted data: each missing or invalid field
 * falls back to its default and unknown keys are stripped.
 */
export const PersistedServerConfigSchema = z.object({
    runInBackground:              ServerConfigValuesSchema.shape.runInBackground.catch(DEFAULT_SERVER_CONFIG.runInBackground),
    requestHandlerTimeout:        ServerConfigValuesSchema.shape.requestHandlerTimeout.catch(DEFAULT_SERVER_CONFIG.requestHandlerTimeout),
    maxConcurrentRequests:        ServerConfigValuesSchema.shape.maxConcurrentRequests.catch(DEFAULT_SERVER_CONFIG.maxConcurrentRequests),
    monitorResourceUsage:         ServerConfigValuesSchema.shape.monitorResourceUsage.catch(DEFAULT_SERVER_CONFIG.monitorResourceUsage),
    resourceStatsUpdateInterval:  ServerConfigValuesSchema.shape.resourceStatsUpdateInterval.catch(DEFAULT_SERVER_CONFIG.resourceStatsUpdateInterval),
    useForegroundServiceOnMobile: ServerConfigValuesSchema.shape.useForegroundServiceOnMobile.catch(DEFAULT_SERVER_CONFIG.useForegroundServiceOnMobile),
    registerWithSystemTray:       ServerConfigValuesSchema.shape.registerWithSystemTray.catch(DEFAULT_SERVER_CONFIG.registerWithSystemTray),
});

/**
 * Resource limits applied to the background worker. `maxExecutionTime` is in
 * milliseconds.
 */
export const ResourceLimitsSchema = z.object({
    maxCpuUsagePercent: z.number().positive(),
    maxMemoryUsageMB:   z.number().positive(),
    maxExecutionTime:   z.number().int().positive(),
    maxNetworkUsageMB:  z.number().positive(),
});

export type ResourceLimits = z.infer<typeof ResourceLimitsSchema>;

export const DEFAULT_RESOURCE_LIMITS: Readonly<ResourceLimits> = Object.freeze({
    maxCpuUsagePercent: 50,
    maxMemoryUsageMB:   100,
    maxExecutionTime:   5 * 60 * 1000,
    maxNetworkUsageMB:  10,
});

// Key-value settings file: record name -> JSON-encoded record
export const SettingsRecordsSchema = z.record(z.string(), z.string());
