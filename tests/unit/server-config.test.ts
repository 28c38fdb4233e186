/**
 * ServerConfig value semantics: defaults, validation, persistence decoding
 */

import { describe, it, expect } from 'vitest';
import { ServerConfig } from '../../src/server/server-config.js';
import { DEFAULT_SERVER_CONFIG } from '../../src/types/config.js';

describe('ServerConfig', () => {
    describe('construction', () => {
        it('should fill every field from the defaults', () => {
            expect(ServerConfig.defaults().toJSON()).toEqual({
                runInBackground:              false,
                requestHandlerTimeout:        30_000,
                maxConcurrentRequests:        5,
                monitorResourceUsage:         true,
                resourceStatsUpdateInterval:  5_000,
                useForegroundServiceOnMobile: true,
                registerWithSystemTray:       true,
            });
        });

        it('should be frozen', () => {
            expect(Object.isFrozen(new ServerConfig())).toBe(true);
        });

        it.each([
            [{ requestHandlerTimeout: 0 }, 'requestHandlerTimeout: Duration must be greater than zero'],
            [{ resourceStatsUpdateInterval: -1 }, 'resourceStatsUpdateInterval: Duration must be greater than zero'],
            [{ maxConcurrentRequests: 0 }, 'maxConcurrentRequests: At least one concurrent request is required'],
        ])('should reject %o', (values, message) => {
            expect(() => new ServerConfig(values)).toThrow(new RangeError(`Invalid server configuration: ${message}`));
        });

        it('should ignore explicitly undefined fields', () => {
            const config = new ServerConfig({ runInBackground: undefined, maxConcurrentRequests: 2 });

            expect(config.runInBackground).toBe(false);
            expect(config.maxConcurrentRequests).toBe(2);
        });
    });

    describe('copyWith and equals', () => {
        it('should change only the given fields and leave the original untouched', () => {
            const original = ServerConfig.defaults();
            const copy = original.copyWith({ runInBackground: true, requestHandlerTimeout: 1000 });

            expect(copy.runInBackground).toBe(true);
            expect(copy.requestHandlerTimeout).toBe(1000);
            expect(copy.maxConcurrentRequests).toBe(DEFAULT_SERVER_CONFIG.maxConcurrentRequests);
            expect(original.runInBackground).toBe(false);
        });

        it('should compare by value', () => {
            const a = new ServerConfig({ maxConcurrentRequests: 3 });

            expect(a.equals(new ServerConfig({ maxConcurrentRequests: 3 }))).toBe(true);
            expect(a.equals(a.copyWith({}))).toBe(true);
            expect(a.equals(ServerConfig.defaults())).toBe(false);
        });
    });

    describe('fromJSON', () => {
        it('should round-trip through toJSON', () => {
            const config = new ServerConfig({
                runInBackground:             true,
                requestHandlerTimeout:       1500,
                maxConcurrentRequests:       9,
                monitorResourceUsage:        false,
                resourceStatsUpdateInterval: 250,
            });

            const decoded = ServerConfig.fromJSON(JSON.parse(JSON.stringify(config)));

            expect(decoded.equals(config)).toBe(true);
        });

        it('should fall back per field for missing and invalid values', () => {
            const decoded = ServerConfig.fromJSON({
                runInBackground:       'yes',
                requestHandlerTimeout: -5,
                maxConcurrentRequests: 2,
                unknownField:          true,
            });

            expect(decoded.toJSON()).toEqual({ ...DEFAULT_SERVER_CONFIG, maxConcurrentRequests: 2 });
        });

        it.each([null, 42, 'config', [1, 2]])('should return the defaults for %o', (data) => {
            expect(ServerConfig.fromJSON(data).equals(ServerConfig.defaults())).toBe(true);
        });
    });

    describe('parse', () => {
        it('should require every field', () => {
            expect(() => ServerConfig.parse({ runInBackground: true })).toThrow(RangeError);
        });

        it('should accept a complete value', () => {
            const parsed = ServerConfig.parse({ ...DEFAULT_SERVER_CONFIG, maxConcurrentRequests: 1 });

            expect(parsed.maxConcurrentRequests).toBe(1);
        });
    });
});
