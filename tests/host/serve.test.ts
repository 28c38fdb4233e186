/**
 * stdio host wiring: startup, process signals, status dump and shutdown
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { PRIMARY_SERVER_ID, startHost, type Host, type HostOptions } from '../../src/host/serve.js';
import { BackgroundTaskRunner } from '../../src/runner/background-task-runner.js';
import { ServerConfig } from '../../src/server/server-config.js';
import { ResourceMode, ServerState } from '../../src/types/runtime.js';
import type { ConfigStore } from '../../src/utils/config-store.js';
import { DisposedError, TransportFailureError } from '../../src/utils/errors.js';
import { FakeTransport, fakeProtocolFactory, flushPromises, type FakeProtocolServer } from '../helpers/index.js';

class MemoryConfigStore implements ConfigStore {
    constructor(private config: ServerConfig = new ServerConfig({ monitorResourceUsage: false })) {}

    async load(): Promise<ServerConfig> {
        return this.config;
    }

    async save(config: ServerConfig): Promise<boolean> {
        this.config = config;
        return true;
    }
}

interface Fixture {
    host:         Host
    protocol:     FakeProtocolServer
    signalTarget: EventEmitter
}

const hosts: Host[] = [];

async function createHost(options: Partial<HostOptions> = {}, protocol = fakeProtocolFactory()): Promise<Fixture> {
    const signalTarget = new EventEmitter();
    const host = await startHost({
        store:           new MemoryConfigStore(),
        transport:       new FakeTransport(),
        runner:          new BackgroundTaskRunner({ spawnWorker: null }),
        protocolFactory: protocol.factory,
        signalTarget,
        ...options,
    });
    hosts.push(host);
    return { host, protocol: protocol.protocol, signalTarget };
}

afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all(hosts.map(async host => host.shutdown()));
    hosts.length = 0;
});

describe('startHost', () => {
    it('should start the primary server with the built-ins registered', async () => {
        const { host, protocol } = await createHost();

        expect(host.instance.id).toBe(PRIMARY_SERVER_ID);
        expect(host.instance.name).toBe('mcp-host-runtime');
        expect(host.instance.state).toBe(ServerState.RUNNING);
        expect(host.manager.getServer(PRIMARY_SERVER_ID)).toBe(host.instance);
        expect(protocol.tools.has('run_in_background')).toBe(true);
        expect(protocol.resources.has('config://app')).toBe(true);
        expect(host.manager.isBackgroundRunning).toBe(false);
    });

    it('should use the given server name', async () => {
        const { host } = await createHost({ name: 'notes-app' });

        expect(host.instance.name).toBe('notes-app');
    });

    it('should let the background flag override the persisted setting', async () => {
        const { host } = await createHost({ background: true });

        expect(host.instance.config.runInBackground).toBe(true);
        expect(host.manager.isBackgroundRunning).toBe(true);
        expect(host.instance.resourceMode).toBe(ResourceMode.MINIMAL);
    });

    it('should shut down and rethrow when the server cannot connect', async () => {
        const protocol = fakeProtocolFactory();
        protocol.protocol.connect.mockRejectedValueOnce(new Error('stdin closed'));
        const signalTarget = new EventEmitter();
        const runner = new BackgroundTaskRunner({ spawnWorker: null });

        await expect(startHost({
            store:           new MemoryConfigStore(),
            transport:       new FakeTransport(),
            runner,
            protocolFactory: protocol.factory,
            signalTarget,
        })).rejects.toBeInstanceOf(TransportFailureError);

        expect(signalTarget.eventNames()).toEqual([]);
        expect(() => runner.enqueueToolExecution('calculator', {})).toThrow(DisposedError);
    });
});

describe('process signals', () => {
    it('should pause on SIGTSTP and resume on SIGCONT', async () => {
        const { host, signalTarget } = await createHost();

        signalTarget.emit('SIGTSTP');
        expect(host.instance.state).toBe(ServerState.PAUSED);

        signalTarget.emit('SIGCONT');
        expect(host.instance.state).toBe(ServerState.RUNNING);
    });

    it('should stop on SIGHUP when not running in background', async () => {
        const { host, signalTarget } = await createHost();

        signalTarget.emit('SIGHUP');
        await flushPromises();

        expect(host.instance.state).toBe(ServerState.STOPPED);
    });

    it('should suspend on SIGHUP when running in background', async () => {
        const { host, signalTarget } = await createHost({ background: true });

        signalTarget.emit('SIGHUP');
        await flushPromises();

        expect(host.instance.state).toBe(ServerState.RUNNING);
        expect(host.instance.resourceMode).toBe(ResourceMode.SUSPENDED);
    });

    it('should dump the status summary to stderr on SIGUSR2', async () => {
        const { host, signalTarget } = await createHost();
        const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

        signalTarget.emit('SIGUSR2');

        expect(stderr).toHaveBeenCalledWith(`${host.statusSummary()}\n`);
        expect(host.statusSummary()).toBe([
            'Background running: off',
            'mcp-host-runtime [running, full] cpu=0% mem=0MB requests=0 errors=0',
            'Queued tasks: 0',
        ].join('\n'));
    });

    it('should not listen for SIGUSR2 when the status surface is disabled', async () => {
        const { signalTarget } = await createHost({
            store: new MemoryConfigStore(new ServerConfig({ monitorResourceUsage: false, registerWithSystemTray: false })),
        });

        expect(signalTarget.listenerCount('SIGUSR2')).toBe(0);
        expect(signalTarget.listenerCount('SIGTSTP')).toBe(1);
    });
});

describe('shutdown', () => {
    it('should release signals, servers and the runner once', async () => {
        const { host, protocol, signalTarget } = await createHost();

        await Promise.all([host.shutdown(), host.shutdown()]);
        await host.shutdown();

        expect(signalTarget.eventNames()).toEqual([]);
        expect(host.instance.disposed).toBe(true);
        expect(host.manager.size).toBe(0);
        expect(protocol.disconnect).toHaveBeenCalledTimes(1);
        expect(() => host.runner.enqueueToolExecution('calculator', {})).toThrow(DisposedError);
    });
});
