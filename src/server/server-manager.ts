/**
 * MCP Server Manager
 *
 * Registry of ServerInstances keyed by id:
 * - Bulk start/stop and resource-mode changes
 * - Publishes registrations and the full {id -> state} map on every change
 * - Keep-alive sweep that restarts background servers while background running is on
 */

import _ from 'lodash';
import type { ServerInstance } from './server-instance.js';
import { ResourceMode, ServerState, type ServerStateSnapshot } from '../types/runtime.js';
import { DisposedError, DuplicateIdError, TransportFailureError, UnknownIdError, toErrorMessage } from '../utils/errors.js';
import { EventChannel, type Subscribable } from '../utils/event-channel.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_KEEP_ALIVE_INTERVAL_MS = 15 * 60 * 1000;

export interface ServerManagerOptions {
    keepAliveIntervalMs?: number
}

export interface ServerRegistration {
    id:       string
    instance: ServerInstance
}

interface ManagedServer {
    instance:    ServerInstance
    unsubscribe: () => void
}

export class ServerManager {
    private readonly servers = new Map<string, ManagedServer>();
    private readonly registrationChannel = new EventChannel<ServerRegistration>('server-registrations');
    private readonly stateChannel = new EventChannel<ServerStateSnapshot>('server-states');
    private readonly keepAliveIntervalMs: number;
    private keepAliveTimer?: NodeJS.Timeout;
    private backgroundRunning = false;
    private isDisposed = false;

    constructor(options: ServerManagerOptions = {}) {
        this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? DEFAULT_KEEP_ALIVE_INTERVAL_MS;
    }

    get registrations(): Subscribable<ServerRegistration> {
        return this.registrationChannel;
    }

    /** Full state map after every registration change or state transition */
    get states(): Subscribable<ServerStateSnapshot> {
        return this.stateChannel;
    }

    get isBackgroundRunning(): boolean {
        return this.backgroundRunning;
    }

    get size(): number {
        return this.servers.size;
    }

    register(id: string, instance: ServerInstance): void {
        if(this.isDisposed) {
            throw new DisposedError('Server manager has been disposed');
        }
        if(this.servers.has(id)) {
            throw new DuplicateIdError(`Server already registered: ${id}`);
        }

        const unsubscribe = instance.stateChanges.subscribe(() => {
            this.publishStates();
        });
        this.servers.set(id, { instance, unsubscribe });

        logger.info({ serverId: id, name: instance.name }, 'Registered MCP server');
        this.registrationChannel.publish({ id, instance });
        this.publishStates();

        if(this.backgroundRunning) {
            this.refreshKeepAliveTimer();
        }
    }

    async unregister(id: string): Promise<void> {
        if(this.isDisposed) {
            return;
        }

        const managed = this.servers.get(id);
        if(!managed) {
            return;
        }

        if(managed.instance.isRunning) {
            try {
                await managed.instance.stop();
            } catch (error) {
                logger.error({ serverId: id, error: toErrorMessage(error) }, 'Failed to stop server during unregister');
            }
        }

        // stop() may have raced with dispose() or a second unregister
        if(this.servers.get(id) !== managed) {
            return;
        }

        managed.unsubscribe();
        this.servers.delete(id);
        logger.info({ serverId: id }, 'Unregistered MCP server');
        this.publishStates();
    }

    getServer(id: string): ServerInstance | undefined {
        return this.servers.get(id)?.instance;
    }

    /**
     * @throws UnknownIdError when nothing is registered under `id`
     */
    requireServer(id: string): ServerInstance {
        const instance = this.getServer(id);
        if(!instance) {
            throw new UnknownIdError(`Server not found: ${id}`);
        }
        return instance;
    }

    getAllServers(): ServerInstance[] {
        return _.map(Array.from(this.servers.values()), 'instance');
    }

    getServersByState(state: ServerState): ServerInstance[] {
        return _.filter(this.getAllServers(), instance => instance.state === state);
    }

    getRunningServers(): ServerInstance[] {
        return this.getServersByState(ServerState.RUNNING);
    }

    getStateSnapshot(): ServerStateSnapshot {
        const snapshot: Record<string, ServerState> = {};
        for(const [id, { instance }] of this.servers) {
            snapshot[id] = instance.state;
        }
        return Object.freeze(snapshot);
    }

    /**
     * Start one registered server on its bound transport
     */
    async startServer(id: string): Promise<void> {
        const instance = this.requireServer(id);
        const transport = instance.getTransport();
        if(!transport) {
            throw new TransportFailureError(`Server ${id} has no transport bound`);
        }
        await instance.start(transport);
    }

    async stopServer(id: string): Promise<void> {
        await this.requireServer(id).stop();
    }

    /**
     * Start every stopped or failed server that has a transport. Failures are
     * logged per server and never propagated.
     */
    async startAll(): Promise<void> {
        const startable = _.filter(Array.from(this.servers.entries()), ([, { instance }]) =>
            (instance.state === ServerState.STOPPED || instance.state === ServerState.ERROR)
            && instance.getTransport() !== undefined
        );

        await Promise.all(_.map(startable, async ([id, { instance }]) => {
            await this.startQuietly(id, instance, 'Failed to start server');
        }));

        logger.info({ started: startable.length, total: this.servers.size }, 'Started MCP servers');
    }

    async stopAll(): Promise<void> {
        await Promise.all(_.map(Array.from(this.servers.entries()), async ([id, { instance }]) => {
            try {
                await instance.stop();
            } catch (error) {
                logger.error({ serverId: id, error: toErrorMessage(error) }, 'Failed to stop server');
            }
        }));

        logger.info({ total: this.servers.size }, 'Stopped MCP servers');
    }

    adjustResourceUsage(mode: ResourceMode): void {
        for(const { instance } of this.servers.values()) {
            instance.adjustResourceUsage(mode);
        }
    }

    enableBackgroundRunning(enabled: boolean): void {
        if(this.isDisposed || enabled === this.backgroundRunning) {
            return;
        }

        this.backgroundRunning = enabled;

        if(enabled) {
            this.refreshKeepAliveTimer();
            for(const { instance } of this.servers.values()) {
                if(instance.config.runInBackground) {
                    instance.adjustResourceUsage(ResourceMode.MINIMAL);
                }
            }
            logger.info({ intervalMs: this.keepAliveIntervalMs }, 'Background running enabled');
        } else {
            this.clearKeepAliveTimer();
            for(const instance of this.getRunningServers()) {
                instance.adjustResourceUsage(ResourceMode.FULL);
            }
            logger.info('Background running disabled');
        }
    }

    /**
     * Restart every background server that is neither running nor starting
     */
    async keepServersAlive(): Promise<void> {
        const restartable = _.filter(Array.from(this.servers.entries()), ([, { instance }]) =>
            instance.config.runInBackground
            && instance.state !== ServerState.RUNNING
            && instance.state !== ServerState.STARTING
            && instance.getTransport() !== undefined
        );

        await Promise.all(_.map(restartable, async ([id, { instance }]) => {
            logger.info({ serverId: id, state: instance.state }, 'Restarting background server');
            if(instance.state === ServerState.PAUSED) {
                await instance.stop();
            }
            await this.startQuietly(id, instance, 'Failed to restart background server');
        }));
    }

    async dispose(): Promise<void> {
        if(this.isDisposed) {
            return;
        }

        this.isDisposed = true;
        this.backgroundRunning = false;
        this.clearKeepAliveTimer();

        const managed = Array.from(this.servers.entries());
        this.servers.clear();

        await Promise.all(_.map(managed, async ([id, { instance, unsubscribe }]) => {
            unsubscribe();
            try {
                await instance.stop();
                await instance.dispose();
            } catch (error) {
                logger.error({ serverId: id, error: toErrorMessage(error) }, 'Failed to dispose server');
            }
        }));

        this.registrationChannel.close();
        this.stateChannel.close();
        logger.debug('Server manager disposed');
    }

    private async startQuietly(id: string, instance: ServerInstance, failureMessage: string): Promise<void> {
        const transport = instance.getTransport();
        if(!transport) {
            return;
        }
        try {
            await instance.start(transport);
        } catch (error) {
            logger.error({ serverId: id, error: toErrorMessage(error) }, failureMessage);
        }
    }

    /**
     * (Re)create the sweep timer. It only holds the process open when some server
     * asks for a foreground service.
     */
    private refreshKeepAliveTimer(): void {
        this.clearKeepAliveTimer();

        this.keepAliveTimer = setInterval(() => {
            void this.keepServersAlive();
        }, this.keepAliveIntervalMs);

        const holdProcess = _.some(this.getAllServers(), instance => instance.config.useForegroundServiceOnMobile);
        if(!holdProcess) {
            this.keepAliveTimer.unref();
        }
    }

    private clearKeepAliveTimer(): void {
        if(this.keepAliveTimer) {
            clearInterval(this.keepAliveTimer);
            this.keepAliveTimer = undefined;
        }
    }

    private publishStates(): void {
        this.stateChannel.publish(this.getStateSnapshot());
    }
}
