/**
 * MCP server instance
 *
 * One server endpoint and its lifecycle:
 * - stopped -> starting -> running (or error when the connect fails)
 * - running <-> paused, driven by host lifecycle signals
 * - running -> stopped on stop(), or on detach when not running in background
 *
 * State only ever changes from inside this class. Observers follow it through the
 * `stateChanges` and `errors` channels.
 */

import { randomUUID } from 'node:crypto';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';
import { ServerConfig } from './server-config.js';
import type { LifecycleSource } from './lifecycle.js';
import {
    createSdkProtocolServer,
    type PromptRegistration,
    type ProtocolServer,
    type ProtocolServerFactory,
    type ResourceRegistration,
    type ToolRegistration
} from './protocol.js';
import { ProcessStatsSampler, type StatsSampler } from './stats-sampler.js';
import {
    EMPTY_RESOURCE_STATS,
    LifecycleSignal,
    ResourceMode,
    ServerState,
    type ResourceStats
} from '../types/runtime.js';
import {
    AlreadyActiveError,
    DisposedError,
    TransportFailureError,
    toErrorMessage,
    type RuntimeError
} from '../utils/errors.js';
import { EventChannel, type Subscribable } from '../utils/event-channel.js';
import { logger } from '../utils/logger.js';

export interface ServerInstanceOptions {
    /** Defaults to a random UUID */
    id?:              string
    name:             string
    version:          string
    config?:          ServerConfig
    /** Builds the protocol layer; defaults to the SDK-backed implementation */
    protocolFactory?: ProtocolServerFactory
    statsSampler?:    StatsSampler
    /** When given, the instance reacts to its signals until disposed */
    lifecycle?:       LifecycleSource
}

export class ServerInstance {
    readonly id:      string;
    readonly name:    string;
    readonly version: string;
    readonly config:  ServerConfig;

    private readonly protocol:     ProtocolServer;
    private readonly statsSampler: StatsSampler;
    private readonly stateChannel = new EventChannel<ServerState>('server-state');
    private readonly errorChannel = new EventChannel<RuntimeError>('server-errors');
    private readonly unsubscribeLifecycle?: () => void;

    private serverState:  ServerState = ServerState.STOPPED;
    private mode:         ResourceMode = ResourceMode.FULL;
    private stats:        ResourceStats = EMPTY_RESOURCE_STATS;
    private transport?:   Transport;
    private statsTimer?:  NodeJS.Timeout;
    private sampling = false;
    private isDisposed = false;

    constructor(options: ServerInstanceOptions) {
        this.id = options.id ?? randomUUID();
        this.name = options.name;
        this.version = options.version;
        this.config = options.config ?? ServerConfig.defaults();

        const protocolFactory = options.protocolFactory ?? createSdkProtocolServer;
        this.protocol = protocolFactory({ name: this.name, version: this.version, config: this.config });
        this.statsSampler = options.statsSampler ?? new ProcessStatsSampler();

        this.unsubscribeLifecycle = options.lifecycle?.subscribe((signal) => {
            this.handleLifecycleSignal(signal);
        });
    }

    static async create(options: ServerInstanceOptions): Promise<ServerInstance> {
        return new ServerInstance(options);
    }

    get state(): ServerState {
        return this.serverState;
    }

    get isRunning(): boolean {
        return this.serverState === ServerState.RUNNING;
    }

    get disposed(): boolean {
        return this.isDisposed;
    }

    get resourceStats(): ResourceStats {
        return this.stats;
    }

    get resourceMode(): ResourceMode {
        return this.mode;
    }

    /** Every state transition, in order */
    get stateChanges(): Subscribable<ServerState> {
        return this.stateChannel;
    }

    get errors(): Subscribable<RuntimeError> {
        return this.errorChannel;
    }

    setTransport(transport: Transport): void {
        this.transport = transport;
    }

    getTransport(): Transport | undefined {
        return this.transport;
    }

    /**
     * Connect the protocol layer to `transport`.
     *
     * @throws DisposedError after dispose()
     * @throws AlreadyActiveError while starting or running; the state is left as is
     * @throws TransportFailureError when the connect fails; the instance is then in
     * the error state and the same error is published on `errors`
     */
    async start(transport: Transport): Promise<void> {
        if(this.isDisposed) {
            throw new DisposedError(`Server ${this.id} has been disposed`);
        }

        if(this.serverState === ServerState.STARTING || this.serverState === ServerState.RUNNING) {
            throw new AlreadyActiveError(`Server ${this.id} is already ${this.serverState}`);
        }

        this.transport = transport;
        this.setServerState(ServerState.STARTING);
        this.startResourceMonitoring();

        try {
            await this.protocol.connect(transport);
        } catch (error) {
            const failure = new TransportFailureError(`Server ${this.id} failed to connect: ${toErrorMessage(error)}`, { cause: error });
            logger.error({ serverId: this.id, error: failure.message }, 'MCP server failed to start');
            this.setServerState(ServerState.ERROR);
            this.recordError();
            this.errorChannel.publish(failure);
            throw failure;
        }

        if(this.isDisposed) {
            // dispose() ran while the connect was in flight and already disconnected
            return;
        }

        this.setServerState(ServerState.RUNNING);
        this.protocol.sendLog('info', 'Server started');
        logger.info({ serverId: this.id, name: this.name }, 'MCP server started');
    }

    /**
     * Disconnect and move to stopped. A no-op when already stopped or disposed.
     * Disconnect failures are logged and otherwise ignored.
     */
    async stop(): Promise<void> {
        if(this.isDisposed || this.serverState === ServerState.STOPPED) {
            return;
        }

        if(this.serverState === ServerState.RUNNING) {
            this.protocol.sendLog('info', 'Server stopping');
            logger.info({ serverId: this.id, name: this.name }, 'MCP server stopping');
        }

        await this.disconnectQuietly();
        this.setServerState(ServerState.STOPPED);
    }

    /**
     * React to a host lifecycle notification.
     *
     * | signal          | state   | runInBackground | effect                   |
     * |-----------------|---------|-----------------|--------------------------|
     * | resumed         | paused  | any             | running, mode full       |
     * | resumed         | running | any             | mode full                |
     * | inactive        | running | any             | mode reduced             |
     * | paused          | running | true            | mode minimal             |
     * | paused          | running | false           | paused                   |
     * | detached/hidden | running | true            | mode suspended           |
     * | detached/hidden | running | false           | stopped                  |
     *
     * Anything else is ignored.
     */
    handleLifecycleSignal(signal: LifecycleSignal): void {
        if(this.isDisposed) {
            return;
        }

        const running = this.serverState === ServerState.RUNNING;

        switch(signal) {
            case LifecycleSignal.RESUMED:
                if(this.serverState === ServerState.PAUSED) {
                    this.resumeServer();
                    this.adjustResourceUsage(ResourceMode.FULL);
                } else if(running) {
                    this.adjustResourceUsage(ResourceMode.FULL);
                }
                break;

            case LifecycleSignal.INACTIVE:
                if(running) {
                    this.adjustResourceUsage(ResourceMode.REDUCED);
                }
                break;

            case LifecycleSignal.PAUSED:
                if(!running) {
                    break;
                }
                if(this.config.runInBackground) {
                    this.adjustResourceUsage(ResourceMode.MINIMAL);
                } else {
                    this.pauseServer();
                }
                break;

            case LifecycleSignal.DETACHED:
            case LifecycleSignal.HIDDEN:
                if(!running) {
                    break;
                }
                if(this.config.runInBackground) {
                    this.adjustResourceUsage(ResourceMode.SUSPENDED);
                } else {
                    // stop() never rejects
                    void this.stop();
                }
                break;
        }
    }

    adjustResourceUsage(mode: ResourceMode): void {
        if(this.isDisposed) {
            return;
        }

        this.mode = mode;
        logger.debug({ serverId: this.id, mode }, 'Server resource usage adjusted');

        if(this.serverState === ServerState.RUNNING) {
            this.protocol.sendLog('debug', 'Server resource usage adjusted', { mode });
        }
    }

    /**
     * Send a log notification to the client; dropped unless running
     */
    sendLog(level: LoggingLevel, message: string, data?: Record<string, unknown>): void {
        if(this.isDisposed || this.serverState !== ServerState.RUNNING) {
            return;
        }
        this.protocol.sendLog(level, message, data);
    }

    addTool(tool: ToolRegistration): void {
        this.assertNotDisposed();
        this.protocol.addTool(tool);
    }

    removeTool(name: string): void {
        this.assertNotDisposed();
        this.protocol.removeTool(name);
    }

    addResource(resource: ResourceRegistration): void {
        this.assertNotDisposed();
        this.protocol.addResource(resource);
    }

    removeResource(uri: string): void {
        this.assertNotDisposed();
        this.protocol.removeResource(uri);
    }

    addPrompt(prompt: PromptRegistration): void {
        this.assertNotDisposed();
        this.protocol.addPrompt(prompt);
    }

    removePrompt(name: string): void {
        this.assertNotDisposed();
        this.protocol.removePrompt(name);
    }

    /**
     * Release everything the instance holds. Idempotent; every later call is a
     * no-op except start() and registration, which throw DisposedError.
     */
    async dispose(): Promise<void> {
        if(this.isDisposed) {
            return;
        }

        this.isDisposed = true;

        if(this.statsTimer) {
            clearInterval(this.statsTimer);
            this.statsTimer = undefined;
        }

        this.unsubscribeLifecycle?.();

        if(this.serverState !== ServerState.STOPPED) {
            await this.disconnectQuietly();
        }

        this.stateChannel.close();
        this.errorChannel.close();
        logger.debug({ serverId: this.id }, 'MCP server disposed');
    }

    private assertNotDisposed(): void {
        if(this.isDisposed) {
            throw new DisposedError(`Server ${this.id} has been disposed`);
        }
    }

    private async disconnectQuietly(): Promise<void> {
        try {
            await this.protocol.disconnect();
        } catch (error) {
            logger.warn({ serverId: this.id, error: toErrorMessage(error) }, 'Disconnect failed, continuing');
        }
    }

    private setServerState(next: ServerState): void {
        if(this.serverState === next) {
            return;
        }
        logger.debug({ serverId: this.id, from: this.serverState, to: next }, 'Server state changed');
        this.serverState = next;
        this.stateChannel.publish(next);
    }

    private pauseServer(): void {
        this.setServerState(ServerState.PAUSED);
        logger.info({ serverId: this.id }, 'MCP server paused');
    }

    private resumeServer(): void {
        this.setServerState(ServerState.RUNNING);
        this.protocol.sendLog('info', 'Server resumed');
        logger.info({ serverId: this.id }, 'MCP server resumed');
    }

    private startResourceMonitoring(): void {
        if(!this.config.monitorResourceUsage || this.statsTimer) {
            return;
        }

        this.statsTimer = setInterval(() => {
            void this.updateResourceStats();
        }, this.config.resourceStatsUpdateInterval);
        this.statsTimer.unref();
    }

    /**
     * Replace the stats snapshot with a fresh sample. Skipped unless running and not
     * suspended, and while a previous sample is still in flight.
     */
    private async updateResourceStats(): Promise<void> {
        if(this.serverState !== ServerState.RUNNING || this.mode === ResourceMode.SUSPENDED || this.sampling) {
            return;
        }

        this.sampling = true;
        try {
            const sample = await this.statsSampler.sample();
            if(this.isDisposed || this.serverState !== ServerState.RUNNING) {
                return;
            }

            this.stats = Object.freeze({
                cpuUsagePercent:   Math.max(0, sample.cpuUsagePercent),
                memoryUsageMB:     Math.max(0, sample.memoryUsageMB),
                activeConnections: this.transport ? 1 : 0,
                requestsProcessed: this.stats.requestsProcessed + 1,
                errorsCount:       this.stats.errorsCount,
            });
        } catch (error) {
            logger.warn({ serverId: this.id, error: toErrorMessage(error) }, 'Resource sampling failed');
        } finally {
            this.sampling = false;
        }
    }

    private recordError(): void {
        this.stats = Object.freeze({
            ...this.stats,
            errorsCount: this.stats.errorsCount + 1,
        });
    }
}
