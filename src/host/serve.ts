/**
 * stdio MCP host
 *
 * Wires one ServerInstance with the built-ins, a ServerManager, a
 * BackgroundTaskRunner and the process lifecycle signals, then serves over stdio.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { registerBuiltins } from './builtins.js';
import { BackgroundTaskRunner } from '../runner/background-task-runner.js';
import { LifecycleSignalHub, bindProcessSignals } from '../server/lifecycle.js';
import { ServerInstance } from '../server/server-instance.js';
import { ServerManager } from '../server/server-manager.js';
import type { ProtocolServerFactory } from '../server/protocol.js';
import { createBuiltinToolRegistry } from '../tools/tool-registry.js';
import { FileConfigStore, type ConfigStore } from '../utils/config-store.js';
import { toErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getPackageInfo } from '../utils/package-info.js';

export const PRIMARY_SERVER_ID = 'primary';

export interface HostOptions {
    name?:            string
    /** Overrides the persisted runInBackground setting */
    background?:      boolean
    store?:           ConfigStore
    transport?:       Transport
    runner?:          BackgroundTaskRunner
    protocolFactory?: ProtocolServerFactory
    /** Receives the process signals; defaults to `process` */
    signalTarget?:    NodeJS.EventEmitter
}

export interface Host {
    readonly instance: ServerInstance
    readonly manager:  ServerManager
    readonly runner:   BackgroundTaskRunner
    readonly signals:  LifecycleSignalHub
    statusSummary(): string
    shutdown(): Promise<void>
}

export async function startHost(options: HostOptions = {}): Promise<Host> {
    const packageInfo = getPackageInfo();
    const store = options.store ?? new FileConfigStore();
    const signalTarget = options.signalTarget ?? process;

    let config = await store.load();
    if(options.background !== undefined) {
        config = config.copyWith({ runInBackground: options.background });
    }

    const signals = new LifecycleSignalHub();
    const tools = createBuiltinToolRegistry();
    const runner = options.runner ?? new BackgroundTaskRunner({ tools });
    const instance = await ServerInstance.create({
        id:              PRIMARY_SERVER_ID,
        name:            options.name ?? packageInfo.name,
        version:         packageInfo.version,
        config,
        lifecycle:       signals,
        protocolFactory: options.protocolFactory,
    });
    registerBuiltins(instance, { tools, runner });

    const manager = new ServerManager();
    manager.register(PRIMARY_SERVER_ID, instance);
    instance.setTransport(options.transport ?? new StdioServerTransport());

    const statusSummary = () => formatStatusSummary(manager, runner);

    const unbindLifecycle = bindProcessSignals(signals, signalTarget);
    const dumpStatus = () => {
        process.stderr.write(`${statusSummary()}\n`);
    };
    if(config.registerWithSystemTray) {
        signalTarget.on('SIGUSR2', dumpStatus);
    }

    let shuttingDown: Promise<void> | undefined;
    const shutdown = async (): Promise<void> => {
        shuttingDown ??= (async () => {
            logger.info('Shutting down MCP host');
            unbindLifecycle();
            signalTarget.off('SIGUSR2', dumpStatus);
            await manager.dispose();
            await runner.dispose();
            signals.close();
            logger.info('MCP host shutdown complete');
        })();
        return shuttingDown;
    };

    try {
        await manager.startServer(PRIMARY_SERVER_ID);
    } catch (error) {
        logger.error({ error: toErrorMessage(error) }, 'Failed to start MCP host');
        await shutdown();
        throw error;
    }

    if(config.runInBackground) {
        manager.enableBackgroundRunning(true);
    }

    logger.info({ name: instance.name, runInBackground: config.runInBackground }, 'MCP host started');

    return { instance, manager, runner, signals, statusSummary, shutdown };
}

export function formatStatusSummary(manager: ServerManager, runner: BackgroundTaskRunner): string {
    const lines = [`Background running: ${manager.isBackgroundRunning ? 'on' : 'off'}`];
    for(const instance of manager.getAllServers()) {
        const stats = instance.resourceStats;
        lines.push(
            `${instance.name} [${instance.state}, ${instance.resourceMode}] `
            + `cpu=${stats.cpuUsagePercent}% mem=${stats.memoryUsageMB}MB `
            + `requests=${stats.requestsProcessed} errors=${stats.errorsCount}`
        );
    }
    lines.push(`Queued tasks: ${runner.queueLength}${runner.isProcessing ? ' (processing)' : ''}`);
    return lines.join('\n');
}
