#!/usr/bin/env node
/**
 * MCP Host CLI Entry Point
 *
 * Commands:
 * - serve: Run the MCP host over stdio
 * - run-tool <name> [json-args]: Run one tool as a background task and print the outcome
 * - config show|set|reset: Inspect or edit the persisted server configuration
 * - config-path: Show where settings are stored
 */

import { Command } from 'commander';
import _ from 'lodash';
import { getPackageInfo } from './utils/package-info.js';

const packageInfo = getPackageInfo();

const program = new Command();

program
    .name('mcp-host')
    .description(packageInfo.description)
    .version(packageInfo.version);

program
    .command('serve')
    .description('Run the MCP host over stdio')
    .option('-n, --name <name>', 'Server name reported to clients')
    .option('-b, --background', 'Keep serving while the terminal is detached')
    .action(async (options: { name?: string, background?: boolean }) => {
        const { startHost } = await import('./host/serve.js');
        const host = await startHost({ name: options.name, background: options.background });

        const shutdown = () => {
            void host.shutdown().then(() => {
                process.exitCode = 0;
            });
        };

        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
        // The stdio transport keeps the process running
    });

program
    .command('run-tool')
    .description('Run a tool as a background task and print the result')
    .argument('<name>', 'Tool name')
    .argument('[json-args]', 'Tool arguments as a JSON object', '{}')
    .option('--no-network', 'Run the task without network access')
    .action(async (name: string, jsonArgs: string, options: { network: boolean }) => {
        const { BackgroundTaskRunner } = await import('./runner/background-task-runner.js');
        const { parseToolArguments } = await import('./host/cli-helpers.js');

        const args = parseToolArguments(jsonArgs);
        const runner = new BackgroundTaskRunner();
        try {
            const taskId = runner.enqueueToolExecution(name, args, options.network);
            const task = await runner.waitForTask(taskId);

            console.log(`Task ${task.id}: ${task.status}`);
            if(task.result) {
                console.log(JSON.stringify(task.result, null, 2));
            }
            if(task.error !== undefined) {
                console.error(task.error);
                process.exitCode = 1;
            }
        } finally {
            await runner.dispose();
        }
    });

const configCommand = program
    .command('config')
    .description('Inspect or edit the persisted server configuration');

configCommand
    .command('show')
    .description('Print the current configuration as JSON')
    .action(async () => {
        const { FileConfigStore } = await import('./utils/config-store.js');
        const config = await new FileConfigStore().load();
        console.log(JSON.stringify(config.toJSON(), null, 2));
    });

configCommand
    .command('set')
    .description('Change one configuration value')
    .argument('<key>', 'Configuration key, e.g. requestHandlerTimeout')
    .argument('<value>', 'New value (booleans and numbers are parsed)')
    .action(async (key: string, value: string) => {
        const { FileConfigStore } = await import('./utils/config-store.js');
        const { applyConfigValue } = await import('./host/cli-helpers.js');

        const store = new FileConfigStore();
        const updated = applyConfigValue(await store.load(), key, value);
        if(!await store.save(updated)) {
            throw new Error('Failed to save configuration');
        }
        console.log(JSON.stringify(updated.toJSON(), null, 2));
    });

configCommand
    .command('reset')
    .description('Restore the default configuration')
    .action(async () => {
        const { FileConfigStore } = await import('./utils/config-store.js');
        const { ServerConfig } = await import('./server/server-config.js');

        if(!await new FileConfigStore().save(ServerConfig.defaults())) {
            throw new Error('Failed to save configuration');
        }
        console.log('Configuration reset to defaults.');
    });

program
    .command('config-path')
    .description('Show where settings are stored')
    .option('-v, --verbose', 'Show the settings file as well as the directory')
    .action(async (options: { verbose?: boolean }) => {
        const { getDataDir, getSettingsPath } = await import('./utils/config-paths.js');

        if(options.verbose) {
            console.log('\nSettings paths:');
            console.log(`  Data directory: ${getDataDir()}`);
            console.log(`  Settings file:  ${getSettingsPath()}`);
            console.log();
        } else {
            // Just the directory, for scripting
            console.log(getDataDir());
        }
    });

program.parseAsync().catch((error: unknown) => {
    console.error(_.isError(error) ? error.message : String(error));
    process.exitCode = 1;
});
