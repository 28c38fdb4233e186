/**
 * Registers the built-in tools, resources and prompts on a server instance,
 * plus the tools that drive the background task runner.
 */

import _ from 'lodash';
import { z } from 'zod';
import type { CallToolResult, GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import { createBuiltinResourceProviders, type ResourceProvider } from '../resources/resource-providers.js';
import type { BackgroundTaskRunner } from '../runner/background-task-runner.js';
import type { ServerInstance } from '../server/server-instance.js';
import { textResult, toToolRegistration } from '../tools/tool-implementation.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { formatZodIssues, toErrorMessage } from '../utils/errors.js';

export interface BuiltinsOptions {
    tools:      ToolRegistry
    runner?:    BackgroundTaskRunner
    /** Defaults to config://app for the instance's config, system://info and time:// */
    providers?: ResourceProvider[]
}

const RunInBackgroundArgsSchema = z.object({
    toolName:        z.string().min(1),
    arguments:       z.record(z.string(), z.unknown()).default({}),
    allowNetworking: z.boolean().default(true),
});

const TaskIdArgsSchema = z.object({
    taskId: z.string().min(1),
});

export function registerBuiltins(instance: ServerInstance, options: BuiltinsOptions): void {
    const { tools, runner } = options;

    for(const tool of tools.list()) {
        instance.addTool(toToolRegistration(tool));
    }

    const providers = options.providers ?? createBuiltinResourceProviders(() => instance.config);
    for(const provider of providers) {
        for(const registration of provider.toRegistrations()) {
            instance.addResource(registration);
        }
    }

    if(runner) {
        registerTaskTools(instance, tools, runner);
    }

    instance.addPrompt({
        name:        'server_status',
        description: 'Summarize the current state and resource usage of this server',
        handler:     async () => serverStatusPrompt(instance),
    });
}

function registerTaskTools(instance: ServerInstance, tools: ToolRegistry, runner: BackgroundTaskRunner): void {
    const backgroundToolNames = _.map(_.filter(tools.list(), 'canRunInBackground'), 'name');

    instance.addTool({
        name:        'run_in_background',
        description: 'Queue a tool for background execution and return its task id',
        inputSchema: {
            type:       'object',
            properties: {
                toolName:        { type: 'string', enum: backgroundToolNames, description: 'Tool to run' },
                arguments:       { type: 'object', description: 'Arguments for the tool' },
                allowNetworking: { type: 'boolean', default: true },
            },
            required: ['toolName'],
        },
        handler: async (args) => {
            const parsed = RunInBackgroundArgsSchema.safeParse(args);
            if(!parsed.success) {
                return textResult(`Invalid arguments: ${formatZodIssues(parsed.error)}`, true);
            }

            const { toolName, arguments: toolArgs, allowNetworking } = parsed.data;
            const tool = tools.get(toolName);
            if(!tool) {
                return textResult(`Unknown tool: ${toolName}`, true);
            }
            if(!tool.canRunInBackground) {
                return textResult(`Tool ${toolName} cannot run in the background`, true);
            }

            try {
                const taskId = runner.enqueueToolExecution(toolName, toolArgs, allowNetworking);
                return textResult(`Task started with ID: ${taskId}`);
            } catch (error) {
                return textResult(toErrorMessage(error), true);
            }
        },
    });

    instance.addTool({
        name:        'task_status',
        description: 'Report the status, result or error of a background task',
        inputSchema: {
            type:       'object',
            properties: { taskId: { type: 'string' } },
            required:   ['taskId'],
        },
        handler: async args => withTaskId(args, (taskId) => {
            const task = runner.getTask(taskId);
            if(!task) {
                return textResult(`Unknown task ID: ${taskId}`, true);
            }
            return textResult(JSON.stringify(_.omit(task, 'arguments'), null, 2));
        }),
    });

    instance.addTool({
        name:        'cancel_task',
        description: 'Cancel a queued or running background task',
        inputSchema: {
            type:       'object',
            properties: { taskId: { type: 'string' } },
            required:   ['taskId'],
        },
        handler: async args => withTaskId(args, (taskId) => {
            if(!runner.cancelTask(taskId)) {
                return textResult(`Task ${taskId} is unknown or already finished`, true);
            }
            return textResult(`Task ${taskId} cancelled`);
        }),
    });
}

function withTaskId(args: unknown, handle: (taskId: string) => CallToolResult): CallToolResult {
    const parsed = TaskIdArgsSchema.safeParse(args);
    if(!parsed.success) {
        return textResult(`Invalid arguments: ${formatZodIssues(parsed.error)}`, true);
    }
    return handle(parsed.data.taskId);
}

export function serverStatusPrompt(instance: ServerInstance): GetPromptResult {
    const stats = instance.resourceStats;
    const lines = [
        `Server ${instance.name} ${instance.version} (${instance.id})`,
        `State: ${instance.state}`,
        `Resource mode: ${instance.resourceMode}`,
        `CPU: ${stats.cpuUsagePercent}%`,
        `Memory: ${stats.memoryUsageMB} MB`,
        `Active connections: ${stats.activeConnections}`,
        `Requests processed: ${stats.requestsProcessed}`,
        `Errors: ${stats.errorsCount}`,
    ];

    return {
        description: `Status of ${instance.name}`,
        messages:    [{
            role:    'user',
            content: { type: 'text', text: `Summarize the health of this MCP server:\n\n${lines.join('\n')}` },
        }],
    };
}
