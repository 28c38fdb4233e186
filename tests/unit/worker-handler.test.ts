/**
 * Worker-side message handling: validation, execution, limits and deadlines
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createWorkerMessageHandler, executeToolRequest } from '../../src/runner/worker-handler.js';
import { TextTool } from '../../src/tools/tool-implementation.js';
import { ToolRegistry, createBuiltinToolRegistry } from '../../src/tools/tool-registry.js';
import type { ToolInputSchema } from '../../src/server/protocol.js';
import { DEFAULT_RESOURCE_LIMITS } from '../../src/types/config.js';
import type { WorkerToRunnerMessage } from '../../src/types/worker-protocol.js';

class SleepTool extends TextTool<{ ms: number }> {
    override readonly name = 'sleep';
    override readonly description = 'Wait, then answer';
    override readonly argsSchema = z.object({ ms: z.number() });
    override readonly inputSchema: ToolInputSchema = { type: 'object' };

    override async executeText({ ms }: { ms: number }): Promise<string> {
        await new Promise(resolve => setTimeout(resolve, ms));
        return 'awake';
    }
}

function createHandler(registry = createBuiltinToolRegistry()) {
    const replies: WorkerToRunnerMessage[] = [];
    const handle = createWorkerMessageHandler(registry, (reply) => {
        replies.push(reply);
    });
    return { handle, replies };
}

describe('executeToolRequest', () => {
    it('should reply with the result of a successful execution', async () => {
        const reply = await executeToolRequest(createBuiltinToolRegistry(), {
            type:            'execute',
            taskId:          'task-1',
            toolName:        'calculator',
            arguments:       { operation: 'add', a: 2, b: 3 },
            allowNetworking: true,
        }, 1000);

        expect(reply).toEqual({ type: 'executeResult', taskId: 'task-1', result: { content: [{ type: 'text', text: '5' }] } });
    });

    it('should reply with an error for failing tools', async () => {
        const reply = await executeToolRequest(createBuiltinToolRegistry(), {
            type:            'execute',
            taskId:          'task-2',
            toolName:        'calculator',
            arguments:       { operation: 'divide', a: 1, b: 0 },
            allowNetworking: true,
        }, 1000);

        expect(reply).toEqual({ type: 'executeError', taskId: 'task-2', error: 'Error: Division by zero' });
    });

    it('should reply with an error when the deadline passes', async () => {
        const reply = await executeToolRequest(new ToolRegistry([new SleepTool()]), {
            type:            'execute',
            taskId:          'task-3',
            toolName:        'sleep',
            arguments:       { ms: 200 },
            allowNetworking: true,
        }, 20);

        expect(reply).toEqual({
            type:   'executeError',
            taskId: 'task-3',
            error:  'Tool sleep exceeded the execution time limit of 20ms',
        });
    });
});

describe('createWorkerMessageHandler', () => {
    it('should execute requests and post the reply', async () => {
        const { handle, replies } = createHandler();

        await handle({
            type:            'execute',
            taskId:          'task-1',
            toolName:        'word_counter',
            arguments:       { text: 'one two' },
            allowNetworking: false,
        });

        expect(replies).toEqual([{
            type:   'executeResult',
            taskId: 'task-1',
            result: { content: [{ type: 'text', text: 'Words: 2\nCharacters: 7 (including spaces)\nSentences: 0' }] },
        }]);
    });

    it.each([
        null,
        'execute',
        { type: 'shutdown' },
        { type: 'execute', taskId: '', toolName: 'calculator', arguments: {}, allowNetworking: true },
        { type: 'setResourceLimits', limits: { ...DEFAULT_RESOURCE_LIMITS, maxExecutionTime: -1 } },
    ])('should drop the malformed message %o', async (message) => {
        const { handle, replies } = createHandler();

        await expect(handle(message)).resolves.toBeUndefined();
        expect(replies).toEqual([]);
    });

    it('should apply new limits to later executions', async () => {
        const { handle, replies } = createHandler(new ToolRegistry([new SleepTool()]));

        await handle({ type: 'setResourceLimits', limits: { ...DEFAULT_RESOURCE_LIMITS, maxExecutionTime: 10 } });
        await handle({ type: 'execute', taskId: 'task-1', toolName: 'sleep', arguments: { ms: 200 }, allowNetworking: true });

        expect(replies).toEqual([{
            type:   'executeError',
            taskId: 'task-1',
            error:  'Tool sleep exceeded the execution time limit of 10ms',
        }]);
    });

    it('should not reject when posting the reply fails', async () => {
        const handle = createWorkerMessageHandler(createBuiltinToolRegistry(), () => {
            throw new Error('port closed');
        });

        await expect(handle({
            type:            'execute',
            taskId:          'task-1',
            toolName:        'calculator',
            arguments:       { operation: 'add', a: 1, b: 1 },
            allowNetworking: true,
        })).resolves.toBeUndefined();
    });
});
