/**
 * Named tool lookup shared by the protocol registration and the task runner
 */

import _ from 'lodash';
import { createBuiltinTools } from './builtin-tools.js';
import { resultText, type RunnableTool, type ToolContext } from './tool-implementation.js';
import type { TaskResult } from '../runner/task.js';
import { DuplicateIdError, TaskFailureError } from '../utils/errors.js';

export class ToolRegistry {
    private readonly tools = new Map<string, RunnableTool>();

    constructor(tools: RunnableTool[] = []) {
        for(const tool of tools) {
            this.register(tool);
        }
    }

    register(tool: RunnableTool): void {
        if(this.tools.has(tool.name)) {
            throw new DuplicateIdError(`Tool already registered: ${tool.name}`);
        }
        this.tools.set(tool.name, tool);
    }

    get(name: string): RunnableTool | undefined {
        return this.tools.get(name);
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    list(): RunnableTool[] {
        return Array.from(this.tools.values());
    }

    names(): string[] {
        return _.sortBy(Array.from(this.tools.keys()));
    }

    /**
     * Run a tool for a background task.
     *
     * @returns the tool result as a plain JSON object
     * @throws TaskFailureError for an unknown tool, invalid arguments or an error result
     */
    async execute(name: string, args: Record<string, unknown>, context: ToolContext): Promise<TaskResult> {
        const tool = this.tools.get(name);
        if(!tool) {
            throw new TaskFailureError(`Unknown tool: ${name}`);
        }

        const result = await tool.run(args, context);
        if(result.isError) {
            throw new TaskFailureError(resultText(result) || `Tool ${name} failed`);
        }

        // Plain data only: the result may cross a worker boundary
        return { content: _.cloneDeep(result.content) };
    }
}

export function createBuiltinToolRegistry(): ToolRegistry {
    return new ToolRegistry(createBuiltinTools());
}
