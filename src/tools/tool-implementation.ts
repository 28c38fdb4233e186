/**
 * Tool base classes
 *
 * A tool declares a JSON schema for clients and a zod schema for the runtime.
 * Arguments are validated with the zod schema before execute() sees them.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { ToolInputSchema, ToolRegistration } from '../server/protocol.js';
import { formatZodIssues, toErrorMessage } from '../utils/errors.js';

export interface ToolContext {
    /**
     * False when the caller asked for a task without network access. Tools that set
     * `requiresNetwork` are refused under it; the built-ins make no network calls.
     */
    allowNetworking: boolean
}

/**
 * Type-erased view of a tool, as the registry and the worker see it
 */
export interface RunnableTool {
    readonly name:               string
    readonly description:        string
    readonly inputSchema:        ToolInputSchema
    readonly canRunInBackground: boolean
    readonly requiresNetwork:    boolean
    run(input: unknown, context: ToolContext): Promise<CallToolResult>
}

export abstract class ToolImplementation<TArgs> implements RunnableTool {
    abstract readonly name: string;
    abstract readonly description: string;
    abstract readonly inputSchema: ToolInputSchema;
    /** Input may differ from TArgs where the schema fills in defaults */
    abstract readonly argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

    get canRunInBackground(): boolean {
        return false;
    }

    get requiresNetwork(): boolean {
        return false;
    }

    abstract execute(args: TArgs, context: ToolContext): Promise<CallToolResult>;

    /**
     * Validate `input` and execute. Invalid arguments, or a network tool called
     * without network access, give an error result, not an exception.
     */
    async run(input: unknown, context: ToolContext): Promise<CallToolResult> {
        if(this.requiresNetwork && !context.allowNetworking) {
            return textResult(`Tool ${this.name} needs network access, which is not allowed here`, true);
        }
        const parsed = this.argsSchema.safeParse(input ?? {});
        if(!parsed.success) {
            return textResult(`Invalid arguments: ${formatZodIssues(parsed.error)}`, true);
        }
        return this.execute(parsed.data, context);
    }
}

/**
 * Tool with a single text result. A thrown error becomes an `Error: ...` result
 * with isError set.
 */
export abstract class TextTool<TArgs> extends ToolImplementation<TArgs> {
    abstract executeText(args: TArgs, context: ToolContext): Promise<string>;

    override async execute(args: TArgs, context: ToolContext): Promise<CallToolResult> {
        try {
            return textResult(await this.executeText(args, context));
        } catch (error) {
            return textResult(`Error: ${toErrorMessage(error)}`, true);
        }
    }
}

/**
 * Protocol registration that runs `tool` with a fixed context
 */
export function toToolRegistration(tool: RunnableTool, context: ToolContext = { allowNetworking: true }): ToolRegistration {
    return {
        name:        tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
        handler:     async args => tool.run(args, context),
    };
}

export function textResult(text: string, isError = false): CallToolResult {
    const result: CallToolResult = { content: [{ type: 'text', text }] };
    if(isError) {
        result.isError = true;
    }
    return result;
}

/**
 * Concatenated text of every text content item
 */
export function resultText(result: CallToolResult): string {
    const parts: string[] = [];
    for(const item of result.content) {
        if(item.type === 'text') {
            parts.push(item.text);
        }
    }
    return parts.join('\n');
}
