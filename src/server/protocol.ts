/**
 * MCP protocol layer
 *
 * ServerInstance talks to the protocol through the ProtocolServer interface only.
 * SdkProtocolServer implements it with the SDK's low-level Server and keeps its
 * own registries of tools, resources and prompts behind the list/call/read/get
 * request handlers.
 */

import _ from 'lodash';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    CallToolRequestSchema,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListResourcesRequestSchema,
    ListToolsRequestSchema,
    ReadResourceRequestSchema,
    type CallToolResult,
    type GetPromptResult,
    type LoggingLevel,
    type PromptArgument,
    type ReadResourceResult,
    type Tool
} from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig } from './server-config.js';
import { toErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export type ToolInputSchema = Tool['inputSchema'];

export type ToolHandler = (args: Record<string, unknown>) => Promise<CallToolResult>;
export type ResourceHandler = (uri: string) => Promise<ReadResourceResult>;
export type PromptHandler = (args: Record<string, string>) => Promise<GetPromptResult>;

export interface ToolRegistration {
    name:         string
    description?: string
    inputSchema:  ToolInputSchema
    handler:      ToolHandler
}

export interface ResourceRegistration {
    uri:          string
    name:         string
    description?: string
    mimeType?:    string
    handler:      ResourceHandler
}

export interface PromptRegistration {
    name:         string
    description?: string
    arguments?:   PromptArgument[]
    handler:      PromptHandler
}

export interface ProtocolServer {
    connect(transport: Transport): Promise<void>
    disconnect(): Promise<void>
    /** Fire-and-forget log notification to the connected client */
    sendLog(level: LoggingLevel, message: string, data?: Record<string, unknown>): void
    addTool(tool: ToolRegistration): void
    removeTool(name: string): void
    addResource(resource: ResourceRegistration): void
    removeResource(uri: string): void
    addPrompt(prompt: PromptRegistration): void
    removePrompt(name: string): void
}

export interface ProtocolServerOptions {
    name:    string
    version: string
    config:  ServerConfig
}

export type ProtocolServerFactory = (options: ProtocolServerOptions) => ProtocolServer;

type ListKind = 'tools' | 'resources' | 'prompts';

export class SdkProtocolServer implements ProtocolServer {
    private readonly server: Server;
    private readonly tools = new Map<string, ToolRegistration>();
    private readonly resources = new Map<string, ResourceRegistration>();
    private readonly prompts = new Map<string, PromptRegistration>();
    private connected = false;
    private inFlightRequests = 0;

    constructor(private readonly options: ProtocolServerOptions) {
        this.server = new Server(
            {
                name:    options.name,
                version: options.version,
            },
            {
                capabilities: {
                    tools:     { listChanged: true },
                    resources: { listChanged: true },
                    prompts:   { listChanged: true },
                    logging:   {},
                },
            }
        );

        this.server.onclose = () => {
            this.connected = false;
        };

        this.registerHandlers();
    }

    async connect(transport: Transport): Promise<void> {
        await this.server.connect(transport);
        this.connected = true;
    }

    async disconnect(): Promise<void> {
        this.connected = false;
        await this.server.close();
    }

    get isConnected(): boolean {
        return this.connected;
    }

    sendLog(level: LoggingLevel, message: string, data?: Record<string, unknown>): void {
        if(!this.connected) {
            return;
        }

        this.server
            .sendLoggingMessage({
                level,
                logger: this.options.name,
                data:   data ? { message, ...data } : message,
            })
            .catch((error: unknown) => {
                logger.debug({ server: this.options.name, error: toErrorMessage(error) }, 'Failed to deliver log notification');
            });
    }

    addTool(tool: ToolRegistration): void {
        this.tools.set(tool.name, tool);
        this.notifyListChanged('tools');
    }

    removeTool(name: string): void {
        if(this.tools.delete(name)) {
            this.notifyListChanged('tools');
        }
    }

    addResource(resource: ResourceRegistration): void {
        this.resources.set(resource.uri, resource);
        this.notifyListChanged('resources');
    }

    removeResource(uri: string): void {
        if(this.resources.delete(uri)) {
            this.notifyListChanged('resources');
        }
    }

    addPrompt(prompt: PromptRegistration): void {
        this.prompts.set(prompt.name, prompt);
        this.notifyListChanged('prompts');
    }

    removePrompt(name: string): void {
        if(this.prompts.delete(name)) {
            this.notifyListChanged('prompts');
        }
    }

    private registerHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => {
            const tools: Tool[] = _.map(Array.from(this.tools.values()), tool => ({
                name:        tool.name,
                description: tool.description,
                inputSchema: tool.inputSchema,
            }));
            return { tools };
        });

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            const tool = this.tools.get(name);
            if(!tool) {
                throw new Error(`Tool not found: ${name}`);
            }

            const { maxConcurrentRequests, requestHandlerTimeout } = this.options.config;
            if(this.inFlightRequests >= maxConcurrentRequests) {
                logger.warn({ toolName: name, maxConcurrentRequests }, 'Rejecting tool call over the concurrency limit');
                return errorResult(`Too many concurrent requests (limit ${maxConcurrentRequests}), try again later`);
            }

            this.inFlightRequests++;
            try {
                return await withTimeout(
                    tool.handler(args ?? {}),
                    requestHandlerTimeout,
                    `Tool ${name} timed out after ${requestHandlerTimeout}ms`
                );
            } catch (error) {
                logger.error({ toolName: name, error: toErrorMessage(error) }, 'Tool handler failed');
                return errorResult(toErrorMessage(error));
            } finally {
                this.inFlightRequests--;
            }
        });

        this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
            const resources = _.map(Array.from(this.resources.values()), resource => ({
                uri:         resource.uri,
                name:        resource.name,
                description: resource.description,
                mimeType:    resource.mimeType,
            }));
            return { resources };
        });

        this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
            const { uri } = request.params;
            const resource = this.resources.get(uri);
            if(!resource) {
                throw new Error(`Resource not found: ${uri}`);
            }
            const { requestHandlerTimeout } = this.options.config;
            return withTimeout(
                resource.handler(uri),
                requestHandlerTimeout,
                `Resource ${uri} timed out after ${requestHandlerTimeout}ms`
            );
        });

        this.server.setRequestHandler(ListPromptsRequestSchema, async () => {
            const prompts = _.map(Array.from(this.prompts.values()), prompt => ({
                name:        prompt.name,
                description: prompt.description,
                arguments:   prompt.arguments,
            }));
            return { prompts };
        });

        this.server.setRequestHandler(GetPromptRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            const prompt = this.prompts.get(name);
            if(!prompt) {
                throw new Error(`Prompt not found: ${name}`);
            }
            const { requestHandlerTimeout } = this.options.config;
            return withTimeout(
                prompt.handler(args ?? {}),
                requestHandlerTimeout,
                `Prompt ${name} timed out after ${requestHandlerTimeout}ms`
            );
        });
    }

    private notifyListChanged(kind: ListKind): void {
        if(!this.connected) {
            return;
        }

        const notification = kind === 'tools'
            ? this.server.sendToolListChanged()
            : kind === 'resources'
                ? this.server.sendResourceListChanged()
                : this.server.sendPromptListChanged();

        notification.catch((error: unknown) => {
            logger.debug({ kind, error: toErrorMessage(error) }, 'Failed to send list-changed notification');
        });
    }
}

export const createSdkProtocolServer: ProtocolServerFactory = options => new SdkProtocolServer(options);

function errorResult(text: string): CallToolResult {
    return {
        content: [{ type: 'text', text }],
        isError: true,
    };
}
