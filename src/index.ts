/**
 * MCP host runtime
 *
 * Public API: server instances and their manager, the background task runner, the
 * built-in tools and resource providers, and the stdio host.
 */

export { ServerConfig } from './server/server-config.js';
export { ServerInstance } from './server/server-instance.js';
export type { ServerInstanceOptions } from './server/server-instance.js';
export { ServerManager, DEFAULT_KEEP_ALIVE_INTERVAL_MS } from './server/server-manager.js';
export type { ServerManagerOptions, ServerRegistration } from './server/server-manager.js';
export { LifecycleSignalHub, bindProcessSignals } from './server/lifecycle.js';
export type { LifecycleSource } from './server/lifecycle.js';
export { SdkProtocolServer, createSdkProtocolServer } from './server/protocol.js';
export type {
    PromptRegistration,
    ProtocolServer,
    ProtocolServerFactory,
    ProtocolServerOptions,
    ResourceRegistration,
    ToolRegistration
} from './server/protocol.js';
export { ProcessStatsSampler } from './server/stats-sampler.js';
export type { ResourceSample, StatsSampler } from './server/stats-sampler.js';

export { BackgroundTaskRunner } from './runner/background-task-runner.js';
export type { BackgroundTaskRunnerOptions } from './runner/background-task-runner.js';
export type { TaskResult, TaskSnapshot } from './runner/task.js';
export { spawnThreadWorker, TOOL_WORKER_ENTRY } from './runner/worker-spawner.js';
export type { WorkerHandle, WorkerSpawner } from './runner/worker-spawner.js';

export { ToolImplementation, TextTool, textResult, resultText, toToolRegistration } from './tools/tool-implementation.js';
export type { RunnableTool, ToolContext } from './tools/tool-implementation.js';
export { CalculatorTool, WordCounterTool, DateTimeTool, createBuiltinTools } from './tools/builtin-tools.js';
export { ToolRegistry, createBuiltinToolRegistry } from './tools/tool-registry.js';
export {
    ResourceProvider,
    JsonResourceProvider,
    ConfigResourceProvider,
    SystemInfoResourceProvider,
    TimeResourceProvider,
    createBuiltinResourceProviders
} from './resources/resource-providers.js';
export type { ResourceDescriptor } from './resources/resource-providers.js';

export { registerBuiltins, serverStatusPrompt } from './host/builtins.js';
export type { BuiltinsOptions } from './host/builtins.js';
export { startHost, formatStatusSummary, PRIMARY_SERVER_ID } from './host/serve.js';
export type { Host, HostOptions } from './host/serve.js';

export { FileConfigStore, CONFIG_RECORD_KEY } from './utils/config-store.js';
export type { ConfigStore } from './utils/config-store.js';
export {
    RuntimeError,
    AlreadyActiveError,
    DisposedError,
    DuplicateIdError,
    UnknownIdError,
    TransportFailureError,
    TaskFailureError
} from './utils/errors.js';
export type { RuntimeErrorCode } from './utils/errors.js';
export type { Subscribable, Listener } from './utils/event-channel.js';
export { TimeoutError, withTimeout } from './utils/timeout.js';

export {
    ServerState,
    ResourceMode,
    LifecycleSignal,
    TaskStatus,
    EMPTY_RESOURCE_STATS
} from './types/runtime.js';
export type { ResourceStats, ServerStateSnapshot } from './types/runtime.js';
export { DEFAULT_SERVER_CONFIG, DEFAULT_RESOURCE_LIMITS } from './types/config.js';
export type { ResourceLimits, ServerConfigValues } from './types/config.js';
