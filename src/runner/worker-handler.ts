/**
 * Message handling on the worker side of the runner protocol. The worker thread
 * entry wires it to its parent port.
 */

import { DEFAULT_RESOURCE_LIMITS, type ResourceLimits } from '../types/config.js';
import {
    RunnerToWorkerMessageSchema,
    type ExecuteMessage,
    type TaskReplyMessage,
    type WorkerToRunnerMessage
} from '../types/worker-protocol.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { TaskFailureError, formatZodIssues, toErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export type WorkerMessageHandler = (raw: unknown) => Promise<void>;

/**
 * Run one execute request under the given deadline and build its reply
 */
export async function executeToolRequest(
    registry: ToolRegistry,
    request: ExecuteMessage,
    timeoutMs: number
): Promise<TaskReplyMessage> {
    try {
        const result = await withTimeout(
            registry.execute(request.toolName, request.arguments, { allowNetworking: request.allowNetworking }),
            timeoutMs,
            () => new TaskFailureError(`Tool ${request.toolName} exceeded the execution time limit of ${timeoutMs}ms`)
        );
        return { type: 'executeResult', taskId: request.taskId, result };
    } catch (error) {
        return { type: 'executeError', taskId: request.taskId, error: toErrorMessage(error) };
    }
}

/**
 * Build the worker's inbound message handler. The returned function never rejects;
 * malformed messages are logged and dropped.
 */
export function createWorkerMessageHandler(
    registry: ToolRegistry,
    post: (message: WorkerToRunnerMessage) => void,
    initialLimits: ResourceLimits = DEFAULT_RESOURCE_LIMITS
): WorkerMessageHandler {
    let limits = initialLimits;

    return async (raw: unknown) => {
        const parsed = RunnerToWorkerMessageSchema.safeParse(raw);
        if(!parsed.success) {
            logger.warn({ error: formatZodIssues(parsed.error) }, 'Ignoring malformed runner message');
            return;
        }

        const message = parsed.data;
        switch(message.type) {
            case 'setResourceLimits':
                limits = message.limits;
                logger.debug({ limits }, 'Worker resource limits updated');
                return;

            case 'execute': {
                const reply = await executeToolRequest(registry, message, limits.maxExecutionTime);
                try {
                    post(reply);
                } catch (error) {
                    logger.error({ taskId: message.taskId, error: toErrorMessage(error) }, 'Failed to post worker reply');
                }
                return;
            }
        }
    };
}
