/**
 * Messages exchanged between the background task runner and its worker thread.
 *
 * Both directions are validated on receipt: the structured-clone boundary gives
 * no type guarantees.
 */

import { z } from 'zod';
import { ResourceLimitsSchema } from './config.js';

const ToolArgumentsSchema = z.record(z.string(), z.unknown());

export const ExecuteMessageSchema = z.object({
    type:            z.literal('execute'),
    taskId:          z.string().min(1),
    toolName:        z.string().min(1),
    arguments:       ToolArgumentsSchema,
    allowNetworking: z.boolean(),
});

export const SetResourceLimitsMessageSchema = z.object({
    type:   z.literal('setResourceLimits'),
    limits: ResourceLimitsSchema,
});

export const RunnerToWorkerMessageSchema = z.discriminatedUnion('type', [
    ExecuteMessageSchema,
    SetResourceLimitsMessageSchema,
]);

export const ExecuteResultMessageSchema = z.object({
    type:   z.literal('executeResult'),
    taskId: z.string().min(1),
    result: z.record(z.string(), z.unknown()),
});

export const ExecuteErrorMessageSchema = z.object({
    type:   z.literal('executeError'),
    taskId: z.string().min(1),
    error:  z.string(),
});

// Sent once by the worker after its entry has loaded
export const ReadyMessageSchema = z.object({
    type: z.literal('ready'),
});

export const WorkerToRunnerMessageSchema = z.discriminatedUnion('type', [
    ReadyMessageSchema,
    ExecuteResultMessageSchema,
    ExecuteErrorMessageSchema,
]);

export type ExecuteMessage = z.infer<typeof ExecuteMessageSchema>;
export type SetResourceLimitsMessage = z.infer<typeof SetResourceLimitsMessageSchema>;
export type RunnerToWorkerMessage = z.infer<typeof RunnerToWorkerMessageSchema>;
export type ExecuteResultMessage = z.infer<typeof ExecuteResultMessageSchema>;
export type ExecuteErrorMessage = z.infer<typeof ExecuteErrorMessageSchema>;
export type ReadyMessage = z.infer<typeof ReadyMessageSchema>;
export type WorkerToRunnerMessage = z.infer<typeof WorkerToRunnerMessageSchema>;
export type TaskReplyMessage = ExecuteResultMessage | ExecuteErrorMessage;
