/**
 * Background task runner
 *
 * FIFO queue of tool executions. One processing pass runs at a time and handles
 * the queue head:
 * - dispatched to the isolated worker while one is alive, matched to its reply by taskId
 * - otherwise executed in-process through the ToolRegistry
 *
 * Both paths are bounded by the current `maxExecutionTime`. A worker that errors or
 * exits is dropped for good and later tasks use the in-process path. A worker that
 * dies before announcing `ready` never ran anything, so its in-flight task is
 * re-run in-process instead of failing.
 */

import { randomUUID } from 'node:crypto';
import _ from 'lodash';
import { TaskRecord, type TaskResult, type TaskSnapshot } from './task.js';
import { TOOL_WORKER_ENTRY, spawnThreadWorker, type WorkerHandle, type WorkerSpawner } from './worker-spawner.js';
import { createBuiltinToolRegistry, type ToolRegistry } from '../tools/tool-registry.js';
import { DEFAULT_RESOURCE_LIMITS, ResourceLimitsSchema, type ResourceLimits } from '../types/config.js';
import { TaskStatus } from '../types/runtime.js';
import { WorkerToRunnerMessageSchema, type TaskReplyMessage } from '../types/worker-protocol.js';
import { DisposedError, TaskFailureError, UnknownIdError, formatZodIssues, toErrorMessage } from '../utils/errors.js';
import type { Subscribable } from '../utils/event-channel.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export interface BackgroundTaskRunnerOptions {
    /** Tools for in-process execution; defaults to the built-ins */
    tools?:            ToolRegistry
    /** `null` disables the worker and forces in-process execution */
    spawnWorker?:      WorkerSpawner | null
    workerEntryPoint?: URL
    /** Delay before each processing pass */
    passDelayMs?:      number
    limits?:           ResourceLimits
}

interface PendingDispatch {
    taskId:  string
    resolve: (reply: TaskReplyMessage) => void
    reject:  (error: Error) => void
}

/** The worker never came up; the task should run in-process */
class WorkerUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkerUnavailableError';
    }
}

export class BackgroundTaskRunner {
    private readonly tools: ToolRegistry;
    private readonly spawnWorker: WorkerSpawner | null;
    private readonly workerEntryPoint: URL;
    private readonly passDelayMs: number;

    private readonly queue: TaskRecord[] = [];
    private readonly tasks = new Map<string, TaskRecord>();
    private limits: ResourceLimits;
    private worker?: WorkerHandle;
    private workerSpawnAttempted = false;
    private workerReady = false;
    private pending?: PendingDispatch;
    private abortInProcess?: (error: Error) => void;
    private passTimer?: NodeJS.Timeout;
    private processing = false;
    private isDisposed = false;

    constructor(options: BackgroundTaskRunnerOptions = {}) {
        this.tools = options.tools ?? createBuiltinToolRegistry();
        this.spawnWorker = options.spawnWorker === undefined ? spawnThreadWorker : options.spawnWorker;
        this.workerEntryPoint = options.workerEntryPoint ?? TOOL_WORKER_ENTRY;
        this.passDelayMs = options.passDelayMs ?? 0;
        this.limits = options.limits ?? DEFAULT_RESOURCE_LIMITS;
    }

    get queueLength(): number {
        return this.queue.length;
    }

    get isProcessing(): boolean {
        return this.processing;
    }

    get hasWorker(): boolean {
        return this.worker !== undefined;
    }

    get resourceLimits(): ResourceLimits {
        return this.limits;
    }

    /**
     * Queue a tool execution and return its task id. Never waits for the tool.
     *
     * @throws DisposedError after dispose()
     */
    enqueueToolExecution(toolName: string, args: Record<string, unknown>, allowNetworking = true): string {
        if(this.isDisposed) {
            throw new DisposedError('Background task runner has been disposed');
        }

        const task = new TaskRecord(randomUUID(), toolName, _.cloneDeep(args), allowNetworking);
        this.tasks.set(task.id, task);
        this.queue.push(task);
        logger.debug({ taskId: task.id, toolName, queueLength: this.queue.length }, 'Task queued');

        if(!this.processing) {
            this.schedulePass();
        }

        return task.id;
    }

    getTask(taskId: string): TaskSnapshot | undefined {
        return this.tasks.get(taskId)?.snapshot();
    }

    /**
     * @throws UnknownIdError for an unknown task
     */
    getTaskStatus(taskId: string): TaskStatus {
        return this.requireTask(taskId).status;
    }

    /** Result of a completed task, else undefined */
    getTaskResult(taskId: string): TaskResult | undefined {
        const task = this.requireTask(taskId);
        return task.status === TaskStatus.COMPLETED ? task.result : undefined;
    }

    /** Error of a failed task, else undefined */
    getTaskError(taskId: string): string | undefined {
        const task = this.requireTask(taskId);
        return task.status === TaskStatus.FAILED ? task.error : undefined;
    }

    getTaskStatusStream(taskId: string): Subscribable<TaskStatus> {
        return this.requireTask(taskId).statusChanges;
    }

    /**
     * Resolve with the task's snapshot once it reaches a terminal status
     */
    async waitForTask(taskId: string): Promise<TaskSnapshot> {
        const task = this.requireTask(taskId);
        if(task.isTerminal) {
            return task.snapshot();
        }

        return new Promise<TaskSnapshot>((resolve) => {
            const unsubscribe = task.statusChanges.subscribe(() => {
                if(task.isTerminal) {
                    unsubscribe();
                    resolve(task.snapshot());
                }
            });
        });
    }

    /**
     * Cancel a task. A queued task is removed before it is ever dispatched; a running
     * task is only marked, the tool keeps running and its reply is discarded.
     *
     * @returns false for an unknown task or one that already finished
     */
    cancelTask(taskId: string): boolean {
        const task = this.tasks.get(taskId);
        if(!task) {
            return false;
        }

        if(task.status === TaskStatus.QUEUED) {
            _.remove(this.queue, queued => queued.id === taskId);
        }

        const cancelled = task.cancel();
        if(cancelled) {
            logger.info({ taskId, toolName: task.toolName }, 'Task cancelled');
        }
        return cancelled;
    }

    /**
     * Apply new limits to later dispatches. Forwarded to the worker when one exists.
     *
     * @throws RangeError when a limit is not positive
     */
    setResourceLimits(limits: ResourceLimits): void {
        const parsed = ResourceLimitsSchema.safeParse(limits);
        if(!parsed.success) {
            throw new RangeError(`Invalid resource limits: ${formatZodIssues(parsed.error)}`);
        }
        this.limits = Object.freeze(parsed.data);

        if(this.worker) {
            try {
                this.worker.postMessage({ type: 'setResourceLimits', limits: this.limits });
            } catch (error) {
                logger.warn({ error: toErrorMessage(error) }, 'Failed to send resource limits to worker');
            }
        }
    }

    /**
     * Forget a task and release its status stream. A task that has not finished is
     * cancelled first, so its waiters see `cancelled`.
     */
    cleanupTask(taskId: string): void {
        const task = this.tasks.get(taskId);
        if(!task) {
            return;
        }
        this.tasks.delete(taskId);
        _.remove(this.queue, queued => queued.id === taskId);
        task.cancel();
        task.dispose();
    }

    async dispose(): Promise<void> {
        if(this.isDisposed) {
            return;
        }

        this.isDisposed = true;

        if(this.passTimer) {
            clearTimeout(this.passTimer);
            this.passTimer = undefined;
        }

        for(const task of this.tasks.values()) {
            task.cancel();
            task.dispose();
        }
        this.tasks.clear();
        this.queue.length = 0;

        this.pending?.reject(new TaskFailureError('Background task runner disposed'));
        this.pending = undefined;
        this.abortInProcess?.(new TaskFailureError('Background task runner disposed'));
        this.abortInProcess = undefined;

        const worker = this.worker;
        this.worker = undefined;
        if(worker) {
            try {
                await worker.terminate();
            } catch (error) {
                logger.warn({ error: toErrorMessage(error) }, 'Failed to terminate tool worker');
            }
        }

        logger.debug('Background task runner disposed');
    }

    private requireTask(taskId: string): TaskRecord {
        const task = this.tasks.get(taskId);
        if(!task) {
            throw new UnknownIdError(`Unknown task ID: ${taskId}`);
        }
        return task;
    }

    private schedulePass(): void {
        if(this.isDisposed || this.passTimer) {
            return;
        }

        this.passTimer = setTimeout(() => {
            this.passTimer = undefined;
            void this.processNextTask();
        }, this.passDelayMs);
    }

    private async processNextTask(): Promise<void> {
        if(this.processing || this.isDisposed) {
            return;
        }

        const task = this.queue.shift();
        if(!task) {
            return;
        }

        this.processing = true;
        try {
            await this.runTask(task);
        } finally {
            this.processing = false;
        }

        if(this.queue.length > 0) {
            this.schedulePass();
        }
    }

    private async runTask(task: TaskRecord): Promise<void> {
        if(!task.markRunning()) {
            return;
        }

        logger.debug({ taskId: task.id, toolName: task.toolName }, 'Task running');

        try {
            const reply = await this.execute(task);

            const applied = reply.type === 'executeError'
                ? task.fail(reply.error)
                : task.complete(reply.result);

            if(!applied) {
                logger.debug({ taskId: task.id, status: task.status }, 'Discarding reply for finished task');
            }
        } catch (error) {
            task.fail(toErrorMessage(error));
        }

        if(task.status === TaskStatus.FAILED) {
            logger.warn({ taskId: task.id, toolName: task.toolName, error: task.error }, 'Task failed');
        } else {
            logger.debug({ taskId: task.id, status: task.status }, 'Task finished');
        }
    }

    private async execute(task: TaskRecord): Promise<TaskReplyMessage> {
        const worker = this.ensureWorker();
        if(!worker) {
            return this.executeInProcess(task);
        }

        try {
            return await this.dispatchToWorker(worker, task);
        } catch (error) {
            if(!(error instanceof WorkerUnavailableError) || this.isDisposed || task.isTerminal) {
                throw error;
            }
            logger.info({ taskId: task.id, reason: error.message }, 'Worker never started, running task in-process');
            return this.executeInProcess(task);
        }
    }

    private async executeInProcess(task: TaskRecord): Promise<TaskReplyMessage> {
        const aborted = new Promise<never>((_resolve, reject) => {
            this.abortInProcess = reject;
        });

        const { maxExecutionTime } = this.limits;
        try {
            const result = await withTimeout(
                Promise.race([
                    this.tools.execute(task.toolName, { ...task.args }, { allowNetworking: task.allowNetworking }),
                    aborted,
                ]),
                maxExecutionTime,
                () => new TaskFailureError(`Task ${task.id} exceeded the execution time limit of ${maxExecutionTime}ms`)
            );
            return { type: 'executeResult', taskId: task.id, result };
        } finally {
            this.abortInProcess = undefined;
        }
    }

    private async dispatchToWorker(worker: WorkerHandle, task: TaskRecord): Promise<TaskReplyMessage> {
        const reply = new Promise<TaskReplyMessage>((resolve, reject) => {
            this.pending = { taskId: task.id, resolve, reject };
        });

        const { maxExecutionTime } = this.limits;
        try {
            worker.postMessage({
                type:            'execute',
                taskId:          task.id,
                toolName:        task.toolName,
                arguments:       { ...task.args },
                allowNetworking: task.allowNetworking,
            });

            return await withTimeout(
                reply,
                maxExecutionTime,
                () => new TaskFailureError(`Task ${task.id} got no worker reply within ${maxExecutionTime}ms`)
            );
        } finally {
            this.pending = undefined;
        }
    }

    /**
     * The live worker, spawning it on first use. Spawning is attempted once.
     */
    private ensureWorker(): WorkerHandle | undefined {
        if(this.worker || this.workerSpawnAttempted || !this.spawnWorker) {
            return this.worker;
        }

        this.workerSpawnAttempted = true;
        this.workerReady = false;

        let worker: WorkerHandle;
        try {
            worker = this.spawnWorker(this.workerEntryPoint, this.limits);
        } catch (error) {
            logger.warn({ error: toErrorMessage(error) }, 'Could not spawn tool worker, running tasks in-process');
            return undefined;
        }

        worker.onMessage((raw) => {
            this.handleWorkerMessage(worker, raw);
        });
        worker.onError((error) => {
            this.dropWorker(worker, `Tool worker failed: ${error.message}`);
        });
        worker.onExit((code) => {
            this.dropWorker(worker, `Tool worker exited with code ${code}`);
        });

        this.worker = worker;
        logger.debug('Tool worker spawned');
        return worker;
    }

    private handleWorkerMessage(worker: WorkerHandle, raw: unknown): void {
        if(worker !== this.worker) {
            return;
        }

        const parsed = WorkerToRunnerMessageSchema.safeParse(raw);
        if(!parsed.success) {
            logger.warn({ error: formatZodIssues(parsed.error) }, 'Ignoring malformed worker message');
            return;
        }

        const message = parsed.data;
        this.workerReady = true;
        if(message.type === 'ready') {
            logger.debug('Tool worker ready');
            return;
        }

        if(!this.pending || this.pending.taskId !== message.taskId) {
            logger.debug({ taskId: message.taskId }, 'Ignoring worker reply with no pending dispatch');
            return;
        }

        this.pending.resolve(message);
    }

    private dropWorker(worker: WorkerHandle, reason: string): void {
        if(worker !== this.worker) {
            return;
        }

        logger.warn({ reason, ready: this.workerReady }, 'Dropping tool worker, later tasks run in-process');
        this.worker = undefined;
        this.pending?.reject(this.workerReady ? new TaskFailureError(reason) : new WorkerUnavailableError(reason));

        worker.terminate().catch((error: unknown) => {
            logger.debug({ error: toErrorMessage(error) }, 'Worker terminate after failure');
        });
    }
}
