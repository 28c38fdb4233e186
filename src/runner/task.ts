/**
 * Background task record
 *
 * queued -> running -> completed | failed, with cancelled reachable from any
 * non-terminal status. Terminal statuses are final: later transitions are ignored
 * and reported as `false`.
 */

import _ from 'lodash';
import { TERMINAL_TASK_STATUSES, TaskStatus } from '../types/runtime.js';
import { EventChannel, type Subscribable } from '../utils/event-channel.js';

export type TaskResult = Record<string, unknown>;

export interface TaskSnapshot {
    id:              string
    toolName:        string
    arguments:       Record<string, unknown>
    allowNetworking: boolean
    status:          TaskStatus
    result?:         TaskResult
    error?:          string
}

export class TaskRecord {
    private currentStatus = TaskStatus.QUEUED;
    private taskResult?: TaskResult;
    private taskError?: string;
    private readonly statusChannel: EventChannel<TaskStatus>;

    constructor(
        readonly id: string,
        readonly toolName: string,
        readonly args: Readonly<Record<string, unknown>>,
        readonly allowNetworking: boolean
    ) {
        this.statusChannel = new EventChannel<TaskStatus>(`task-status:${id}`);
    }

    get status(): TaskStatus {
        return this.currentStatus;
    }

    /** Set iff completed */
    get result(): TaskResult | undefined {
        return this.taskResult;
    }

    /** Set iff failed */
    get error(): string | undefined {
        return this.taskError;
    }

    get isTerminal(): boolean {
        return isTerminalStatus(this.currentStatus);
    }

    get statusChanges(): Subscribable<TaskStatus> {
        return this.statusChannel;
    }

    markRunning(): boolean {
        if(this.currentStatus !== TaskStatus.QUEUED) {
            return false;
        }
        this.transition(TaskStatus.RUNNING);
        return true;
    }

    complete(result: TaskResult): boolean {
        if(this.isTerminal) {
            return false;
        }
        this.taskResult = result;
        this.transition(TaskStatus.COMPLETED);
        return true;
    }

    fail(error: string): boolean {
        if(this.isTerminal) {
            return false;
        }
        this.taskError = error;
        this.transition(TaskStatus.FAILED);
        return true;
    }

    cancel(): boolean {
        if(this.isTerminal) {
            return false;
        }
        this.transition(TaskStatus.CANCELLED);
        return true;
    }

    snapshot(): TaskSnapshot {
        const snapshot: TaskSnapshot = {
            id:              this.id,
            toolName:        this.toolName,
            arguments:       { ...this.args },
            allowNetworking: this.allowNetworking,
            status:          this.currentStatus,
        };
        if(this.taskResult) {
            snapshot.result = this.taskResult;
        }
        if(this.taskError !== undefined) {
            snapshot.error = this.taskError;
        }
        return snapshot;
    }

    /** Release the status stream; subscribers are dropped */
    dispose(): void {
        this.statusChannel.close();
    }

    private transition(next: TaskStatus): void {
        this.currentStatus = next;
        this.statusChannel.publish(next);
    }
}

export function isTerminalStatus(status: TaskStatus): boolean {
    return _.includes(TERMINAL_TASK_STATUSES, status);
}
