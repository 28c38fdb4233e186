/**
 * TaskRecord status machine
 */

import { describe, it, expect } from 'vitest';
import { TaskRecord, isTerminalStatus } from '../../src/runner/task.js';
import { TaskStatus } from '../../src/types/runtime.js';
import { collect } from '../helpers/index.js';

function createTask(): TaskRecord {
    return new TaskRecord('task-1', 'calculator', { operation: 'add', a: 1, b: 2 }, true);
}

describe('TaskRecord', () => {
    it('should start queued with neither result nor error', () => {
        const task = createTask();

        expect(task.status).toBe(TaskStatus.QUEUED);
        expect(task.isTerminal).toBe(false);
        expect(task.snapshot()).toEqual({
            id:              'task-1',
            toolName:        'calculator',
            arguments:       { operation: 'add', a: 1, b: 2 },
            allowNetworking: true,
            status:          TaskStatus.QUEUED,
        });
    });

    it('should publish queued -> running -> completed and keep the result', () => {
        const task = createTask();
        const statuses = collect(task.statusChanges);

        expect(task.markRunning()).toBe(true);
        expect(task.complete({ content: [{ type: 'text', text: '3' }] })).toBe(true);

        expect(statuses.values).toEqual([TaskStatus.RUNNING, TaskStatus.COMPLETED]);
        expect(task.result).toEqual({ content: [{ type: 'text', text: '3' }] });
        expect(task.error).toBeUndefined();
        expect(task.snapshot().result).toEqual({ content: [{ type: 'text', text: '3' }] });
    });

    it('should keep the error of a failed task', () => {
        const task = createTask();
        task.markRunning();

        expect(task.fail('Error: Division by zero')).toBe(true);

        expect(task.status).toBe(TaskStatus.FAILED);
        expect(task.error).toBe('Error: Division by zero');
        expect(task.result).toBeUndefined();
        expect(task.snapshot()).toMatchObject({ status: TaskStatus.FAILED, error: 'Error: Division by zero' });
    });

    it('should only mark queued tasks as running', () => {
        const task = createTask();
        task.cancel();

        expect(task.markRunning()).toBe(false);
        expect(task.status).toBe(TaskStatus.CANCELLED);
    });

    it('should ignore every transition once terminal', () => {
        const task = createTask();
        task.markRunning();
        task.cancel();
        const statuses = collect(task.statusChanges);

        expect(task.complete({ late: true })).toBe(false);
        expect(task.fail('late')).toBe(false);
        expect(task.cancel()).toBe(false);

        expect(task.status).toBe(TaskStatus.CANCELLED);
        expect(task.result).toBeUndefined();
        expect(task.error).toBeUndefined();
        expect(statuses.values).toEqual([]);
    });

    it('should hand out copies of the arguments', () => {
        const task = createTask();

        const snapshot = task.snapshot();
        snapshot.arguments.a = 100;

        expect(task.snapshot().arguments.a).toBe(1);
    });

    it('should drop status subscribers on dispose', () => {
        const task = createTask();
        const statuses = collect(task.statusChanges);

        task.dispose();
        task.markRunning();

        expect(statuses.values).toEqual([]);
    });
});

describe('isTerminalStatus', () => {
    it.each([
        [TaskStatus.QUEUED, false],
        [TaskStatus.RUNNING, false],
        [TaskStatus.COMPLETED, true],
        [TaskStatus.FAILED, true],
        [TaskStatus.CANCELLED, true],
    ])('should classify %s as terminal=%s', (status, terminal) => {
        expect(isTerminalStatus(status)).toBe(terminal);
    });
});
