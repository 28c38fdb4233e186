/**
 * Isolated worker spawning
 *
 * The runner only sees WorkerHandle, so tests and hosts without worker support
 * can swap in their own spawner (or none at all).
 */

import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';
import type { ResourceLimits } from '../types/config.js';
import type { RunnerToWorkerMessage } from '../types/worker-protocol.js';

export interface WorkerHandle {
    postMessage(message: RunnerToWorkerMessage): void
    onMessage(listener: (message: unknown) => void): void
    onError(listener: (error: Error) => void): void
    onExit(listener: (code: number) => void): void
    terminate(): Promise<void>
}

export type WorkerSpawner = (entryPoint: URL, limits: ResourceLimits) => WorkerHandle;

/** Compiled worker entry, next to this module in dist/. Absent when running from sources. */
export const TOOL_WORKER_ENTRY = new URL('./tool-worker.js', import.meta.url);

// V8 refuses very small heaps
const MIN_HEAP_MB = 16;

/**
 * Spawn a worker thread with its old-generation heap capped at `maxMemoryUsageMB`
 *
 * @throws Error when the entry file does not exist
 */
export const spawnThreadWorker: WorkerSpawner = (entryPoint, limits) => {
    if(entryPoint.protocol === 'file:' && !existsSync(fileURLToPath(entryPoint))) {
        throw new Error(`Worker entry not found: ${fileURLToPath(entryPoint)}`);
    }

    const worker = new Worker(entryPoint, {
        workerData:     { limits },
        resourceLimits: {
            maxOldGenerationSizeMb: Math.max(MIN_HEAP_MB, Math.ceil(limits.maxMemoryUsageMB)),
        },
    });

    // An idle worker must not keep the host process alive
    worker.unref();

    return {
        postMessage: (message) => {
            worker.postMessage(message);
        },
        onMessage: (listener) => {
            worker.on('message', listener);
        },
        onError: (listener) => {
            worker.on('error', listener);
        },
        onExit: (listener) => {
            worker.on('exit', listener);
        },
        terminate: async () => {
            await worker.terminate();
        },
    };
};
