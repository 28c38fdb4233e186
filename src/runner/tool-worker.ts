/**
 * Worker thread entry for background tool execution. Runs the built-in tools.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { z } from 'zod';
import { createWorkerMessageHandler } from './worker-handler.js';
import { createBuiltinToolRegistry } from '../tools/tool-registry.js';
import { DEFAULT_RESOURCE_LIMITS, ResourceLimitsSchema } from '../types/config.js';
import { logger } from '../utils/logger.js';

const WorkerDataSchema = z.object({ limits: ResourceLimitsSchema });

if(!parentPort) {
    throw new Error('tool-worker must be started as a worker thread');
}

const port = parentPort;
const initialData = WorkerDataSchema.safeParse(workerData);

const handleMessage = createWorkerMessageHandler(
    createBuiltinToolRegistry(),
    (message) => {
        port.postMessage(message);
    },
    initialData.success ? initialData.data.limits : DEFAULT_RESOURCE_LIMITS
);

port.on('message', (raw: unknown) => {
    void handleMessage(raw);
});

port.postMessage({ type: 'ready' });
logger.debug('Tool worker ready');
