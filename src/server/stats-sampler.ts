/**
 * Platform resource sampling for server instances
 */

import { availableParallelism } from 'node:os';
import _ from 'lodash';

export interface ResourceSample {
    cpuUsagePercent: number
    memoryUsageMB:   number
}

export interface StatsSampler {
    sample(): Promise<ResourceSample>
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Samples the current Node.js process. CPU usage is averaged over the time since
 * the previous sample and normalised to the number of available cores.
 */
export class ProcessStatsSampler implements StatsSampler {
    private lastCpuUsage = process.cpuUsage();
    private lastSampleAt = process.hrtime.bigint();

    async sample(): Promise<ResourceSample> {
        const now = process.hrtime.bigint();
        const cpuDelta = process.cpuUsage(this.lastCpuUsage);
        const elapsedMicros = Number(now - this.lastSampleAt) / 1000;

        this.lastCpuUsage = process.cpuUsage();
        this.lastSampleAt = now;

        const busyMicros = cpuDelta.user + cpuDelta.system;
        const cpuUsagePercent = elapsedMicros > 0
            ? (busyMicros / elapsedMicros) * 100 / availableParallelism()
            : 0;

        return {
            cpuUsagePercent: _.round(Math.max(0, cpuUsagePercent), 2),
            memoryUsageMB:   _.round(process.memoryUsage().rss / BYTES_PER_MB, 2),
        };
    }
}
