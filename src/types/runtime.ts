/**
 * Runtime state types shared by server instances, the server manager and the
 * background task runner
 */

export enum ServerState {
    STOPPED = 'stopped',
    STARTING = 'starting',
    RUNNING = 'running',
    ERROR = 'error',
    PAUSED = 'paused'
}

/**
 * How aggressively a server should conserve CPU, memory and network
 */
export enum ResourceMode {
    FULL = 'full',
    REDUCED = 'reduced',
    MINIMAL = 'minimal',
    SUSPENDED = 'suspended'
}

/**
 * Host application lifecycle notifications
 */
export enum LifecycleSignal {
    RESUMED = 'resumed',
    INACTIVE = 'inactive',
    PAUSED = 'paused',
    DETACHED = 'detached',
    HIDDEN = 'hidden'
}

export enum TaskStatus {
    QUEUED = 'queued',
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled'
}

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = [TaskStatus.COMPLETED, TaskStatus.FAILED, TaskStatus.CANCELLED];

export interface ResourceStats {
    readonly cpuUsagePercent:   number
    readonly memoryUsageMB:     number
    readonly activeConnections: number
    readonly requestsProcessed: number
    readonly errorsCount:       number
}

export const EMPTY_RESOURCE_STATS: ResourceStats = Object.freeze({
    cpuUsagePercent:   0,
    memoryUsageMB:     0,
    activeConnections: 0,
    requestsProcessed: 0,
    errorsCount:       0,
});

/** Complete `{ server id -> state }` view published by the server manager */
export type ServerStateSnapshot = Readonly<Record<string, ServerState>>;
