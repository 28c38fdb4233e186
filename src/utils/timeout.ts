/**
 * Timeout Utilities
 */

import _ from 'lodash';

export class TimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(message: string, timeoutMs: number) {
        super(message);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Race a promise against a timeout. The timer is cleared on every path so a
 * finished operation never leaves a pending callback behind.
 *
 * @param timeout - Either the TimeoutError message, or a factory for the error to throw
 *
 * @example
 * const result = await withTimeout(
 *   handler(args),
 *   config.requestHandlerTimeout,
 *   `Tool ${name} timed out`
 * );
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    timeout: string | (() => Error)
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
            reject(_.isString(timeout) ? new TimeoutError(timeout, timeoutMs) : timeout());
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
    }
}
