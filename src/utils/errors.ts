/**
 * Runtime error taxonomy
 *
 * Every error the runtime raises on purpose extends RuntimeError and carries a
 * stable `code`, so callers can branch without string matching.
 */

import _ from 'lodash';
import type { ZodError } from 'zod';

export type RuntimeErrorCode =
    | 'ALREADY_ACTIVE'
    | 'DISPOSED'
    | 'DUPLICATE_ID'
    | 'UNKNOWN_ID'
    | 'TRANSPORT_FAILURE'
    | 'TASK_FAILURE';

export class RuntimeError extends Error {
    readonly code: RuntimeErrorCode;

    constructor(code: RuntimeErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** An illegal state transition was attempted, e.g. starting a running server */
export class AlreadyActiveError extends RuntimeError {
    constructor(message: string) {
        super('ALREADY_ACTIVE', message);
    }
}

export class DisposedError extends RuntimeError {
    constructor(message: string) {
        super('DISPOSED', message);
    }
}

export class DuplicateIdError extends RuntimeError {
    constructor(message: string) {
        super('DUPLICATE_ID', message);
    }
}

export class UnknownIdError extends RuntimeError {
    constructor(message: string) {
        super('UNKNOWN_ID', message);
    }
}

/** Connect or disconnect failure reported by the protocol layer; the original error is `cause` */
export class TransportFailureError extends RuntimeError {
    constructor(message: string, options?: ErrorOptions) {
        super('TRANSPORT_FAILURE', message, options);
    }
}

export class TaskFailureError extends RuntimeError {
    constructor(message: string, options?: ErrorOptions) {
        super('TASK_FAILURE', message, options);
    }
}

export function toErrorMessage(error: unknown): string {
    return _.isError(error) ? error.message : String(error);
}

/**
 * Flatten zod issues into `path: message` pairs
 */
export function formatZodIssues(error: ZodError): string {
    return _.map(error.issues, issue => `${_.join(issue.path, '.') || '(root)'}: ${issue.message}`).join(', ');
}
