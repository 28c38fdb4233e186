/**
 * Stderr Logger
 *
 * Every level is written to stderr so that the stdio transport keeps stdout to
 * itself. Output goes to one of two sinks:
 * - a silent sink, used when MCP_HOST_SILENT=true (tests, embedding hosts)
 * - a winston sink emitting JSON lines to stderr
 *
 * The sink is picked on every call so that changes to MCP_HOST_SILENT made after
 * module load are honoured.
 */

import winston from 'winston';
import _ from 'lodash';

export interface Logger {
    debug(infoObject: Record<string, unknown>, message?: string): Logger
    debug(message: string, ...meta: unknown[]): Logger
    info(infoObject: Record<string, unknown>, message?: string): Logger
    info(message: string, ...meta: unknown[]): Logger
    warn(infoObject: Record<string, unknown>, message?: string): Logger
    warn(message: string, ...meta: unknown[]): Logger
    error(infoObject: Record<string, unknown>, message?: string): Logger
    error(message: string, ...meta: unknown[]): Logger
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogSink {
    write(level: LogLevel, infoObjectOrMessage: Record<string, unknown> | string, rest: unknown[]): void
}

const silentSink: LogSink = {
    write() {
        // discard
    },
};

/**
 * Adapts winston's `(message, meta)` order to the `(meta, message)` call style used
 * throughout the codebase.
 */
class WinstonStderrSink implements LogSink {
    private readonly winstonLogger: winston.Logger;

    constructor() {
        this.winstonLogger = winston.createLogger({
            level:  process.env.LOG_LEVEL ?? 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            transports: [
                new winston.transports.Console({
                    stderrLevels: ['error', 'warn', 'info', 'debug'], // ALL levels to stderr
                }),
            ],
        });
    }

    write(level: LogLevel, infoObjectOrMessage: Record<string, unknown> | string, rest: unknown[]): void {
        if(_.isString(infoObjectOrMessage)) {
            this.winstonLogger.log(level, infoObjectOrMessage, ...rest);
            return;
        }
        const [message] = rest;
        this.winstonLogger.log(level, _.isString(message) ? message : '', infoObjectOrMessage);
    }
}

let stderrSink: LogSink | undefined;

function getSink(): LogSink {
    if(process.env.MCP_HOST_SILENT === 'true') {
        return silentSink;
    }

    // Built on first use so silent processes never create a winston pipeline
    stderrSink ??= new WinstonStderrSink();
    return stderrSink;
}

class LazyLogger implements Logger {
    debug(infoObjectOrMessage: Record<string, unknown> | string, ...rest: unknown[]): Logger {
        getSink().write('debug', infoObjectOrMessage, rest);
        return this;
    }

    info(infoObjectOrMessage: Record<string, unknown> | string, ...rest: unknown[]): Logger {
        getSink().write('info', infoObjectOrMessage, rest);
        return this;
    }

    warn(infoObjectOrMessage: Record<string, unknown> | string, ...rest: unknown[]): Logger {
        getSink().write('warn', infoObjectOrMessage, rest);
        return this;
    }

    error(infoObjectOrMessage: Record<string, unknown> | string, ...rest: unknown[]): Logger {
        getSink().write('error', infoObjectOrMessage, rest);
        return this;
    }
}

export const logger: Logger = new LazyLogger();
