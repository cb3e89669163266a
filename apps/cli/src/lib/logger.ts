import pino from 'pino';
import type { ILogger } from '@resource-monitor/types';
import { env } from '../config/env.js';

/**
 * Logger utilities for the resource monitor.
 *
 * Standard output carries the live sample lines and the summary, so log
 * entries go to stderr through `pino-pretty`. When `LOG_FILE` is set, the same
 * entries are also appended to that file as JSON lines.
 *
 * **Usage:**
 *
 * ```typescript
 * const logger = new PinoLogger(createLogger());
 * const samplerLogger = logger.child({ module: 'sampler' });
 * samplerLogger.warn({ attempt: 2 }, 'Missed sample');
 * ```
 */

/**
 * Creates a Pino logger writing to stderr and, optionally, to `LOG_FILE`.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const targets: pino.TransportTargetOptions[] = [
        {
            level: env.LOG_LEVEL,
            target: 'pino-pretty',
            options: {
                destination: 2,
                colorize: true,
                singleLine: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
    ];

    if (env.LOG_FILE) {
        targets.push({
            level: env.LOG_LEVEL,
            target: 'pino/file',
            options: { destination: env.LOG_FILE, mkdir: true }
        });
    }

    const transport = pino.transport({ targets });

    return pino(
        {
            level: env.LOG_LEVEL,
            // Call sites log failures under `error`, not pino's default `err`
            serializers: {
                error: pino.stdSerializers.err
            },
            base: {
                service: 'tron-resource-monitor'
            }
        },
        transport
    );
}

/**
 * Adapts a Pino instance to the shared `ILogger` contract.
 *
 * Keeps call sites independent of pino's generic signatures; every method
 * accepts either a message or a context object followed by a message.
 */
export class PinoLogger implements ILogger {
    constructor(private readonly base: pino.Logger) {}

    public fatal(contextOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof contextOrMessage === 'string') {
            this.base.fatal(contextOrMessage);
            return;
        }
        this.base.fatal(contextOrMessage, message);
    }

    public error(contextOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof contextOrMessage === 'string') {
            this.base.error(contextOrMessage);
            return;
        }
        this.base.error(contextOrMessage, message);
    }

    public warn(contextOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof contextOrMessage === 'string') {
            this.base.warn(contextOrMessage);
            return;
        }
        this.base.warn(contextOrMessage, message);
    }

    public info(contextOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof contextOrMessage === 'string') {
            this.base.info(contextOrMessage);
            return;
        }
        this.base.info(contextOrMessage, message);
    }

    public debug(contextOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof contextOrMessage === 'string') {
            this.base.debug(contextOrMessage);
            return;
        }
        this.base.debug(contextOrMessage, message);
    }

    public trace(contextOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof contextOrMessage === 'string') {
            this.base.trace(contextOrMessage);
            return;
        }
        this.base.trace(contextOrMessage, message);
    }

    public child(bindings: Record<string, unknown>): ILogger {
        return new PinoLogger(this.base.child(bindings));
    }
}
