import pino from 'pino';
import { mkdirSync } from 'fs';
import type { ILogger } from '@ledgerwatch/types';
import { env } from '../config/env.js';

/**
 * Logger utilities for the ledger-watch backend.
 *
 * This module provides:
 * - Factory function for creating configured Pino logger instances
 * - `PinoLogger`, the adapter that exposes a Pino instance through `ILogger`
 *
 * Services never import Pino directly. They receive an `ILogger` by injection, so
 * tests can hand them a spy and bootstrap code decides where output goes.
 *
 * **Usage:**
 *
 * ```typescript
 * import { createLogger, PinoLogger } from './lib/logger.js';
 *
 * const logger = new PinoLogger(createLogger());
 * logger.info({ port: 4000 }, 'Started');
 * const scoped = logger.child({ module: 'subscription' });
 * ```
 */

// Ensure .run directory exists before creating logger
try {
    mkdirSync('.run', { recursive: true });
} catch (err) {
    console.error('Warning: Could not create .run directory:', err);
}

/**
 * Creates a Pino logger instance with the standard configuration.
 *
 * **Transport targets:**
 *
 * 1. `pino/file` - Writes to `.run/backend.log` for local file access
 * 2. `pino-pretty` - Writes to stdout with colorized, human-readable formatting
 *
 * **Log levels:**
 *
 * - `LOG_LEVEL` when set
 * - Production: `info` and above
 * - Otherwise: `debug` and above
 */
export function createLogger(): pino.Logger {
    const level = env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');

    const targets: pino.TransportTargetOptions[] = [
        {
            level,
            target: 'pino/file',
            options: { destination: '.run/backend.log' }
        },
        {
            level,
            target: 'pino-pretty',
            options: {
                colorize: true,
                singleLine: false,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
    ];

    const transport = pino.transport({ targets });

    return pino(
        {
            level,
            base: {
                service: 'ledger-watch'
            }
        },
        transport
    );
}

/**
 * `ILogger` implementation backed by Pino.
 *
 * Supports both call shapes Pino accepts:
 * - `info(message)` - Simple message
 * - `info(obj, message)` - Structured logging with metadata
 */
export class PinoLogger implements ILogger {
    public constructor(private readonly instance: pino.Logger) {}

    public get level(): string {
        return this.instance.level;
    }

    public fatal(objOrMessage: object | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.instance.fatal(objOrMessage);
        } else {
            this.instance.fatal(objOrMessage, message);
        }
    }

    public error(objOrMessage: object | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.instance.error(objOrMessage);
        } else {
            this.instance.error(objOrMessage, message);
        }
    }

    public warn(objOrMessage: object | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.instance.warn(objOrMessage);
        } else {
            this.instance.warn(objOrMessage, message);
        }
    }

    public info(objOrMessage: object | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.instance.info(objOrMessage);
        } else {
            this.instance.info(objOrMessage, message);
        }
    }

    public debug(objOrMessage: object | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.instance.debug(objOrMessage);
        } else {
            this.instance.debug(objOrMessage, message);
        }
    }

    public trace(objOrMessage: object | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.instance.trace(objOrMessage);
        } else {
            this.instance.trace(objOrMessage, message);
        }
    }

    /**
     * Create a scoped child logger.
     *
     * @example
     * const moduleLogger = logger.child({ module: 'ledger-client' });
     */
    public child(bindings: Record<string, unknown>): ILogger {
        return new PinoLogger(this.instance.child(bindings));
    }
}
