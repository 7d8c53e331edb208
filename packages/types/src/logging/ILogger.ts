/**
 * Structured logging contract shared across the service.
 *
 * Code depends on this interface rather than on a logging library so loggers can be
 * injected, scoped with `child()` and replaced by spies in tests. Every level takes
 * either a message string, or a structured context object followed by the message;
 * implementations typically wrap Pino and forward both forms unchanged.
 */
export interface ILogger {
    /**
     * Unrecoverable failure that terminates or cripples the process.
     */
    fatal(objOrMessage: object | string, message?: string): void;

    /**
     * Recoverable failure that still needs attention.
     */
    error(objOrMessage: object | string, message?: string): void;

    /**
     * Unusual but non-fatal behavior such as retries or degraded operation.
     */
    warn(objOrMessage: object | string, message?: string): void;

    /**
     * Normal operational milestones.
     */
    info(objOrMessage: object | string, message?: string): void;

    /**
     * Diagnostic detail, usually suppressed in production.
     */
    debug(objOrMessage: object | string, message?: string): void;

    trace(objOrMessage: object | string, message?: string): void;

    /**
     * Create a scoped child logger.
     *
     * The bindings are merged into every entry the child emits, e.g.
     * `logger.child({ module: 'subscription' })`.
     *
     * @param bindings - Static key-value pairs attached to each log entry
     */
    child(bindings: Record<string, unknown>): ILogger;
}
