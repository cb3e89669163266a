/**
 * Single log method: either a plain message or structured context followed by
 * a message, matching pino's call convention.
 */
export interface ILogMethod {
    (message: string): void;
    (context: Record<string, unknown>, message: string): void;
}

/**
 * Structured logging contract shared by the engine and its collaborators.
 *
 * Components receive a logger through their constructors instead of importing
 * a concrete logging library, so tests can pass a spy and the CLI can pass a
 * pino-backed implementation.
 */
export interface ILogger {
    /** Unrecoverable failure that ends the process */
    fatal: ILogMethod;
    error: ILogMethod;
    /** Unusual but non-fatal behavior such as retries or missed samples */
    warn: ILogMethod;
    info: ILogMethod;
    debug: ILogMethod;
    trace: ILogMethod;

    /**
     * Create a scoped logger that merges `bindings` into every entry.
     *
     * @param bindings - Static key-value pairs such as `{ module: 'sampler' }`
     */
    child(bindings: Record<string, unknown>): ILogger;
}
