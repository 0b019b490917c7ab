import debug from 'debug';

export interface DebugLogger {
    log: (formatter: string, ...args: unknown[]) => void;
    warn: (formatter: string, ...args: unknown[]) => void;
    error: (formatter: string, ...args: unknown[]) => void;
}

/**
 * Create debug loggers for a given namespace.
 * Usage: const { log, warn, error } = createDebugLogger('ordered-treap:tree')
 * Output is off unless `DEBUG` names the namespace.
 */
export function createDebugLogger(namespace: string): DebugLogger {
    const log = debug(namespace);
    const warn = debug(`${namespace}:warn`);
    const err = debug(`${namespace}:error`);

    return {
        log: (formatter, ...args) => log(formatter, ...args),
        warn: (formatter, ...args) => warn(formatter, ...args),
        error: (formatter, ...args) => err(formatter, ...args),
    };
}
