export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export const consoleLogger: Logger = console;

/**
 * Logger that drops everything; used where output would only be noise.
 */
export const silentLogger: Logger = {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
