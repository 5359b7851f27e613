/**
 * Centralized logger using Pino
 *
 * Pretty output in development, JSON lines in production, silent under tests.
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isTest = nodeEnv === 'test';
const isDev = nodeEnv !== 'production' && !isTest;

function resolveLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: resolveLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

// Logs go to stderr so report output on stdout stays pipeable
const logger: Logger = isDev
    ? pino({
        ...options,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                destination: 2,
            },
        },
    })
    : pino(options, pino.destination(2));

// Child loggers per module
export const catalogLogger: Logger = logger.child({ module: 'catalog' });
export const allocationLogger: Logger = logger.child({ module: 'allocation' });
export const pickingLogger: Logger = logger.child({ module: 'picking' });
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const storeLogger: Logger = logger.child({ module: 'location-map' });

export default logger;
