import winston from 'winston';
import { PROGRAM_NAME } from '@/constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

/**
 * The slice of a winston logger the rest of the code depends on. Components
 * take one of these in their `create()` so tests can hand in a stub.
 */
export interface Logger {
    error(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    verbose(message: string, ...meta: unknown[]): void;
    debug(message: string, ...meta: unknown[]): void;
}

export const NOOP_LOGGER: Logger = {
    error: () => {},
    warn: () => {},
    info: () => {},
    verbose: () => {},
    debug: () => {},
};

const createLogger = (level: LogLevel = 'info'): winston.Logger => {

    let format = winston.format.combine(
        winston.format.timestamp(),
        winston.format.splat(),
        winston.format.errors({ stack: true }),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
            // service is always in defaultMeta, drop it from the printed line
            const { service: _service, ...rest } = meta;
            const metaStr = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
            return `${timestamp} ${level}: ${message}${metaStr}`;
        })
    );

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.splat(),
            winston.format.errors({ stack: true }),
            winston.format.printf(({ message }) => {
                return `${message}`;
            })
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console({
                stderrLevels: ['error', 'warn'],
            }),
        ],
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel) => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
