import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface LogContext {
    [key: string]: unknown;
}

const createLogger = (level: LogLevel = 'info'): winston.Logger => {
    let format = winston.format.combine(
        winston.format.splat(),
        winston.format.errors({ stack: true }),
        winston.format.colorize(),
        winston.format.printf(({ level, message }) => `${level}: ${message}`),
    );

    if (level !== 'info') {
        format = winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
                const { service: _service, ...rest } = meta;
                const metaStr = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
                return `${timestamp} ${level}: ${message}${metaStr}`;
            }),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            // stdout is reserved for command output
            new winston.transports.Console({
                stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
            }),
        ],
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
