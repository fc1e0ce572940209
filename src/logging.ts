import winston from 'winston';
import { DATE_FORMAT_YEAR_MONTH_DAY_HOURS_MINUTES_SECONDS_MILLISECONDS, PROGRAM_NAME } from './constants';

export interface LogContext {
    [key: string]: unknown;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

// stderr for every level: stdout belongs to progress output (plain or NDJSON)
const ALL_LEVELS_TO_STDERR: LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

const createLogger = (level: LogLevel = 'info'): winston.Logger => {
    let format = winston.format.combine(
        winston.format.timestamp({ format: DATE_FORMAT_YEAR_MONTH_DAY_HOURS_MINUTES_SECONDS_MILLISECONDS }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
    );

    let transports: winston.transport[] = [
        new winston.transports.Console({
            stderrLevels: ALL_LEVELS_TO_STDERR,
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.printf(({ timestamp, level, message, ...meta }) => {
                    const { service: _service, ...rest } = meta;
                    const metaStr = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
                    return `${timestamp} ${level}: ${message}${metaStr}`;
                })
            ),
        }),
    ];

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
        );

        transports = [
            new winston.transports.Console({
                stderrLevels: ALL_LEVELS_TO_STDERR,
                format: winston.format.combine(
                    winston.format.colorize(),
                    winston.format.printf(({ message }) => `${message}`)
                ),
            }),
        ];
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports,
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel) => {
    logger = createLogger(level);
};

export const getLogger = () => logger;
