import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { config } from './config.js';

const DEFAULT_LEVEL = 'info';
const VERBOSE_LEVEL = 'debug';

const { combine, printf, colorize } = winston.format;

const upperCaseLevel = winston.format((info) => {
    info.level = info.level.toUpperCase();
    return info;
});

const logFormat = printf(({ level, message, ...metadata }) => {
    let msg = `${level}: ${message}`;
    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
});

export const logger = winston.createLogger({
    level: DEFAULT_LEVEL,
    format: combine(upperCaseLevel(), logFormat),
    transports: [
        new winston.transports.Console({
            format: combine(upperCaseLevel(), colorize(), logFormat),
        }),
        // 10MB per file, keep 5 files max
        new DailyRotateFile({
            filename: path.join(config.logDir, 'weather-app-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            maxSize: '10m',
            maxFiles: '5',
        }),
    ],
});

/**
 * Verbose runs log everything down to debug on every transport.
 */
export function setVerbose(verbose: boolean): void {
    logger.level = verbose ? VERBOSE_LEVEL : DEFAULT_LEVEL;
}
