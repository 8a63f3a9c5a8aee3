import { createLogger, format, transports } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LogDir } from './constants';

const logger = createLogger({
    level: 'info',
    format: format.combine(
        format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        format.json()
    ),
    transports: [
        new transports.Console({ silent: process.env.NODE_ENV === 'test' }),
    ],
});

let fileLogEnabled = false;

export function enableFileLog(dirname = LogDir) {
    if (fileLogEnabled) {
        return;
    }
    logger.add(
        new DailyRotateFile({
            dirname,
            filename: 'raylink-%DATE%.log',
            maxFiles: '14d',
        })
    );
    fileLogEnabled = true;
}

export function setLoggerLevel(level: string) {
    logger.level = level;
}

export default logger;
