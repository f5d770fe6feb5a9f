import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export interface LoggingOptions {
    logFile?: string;
}

let currentLevel = 'info';
let currentOptions: LoggingOptions = {};

type Transport = winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance;

const createTransports = (options: LoggingOptions): Transport[] => {
    const transports: Transport[] = [new winston.transports.Console()];
    if (options.logFile) {
        transports.push(new winston.transports.File({
            filename: options.logFile,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.splat(),
                winston.format.json(),
            ),
        }));
    }
    return transports;
};

const createLogger = (level: string = 'info', options: LoggingOptions = {}): winston.Logger => {
    let format: winston.Logform.Format;

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ message }) => {
                return String(message);
            }),
        );
    } else {
        format = winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
                const { service: _service, ...rest } = meta;
                const metaStr = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
                return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
            }),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: createTransports(options),
    });
};

let logger = createLogger();

export const setLogLevel = (level: string, options?: LoggingOptions): void => {
    currentLevel = level;
    if (options) {
        currentOptions = options;
    }
    logger = createLogger(currentLevel, currentOptions);
};

export const getLogger = (): winston.Logger => logger;
