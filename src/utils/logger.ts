// src/utils/logger.ts
import winston from 'winston';

// Read straight from process.env: the validated config imports the logger's consumers,
// so the logger has to come up before it.
const validLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];
const requestedLevel = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'development' ? 'debug' : 'info');
const level = validLevels.includes(requestedLevel) ? requestedLevel : 'info';
const isDevelopment = process.env.NODE_ENV === 'development';

const enumerateErrorFormat = winston.format((info) => {
    if (info instanceof Error) {
        Object.assign(info, { message: info.stack });
    }
    return info;
});

/** Renders the structured context (`{ function, shiftId, ... }`) after the message. */
const renderMeta = (meta: Record<string, unknown>): string => {
    const { stack: _stack, ...rest } = meta;
    const keys = Object.keys(rest);
    if (keys.length === 0) return '';
    if (!isDevelopment && keys.length >= 8) return ' [meta omitted in prod]';
    try {
        return ` ${JSON.stringify(rest, (_key, value: unknown) =>
            value instanceof Error ? { name: value.name, message: value.message } : value
        )}`;
    } catch {
        return ' [meta serialization failed]';
    }
};

const logger = winston.createLogger({
    level,
    format: winston.format.combine(
        enumerateErrorFormat(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.splat(),
    ),
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                isDevelopment ? winston.format.colorize() : winston.format.uncolorize(),
                winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
                    const text = typeof message === 'string' ? message : JSON.stringify(message);
                    let line = `[${String(timestamp)}] ${lvl}: ${text}${renderMeta(meta)}`;
                    if (typeof meta.stack === 'string' && !text.includes(meta.stack)) {
                        line += `\nStack: ${meta.stack}`;
                    }
                    return line;
                })
            ),
            stderrLevels: ['error'],
            silent: process.env.NODE_ENV === 'test' && process.env.LOG_LEVEL === undefined,
        }),
    ],
});

export default logger;

/** Structured context attached to service log lines. */
export type LogContext = {
    function?: string;
    shiftId?: number | null;
    employeeId?: number | null;
    orderId?: number | null;
    error?: unknown;
    [key: string]: unknown;
};
