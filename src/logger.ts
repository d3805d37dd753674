import pino, { type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
    level: LogLevel;
    nodeEnv: string;
}

// Pretty output in development, JSON lines everywhere else
export function createLogger(options: LoggerOptions): Logger {
    return pino({
        name: 'gst-reconciliation',
        level: options.level,
        serializers: {
            ...pino.stdSerializers,
        },
        transport:
            options.nodeEnv === 'development'
                ? { target: 'pino-pretty', options: { colorize: true } }
                : undefined,
    });
}
