// src/infrastructure/monitoring/logger.service.ts
import pino, { Logger, LoggerOptions } from 'pino';
import { LOG_LEVELS, LogLevel } from '../../config/environment';

export interface LogContext {
    requestId?: string;
    userId?: number;
    transactionId?: number;
    [key: string]: unknown;
}

/**
 * Level used before configuration is validated. An unknown LOG_LEVEL falls back
 * to the environment default so the config loader can report it.
 */
export function resolveLogLevel(value: string | undefined, environment: string): LogLevel {
    const level = LOG_LEVELS.find(candidate => candidate === value);
    if (level) {
        return level;
    }
    if (environment === 'test') {
        return 'silent';
    }
    return environment === 'development' ? 'debug' : 'info';
}

export class LoggerService {
    private static instance: LoggerService;
    private readonly logger: Logger;

    private constructor(logger?: Logger) {
        this.logger = logger ?? LoggerService.createLogger();
    }

    static getInstance(): LoggerService {
        if (!LoggerService.instance) {
            LoggerService.instance = new LoggerService();
        }
        return LoggerService.instance;
    }

    private static createLogger(): Logger {
        const environment = process.env.NODE_ENV || 'development';
        const isDevelopment = environment === 'development';

        const baseOptions: LoggerOptions = {
            level: resolveLogLevel(process.env.LOG_LEVEL, environment),
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
                level: (label) => ({ level: label })
            }
        };

        if (isDevelopment) {
            return pino({
                ...baseOptions,
                transport: {
                    target: 'pino-pretty',
                    options: {
                        colorize: true,
                        translateTime: 'HH:MM:ss Z',
                        ignore: 'pid,hostname'
                    }
                }
            });
        }

        return pino({
            ...baseOptions,
            serializers: {
                error: pino.stdSerializers.err
            }
        });
    }

    debug(message: string, context?: LogContext): void {
        this.logger.debug(context ?? {}, message);
    }

    info(message: string, context?: LogContext): void {
        this.logger.info(context ?? {}, message);
    }

    warn(message: string, context?: LogContext): void {
        this.logger.warn(context ?? {}, message);
    }

    error(message: string, error?: unknown, context?: LogContext): void {
        this.logger.error({ ...context, ...(error !== undefined && { error }) }, message);
    }

    fatal(message: string, error?: unknown, context?: LogContext): void {
        this.logger.fatal({ ...context, ...(error !== undefined && { error }) }, message);
    }

    http(message: string, context?: LogContext): void {
        this.info(`[HTTP] ${message}`, context);
    }

    database(message: string, context?: LogContext): void {
        this.debug(`[DATABASE] ${message}`, context);
    }

    security(message: string, context?: LogContext): void {
        this.warn(`[SECURITY] ${message}`, context);
    }

    audit(action: string, resource: string, userId: number, context?: LogContext): void {
        this.info(`[AUDIT] ${action} on ${resource}`, {
            ...context,
            audit: { action, resource, userId }
        });
    }

    get level(): string {
        return this.logger.level;
    }

    setLevel(level: LogLevel): void {
        this.logger.level = level;
    }

    /**
     * Returns a logger that adds `context` to every line, leaving this one untouched.
     */
    child(context: LogContext): LoggerService {
        return new LoggerService(this.logger.child(context));
    }

    async flush(): Promise<void> {
        await new Promise<void>((resolve) => this.logger.flush(() => resolve()));
    }
}

export const logger = LoggerService.getInstance();
