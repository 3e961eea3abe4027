import pino, { Logger, LoggerOptions } from 'pino';

export type LogMeta = Record<string, unknown>;

export class LoggerService {
    private static instance: LoggerService | undefined;
    private readonly logger: Logger;

    private constructor() {
        this.logger = LoggerService.createLogger();
    }

    static getInstance(): LoggerService {
        if (!LoggerService.instance) {
            LoggerService.instance = new LoggerService();
        }
        return LoggerService.instance;
    }

    private static createLogger(): Logger {
        const environment = process.env.NODE_ENV;
        const isDevelopment = environment === 'development';
        const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : environment === 'test' ? 'silent' : 'info');

        const baseOptions: LoggerOptions = {
            level: logLevel,
            base: { service: 'bank-reconciliation-engine' },
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

    private formatMessage(message: string, meta?: LogMeta): object {
        return {
            ...meta,
            message
        };
    }

    trace(message: string, meta?: LogMeta): void {
        this.logger.trace(this.formatMessage(message, meta));
    }

    debug(message: string, meta?: LogMeta): void {
        this.logger.debug(this.formatMessage(message, meta));
    }

    info(message: string, meta?: LogMeta): void {
        this.logger.info(this.formatMessage(message, meta));
    }

    warn(message: string, meta?: LogMeta): void {
        this.logger.warn(this.formatMessage(message, meta));
    }

    error(message: string, error?: Error, meta?: LogMeta): void {
        const errorMeta = error ? {
            error: {
                name: error.name,
                message: error.message,
                stack: error.stack
            }
        } : {};

        this.logger.error(this.formatMessage(message, { ...meta, ...errorMeta }));
    }

    fatal(message: string, error?: Error, meta?: LogMeta): void {
        const errorMeta = error ? {
            error: {
                name: error.name,
                message: error.message,
                stack: error.stack
            }
        } : {};

        this.logger.fatal(this.formatMessage(message, { ...meta, ...errorMeta }));
    }

    http(message: string, meta?: LogMeta): void {
        this.info(`[HTTP] ${message}`, meta);
    }

    database(message: string, meta?: LogMeta): void {
        this.debug(`[DATABASE] ${message}`, meta);
    }

    event(message: string, meta?: LogMeta): void {
        this.info(`[EVENT] ${message}`, meta);
    }

    /** Every committed reconciliation mutation passes through here. */
    audit(action: string, resource: string, actorId: string, meta?: LogMeta): void {
        this.info(`[AUDIT] ${action} on ${resource}`, {
            ...meta,
            audit: {
                action,
                resource,
                actorId,
                timestamp: new Date().toISOString()
            }
        });
    }

    flush(): void {
        this.logger.flush();
    }
}

// Singleton instance
export const logger = LoggerService.getInstance();
