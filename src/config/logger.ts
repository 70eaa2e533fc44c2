import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Structured fields come first, the message second, the way pino takes them.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

/**
 * Logger Configuration
 *
 * JSON logger for the résumé evaluation pipeline and the local HTTP shell.
 * Pretty printing is skipped under test so no transport worker is started.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'test' ? undefined : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
