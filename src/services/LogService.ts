/**
 * Log Service - shared pino logger with one child per service
 */

import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { config } from '../config';

export function createLogger(level: string = config.LOG_LEVEL, destination?: DestinationStream): Logger {
    const options: LoggerOptions = {
        level,
        base: { app: 'steam-switcher' },
        // Call sites log failures as `{ error }`, not pino's default `err` key
        serializers: { error: pino.stdSerializers.err },
    };

    if (destination) {
        return pino(options, destination);
    }

    if (config.LOG_FILE) {
        return pino(options, pino.destination({ dest: config.LOG_FILE, mkdir: true }));
    }

    return pino(options);
}

export const logger = createLogger();

export function getLogger(service: string): Logger {
    return logger.child({ service });
}
