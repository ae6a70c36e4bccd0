/**
 * Logger construction
 * Loggers are log4js loggers, typed as the Stryker `Logger` interface they satisfy
 */

import type { Logger } from '@stryker-mutator/api/logging';
import log4js from 'log4js';

export type LogLevel = 'off' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'all';

export const DEFAULT_LOGGER_CATEGORY = 'unit-case-engine';

/**
 * Route all categories to stdout at the given level
 */
export function configureLogging(level: LogLevel): void {
    log4js.configure({
        appenders: {
            console: {
                type:   'stdout',
                layout: { type: 'pattern', pattern: '%d{hh:mm:ss} %[%-5p%] %c %m' },
            },
        },
        categories: {
            'default': { appenders: ['console'], level },
        },
    });
}

/**
 * Get the logger for a category
 */
export function createLogger(category: string = DEFAULT_LOGGER_CATEGORY): Logger {
    return log4js.getLogger(category);
}
