/* eslint-disable no-console */

import { isDebugEnabled } from './config';

export type LogContext = Record<string, unknown>;

export interface ForecastLogger {
    debug(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

/**
 * Tagged console logger. Debug lines are dropped unless SMHI_DEBUG is set.
 */
export function createConsoleLogger(tag = 'smhi'): ForecastLogger {
    const prefix = `[${tag}]`;
    return {
        debug(message, context) {
            if (!isDebugEnabled()) return;
            console.log(`${prefix} ${message}`, context ?? {});
        },
        warn(message, context) {
            console.warn(`${prefix} ${message}`, context ?? {});
        },
        error(message, context) {
            console.error(`${prefix} ${message}`, context ?? {});
        }
    };
}

export const silentLogger: ForecastLogger = {
    debug() {},
    warn() {},
    error() {}
};
