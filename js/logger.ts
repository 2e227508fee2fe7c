/**
 * @fileoverview Structured Logging Module
 * Module-scoped console logging with levels and payload sanitizing.
 * In production mode, DEBUG and INFO logs are suppressed.
 */

import { ENV_KEYS } from './constants.js';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR',
    [LogLevel.NONE]: 'NONE',
};

const LOG_LEVEL_BY_NAME: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE,
};

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Minimum log level to output */
    minLevel: LogLevel;
    /** Whether to include timestamps in output */
    timestamps: boolean;
    /** Whether to include the module name in output */
    showModule: boolean;
}

/**
 * Parses a level name (case-insensitive); unknown names give undefined.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
    if (!name) return undefined;
    return LOG_LEVEL_BY_NAME[name.trim().toLowerCase()];
}

/**
 * Default configuration derived from the environment.
 * LOG_LEVEL wins over WORKTIME_DEBUG, which wins over NODE_ENV.
 */
export const getDefaultConfig = (env: NodeJS.ProcessEnv = process.env): LoggerConfig => {
    const isDebug = env[ENV_KEYS.DEBUG] === 'true';
    const isProduction = env.NODE_ENV === 'production';
    const explicit = parseLogLevel(env[ENV_KEYS.LOG_LEVEL]);

    return {
        minLevel: explicit ?? (isDebug ? LogLevel.DEBUG : isProduction ? LogLevel.WARN : LogLevel.INFO),
        timestamps: true,
        showModule: true,
    };
};

let config: LoggerConfig = getDefaultConfig();

/**
 * Configure the logger
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
    config = { ...config, ...newConfig };
}

/**
 * Set the minimum log level
 */
export function setLogLevel(level: LogLevel): void {
    config.minLevel = level;
}

export function isDebugEnabled(): boolean {
    return config.minLevel <= LogLevel.DEBUG;
}

function formatMessage(level: LogLevel, module: string | undefined, message: string): string {
    const parts: string[] = [];

    if (config.timestamps) {
        parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${LOG_LEVEL_NAMES[level]}]`);

    if (config.showModule && module) {
        parts.push(`[${module}]`);
    }

    parts.push(message);

    return parts.join(' ');
}

/**
 * Sanitize data to remove sensitive information before logging.
 * Removes API keys, tokens, emails and other PII.
 */
export function sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
        return data;
    }

    if (typeof data === 'string') {
        // Mask potential tokens (long alphanumeric strings)
        return data.replace(/[a-zA-Z0-9]{32,}/g, '[REDACTED]');
    }

    if (Array.isArray(data)) {
        return data.map(sanitize);
    }

    if (data instanceof Error) {
        return data;
    }

    if (typeof data === 'object') {
        const sanitized: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(data)) {
            const lowerKey = key.toLowerCase();
            if (
                lowerKey.includes('token') ||
                lowerKey.includes('password') ||
                lowerKey.includes('secret') ||
                lowerKey.includes('email') ||
                lowerKey.includes('key') ||
                lowerKey === 'authorization'
            ) {
                sanitized[key] = '[REDACTED]';
            } else {
                sanitized[key] = sanitize(value);
            }
        }
        return sanitized;
    }

    return data;
}

function log(level: LogLevel, module: string | undefined, message: string, ...data: unknown[]): void {
    if (level < config.minLevel || level === LogLevel.NONE) {
        return;
    }

    const formattedMessage = formatMessage(level, module, message);
    const sanitizedData = data.map(sanitize);

    switch (level) {
        case LogLevel.DEBUG:
        case LogLevel.INFO:
            // eslint-disable-next-line no-console
            console.log(formattedMessage, ...sanitizedData);
            break;
        case LogLevel.WARN:
            console.warn(formattedMessage, ...sanitizedData);
            break;
        case LogLevel.ERROR:
            console.error(formattedMessage, ...sanitizedData);
            break;
    }
}

export interface Logger {
    debug: (message: string, ...data: unknown[]) => void;
    info: (message: string, ...data: unknown[]) => void;
    warn: (message: string, ...data: unknown[]) => void;
    error: (message: string, ...data: unknown[]) => void;
    log: (level: LogLevel, message: string, ...data: unknown[]) => void;
}

/**
 * Create a scoped logger for a specific module
 */
export function createLogger(module: string): Logger {
    return {
        debug: (message, ...data) => log(LogLevel.DEBUG, module, message, ...data),
        info: (message, ...data) => log(LogLevel.INFO, module, message, ...data),
        warn: (message, ...data) => log(LogLevel.WARN, module, message, ...data),
        error: (message, ...data) => log(LogLevel.ERROR, module, message, ...data),
        log: (level, message, ...data) => log(level, module, message, ...data),
    };
}
