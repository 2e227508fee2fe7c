/**
 * @fileoverview Error Reporting Module
 * Centralized error tracking through Sentry for the Node host.
 * Handles initialization, error capture and sensitive data scrubbing.
 */

import * as Sentry from '@sentry/node';
import type { Breadcrumb, Event } from '@sentry/node';
import { SENTRY_DSN_PLACEHOLDER } from './constants.js';
import { createLogger } from './logger.js';

const logger = createLogger('ErrorReporting');

// ==================== TYPES ====================

/**
 * Sentry configuration options
 */
export interface SentryConfig {
    /** Sentry DSN (Data Source Name) */
    dsn: string | null;
    /** Environment name (e.g., 'production', 'development') */
    environment: string;
    release?: string;
    debug?: boolean;
    /** Sample rate for error events (0.0 to 1.0) */
    sampleRate?: number;
}

/**
 * Error context for reporting
 */
export interface ErrorContext {
    /** Module where error occurred */
    module?: string;
    /** Function or operation name */
    operation?: string;
    metadata?: Record<string, unknown>;
    /** User-facing error message */
    userMessage?: string;
    level?: Sentry.SeverityLevel;
}

// ==================== STATE ====================

let sentryInitialized = false;

// ==================== SENSITIVE DATA PATTERNS ====================

/**
 * Patterns to redact from error reports
 */
const SENSITIVE_PATTERNS = [
    /key=[^&\s]*/gi,
    /X-Redmine-API-Key:\s*[^\s]*/gi,
    /Bearer\s+[^\s]*/gi,
    /token["\s:=]+[^"'\s,}]*/gi,
    /password["\s:=]+[^"'\s,}]*/gi,
    /secret["\s:=]+[^"'\s,}]*/gi,
    /api[_-]?key["\s:=]+[^"'\s,}]*/gi,
    /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
];

/**
 * Scrubs sensitive data from a string
 */
export function scrubSensitiveData(text: string): string {
    let scrubbed = text;
    for (const pattern of SENSITIVE_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, '[REDACTED]');
    }
    return scrubbed;
}

function isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return (
        lowerKey.includes('token') ||
        lowerKey.includes('password') ||
        lowerKey.includes('secret') ||
        lowerKey.includes('key') ||
        lowerKey.includes('email')
    );
}

function scrubValue(value: unknown): unknown {
    if (typeof value === 'string') {
        return scrubSensitiveData(value);
    }
    if (Array.isArray(value)) {
        return value.map(scrubValue);
    }
    if (value !== null && typeof value === 'object') {
        return scrubRecord(Object.fromEntries(Object.entries(value)));
    }
    return value;
}

/**
 * Scrubs sensitive data from a record recursively.
 * Sensitive keys are redacted entirely.
 */
export function scrubRecord(obj: Record<string, unknown>): Record<string, unknown> {
    const scrubbed: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
        scrubbed[key] = isSensitiveKey(key) ? '[REDACTED]' : scrubValue(value);
    }
    return scrubbed;
}

/**
 * Scrubs an outgoing Sentry event in place.
 */
export function scrubEvent<T extends Event>(event: T): T {
    for (const exception of event.exception?.values ?? []) {
        if (exception.value) {
            exception.value = scrubSensitiveData(exception.value);
        }
        for (const frame of exception.stacktrace?.frames ?? []) {
            if (frame.filename) {
                frame.filename = scrubSensitiveData(frame.filename);
            }
        }
    }

    for (const breadcrumb of event.breadcrumbs ?? []) {
        if (breadcrumb.message) {
            breadcrumb.message = scrubSensitiveData(breadcrumb.message);
        }
        if (breadcrumb.data) {
            breadcrumb.data = scrubRecord(breadcrumb.data);
        }
    }

    if (event.request?.url) {
        event.request.url = scrubSensitiveData(event.request.url);
    }
    if (typeof event.request?.query_string === 'string') {
        event.request.query_string = scrubSensitiveData(event.request.query_string);
    }

    if (event.extra) {
        event.extra = scrubRecord(event.extra);
    }

    return event;
}

// ==================== INITIALIZATION ====================

/**
 * Initializes Sentry error reporting.
 * Safe to call multiple times; subsequent calls are no-ops.
 *
 * @returns Whether reporting is enabled.
 */
export function initErrorReporting(config: SentryConfig): boolean {
    if (sentryInitialized) {
        return true;
    }

    if (!config.dsn || config.dsn === SENTRY_DSN_PLACEHOLDER) {
        logger.debug('Sentry DSN not configured, error reporting disabled');
        return false;
    }

    try {
        Sentry.init({
            dsn: config.dsn,
            environment: config.environment,
            release: config.release,
            debug: config.debug ?? false,
            sampleRate: config.sampleRate ?? 1.0,

            beforeSend(event) {
                return scrubEvent(event);
            },

            ignoreErrors: [
                // Caller-initiated aborts
                'AbortError',
            ],

            beforeBreadcrumb(breadcrumb: Breadcrumb) {
                // Filter out noisy console breadcrumbs
                if (breadcrumb.category === 'console' && breadcrumb.level === 'debug') {
                    return null;
                }
                return breadcrumb;
            },
        });

        sentryInitialized = true;
        logger.info('Sentry initialized');
        return true;
    } catch (error) {
        logger.warn('Failed to initialize Sentry', error);
        return false;
    }
}

// ==================== ERROR REPORTING ====================

/**
 * Reports an error to Sentry with optional context.
 * Safe to call even if Sentry is not initialized.
 */
export function reportError(error: Error | string, context?: ErrorContext): void {
    const errorObj = typeof error === 'string' ? new Error(error) : error;

    // Always log locally
    logger.error(`[${context?.module || 'Engine'}] ${context?.operation || 'Error'}:`, errorObj);

    if (!sentryInitialized) {
        return;
    }

    try {
        Sentry.withScope((scope) => {
            if (context?.level) {
                scope.setLevel(context.level);
            }
            if (context?.module) {
                scope.setTag('module', context.module);
            }
            if (context?.operation) {
                scope.setTag('operation', context.operation);
            }
            if (context?.metadata) {
                scope.setExtras(scrubRecord(context.metadata));
            }
            if (context?.userMessage) {
                scope.setExtra('user_message', context.userMessage);
            }

            Sentry.captureException(errorObj);
        });
    } catch (sentryError) {
        logger.warn('Failed to report error to Sentry', sentryError);
    }
}

/**
 * Reports a message to Sentry (for non-error events such as degraded paths).
 */
export function reportMessage(
    message: string,
    level: Sentry.SeverityLevel = 'info',
    context?: Omit<ErrorContext, 'level'>
): void {
    const line = `[${context?.module || 'Engine'}] ${message}`;
    if (level === 'error' || level === 'fatal') {
        logger.error(line);
    } else {
        logger.warn(line);
    }

    if (!sentryInitialized) {
        return;
    }

    try {
        Sentry.withScope((scope) => {
            scope.setLevel(level);
            if (context?.module) {
                scope.setTag('module', context.module);
            }
            if (context?.operation) {
                scope.setTag('operation', context.operation);
            }
            if (context?.metadata) {
                scope.setExtras(scrubRecord(context.metadata));
            }

            Sentry.captureMessage(scrubSensitiveData(message));
        });
    } catch (sentryError) {
        logger.warn('Failed to report message to Sentry', sentryError);
    }
}

/**
 * Sets user context for error reports.
 * The user ID is hashed; no PII is attached.
 */
export function setUserContext(userId: string | null): void {
    if (!sentryInitialized) {
        return;
    }

    Sentry.setUser(userId ? { id: hashString(userId) } : null);
}

/**
 * Adds a breadcrumb to the error trail.
 */
export function addBreadcrumb(category: string, message: string, data?: Record<string, unknown>): void {
    if (!sentryInitialized) {
        return;
    }

    Sentry.addBreadcrumb({
        category,
        message: scrubSensitiveData(message),
        data: data ? scrubRecord(data) : undefined,
        level: 'info',
    });
}

// ==================== HELPERS ====================

/**
 * Simple hash function for strings (FNV-1a)
 * Used to hash user IDs for privacy.
 */
export function hashString(str: string): string {
    let hash = 2166136261;
    for (let i = 0; i < str.length; i++) {
        hash ^= str.charCodeAt(i);
        hash = Math.imul(hash, 16777619);
    }
    return (hash >>> 0).toString(16);
}

export function isErrorReportingEnabled(): boolean {
    return sentryInitialized;
}

/**
 * Flushes pending error reports (call before process exit)
 */
export async function flushErrorReports(timeout = 2000): Promise<boolean> {
    if (!sentryInitialized) {
        return true;
    }

    try {
        return await Sentry.flush(timeout);
    } catch (error) {
        logger.warn('Failed to flush error reports', error);
        return false;
    }
}
