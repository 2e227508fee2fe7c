/**
 * @fileoverview Engine Constants
 * Configuration defaults, status values, error classification and other
 * shared constants used across the engine.
 */

import type { FriendlyError, WeekdayKey } from './types.js';

// ==================== ERROR TRACKING ====================

/**
 * Placeholder DSN; error reporting stays disabled until SENTRY_DSN is set.
 */
export const SENTRY_DSN_PLACEHOLDER = '__SENTRY_DSN__';

/**
 * Environment variable names read by loadConfig() and the logger.
 */
export const ENV_KEYS = {
    REDMINE_URL: 'REDMINE_URL',
    REDMINE_API_KEY: 'REDMINE_API_KEY',
    REDMINE_ISSUE_CONTRACT_FIELD: 'REDMINE_ISSUE_CONTRACT_FIELD',
    REDMINE_TIMEOUT_MS: 'REDMINE_TIMEOUT_MS',
    REDMINE_MAX_PAGES: 'REDMINE_MAX_PAGES',
    REDMINE_IN_PROGRESS_STATUS_IDS: 'REDMINE_IN_PROGRESS_STATUS_IDS',
    SENTRY_DSN: 'SENTRY_DSN',
    USER_BATCH_SIZE: 'WORKTIME_USER_BATCH_SIZE',
    DEBUG: 'WORKTIME_DEBUG',
    LOG_LEVEL: 'LOG_LEVEL',
} as const;

/**
 * Global engine constants.
 */
export const CONSTANTS = {
    /** Decimal places kept for hour figures. */
    HOUR_DECIMALS: 2,
    /** Minimum free hours before a user counts as available for internal work. */
    MIN_INTERNAL_FREE_HOURS: 1,
    /** Number of users resolved concurrently per batch. */
    DEFAULT_USER_BATCH_SIZE: 5,
    /** Upper bound of any weekday schedule value. */
    MAX_DAY_HOURS: 24,
    /** Upper bound of a performance type multiplier. */
    MAX_MULTIPLIER: 5,
    MIN_TIMESHEET_YEAR: 2000,
    MAX_TIMESHEET_YEAR: 3000,
} as const;

/**
 * Weekday keys indexed by Date#getUTCDay() (0 = Sunday).
 */
export const WEEKDAY_KEYS: readonly WeekdayKey[] = [
    'sunday',
    'monday',
    'tuesday',
    'wednesday',
    'thursday',
    'friday',
    'saturday',
];

// ==================== REDMINE CONSTANTS ====================

export const REDMINE_DEFAULTS = {
    /** Custom field holding "<contract id>|<label>" on issues. */
    ISSUE_CONTRACT_FIELD: '925r_contract',
    /** Per-request timeout. */
    TIMEOUT_MS: 10_000,
    /** Redmine caps `limit` at 100. */
    PAGE_SIZE: 100,
    /** Issue status IDs considered "in progress" (In Progress, Ready for UAT). */
    IN_PROGRESS_STATUS_IDS: [2, 9],
} as const;

/**
 * Default maximum number of pages to fetch per listing.
 * Set to 0 for unlimited (up to the hard limit).
 */
export const DEFAULT_MAX_PAGES = 50;

/**
 * Hard limit on pages to prevent runaway fetches.
 */
export const HARD_MAX_PAGES_LIMIT = 500;

/**
 * TTL of cached Redmine dropdown choices (5 minutes).
 */
export const CHOICES_CACHE_TTL = 5 * 60 * 1000;

export const CACHE_KEYS = {
    REDMINE_USER_CHOICES: 'redmine_user_choices',
    REDMINE_PROJECT_CHOICES: 'redmine_project_choices',
} as const;

/**
 * Label of the empty dropdown choice.
 */
export const EMPTY_CHOICE_LABEL = '-----------';

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    NETWORK: 'NETWORK_ERROR',
    AUTH: 'AUTH_ERROR',
    VALIDATION: 'VALIDATION_ERROR',
    API: 'API_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

export interface ErrorMessageConfig {
    title: string;
    message: string;
    action: FriendlyError['action'];
}

/**
 * User-facing messages and actions for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.NETWORK]: {
        title: 'Network Error',
        message: 'Unable to reach Redmine. External data is left out of this report.',
        action: 'retry',
    },
    [ERROR_TYPES.AUTH]: {
        title: 'Authentication Error',
        message: 'Redmine rejected the configured API key.',
        action: 'none',
    },
    [ERROR_TYPES.VALIDATION]: {
        title: 'Validation Error',
        message: 'The record conflicts with existing data. Please correct the highlighted field.',
        action: 'correct',
    },
    [ERROR_TYPES.API]: {
        title: 'API Error',
        message: 'Redmine returned an error. The service may be temporarily unavailable.',
        action: 'retry',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred.',
        action: 'none',
    },
};

export type { FriendlyError };
