/**
 * @fileoverview Utility Functions
 * Generic helpers for date arithmetic, rounding, error classification and
 * input validation. These functions are pure and stateless.
 */

import { ERROR_MESSAGES, ERROR_TYPES, WEEKDAY_KEYS, type ErrorType, type FriendlyError } from './constants.js';
import type {
    ConflictKind,
    DateKey,
    DateRange,
    ValidationConflict,
    ValidationResult,
    WeekdayKey,
} from './types.js';

// ==================== ERRORS ====================

/**
 * Extended error with status code
 */
interface ErrorWithStatus extends Error {
    status?: number;
}

/**
 * Raised when a record violates an interval or consistency invariant.
 * The record is never persisted; `field` names what the caller must correct.
 */
export class ValidationConflictError extends Error {
    readonly kind: ConflictKind;
    readonly field: string;

    constructor(conflict: ValidationConflict) {
        super(conflict.message);
        this.name = 'ValidationConflictError';
        this.kind = conflict.kind;
        this.field = conflict.field;
    }

    /**
     * Field → messages map, the shape form layers expect.
     */
    toFieldErrors(): Record<string, string[]> {
        return { [this.field]: [this.message] };
    }
}

/**
 * Builds a failed ValidationResult.
 */
export function conflict(kind: ConflictKind, field: string, message: string): ValidationResult {
    return { ok: false, conflict: { kind, field, message } };
}

export const VALID: ValidationResult = { ok: true };

/**
 * Throws when the result is a conflict.
 * @throws ValidationConflictError
 */
export function assertValid(result: ValidationResult): void {
    if (!result.ok) {
        throw new ValidationConflictError(result.conflict);
    }
}

/**
 * Classifies an error object into a predefined category.
 * Used to decide how a failure surfaces to the caller.
 *
 * @param error - The error object to classify.
 * @returns One of the ERROR_TYPES constants.
 */
export function classifyError(error: unknown): ErrorType {
    if (!error) return ERROR_TYPES.UNKNOWN;
    if (error instanceof ValidationConflictError) return ERROR_TYPES.VALIDATION;
    if (!(error instanceof Error)) return ERROR_TYPES.UNKNOWN;

    const err: ErrorWithStatus = error;

    // Network errors (fetch failures, timeouts)
    if (err.name === 'TypeError' && err.message?.includes('fetch')) {
        return ERROR_TYPES.NETWORK;
    }
    if (err.name === 'AbortError' || err.name === 'TimeoutError') {
        return ERROR_TYPES.NETWORK;
    }

    if (err.status === 401 || err.status === 403) {
        return ERROR_TYPES.AUTH;
    }
    if (err.status && err.status >= 400 && err.status < 500) {
        return ERROR_TYPES.VALIDATION;
    }
    if (err.status && err.status >= 500) {
        return ERROR_TYPES.API;
    }

    return ERROR_TYPES.UNKNOWN;
}

/**
 * Creates a structured, user-friendly error object from a raw error.
 *
 * @param error - The raw error or error message.
 * @param type - Optional explicit error type override.
 */
export function createUserFriendlyError(error: Error | string, type?: ErrorType): FriendlyError {
    const errorType = type || classifyError(error);
    const errorMessage = ERROR_MESSAGES[errorType] || ERROR_MESSAGES[ERROR_TYPES.UNKNOWN];
    const err = typeof error === 'string' ? new Error(error) : error;

    return {
        type: errorType,
        title: errorMessage.title,
        // Validation conflicts carry their own user-facing message
        message: err instanceof ValidationConflictError ? err.message : errorMessage.message,
        action: errorMessage.action,
        originalError: err,
        timestamp: new Date().toISOString(),
        stack: err.stack,
    };
}

// ==================== INPUT VALIDATION ====================

/**
 * Validates a date range.
 * @param startDate - Start date in YYYY-MM-DD format.
 * @param endDate - End date in YYYY-MM-DD format.
 * @throws ValidationConflictError if a bound is malformed or start is after end.
 */
export function validateDateRange(startDate: string, endDate: string): DateRange {
    if (!IsoUtils.isDateKey(startDate)) {
        throw new ValidationConflictError({
            kind: 'invalid_value',
            field: 'from',
            message: 'Invalid date format. Use YYYY-MM-DD.',
        });
    }
    if (!IsoUtils.isDateKey(endDate)) {
        throw new ValidationConflictError({
            kind: 'invalid_value',
            field: 'until',
            message: 'Invalid date format. Use YYYY-MM-DD.',
        });
    }
    if (startDate > endDate) {
        throw new ValidationConflictError({
            kind: 'invalid_interval',
            field: 'from',
            message: 'Start date must be before end date',
        });
    }
    return { start: startDate, end: endDate };
}

// ==================== GENERIC HELPERS ====================

/**
 * Rounds a number to a specific number of decimal places.
 * Avoids floating point drift in hour totals.
 *
 * @param num - The number to round.
 * @param decimals - Number of decimal places.
 */
export function round(num: number, decimals = 2): number {
    if (!Number.isFinite(num)) return 0;
    const factor = Math.pow(10, decimals);
    return Math.round((num + Number.EPSILON) * factor) / factor;
}

/**
 * Splits an array into consecutive chunks of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    const step = Math.max(1, Math.floor(size));
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += step) {
        chunks.push(items.slice(i, i + step));
    }
    return chunks;
}

/**
 * Converts hours to 8-hour days.
 */
export function hoursToDays(hours: number): number {
    return round(hours / 8, 2);
}

/**
 * Formats hours as "8.00h (1.00d)".
 */
export function formatDuration(hours: number): string {
    return `${hours.toFixed(2)}h (${hoursToDays(hours).toFixed(2)}d)`;
}

// --- Date Helpers ---

export const IsoUtils = {
    /**
     * Converts a Date object to an ISO date string (YYYY-MM-DD) using UTC fields.
     */
    toISODate(date: Date): DateKey {
        const y = date.getUTCFullYear();
        const m = String(date.getUTCMonth() + 1).padStart(2, '0');
        const d = String(date.getUTCDate()).padStart(2, '0');
        return `${y}-${m}-${d}`;
    },

    /**
     * Converts a Date object to its local calendar date (YYYY-MM-DD).
     */
    toLocalISODate(date: Date): DateKey {
        const y = date.getFullYear();
        const m = String(date.getMonth() + 1).padStart(2, '0');
        const d = String(date.getDate()).padStart(2, '0');
        return `${y}-${m}-${d}`;
    },

    /**
     * Checks the YYYY-MM-DD shape and that the date exists.
     */
    isDateKey(value: string): boolean {
        if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
        const date = this.parseDate(value);
        return date !== null && this.toISODate(date) === value;
    },

    /**
     * Parses a YYYY-MM-DD string into a Date object (at UTC midnight).
     *
     * @returns Date object or null if invalid.
     */
    parseDate(dateStr: string | null | undefined): Date | null {
        if (!dateStr) return null;
        const date = new Date(`${dateStr}T00:00:00Z`);
        return isNaN(date.getTime()) ? null : date;
    },

    /**
     * Extracts the local calendar date (YYYY-MM-DD) from an ISO timestamp.
     * Date-only strings are returned unchanged.
     */
    extractDateKey(isoString: string | null | undefined): DateKey | null {
        if (!isoString) return null;
        if (isoString.length === 10) return isoString;

        const date = new Date(isoString);
        if (isNaN(date.getTime())) return null;
        return this.toLocalISODate(date);
    },

    /**
     * Gets the lowercase weekday key (e.g. 'monday') for a date key.
     */
    getWeekdayKey(dateKey: DateKey): WeekdayKey {
        const date = this.parseDate(dateKey);
        if (!date) {
            throw new RangeError(`Invalid date key: ${dateKey}`);
        }
        return WEEKDAY_KEYS[date.getUTCDay()];
    },

    /**
     * Checks if a date falls on a weekend (Sat/Sun).
     */
    isWeekend(dateKey: DateKey): boolean {
        const date = this.parseDate(dateKey);
        if (!date) return false;
        const day = date.getUTCDay(); // 0=Sun, 6=Sat
        return day === 0 || day === 6;
    },

    /**
     * Adds (or subtracts) whole days to a date key.
     */
    addDays(dateKey: DateKey, days: number): DateKey {
        const date = this.parseDate(dateKey);
        if (!date) {
            throw new RangeError(`Invalid date key: ${dateKey}`);
        }
        date.setUTCDate(date.getUTCDate() + days);
        return this.toISODate(date);
    },

    /**
     * Generates an array of date strings between start and end (inclusive).
     */
    generateDateRange(startIso: DateKey, endIso: DateKey): DateKey[] {
        const dates: DateKey[] = [];
        const current = this.parseDate(startIso);
        const end = this.parseDate(endIso);
        if (!current || !end) return [];

        while (current <= end) {
            dates.push(this.toISODate(current));
            current.setUTCDate(current.getUTCDate() + 1);
        }
        return dates;
    },

    /**
     * First and last day of the given month (1-based).
     */
    monthRange(year: number, month: number): DateRange {
        const first = new Date(Date.UTC(year, month - 1, 1));
        const last = new Date(Date.UTC(year, month, 0));
        return { start: this.toISODate(first), end: this.toISODate(last) };
    },

    /**
     * Year and 1-based month of a date key.
     */
    yearMonth(dateKey: DateKey): { year: number; month: number } {
        const [year, month] = dateKey.split('-').map((part) => parseInt(part, 10));
        return { year, month };
    },
};

/**
 * Hours between two ISO date-times, rounded to 2 decimals.
 */
export function hoursBetween(startsAt: string, endsAt: string): number {
    const start = new Date(startsAt).getTime();
    const end = new Date(endsAt).getTime();
    if (isNaN(start) || isNaN(end)) return 0;
    return round((end - start) / (1000 * 60 * 60), 2);
}

/**
 * Whether the inclusive date interval [startsAt, endsAt ?? ∞] contains the date.
 */
export function isActiveOn(startsAt: DateKey, endsAt: DateKey | null, date: DateKey): boolean {
    return startsAt <= date && (endsAt === null || endsAt >= date);
}

/**
 * Whether two inclusive date intervals overlap; a null end is open-ended.
 */
export function dateIntervalsOverlap(
    aStart: DateKey,
    aEnd: DateKey | null,
    bStart: DateKey,
    bEnd: DateKey | null
): boolean {
    return (bEnd === null || aStart <= bEnd) && (aEnd === null || bStart <= aEnd);
}

/**
 * Whether two date-time intervals overlap. Intervals are closed-open unless
 * `closed` is set, in which case touching intervals overlap too.
 */
export function dateTimeIntervalsOverlap(
    aStart: string,
    aEnd: string,
    bStart: string,
    bEnd: string,
    { closed = false }: { closed?: boolean } = {}
): boolean {
    const as = new Date(aStart).getTime();
    const ae = new Date(aEnd).getTime();
    const bs = new Date(bStart).getTime();
    const be = new Date(bEnd).getTime();
    return closed ? as <= be && bs <= ae : as < be && bs < ae;
}
