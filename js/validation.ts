/**
 * @fileoverview Overlap Invariant Validator
 * Pure checks run before a time-bound record is committed. Each validator
 * takes the candidate plus the existing records for the same subject and
 * returns OK or a field-tagged conflict; it never touches the store.
 *
 * Interval semantics:
 * - Date-bounded records (contracts, schedules) use closed intervals with an
 *   optional open end: [start, end ?? ∞].
 * - Leave dates are closed: 09:00-11:00 and 11:00-13:00 conflict.
 * - Whereabouts are closed-open, so the same two intervals do not.
 */

import { CONSTANTS, WEEKDAY_KEYS } from './constants.js';
import type {
    Contract,
    ContractUser,
    ContractUserWorkSchedule,
    EmploymentContract,
    Holiday,
    Leave,
    LeaveDate,
    LeaveDateWithLeave,
    Performance,
    PerformanceType,
    Timesheet,
    TimesheetStatus,
    ValidationResult,
    WeekdayHours,
    Whereabout,
    WorkSchedule,
} from './types.js';
import {
    IsoUtils,
    VALID,
    conflict,
    dateIntervalsOverlap,
    dateTimeIntervalsOverlap,
} from './utils.js';

// ==================== SHARED RULES ====================

function validateWeekdayHours(hours: WeekdayHours): ValidationResult {
    for (const day of WEEKDAY_KEYS) {
        const value = hours[day];
        if (!Number.isFinite(value) || value < 0 || value > CONSTANTS.MAX_DAY_HOURS) {
            return conflict('invalid_value', day, `Hours must be between 0 and ${CONSTANTS.MAX_DAY_HOURS}.`);
        }
    }
    return VALID;
}

/**
 * Checks a same-day date-time interval and resolves its date.
 */
function validateSameDayInterval(
    startsAt: string,
    endsAt: string
): { ok: true; date: string } | { ok: false; result: ValidationResult } {
    const startDate = startsAt ? IsoUtils.extractDateKey(startsAt) : null;
    if (!startDate) {
        return { ok: false, result: conflict('invalid_value', 'starts_at', 'The start date/time should be set') };
    }
    const endDate = endsAt ? IsoUtils.extractDateKey(endsAt) : null;
    if (!endDate) {
        return { ok: false, result: conflict('invalid_value', 'ends_at', 'The end date/time should be set') };
    }
    if (new Date(startsAt).getTime() >= new Date(endsAt).getTime()) {
        return {
            ok: false,
            result: conflict('invalid_interval', 'starts_at', 'The start date should be set before the end date'),
        };
    }
    if (startDate !== endDate) {
        return {
            ok: false,
            result: conflict(
                'invalid_interval',
                'starts_at',
                'The start date should occur on the same day as the end date'
            ),
        };
    }
    return { ok: true, date: startDate };
}

function isInTimesheetMonth(date: string, timesheet: Timesheet): boolean {
    const { year, month } = IsoUtils.yearMonth(date);
    return year === timesheet.year && month === timesheet.month;
}

// ==================== SCHEDULES & CONTRACTS ====================

export function validateWorkSchedule(schedule: WorkSchedule): ValidationResult {
    return validateWeekdayHours(schedule.hours);
}

/**
 * At most one employment contract per (user, company) may be active on any day.
 *
 * @param existing - Employment contracts of the same user (any company).
 */
export function validateEmploymentContract(
    candidate: EmploymentContract,
    existing: readonly EmploymentContract[]
): ValidationResult {
    if (candidate.endedAt !== null && candidate.endedAt < candidate.startedAt) {
        return conflict('invalid_interval', 'ended_at', 'The end date should come after the start date.');
    }

    if (!candidate.company.internal) {
        return conflict(
            'invalid_reference',
            'company',
            'Employment contracts can only be created for internal companies.'
        );
    }

    const clash = existing.some(
        (other) =>
            other.id !== candidate.id &&
            other.userId === candidate.userId &&
            other.company.id === candidate.company.id &&
            dateIntervalsOverlap(candidate.startedAt, candidate.endedAt, other.startedAt, other.endedAt)
    );
    if (clash) {
        return conflict('overlap', 'user', 'The selected user already has an active employment contract.');
    }

    return VALID;
}

/**
 * No two schedules of the same contract user may overlap.
 *
 * @param existing - Schedules of the same user.
 */
export function validateContractUserWorkSchedule(
    candidate: ContractUserWorkSchedule,
    existing: readonly ContractUserWorkSchedule[]
): ValidationResult {
    if (candidate.endsAt !== null && candidate.endsAt < candidate.startsAt) {
        return conflict('invalid_interval', 'ends_at', 'The end date should come after the start date.');
    }

    const hours = validateWeekdayHours(candidate.hours);
    if (!hours.ok) return hours;

    const clash = existing.some(
        (other) =>
            other.id !== candidate.id &&
            other.contractUserId === candidate.contractUserId &&
            dateIntervalsOverlap(candidate.startsAt, candidate.endsAt, other.startsAt, other.endsAt)
    );
    if (clash) {
        return conflict(
            'overlap',
            'starts_at',
            'The given contract user already has a work schedule for this period.'
        );
    }

    return VALID;
}

export function validateContract(candidate: Contract): ValidationResult {
    if (candidate.endsAt !== null && candidate.startsAt >= candidate.endsAt) {
        return conflict('invalid_interval', 'ends_at', 'The start date should be set before the end date');
    }

    switch (candidate.kind) {
        case 'support':
            if (candidate.fixedFeePeriod && !candidate.fixedFee) {
                return conflict('invalid_value', 'fixed_fee', 'A contract with a fixed fee period requires a fixed fee');
            }
            return VALID;
        case 'project':
        case 'consultancy':
            return VALID;
    }
}

export function validatePerformanceType(candidate: PerformanceType): ValidationResult {
    if (
        !Number.isFinite(candidate.multiplier) ||
        candidate.multiplier < 0 ||
        candidate.multiplier > CONSTANTS.MAX_MULTIPLIER
    ) {
        return conflict(
            'invalid_value',
            'multiplier',
            `The multiplier must be between 0 and ${CONSTANTS.MAX_MULTIPLIER}.`
        );
    }
    return VALID;
}

// ==================== HOLIDAYS ====================

export function validateHoliday(candidate: Holiday, existing: readonly Holiday[]): ValidationResult {
    if (!IsoUtils.isDateKey(candidate.date)) {
        return conflict('invalid_value', 'date', 'Invalid date format. Use YYYY-MM-DD.');
    }

    const duplicate = existing.some(
        (other) =>
            other.id !== candidate.id &&
            other.name === candidate.name &&
            other.date === candidate.date &&
            other.country === candidate.country
    );
    if (duplicate) {
        return conflict('duplicate', 'name', 'A holiday with this name, date and country already exists.');
    }
    return VALID;
}

// ==================== LEAVE & WHEREABOUTS ====================

export interface LeaveDateContext {
    leave: Leave | null;
    timesheet: Timesheet | null;
    /** Leave dates of the leave's user */
    existing: readonly LeaveDateWithLeave[];
}

/**
 * Whether a leave date touches or overlaps another non-rejected leave date of
 * the same user.
 */
function hasLeaveClash(candidate: LeaveDate, leave: Leave, existing: readonly LeaveDateWithLeave[]): boolean {
    return existing.some(
        (other) =>
            other.id !== candidate.id &&
            other.leave.userId === leave.userId &&
            other.leave.status !== 'rejected' &&
            dateTimeIntervalsOverlap(candidate.startsAt, candidate.endsAt, other.startsAt, other.endsAt, {
                closed: true,
            })
    );
}

export interface LeaveContext {
    /** Leave dates attached to the candidate leave */
    leaveDates: readonly LeaveDate[];
    /** Leave dates of the leave's user, joined with their stored leave */
    existing: readonly LeaveDateWithLeave[];
}

/**
 * A leave that is not rejected must not bring its dates into conflict with
 * other leave of the user, e.g. when a rejected leave is approved again.
 */
export function validateLeave(candidate: Leave, ctx: LeaveContext): ValidationResult {
    if (candidate.status === 'rejected') return VALID;

    const existing = ctx.existing.map((other) =>
        other.leaveId === candidate.id ? { ...other, leave: candidate } : other
    );
    for (const leaveDate of ctx.leaveDates) {
        if (hasLeaveClash(leaveDate, candidate, existing)) {
            return conflict('overlap', 'user', 'User already has leave planned during this time');
        }
    }
    return VALID;
}

export function validateLeaveDate(candidate: LeaveDate, ctx: LeaveDateContext): ValidationResult {
    const interval = validateSameDayInterval(candidate.startsAt, candidate.endsAt);
    if (!interval.ok) return interval.result;

    const { leave, timesheet } = ctx;
    if (!leave) {
        return conflict('invalid_reference', 'leave', 'The selected leave does not exist.');
    }
    if (!timesheet) {
        return conflict('invalid_reference', 'timesheet', 'The selected timesheet does not exist.');
    }

    if (hasLeaveClash(candidate, leave, ctx.existing)) {
        return conflict('overlap', 'user', 'User already has leave planned during this time');
    }

    if (!isInTimesheetMonth(interval.date, timesheet)) {
        return conflict(
            'timesheet_mismatch',
            'timesheet',
            'You cannot attach leave dates to a timesheet for a different month'
        );
    }

    if (timesheet.status !== 'active') {
        return conflict('timesheet_inactive', 'timesheet', 'You can only add leave dates to active timesheets.');
    }

    if (leave.userId !== timesheet.userId) {
        return conflict(
            'user_mismatch',
            'leave',
            'You cannot attach leave dates to leaves and timesheets for different users'
        );
    }

    return VALID;
}

export interface WhereaboutContext {
    timesheet: Timesheet | null;
    /** Whereabouts of the timesheet's user */
    existing: readonly Whereabout[];
}

export function validateWhereabout(candidate: Whereabout, ctx: WhereaboutContext): ValidationResult {
    const interval = validateSameDayInterval(candidate.startsAt, candidate.endsAt);
    if (!interval.ok) return interval.result;

    const { timesheet } = ctx;
    if (!timesheet) {
        return conflict('invalid_reference', 'timesheet', 'The selected timesheet does not exist.');
    }

    const clash = ctx.existing.some(
        (other) =>
            other.id !== candidate.id &&
            dateTimeIntervalsOverlap(candidate.startsAt, candidate.endsAt, other.startsAt, other.endsAt)
    );
    if (clash) {
        return conflict('overlap', 'user', 'User already has a whereabout during this time');
    }

    if (!isInTimesheetMonth(interval.date, timesheet)) {
        return conflict(
            'timesheet_mismatch',
            'timesheet',
            'You cannot attach whereabouts to a timesheet for a different month'
        );
    }

    if (timesheet.status !== 'active') {
        return conflict('timesheet_inactive', 'timesheet', 'You can only add whereabouts to active timesheets.');
    }

    return VALID;
}

// ==================== TIMESHEETS ====================

const ALLOWED_TRANSITIONS: Record<TimesheetStatus, readonly TimesheetStatus[] | null> = {
    active: ['pending'],
    pending: ['closed', 'active'],
    // Closed timesheets can be reopened by administrators
    closed: null,
};

/**
 * @param previous - Stored version of the timesheet, null on creation.
 * @param existing - Timesheets of the same user.
 */
export function validateTimesheet(
    candidate: Timesheet,
    previous: Timesheet | null,
    existing: readonly Timesheet[]
): ValidationResult {
    if (!Number.isInteger(candidate.month) || candidate.month < 1 || candidate.month > 12) {
        return conflict('invalid_value', 'month', 'The month must be between 1 and 12.');
    }
    if (
        !Number.isInteger(candidate.year) ||
        candidate.year < CONSTANTS.MIN_TIMESHEET_YEAR ||
        candidate.year > CONSTANTS.MAX_TIMESHEET_YEAR
    ) {
        return conflict(
            'invalid_value',
            'year',
            `The year must be between ${CONSTANTS.MIN_TIMESHEET_YEAR} and ${CONSTANTS.MAX_TIMESHEET_YEAR}.`
        );
    }

    if (!previous) {
        if (candidate.status !== 'active') {
            return conflict('invalid_transition', 'status', 'Timesheets must be set to active when created.');
        }
        const duplicate = existing.some(
            (other) =>
                other.id !== candidate.id &&
                other.userId === candidate.userId &&
                other.year === candidate.year &&
                other.month === candidate.month
        );
        if (duplicate) {
            return conflict('duplicate', 'year', 'A timesheet for this user, year and month already exists.');
        }
        return VALID;
    }

    if (previous.status !== candidate.status) {
        const allowed = ALLOWED_TRANSITIONS[previous.status];
        if (allowed && !allowed.includes(candidate.status)) {
            return conflict(
                'invalid_transition',
                'status',
                previous.status === 'active'
                    ? 'Active timesheets can only be made pending.'
                    : 'Pending timesheets can only be closed or reactivated.'
            );
        }
    }

    return VALID;
}

// ==================== PERFORMANCES ====================

export interface PerformanceContext {
    timesheet: Timesheet | null;
    contract: Contract | null;
    /** Contract users of the timesheet's user */
    contractUsers: readonly ContractUser[];
    /** Performances on the same timesheet */
    existing: readonly Performance[];
}

export function validatePerformance(candidate: Performance, ctx: PerformanceContext): ValidationResult {
    const { timesheet, contract } = ctx;
    if (!timesheet) {
        return conflict('invalid_reference', 'timesheet', 'The selected timesheet does not exist.');
    }
    if (candidate.contractId !== null && !contract) {
        return conflict('invalid_reference', 'contract', 'The selected contract does not exist.');
    }

    if (timesheet.status !== 'active') {
        return conflict(
            'timesheet_inactive',
            'timesheet',
            'Performances can only be attached to active timesheets.'
        );
    }
    if (!IsoUtils.isDateKey(candidate.date) || !isInTimesheetMonth(candidate.date, timesheet)) {
        return conflict('timesheet_mismatch', 'date', 'This date is not part of the given timesheet.');
    }

    switch (candidate.kind) {
        case 'activity': {
            if (!(candidate.duration > 0 && candidate.duration <= CONSTANTS.MAX_DAY_HOURS)) {
                return conflict('invalid_value', 'duration', 'The duration must be between 0.01 and 24 hours.');
            }
            if (!contract) return VALID;

            const roleAllowed = ctx.contractUsers.some(
                (cu) =>
                    cu.contractId === contract.id &&
                    cu.userId === timesheet.userId &&
                    cu.contractRoleId === candidate.contractRoleId
            );
            if (!roleAllowed) {
                return conflict(
                    'invalid_reference',
                    'contract_role',
                    'The selected contract role is not valid for that user on that contract.'
                );
            }
            if (
                contract.performanceTypeIds.length > 0 &&
                !contract.performanceTypeIds.includes(candidate.performanceType.id)
            ) {
                return conflict(
                    'invalid_reference',
                    'performance_type',
                    'The selected performance type is not valid for the selected contract'
                );
            }
            if (!contract.active) {
                return conflict('invalid_reference', 'contract', 'Contract is not active');
            }
            return VALID;
        }
        case 'standby': {
            const duplicate = ctx.existing.some(
                (other) =>
                    other.kind === 'standby' &&
                    other.id !== candidate.id &&
                    other.contractId === candidate.contractId &&
                    other.timesheetId === candidate.timesheetId &&
                    other.date === candidate.date
            );
            if (duplicate) {
                return conflict(
                    'duplicate',
                    'date',
                    'The standby performance is already linked to that contract for that date.'
                );
            }
            if (contract && contract.kind !== 'support') {
                return conflict(
                    'invalid_reference',
                    'contract',
                    'Standby performances can only be created for support contracts.'
                );
            }
            return VALID;
        }
    }
}
