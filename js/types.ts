/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the engine: stored time-bound
 * records, derived day/range/availability structures and Redmine payloads.
 */

// ==================== PRIMITIVES ====================

/** Calendar date in YYYY-MM-DD format. */
export type DateKey = string;

/** ISO 8601 date-time without offset, interpreted in local time (e.g. 2024-05-02T09:00:00). */
export type DateTimeString = string;

export type WeekdayKey =
    | 'monday'
    | 'tuesday'
    | 'wednesday'
    | 'thursday'
    | 'friday'
    | 'saturday'
    | 'sunday';

/**
 * Expected hours per weekday, each in [0, 24].
 */
export type WeekdayHours = Record<WeekdayKey, number>;

/**
 * Inclusive calendar date range.
 */
export interface DateRange {
    start: DateKey;
    end: DateKey;
}

// ==================== ORGANISATION ====================

export interface Company {
    id: string;
    name: string;
    /** ISO 3166 country code, matched against holiday countries */
    country: string;
    /** Employment contracts can only be made with internal companies */
    internal: boolean;
}

/**
 * Per-user profile data the engine needs for external identity resolution.
 */
export interface UserInfo {
    userId: string;
    username: string;
    email?: string | null;
    /** Stored Redmine user ID mapping */
    redmineId?: string | null;
}

// ==================== SCHEDULES & CONTRACTS ====================

/**
 * Named template of expected hours per weekday.
 */
export interface WorkSchedule {
    id: string;
    name: string;
    hours: WeekdayHours;
}

export interface EmploymentContract {
    id: string;
    userId: string;
    company: Company;
    workSchedule: WorkSchedule;
    startedAt: DateKey;
    /** null means ongoing */
    endedAt: DateKey | null;
}

export type FeePeriod = 'daily' | 'weekly' | 'monthly' | 'yearly';

/**
 * Fields shared by every contract variant.
 */
interface ContractBase {
    id: string;
    name: string;
    customerId: string;
    companyId: string;
    startsAt: DateKey;
    endsAt: DateKey | null;
    active: boolean;
    /** Redmine project ID mapped to this contract */
    redmineId: string | null;
    /** Allowed performance types; empty means unrestricted */
    performanceTypeIds: string[];
}

export interface ProjectContract extends ContractBase {
    kind: 'project';
    fixedFee: number;
}

export interface ConsultancyContract extends ContractBase {
    kind: 'consultancy';
    /** Contracted hours */
    duration: number | null;
    dayRate: number;
}

export interface SupportContract extends ContractBase {
    kind: 'support';
    dayRate: number | null;
    fixedFee: number | null;
    fixedFeePeriod: FeePeriod | null;
}

export type Contract = ProjectContract | ConsultancyContract | SupportContract;

/**
 * Assignment of a user to a contract in a given role.
 */
export interface ContractUser {
    id: string;
    userId: string;
    contractId: string;
    contractRoleId: string;
}

/**
 * Per-contract schedule commitment for a contract user over a date interval.
 */
export interface ContractUserWorkSchedule {
    id: string;
    contractUserId: string;
    userId: string;
    contractId: string;
    startsAt: DateKey;
    endsAt: DateKey | null;
    hours: WeekdayHours;
}

// ==================== HOLIDAYS, LEAVE & WHEREABOUTS ====================

export interface Holiday {
    id: string;
    name: string;
    date: DateKey;
    country: string;
}

export type LeaveStatus = 'draft' | 'pending' | 'approved' | 'rejected';

export interface LeaveType {
    id: string;
    name: string;
    /** Leave taken against the overtime balance */
    overtime: boolean;
    sickness: boolean;
}

export interface Leave {
    id: string;
    userId: string;
    leaveType: LeaveType;
    status: LeaveStatus;
    description?: string | null;
}

export interface LeaveDate {
    id: string;
    leaveId: string;
    timesheetId: string;
    startsAt: DateTimeString;
    endsAt: DateTimeString;
}

/**
 * Leave date joined with its parent leave, as returned by store queries.
 */
export interface LeaveDateWithLeave extends LeaveDate {
    leave: Leave;
}

/**
 * Location/presence record of a user.
 */
export interface Whereabout {
    id: string;
    timesheetId: string;
    locationId: string;
    description?: string | null;
    startsAt: DateTimeString;
    endsAt: DateTimeString;
}

// ==================== TIMESHEETS & PERFORMANCES ====================

export type TimesheetStatus = 'active' | 'pending' | 'closed';

export interface Timesheet {
    id: string;
    userId: string;
    year: number;
    month: number;
    status: TimesheetStatus;
}

export interface PerformanceType {
    id: string;
    name: string;
    /** Factor in [0, 5] applied to activity durations */
    multiplier: number;
}

/**
 * Fields shared by every performance variant.
 */
interface PerformanceBase {
    id: string;
    timesheetId: string;
    date: DateKey;
    contractId: string | null;
    /** Redmine time entry ID this performance was imported from */
    redmineId: string | null;
}

export interface ActivityPerformance extends PerformanceBase {
    kind: 'activity';
    performanceType: PerformanceType;
    contractRoleId: string;
    description: string | null;
    /** Hours, in (0, 24] */
    duration: number;
}

/**
 * On-call day; counted in days, not hours.
 */
export interface StandbyPerformance extends PerformanceBase {
    kind: 'standby';
}

export type Performance = ActivityPerformance | StandbyPerformance;

/**
 * Performance joined with the user of its timesheet.
 */
export type OwnedPerformance = Performance & { userId: string };

// ==================== DERIVED STRUCTURES ====================

/**
 * Hour figures shared by day details and range totals.
 */
export interface HourTotals {
    /** Obligation from the employment contract's work schedule */
    workHours: number;
    /** Commitment from contract user work schedules */
    scheduledHours: number;
    /** Normalized activity hours (duration × multiplier) */
    performedHours: number;
    /** Approved leave hours of every leave type */
    leaveHours: number;
    /** Part of leaveHours taken on overtime-flagged leave types */
    overtimeLeaveHours: number;
    holidayHours: number;
    overtimeHours: number;
    remainingHours: number;
    standbyDays: number;
}

/**
 * Records that contributed to a day detail (detailed mode only).
 */
export interface DayRecords {
    employmentContract: EmploymentContract | null;
    workSchedules: ContractUserWorkSchedule[];
    holiday: Holiday | null;
    leaveDates: LeaveDateWithLeave[];
    performances: OwnedPerformance[];
}

export interface DayDetail extends HourTotals {
    date: DateKey;
    records?: DayRecords;
}

export interface ContractPerformanceSummary {
    contract: Contract;
    /** Summed normalized duration */
    duration: number;
    standbyDays: number;
}

export interface RangeSummary {
    performances: ContractPerformanceSummary[];
}

export interface RangeInfo extends HourTotals {
    userId: string;
    from: DateKey;
    until: DateKey;
    details?: Map<DateKey, DayDetail>;
    summary?: RangeSummary;
}

export interface RangeOptions {
    /** Retain per-day details keyed by date */
    daily?: boolean;
    /** Attach contributing records to each day detail (implies daily) */
    detailed?: boolean;
    /** Group performances by contract */
    summary?: boolean;
}

/**
 * One month of the running overtime balance.
 */
export interface OvertimeMonth {
    year: number;
    month: number;
    overtimeHours: number;
    remainingHours: number;
    usedOvertimeHours: number;
    remainingOvertimeHours: number;
}

export type AvailabilityTag =
    | 'weekend'
    | 'holiday'
    | 'leave'
    | 'sickness'
    | 'scheduled'
    | 'not_available_for_internal_work'
    | 'free_hours_available';

export interface AvailabilityInfo {
    date: DateKey;
    tags: AvailabilityTag[];
    leaveDates: LeaveDateWithLeave[];
    holiday: Holiday | null;
    workHours: number;
    scheduledHours: number;
}

export type IssueColor = 'green' | 'yellow' | 'red';

export interface IssueAvailability {
    issue: RedmineIssue;
    color: IssueColor;
}

export interface InternalAvailabilityInfo extends AvailabilityInfo {
    /** workHours - scheduledHours */
    freeHours: number;
    availableForInternal: boolean;
    issues: IssueAvailability[];
}

// ==================== VALIDATION ====================

export type ConflictKind =
    | 'overlap'
    | 'invalid_interval'
    | 'invalid_value'
    | 'invalid_reference'
    | 'duplicate'
    | 'timesheet_mismatch'
    | 'timesheet_inactive'
    | 'user_mismatch'
    | 'invalid_transition';

/**
 * Field-tagged invariant violation.
 */
export interface ValidationConflict {
    kind: ConflictKind;
    /** Field the user should correct */
    field: string;
    message: string;
}

export type ValidationResult = { ok: true } | { ok: false; conflict: ValidationConflict };

// ==================== REDMINE ====================

export interface RedmineRef {
    id: number;
    name?: string;
}

export interface RedmineCustomField {
    id: number;
    name: string;
    value?: string | string[] | null;
}

export interface RedmineIssue {
    id: number;
    subject?: string;
    project?: RedmineRef;
    status?: RedmineRef;
    parent?: { id: number };
    assigned_to?: RedmineRef;
    start_date?: DateKey | null;
    due_date?: DateKey | null;
    /** ISO 8601 timestamp */
    updated_on?: string;
    custom_fields?: RedmineCustomField[];
}

export interface RedmineTimeEntry {
    id: number;
    project: RedmineRef;
    issue?: { id: number };
    user?: RedmineRef;
    hours: number;
    comments?: string | null;
    spent_on: DateKey;
}

export interface RedmineUser {
    id: number;
    login: string;
    firstname: string;
    lastname: string;
    mail?: string;
}

export interface RedmineProject {
    id: number;
    name: string;
    identifier?: string;
}

/**
 * Redmine time entry attributed to one of the user's contracts.
 */
export interface PerformanceCandidate {
    /** Existing performance ID when the entry was imported before */
    id: string | null;
    contractId: string;
    redmineId: string;
    duration: number;
    description: string;
    date: DateKey;
}

export interface ChoiceOption {
    value: string | null;
    label: string;
}

// ==================== API & ERROR TYPES ====================

/**
 * API response wrapper
 */
export interface ApiResponse<T> {
    /** Response data */
    data: T | null;
    /** Whether the request failed */
    failed: boolean;
    /** HTTP status code (0 when no response was received) */
    status: number;
}

/**
 * Structured, user-facing error.
 */
export interface FriendlyError {
    /** Error type from ERROR_TYPES */
    type: string;
    title: string;
    message: string;
    /** Suggested action */
    action: 'retry' | 'correct' | 'none';
    originalError?: Error | string;
    /** ISO timestamp of when error occurred */
    timestamp: string;
    stack?: string;
}
