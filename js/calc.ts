/**
 * @fileoverview Calculation Engine - Daily Resolver & Range Aggregator
 *
 * Merges the time-bound records of a user into per-day hour figures and
 * accumulates them over a date range. The resolver itself is pure: it takes
 * pre-loaded records and never touches the store. The async entry points load
 * one batch of users at a time (one store query per record type per batch)
 * and then resolve every day of every user in that batch.
 *
 * ## Day Resolution (per user, per date)
 * 1. **Employment contract**: the first contract (by `startedAt`) active on the
 *    date. `workHours` is its work schedule's hours for the weekday; no
 *    contract means no obligation (`workHours = 0`), not an error.
 * 2. **Contract schedules**: every ContractUserWorkSchedule active on the date
 *    contributes its weekday hours to `scheduledHours`. Both figures are kept:
 *    `workHours` is the global obligation, `scheduledHours` the commitment to
 *    specific contracts.
 * 3. **Holiday**: a holiday on the date in the contract company's country
 *    waives the obligation, `holidayHours = workHours`. `workHours` itself is
 *    left as is.
 * 4. **Leave**: approved leave dates starting on the date. `leaveHours` holds
 *    all of them, `overtimeLeaveHours` the part booked on overtime leave types.
 * 5. **Performances**: activity durations normalized by the performance type
 *    multiplier, each rounded to 2 decimals. Standby performances count as
 *    days (`standbyDays`), never as hours.
 * 6. **Balance**:
 *    - `obligation = max(0, workHours - holidayHours - leaveHours)`
 *    - `remainingHours = max(0, obligation - performedHours)`
 *    - `overtimeHours = max(0, performedHours - obligation)`
 *
 * ## Edge Cases
 * - Performances on a day without employment contract still count as
 *   performed hours (and therefore as overtime).
 * - Leave dates are dated by the local calendar date of `startsAt`.
 * - Hours are rounded to 2 decimals per day and again after summing a range.
 *
 * @see getRangeInfo - Main entry point for range aggregation
 */

import { CONSTANTS } from './constants.js';
import { createLogger } from './logger.js';
import type { IntervalStore } from './store.js';
import type {
    Contract,
    ContractPerformanceSummary,
    ContractUserWorkSchedule,
    DateKey,
    DateRange,
    DayDetail,
    DayRecords,
    EmploymentContract,
    Holiday,
    HourTotals,
    LeaveDateWithLeave,
    OwnedPerformance,
    RangeInfo,
    RangeOptions,
    RangeSummary,
} from './types.js';
import { IsoUtils, chunk, hoursBetween, isActiveOn, round, validateDateRange } from './utils.js';

const logger = createLogger('Calc');

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

/**
 * Records of one user that may contribute to days in the requested range.
 * Plain data, so the resolver can be exercised without a store.
 */
export interface UserRecords {
    employmentContracts: readonly EmploymentContract[];
    workSchedules: readonly ContractUserWorkSchedule[];
    /** Holidays of any country; the resolver matches the contract's country */
    holidays: readonly Holiday[];
    leaveDates: readonly LeaveDateWithLeave[];
    performances: readonly OwnedPerformance[];
}

/**
 * Dependencies of the async entry points.
 */
export interface CalcDeps {
    store: IntervalStore;
    /** Users resolved per batch */
    userBatchSize?: number;
}

// ============================================================================
// HELPERS
// ============================================================================

export function createEmptyTotals(): HourTotals {
    return {
        workHours: 0,
        scheduledHours: 0,
        performedHours: 0,
        leaveHours: 0,
        overtimeLeaveHours: 0,
        holidayHours: 0,
        overtimeHours: 0,
        remainingHours: 0,
        standbyDays: 0,
    };
}

const TOTAL_KEYS: readonly (keyof HourTotals)[] = [
    'workHours',
    'scheduledHours',
    'performedHours',
    'leaveHours',
    'overtimeLeaveHours',
    'holidayHours',
    'overtimeHours',
    'remainingHours',
    'standbyDays',
];

function addTotals(target: HourTotals, day: HourTotals): void {
    for (const key of TOTAL_KEYS) {
        target[key] += day[key];
    }
}

function roundTotals(totals: HourTotals): void {
    for (const key of TOTAL_KEYS) {
        totals[key] = round(totals[key], CONSTANTS.HOUR_DECIMALS);
    }
}

/**
 * Hours of an activity performance after applying its type multiplier.
 */
export function normalizedDuration(performance: OwnedPerformance): number {
    if (performance.kind !== 'activity') return 0;
    return round(performance.duration * performance.performanceType.multiplier, CONSTANTS.HOUR_DECIMALS);
}

/**
 * The employment contract that governs a day: the earliest-started active one.
 */
export function selectEmploymentContract(
    contracts: readonly EmploymentContract[],
    date: DateKey
): EmploymentContract | null {
    let selected: EmploymentContract | null = null;
    for (const contract of contracts) {
        if (!isActiveOn(contract.startedAt, contract.endedAt, date)) continue;
        if (
            !selected ||
            contract.startedAt < selected.startedAt ||
            (contract.startedAt === selected.startedAt && contract.id < selected.id)
        ) {
            selected = contract;
        }
    }
    return selected;
}

/**
 * Builds the per-user record sets from batch query results.
 */
function groupByUser(
    userIds: readonly string[],
    loaded: {
        employmentContracts: EmploymentContract[];
        workSchedules: ContractUserWorkSchedule[];
        holidays: Holiday[];
        leaveDates: LeaveDateWithLeave[];
        performances: OwnedPerformance[];
    }
): Map<string, UserRecords> {
    const byUser = new Map<string, UserRecords>();
    for (const userId of userIds) {
        byUser.set(userId, {
            employmentContracts: loaded.employmentContracts.filter((ec) => ec.userId === userId),
            workSchedules: loaded.workSchedules.filter((ws) => ws.userId === userId),
            holidays: loaded.holidays,
            leaveDates: loaded.leaveDates.filter((ld) => ld.leave.userId === userId),
            performances: loaded.performances.filter((p) => p.userId === userId),
        });
    }
    return byUser;
}

/**
 * Loads everything needed to resolve `range` for a batch of users.
 * One query per record type; holidays follow once the contract countries are known.
 */
export async function loadUserRecords(
    store: IntervalStore,
    userIds: readonly string[],
    range: DateRange
): Promise<Map<string, UserRecords>> {
    const [employmentContracts, workSchedules, leaveDates, performances] = await Promise.all([
        store.findEmploymentContracts(userIds, range),
        store.findContractUserWorkSchedules(userIds, range),
        store.findApprovedLeaveDates(userIds, range),
        store.findPerformances(userIds, range),
    ]);

    const countries = [...new Set(employmentContracts.map((ec) => ec.company.country))];
    const holidays = countries.length > 0 ? await store.findHolidays(countries, range) : [];

    return groupByUser(userIds, { employmentContracts, workSchedules, holidays, leaveDates, performances });
}

// ============================================================================
// DAILY RESOLVER
// ============================================================================

/**
 * Resolves one day of one user from pre-loaded records.
 *
 * Deterministic and side-effect free: the same records always yield the same
 * detail.
 *
 * @param detailed - Attach the contributing records to the result.
 */
export function resolveDayDetail(date: DateKey, records: UserRecords, detailed = false): DayDetail {
    const weekday = IsoUtils.getWeekdayKey(date);

    const employmentContract = selectEmploymentContract(records.employmentContracts, date);
    const workHours = employmentContract ? employmentContract.workSchedule.hours[weekday] : 0;

    const workSchedules = records.workSchedules.filter((ws) => isActiveOn(ws.startsAt, ws.endsAt, date));
    const scheduledHours = workSchedules.reduce((sum, ws) => sum + ws.hours[weekday], 0);

    const holiday = employmentContract
        ? records.holidays.find((h) => h.date === date && h.country === employmentContract.company.country) ?? null
        : null;
    const holidayHours = holiday ? workHours : 0;

    const leaveDates = records.leaveDates.filter(
        (ld) => ld.leave.status === 'approved' && IsoUtils.extractDateKey(ld.startsAt) === date
    );
    let leaveHours = 0;
    let overtimeLeaveHours = 0;
    for (const leaveDate of leaveDates) {
        const hours = hoursBetween(leaveDate.startsAt, leaveDate.endsAt);
        leaveHours += hours;
        if (leaveDate.leave.leaveType.overtime) {
            overtimeLeaveHours += hours;
        }
    }

    const performances = records.performances.filter((p) => p.date === date);
    let performedHours = 0;
    let standbyDays = 0;
    for (const performance of performances) {
        switch (performance.kind) {
            case 'activity':
                performedHours += normalizedDuration(performance);
                break;
            case 'standby':
                standbyDays += 1;
                break;
        }
    }

    const obligation = Math.max(0, workHours - holidayHours - leaveHours);

    const detail: DayDetail = {
        date,
        workHours: round(workHours),
        scheduledHours: round(scheduledHours),
        performedHours: round(performedHours),
        leaveHours: round(leaveHours),
        overtimeLeaveHours: round(overtimeLeaveHours),
        holidayHours: round(holidayHours),
        overtimeHours: round(Math.max(0, performedHours - obligation)),
        remainingHours: round(Math.max(0, obligation - performedHours)),
        standbyDays,
    };

    if (detailed) {
        const dayRecords: DayRecords = {
            employmentContract,
            workSchedules,
            holiday,
            leaveDates,
            performances,
        };
        detail.records = dayRecords;
    }

    return detail;
}

/**
 * Aggregates the days of `range` for one user from pre-loaded records.
 */
export function aggregateRange(
    userId: string,
    range: DateRange,
    records: UserRecords,
    options: RangeOptions = {}
): RangeInfo {
    const detailed = options.detailed === true;
    const daily = detailed || options.daily === true;

    const info: RangeInfo = {
        userId,
        from: range.start,
        until: range.end,
        ...createEmptyTotals(),
    };
    const details = new Map<DateKey, DayDetail>();

    for (const date of IsoUtils.generateDateRange(range.start, range.end)) {
        const day = resolveDayDetail(date, records, detailed);
        addTotals(info, day);
        if (daily) {
            details.set(date, day);
        }
    }

    roundTotals(info);
    if (daily) {
        info.details = details;
    }
    return info;
}

// ============================================================================
// SUMMARY
// ============================================================================

/**
 * Groups performances by contract: normalized duration and standby day count.
 * Performances without contract are left out.
 */
export function summarizePerformances(
    performances: readonly OwnedPerformance[],
    contracts: ReadonlyMap<string, Contract>
): RangeSummary {
    const byContract = new Map<string, ContractPerformanceSummary>();

    for (const performance of performances) {
        if (performance.contractId === null) continue;
        const contract = contracts.get(performance.contractId);
        if (!contract) {
            logger.warn(`Performance ${performance.id} references unknown contract ${performance.contractId}`);
            continue;
        }

        let entry = byContract.get(contract.id);
        if (!entry) {
            entry = { contract, duration: 0, standbyDays: 0 };
            byContract.set(contract.id, entry);
        }
        if (performance.kind === 'standby') {
            entry.standbyDays += 1;
        } else {
            entry.duration += normalizedDuration(performance);
        }
    }

    const summaries = [...byContract.values()].map((entry) => ({
        ...entry,
        duration: round(entry.duration, CONSTANTS.HOUR_DECIMALS),
    }));
    summaries.sort((a, b) => a.contract.name.localeCompare(b.contract.name) || a.contract.id.localeCompare(b.contract.id));
    return { performances: summaries };
}

// ============================================================================
// ASYNC ENTRY POINTS
// ============================================================================

/**
 * Range info for every user over `[from, until]` (inclusive).
 *
 * Users are processed in batches of `userBatchSize`; each batch issues one
 * store query per record type. Store failures propagate unchanged.
 *
 * @throws ValidationConflictError when the range is malformed.
 */
export async function getRangeInfo(
    deps: CalcDeps,
    userIds: readonly string[],
    from: DateKey,
    until: DateKey,
    options: RangeOptions = {}
): Promise<Map<string, RangeInfo>> {
    const range = validateDateRange(from, until);
    const batchSize = deps.userBatchSize ?? CONSTANTS.DEFAULT_USER_BATCH_SIZE;
    const uniqueUserIds = [...new Set(userIds)];
    const result = new Map<string, RangeInfo>();

    logger.debug(`Resolving ${uniqueUserIds.length} user(s) from ${from} until ${until}`);

    for (const batch of chunk(uniqueUserIds, batchSize)) {
        const recordsByUser = await loadUserRecords(deps.store, batch, range);

        let contracts = new Map<string, Contract>();
        if (options.summary) {
            const contractIds = new Set<string>();
            for (const records of recordsByUser.values()) {
                for (const performance of records.performances) {
                    if (performance.contractId !== null) contractIds.add(performance.contractId);
                }
            }
            const found = await deps.store.findContracts([...contractIds]);
            contracts = new Map(found.map((contract) => [contract.id, contract]));
        }

        for (const userId of batch) {
            const records = recordsByUser.get(userId);
            if (!records) continue;

            const info = aggregateRange(userId, range, records, options);
            if (options.summary) {
                info.summary = summarizePerformances(records.performances, contracts);
            }
            if (records.employmentContracts.length === 0) {
                logger.debug(`No employment contract for user ${userId} between ${from} and ${until}`);
            }
            result.set(userId, info);
        }
    }

    return result;
}

/**
 * Day detail of one user.
 *
 * @throws ValidationConflictError when the date is malformed.
 */
export async function resolveDay(
    deps: CalcDeps,
    userId: string,
    date: DateKey,
    options: { detailed?: boolean } = {}
): Promise<DayDetail> {
    const range = validateDateRange(date, date);
    const recordsByUser = await loadUserRecords(deps.store, [userId], range);
    const records = recordsByUser.get(userId);
    if (!records) {
        return { date, ...createEmptyTotals() };
    }
    return resolveDayDetail(date, records, options.detailed === true);
}

// ============================================================================
// SERIALIZATION
// ============================================================================

export type SerializedRangeInfo = Omit<RangeInfo, 'details'> & {
    details?: Record<DateKey, DayDetail>;
};

/**
 * Converts range info into plain JSON (details map → object keyed by date).
 */
export function serializeRangeInfo(info: RangeInfo): SerializedRangeInfo {
    const { details, ...rest } = info;
    if (!details) return rest;
    return { ...rest, details: Object.fromEntries(details) };
}
