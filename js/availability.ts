/**
 * @fileoverview Availability Tagger
 * Classifies each day of a user with semantic tags for resourcing reports,
 * and computes internal availability (free hours next to contract
 * commitments) enriched with the user's open Redmine issues.
 */

import type { RedmineConnector, RequestOptions } from './api.js';
import { loadUserRecords, resolveDayDetail, type CalcDeps } from './calc.js';
import { CONSTANTS, REDMINE_DEFAULTS } from './constants.js';
import { createLogger } from './logger.js';
import { getUserRedmineId } from './redmine.js';
import type {
    AvailabilityInfo,
    AvailabilityTag,
    DateKey,
    InternalAvailabilityInfo,
    IssueAvailability,
    IssueColor,
    RedmineIssue,
} from './types.js';
import { IsoUtils, chunk, round, validateDateRange } from './utils.js';

const logger = createLogger('Availability');

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

// ==================== ISSUE COLOURS ====================

export interface IssueColorContext {
    /** Day being assessed */
    date: DateKey;
    /** Local calendar date of `now` */
    today: DateKey;
    now: Date;
    inProgressStatusIds: readonly number[];
}

/**
 * Freshness heuristic for an issue on a given day.
 */
export type IssueColorPolicy = (issue: RedmineIssue, ctx: IssueColorContext) => IssueColor;

function updatedSince(issue: RedmineIssue, threshold: Date): boolean {
    if (!issue.updated_on) return false;
    const updated = new Date(issue.updated_on).getTime();
    return !isNaN(updated) && updated >= threshold.getTime();
}

/**
 * Today: started and touched within the last day → green when in an
 * in-progress status, yellow otherwise; anything else is red.
 * Other days: due on or after the day and touched since the day before → green, else red.
 */
export const defaultIssueColorPolicy: IssueColorPolicy = (issue, ctx) => {
    if (ctx.date === ctx.today) {
        const started = Boolean(issue.start_date && issue.start_date <= ctx.date);
        if (started && updatedSince(issue, new Date(ctx.now.getTime() - ONE_DAY_MS))) {
            const statusId = issue.status?.id;
            return statusId !== undefined && ctx.inProgressStatusIds.includes(statusId) ? 'green' : 'yellow';
        }
        return 'red';
    }

    const dueLater = Boolean(issue.due_date && issue.due_date >= ctx.date);
    // Local midnight of the previous day
    const dayBefore = new Date(`${IsoUtils.addDays(ctx.date, -1)}T00:00:00`);
    return dueLater && updatedSince(issue, dayBefore) ? 'green' : 'red';
};

// ==================== AVAILABILITY ====================

/**
 * Tags of one resolved day.
 */
export function tagDay(info: Omit<AvailabilityInfo, 'tags'>): AvailabilityTag[] {
    const tags: AvailabilityTag[] = [];

    if (IsoUtils.isWeekend(info.date)) tags.push('weekend');
    if (info.holiday) tags.push('holiday');
    if (info.leaveDates.length > 0) tags.push('leave');
    if (info.leaveDates.some((ld) => ld.leave.leaveType.sickness)) tags.push('sickness');
    if (info.scheduledHours > 0) tags.push('scheduled');
    tags.push(info.scheduledHours >= info.workHours ? 'not_available_for_internal_work' : 'free_hours_available');

    return tags;
}

/**
 * Availability of every user for every day in `[from, until]`.
 *
 * @throws ValidationConflictError when the range is malformed.
 */
export async function getAvailabilityInfo(
    deps: CalcDeps,
    userIds: readonly string[],
    from: DateKey,
    until: DateKey
): Promise<Map<string, Map<DateKey, AvailabilityInfo>>> {
    const range = validateDateRange(from, until);
    const dates = IsoUtils.generateDateRange(range.start, range.end);
    const result = new Map<string, Map<DateKey, AvailabilityInfo>>();

    for (const batch of chunk([...new Set(userIds)], deps.userBatchSize ?? CONSTANTS.DEFAULT_USER_BATCH_SIZE)) {
        const recordsByUser = await loadUserRecords(deps.store, batch, range);

        for (const userId of batch) {
            const records = recordsByUser.get(userId);
            if (!records) continue;

            const days = new Map<DateKey, AvailabilityInfo>();
            for (const date of dates) {
                const detail = resolveDayDetail(date, records, true);
                const base = {
                    date,
                    leaveDates: detail.records?.leaveDates ?? [],
                    holiday: detail.records?.holiday ?? null,
                    workHours: detail.workHours,
                    scheduledHours: detail.scheduledHours,
                };
                days.set(date, { ...base, tags: tagDay(base) });
            }
            result.set(userId, days);
        }
    }

    return result;
}

export interface InternalAvailabilityDeps extends CalcDeps {
    connector?: RedmineConnector;
    issueColorPolicy?: IssueColorPolicy;
    inProgressStatusIds?: readonly number[];
    now?: () => Date;
}

/**
 * Internal availability of every user on one day. Users with at least one
 * free hour on today or a later day get their open Redmine issues, coloured
 * by the issue colour policy.
 */
export async function getInternalAvailabilityInfo(
    deps: InternalAvailabilityDeps,
    userIds: readonly string[],
    date: DateKey,
    options: RequestOptions = {}
): Promise<Map<string, InternalAvailabilityInfo>> {
    const availability = await getAvailabilityInfo(deps, userIds, date, date);
    const now = (deps.now ?? (() => new Date()))();
    const today = IsoUtils.toLocalISODate(now);
    const policy = deps.issueColorPolicy ?? defaultIssueColorPolicy;
    const connector = deps.connector;
    const colorContext: IssueColorContext = {
        date,
        today,
        now,
        inProgressStatusIds: deps.inProgressStatusIds ?? REDMINE_DEFAULTS.IN_PROGRESS_STATUS_IDS,
    };

    const result = new Map<string, InternalAvailabilityInfo>();
    for (const [userId, days] of availability) {
        const day = days.get(date);
        if (!day) continue;

        const freeHours = round(day.workHours - day.scheduledHours);
        const availableForInternal = freeHours >= CONSTANTS.MIN_INTERNAL_FREE_HOURS;

        let issues: IssueAvailability[] = [];
        if (availableForInternal && date >= today && connector?.configured) {
            const redmineUserId = await getUserRedmineId({ store: deps.store, connector }, userId, options);
            if (redmineUserId) {
                const open = await connector.listUserIssues(redmineUserId, options);
                issues = open.map((issue) => ({ issue, color: policy(issue, colorContext) }));
            } else {
                logger.debug(`No Redmine user ID found for user ${userId}`);
            }
        }

        result.set(userId, { ...day, freeHours, availableForInternal, issues });
    }

    return result;
}

// ==================== SERIALIZATION ====================

/**
 * Converts nested availability maps into plain JSON objects.
 */
export function serializeAvailability(
    availability: ReadonlyMap<string, ReadonlyMap<DateKey, AvailabilityInfo>>
): Record<string, Record<DateKey, AvailabilityInfo>> {
    const serialized: Record<string, Record<DateKey, AvailabilityInfo>> = {};
    for (const [userId, days] of availability) {
        serialized[userId] = Object.fromEntries(days);
    }
    return serialized;
}
