/**
 * @fileoverview Overtime Banker
 * Running monthly overtime balance of a user. The balance is a pure fold over
 * full calendar months, seeded at 0 in the month containing `from`:
 *
 *   balance += overtimeHours - remainingHours - usedOvertimeHours
 *
 * where `usedOvertimeHours` are approved leave hours booked on overtime leave
 * types. Nothing is persisted; every call re-walks from `from`, so callers
 * should pass a stable epoch such as the start of employment.
 */

import { CONSTANTS } from './constants.js';
import { aggregateRange, loadUserRecords, type CalcDeps } from './calc.js';
import { createLogger } from './logger.js';
import type { DateKey, OvertimeMonth } from './types.js';
import { IsoUtils, formatDuration, round, validateDateRange } from './utils.js';

const logger = createLogger('Overtime');

/**
 * Monthly overtime records for `[from, until]`, oldest first.
 * Months are always whole: a `from` of 2024-03-15 starts with all of March.
 *
 * @throws ValidationConflictError when the range is malformed.
 */
export async function getOvertimeSeries(
    deps: CalcDeps,
    userId: string,
    from: DateKey,
    until: DateKey
): Promise<OvertimeMonth[]> {
    validateDateRange(from, until);

    const first = IsoUtils.yearMonth(from);
    const last = IsoUtils.yearMonth(until);
    const span = {
        start: IsoUtils.monthRange(first.year, first.month).start,
        end: IsoUtils.monthRange(last.year, last.month).end,
    };

    // One load for the whole walk; each month is then folded from memory
    const records = (await loadUserRecords(deps.store, [userId], span)).get(userId);
    if (!records) return [];

    const series: OvertimeMonth[] = [];
    let balance = 0;
    let { year, month } = first;

    while (year < last.year || (year === last.year && month <= last.month)) {
        const info = aggregateRange(userId, IsoUtils.monthRange(year, month), records);
        const usedOvertimeHours = round(info.overtimeLeaveHours, CONSTANTS.HOUR_DECIMALS);

        balance = round(
            balance + info.overtimeHours - info.remainingHours - usedOvertimeHours,
            CONSTANTS.HOUR_DECIMALS
        );

        series.push({
            year,
            month,
            overtimeHours: info.overtimeHours,
            remainingHours: info.remainingHours,
            usedOvertimeHours,
            remainingOvertimeHours: balance,
        });

        month += 1;
        if (month > 12) {
            month = 1;
            year += 1;
        }
    }

    logger.debug(`Overtime balance of user ${userId} after ${series.length} month(s): ${formatDuration(balance)}`);
    return series;
}
