import { describe, expect, it } from '@jest/globals';
import type { ContractUser, ContractUserWorkSchedule, StandbyPerformance, ValidationResult } from '../../js/types.js';
import {
    validateContract,
    validateContractUserWorkSchedule,
    validateEmploymentContract,
    validateHoliday,
    validateLeave,
    validateLeaveDate,
    validatePerformance,
    validatePerformanceType,
    validateTimesheet,
    validateWhereabout,
    validateWorkSchedule,
} from '../../js/validation.js';
import {
    FULL_TIME,
    activity,
    company,
    employmentContract,
    labourDay,
    leave,
    leaveDate,
    projectContract,
    supportContract,
    timesheet,
} from './helpers/fixtures.js';

/**
 * Field and kind of a failed result, or 'ok'.
 */
function outcome(result: ValidationResult): string {
    return result.ok ? 'ok' : `${result.conflict.field}:${result.conflict.kind}`;
}

describe('validateWorkSchedule', () => {
    it('reports the first weekday out of range', () => {
        const result = validateWorkSchedule({ id: 'ws', name: 'Bad', hours: { ...FULL_TIME, tuesday: 25 } });
        expect(outcome(result)).toBe('tuesday:invalid_value');
    });

    it('accepts 0 to 24 hours', () => {
        expect(outcome(validateWorkSchedule({ id: 'ws', name: 'Max', hours: { ...FULL_TIME, saturday: 24 } }))).toBe('ok');
    });
});

describe('validateEmploymentContract', () => {
    it('rejects an end before the start', () => {
        const candidate = employmentContract({ startedAt: '2024-05-01', endedAt: '2024-04-30' });
        expect(outcome(validateEmploymentContract(candidate, []))).toBe('ended_at:invalid_interval');
    });

    it('rejects external companies', () => {
        const candidate = employmentContract({ company: { ...company, internal: false } });
        expect(outcome(validateEmploymentContract(candidate, []))).toBe('company:invalid_reference');
    });

    it('rejects overlapping contracts with the same company', () => {
        const existing = [employmentContract({ id: 'ec-old', startedAt: '2023-01-01', endedAt: null })];
        const result = validateEmploymentContract(employmentContract(), existing);

        expect(result).toEqual({
            ok: false,
            conflict: {
                kind: 'overlap',
                field: 'user',
                message: 'The selected user already has an active employment contract.',
            },
        });
    });

    it('allows adjacent contracts, other companies and updates of itself', () => {
        const previous = employmentContract({ id: 'ec-old', startedAt: '2023-01-01', endedAt: '2023-12-31' });
        const elsewhere = employmentContract({ id: 'ec-other', company: { ...company, id: 'company-2' } });

        expect(outcome(validateEmploymentContract(employmentContract(), [previous, elsewhere]))).toBe('ok');
        expect(outcome(validateEmploymentContract(employmentContract(), [employmentContract()]))).toBe('ok');
    });
});

describe('validateContractUserWorkSchedule', () => {
    const schedule = (overrides: Partial<ContractUserWorkSchedule>): ContractUserWorkSchedule => ({
        id: 'cuws-1',
        contractUserId: 'cu-1',
        userId: 'user-1',
        contractId: 'contract-alpha',
        startsAt: '2024-01-01',
        endsAt: '2024-06-30',
        hours: FULL_TIME,
        ...overrides,
    });

    it('rejects overlapping schedules of the same contract user', () => {
        const existing = [schedule({ id: 'cuws-0', startsAt: '2024-06-30', endsAt: null })];
        expect(outcome(validateContractUserWorkSchedule(schedule({}), existing))).toBe('starts_at:overlap');
    });

    it('ignores schedules of other contract users', () => {
        const existing = [schedule({ id: 'cuws-0', contractUserId: 'cu-2' })];
        expect(outcome(validateContractUserWorkSchedule(schedule({}), existing))).toBe('ok');
    });

    it('checks interval and hours', () => {
        expect(outcome(validateContractUserWorkSchedule(schedule({ endsAt: '2023-12-31' }), []))).toBe(
            'ends_at:invalid_interval'
        );
        expect(outcome(validateContractUserWorkSchedule(schedule({ hours: { ...FULL_TIME, monday: -1 } }), []))).toBe(
            'monday:invalid_value'
        );
    });
});

describe('validateContract', () => {
    it('requires the start before the end', () => {
        expect(outcome(validateContract(projectContract({ startsAt: '2024-05-01', endsAt: '2024-05-01' })))).toBe(
            'ends_at:invalid_interval'
        );
    });

    it('requires a fixed fee for a fixed fee period', () => {
        expect(outcome(validateContract(supportContract({ fixedFeePeriod: 'monthly' })))).toBe('fixed_fee:invalid_value');
        expect(outcome(validateContract(supportContract({ fixedFeePeriod: 'monthly', fixedFee: 300 })))).toBe('ok');
    });
});

describe('validatePerformanceType', () => {
    it('bounds the multiplier to [0, 5]', () => {
        expect(outcome(validatePerformanceType({ id: 'pt', name: 'x', multiplier: 5 }))).toBe('ok');
        expect(outcome(validatePerformanceType({ id: 'pt', name: 'x', multiplier: 5.5 }))).toBe('multiplier:invalid_value');
        expect(outcome(validatePerformanceType({ id: 'pt', name: 'x', multiplier: -1 }))).toBe('multiplier:invalid_value');
    });
});

describe('validateHoliday', () => {
    it('rejects a duplicate name, date and country', () => {
        expect(outcome(validateHoliday({ ...labourDay, id: 'holiday-2' }, [labourDay]))).toBe('name:duplicate');
    });

    it('allows the same holiday in another country', () => {
        expect(outcome(validateHoliday({ ...labourDay, id: 'holiday-2', country: 'NL' }, [labourDay]))).toBe('ok');
    });
});

describe('validateLeaveDate', () => {
    const approvedMorning = { ...leaveDate(), leave: leave() };

    it('rejects overlapping leave of the same user', () => {
        const candidate = leaveDate({ id: 'ld-2', startsAt: '2024-05-02T11:00:00', endsAt: '2024-05-02T15:00:00' });
        const result = validateLeaveDate(candidate, { leave: leave(), timesheet: timesheet(), existing: [approvedMorning] });

        expect(result).toEqual({
            ok: false,
            conflict: { kind: 'overlap', field: 'user', message: 'User already has leave planned during this time' },
        });
    });

    it('rejects leave that starts when other leave ends', () => {
        const afternoon = leaveDate({ id: 'ld-2', startsAt: '2024-05-02T13:00:00', endsAt: '2024-05-02T15:00:00' });
        expect(outcome(validateLeaveDate(afternoon, { leave: leave(), timesheet: timesheet(), existing: [approvedMorning] }))).toBe(
            'user:overlap'
        );
    });

    it('ignores rejected leave', () => {
        const overlapping = leaveDate({ id: 'ld-2', startsAt: '2024-05-02T10:00:00', endsAt: '2024-05-02T12:00:00' });
        const rejected = { ...leaveDate(), leave: leave({ status: 'rejected' }) };
        expect(outcome(validateLeaveDate(overlapping, { leave: leave(), timesheet: timesheet(), existing: [rejected] }))).toBe('ok');
    });

    it('checks the interval before anything else', () => {
        const inverted = leaveDate({ startsAt: '2024-05-02T13:00:00', endsAt: '2024-05-02T09:00:00' });
        const overnight = leaveDate({ startsAt: '2024-05-02T22:00:00', endsAt: '2024-05-03T02:00:00' });

        expect(outcome(validateLeaveDate(inverted, { leave: null, timesheet: null, existing: [] }))).toBe(
            'starts_at:invalid_interval'
        );
        expect(outcome(validateLeaveDate(overnight, { leave: leave(), timesheet: timesheet(), existing: [] }))).toBe(
            'starts_at:invalid_interval'
        );
        expect(outcome(validateLeaveDate(leaveDate({ startsAt: '' }), { leave: null, timesheet: null, existing: [] }))).toBe(
            'starts_at:invalid_value'
        );
    });

    it('checks the timesheet month, status and user', () => {
        const june = leaveDate({ startsAt: '2024-06-03T09:00:00', endsAt: '2024-06-03T13:00:00' });
        expect(outcome(validateLeaveDate(june, { leave: leave(), timesheet: timesheet(), existing: [] }))).toBe(
            'timesheet:timesheet_mismatch'
        );

        expect(
            outcome(validateLeaveDate(leaveDate(), { leave: leave(), timesheet: timesheet({ status: 'closed' }), existing: [] }))
        ).toBe('timesheet:timesheet_inactive');

        expect(
            outcome(validateLeaveDate(leaveDate(), { leave: leave({ userId: 'user-2' }), timesheet: timesheet(), existing: [] }))
        ).toBe('leave:user_mismatch');
    });
});

describe('validateLeave', () => {
    const approvedAfternoon = {
        ...leaveDate({ id: 'ld-2', leaveId: 'leave-2', startsAt: '2024-05-02T11:00:00', endsAt: '2024-05-02T15:00:00' }),
        leave: leave({ id: 'leave-2' }),
    };
    const rejectedMorning = { ...leaveDate(), leave: leave({ status: 'rejected' }) };

    it('checks the dates of a leave that leaves the rejected state', () => {
        const ctx = { leaveDates: [leaveDate()], existing: [rejectedMorning, approvedAfternoon] };

        expect(outcome(validateLeave(leave(), ctx))).toBe('user:overlap');
        expect(outcome(validateLeave(leave({ status: 'rejected' }), ctx))).toBe('ok');
    });

    it('allows a leave without clashing dates', () => {
        expect(outcome(validateLeave(leave(), { leaveDates: [leaveDate()], existing: [rejectedMorning] }))).toBe('ok');
    });
});

describe('validateWhereabout', () => {
    it('rejects overlapping whereabouts', () => {
        const office = {
            id: 'wb-1',
            timesheetId: 'ts-2024-05',
            locationId: 'office',
            startsAt: '2024-05-02T08:00:00',
            endsAt: '2024-05-02T12:00:00',
        };
        const home = { ...office, id: 'wb-2', locationId: 'home', startsAt: '2024-05-02T11:00:00', endsAt: '2024-05-02T17:00:00' };

        expect(outcome(validateWhereabout(home, { timesheet: timesheet(), existing: [office] }))).toBe('user:overlap');
        expect(outcome(validateWhereabout({ ...home, startsAt: '2024-05-02T12:00:00' }, { timesheet: timesheet(), existing: [office] }))).toBe(
            'ok'
        );
        expect(outcome(validateWhereabout(home, { timesheet: null, existing: [] }))).toBe('timesheet:invalid_reference');
    });
});

describe('validateTimesheet', () => {
    it('creates timesheets as active and unique per month', () => {
        expect(outcome(validateTimesheet(timesheet({ status: 'pending' }), null, []))).toBe('status:invalid_transition');
        expect(outcome(validateTimesheet(timesheet({ id: 'ts-dup' }), null, [timesheet()]))).toBe('year:duplicate');
        expect(outcome(validateTimesheet(timesheet(), null, []))).toBe('ok');
    });

    it('bounds month and year', () => {
        expect(outcome(validateTimesheet(timesheet({ month: 13 }), null, []))).toBe('month:invalid_value');
        expect(outcome(validateTimesheet(timesheet({ year: 1999 }), null, []))).toBe('year:invalid_value');
    });

    it('follows the status transitions', () => {
        const active = timesheet();
        const pending = timesheet({ status: 'pending' });
        const closed = timesheet({ status: 'closed' });

        expect(outcome(validateTimesheet(pending, active, [active]))).toBe('ok');
        expect(outcome(validateTimesheet(closed, active, [active]))).toBe('status:invalid_transition');
        expect(outcome(validateTimesheet(closed, pending, [pending]))).toBe('ok');
        expect(outcome(validateTimesheet(active, pending, [pending]))).toBe('ok');
        expect(outcome(validateTimesheet(active, closed, [closed]))).toBe('ok');
    });
});

describe('validatePerformance', () => {
    const developer: ContractUser = {
        id: 'cu-1',
        userId: 'user-1',
        contractId: 'contract-alpha',
        contractRoleId: 'role-dev',
    };
    const context = {
        timesheet: timesheet(),
        contract: projectContract(),
        contractUsers: [developer],
        existing: [],
    };

    it('accepts a valid activity', () => {
        expect(outcome(validatePerformance(activity({ duration: 24 }), context))).toBe('ok');
    });

    it('requires an active timesheet of the same month', () => {
        expect(outcome(validatePerformance(activity(), { ...context, timesheet: timesheet({ status: 'pending' }) }))).toBe(
            'timesheet:timesheet_inactive'
        );
        expect(outcome(validatePerformance(activity({ date: '2024-06-03' }), context))).toBe('date:timesheet_mismatch');
        expect(outcome(validatePerformance(activity(), { ...context, timesheet: null }))).toBe('timesheet:invalid_reference');
    });

    it('checks duration, role, type and contract state', () => {
        expect(outcome(validatePerformance(activity({ duration: 0 }), context))).toBe('duration:invalid_value');
        expect(outcome(validatePerformance(activity({ contractRoleId: 'role-pm' }), context))).toBe(
            'contract_role:invalid_reference'
        );
        expect(
            outcome(validatePerformance(activity(), { ...context, contract: projectContract({ performanceTypeIds: ['pt-other'] }) }))
        ).toBe('performance_type:invalid_reference');
        expect(outcome(validatePerformance(activity(), { ...context, contract: projectContract({ active: false }) }))).toBe(
            'contract:invalid_reference'
        );
    });

    it('allows one standby per contract and day on support contracts', () => {
        const standby: StandbyPerformance = {
            kind: 'standby',
            id: 'sb-1',
            timesheetId: 'ts-2024-05',
            date: '2024-05-04',
            contractId: 'contract-support',
            redmineId: null,
        };
        const supportContext = { ...context, contract: supportContract() };

        expect(outcome(validatePerformance(standby, supportContext))).toBe('ok');
        expect(outcome(validatePerformance({ ...standby, id: 'sb-2' }, { ...supportContext, existing: [standby] }))).toBe(
            'date:duplicate'
        );
        expect(outcome(validatePerformance({ ...standby, contractId: 'contract-alpha' }, context))).toBe(
            'contract:invalid_reference'
        );
    });
});
