/**
 * Record builders and a seeded store for unit tests
 */

import { MemoryIntervalStore } from '../../../js/store.js';
import type {
    ActivityPerformance,
    Company,
    EmploymentContract,
    Holiday,
    Leave,
    LeaveDate,
    LeaveType,
    PerformanceType,
    ProjectContract,
    SupportContract,
    Timesheet,
    WeekdayHours,
    WorkSchedule,
} from '../../../js/types.js';

export const FULL_TIME: WeekdayHours = {
    monday: 8,
    tuesday: 8,
    wednesday: 8,
    thursday: 8,
    friday: 8,
    saturday: 0,
    sunday: 0,
};

export const NO_HOURS: WeekdayHours = {
    monday: 0,
    tuesday: 0,
    wednesday: 0,
    thursday: 0,
    friday: 0,
    saturday: 0,
    sunday: 0,
};

export const company: Company = { id: 'company-1', name: 'Acme', country: 'BE', internal: true };

export const fullTimeSchedule: WorkSchedule = { id: 'ws-full', name: 'Full time', hours: FULL_TIME };

export function employmentContract(overrides: Partial<EmploymentContract> = {}): EmploymentContract {
    return {
        id: 'ec-1',
        userId: 'user-1',
        company,
        workSchedule: fullTimeSchedule,
        startedAt: '2024-01-01',
        endedAt: null,
        ...overrides,
    };
}

export function projectContract(overrides: Partial<ProjectContract> = {}): ProjectContract {
    return {
        kind: 'project',
        id: 'contract-alpha',
        name: 'Alpha',
        customerId: 'customer-1',
        companyId: company.id,
        startsAt: '2024-01-01',
        endsAt: null,
        active: true,
        redmineId: null,
        performanceTypeIds: [],
        fixedFee: 1000,
        ...overrides,
    };
}

export function supportContract(overrides: Partial<SupportContract> = {}): SupportContract {
    return {
        kind: 'support',
        id: 'contract-support',
        name: 'Support',
        customerId: 'customer-1',
        companyId: company.id,
        startsAt: '2024-01-01',
        endsAt: null,
        active: true,
        redmineId: null,
        performanceTypeIds: [],
        dayRate: 500,
        fixedFee: null,
        fixedFeePeriod: null,
        ...overrides,
    };
}

export const labourDay: Holiday = { id: 'holiday-1', name: 'Labour Day', date: '2024-05-01', country: 'BE' };

export const normalType: PerformanceType = { id: 'pt-normal', name: 'Normal', multiplier: 1 };

export const annualLeave: LeaveType = { id: 'lt-annual', name: 'Annual', overtime: false, sickness: false };
export const overtimeLeave: LeaveType = { id: 'lt-overtime', name: 'Overtime', overtime: true, sickness: false };
export const sickLeave: LeaveType = { id: 'lt-sick', name: 'Sick', overtime: false, sickness: true };

export function timesheet(overrides: Partial<Timesheet> = {}): Timesheet {
    return { id: 'ts-2024-05', userId: 'user-1', year: 2024, month: 5, status: 'active', ...overrides };
}

export function leave(overrides: Partial<Leave> = {}): Leave {
    return { id: 'leave-1', userId: 'user-1', leaveType: annualLeave, status: 'approved', ...overrides };
}

export function leaveDate(overrides: Partial<LeaveDate> = {}): LeaveDate {
    return {
        id: 'ld-1',
        leaveId: 'leave-1',
        timesheetId: 'ts-2024-05',
        startsAt: '2024-05-02T09:00:00',
        endsAt: '2024-05-02T13:00:00',
        ...overrides,
    };
}

export function activity(overrides: Partial<ActivityPerformance> = {}): ActivityPerformance {
    return {
        kind: 'activity',
        id: 'perf-1',
        timesheetId: 'ts-2024-05',
        date: '2024-05-01',
        contractId: 'contract-alpha',
        redmineId: null,
        performanceType: normalType,
        contractRoleId: 'role-dev',
        description: null,
        duration: 4,
        ...overrides,
    };
}

/**
 * Store with one full-time user (user-1) employed by a Belgian company since
 * 2024-01-01, Labour Day 2024, the Alpha project contract with user-1 as
 * developer, and an active May 2024 timesheet.
 */
export async function seedStore(store = new MemoryIntervalStore()): Promise<MemoryIntervalStore> {
    await store.save({ type: 'employmentContract', value: employmentContract() });
    await store.save({ type: 'holiday', value: labourDay });
    await store.save({ type: 'contract', value: projectContract() });
    await store.save({
        type: 'contractUser',
        value: { id: 'cu-1', userId: 'user-1', contractId: 'contract-alpha', contractRoleId: 'role-dev' },
    });
    await store.save({ type: 'performanceType', value: normalType });
    await store.save({ type: 'timesheet', value: timesheet() });
    return store;
}
