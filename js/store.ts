/**
 * @fileoverview Interval Store
 * Persistence boundary of the engine. `IntervalStore` is what the engine
 * reads from (batched by user IDs) and writes through; `MemoryIntervalStore`
 * is the in-process implementation used by tests and database-less embedders.
 *
 * Every write runs the overlap invariant validator first and throws
 * ValidationConflictError without committing when it fails.
 */

import { createLogger } from './logger.js';
import type {
    Contract,
    ContractUser,
    ContractUserWorkSchedule,
    DateRange,
    EmploymentContract,
    Holiday,
    Leave,
    LeaveDate,
    LeaveDateWithLeave,
    OwnedPerformance,
    Performance,
    PerformanceType,
    Timesheet,
    UserInfo,
    ValidationResult,
    Whereabout,
    WorkSchedule,
} from './types.js';
import { IsoUtils, assertValid, dateIntervalsOverlap } from './utils.js';
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
} from './validation.js';

const logger = createLogger('Store');

// ==================== INTERFACE ====================

/**
 * Any record the store persists, tagged by type.
 */
export type StoreRecord =
    | { type: 'workSchedule'; value: WorkSchedule }
    | { type: 'employmentContract'; value: EmploymentContract }
    | { type: 'contract'; value: Contract }
    | { type: 'contractUser'; value: ContractUser }
    | { type: 'contractUserWorkSchedule'; value: ContractUserWorkSchedule }
    | { type: 'holiday'; value: Holiday }
    | { type: 'leave'; value: Leave }
    | { type: 'leaveDate'; value: LeaveDate }
    | { type: 'whereabout'; value: Whereabout }
    | { type: 'timesheet'; value: Timesheet }
    | { type: 'performanceType'; value: PerformanceType }
    | { type: 'performance'; value: Performance }
    | { type: 'userInfo'; value: UserInfo };

export type StoreRecordType = StoreRecord['type'];

/**
 * Read/write access to time-bound records.
 * Range queries return records whose interval intersects the (inclusive) range.
 */
export interface IntervalStore {
    findEmploymentContracts(userIds: readonly string[], range: DateRange): Promise<EmploymentContract[]>;
    findContractUserWorkSchedules(
        userIds: readonly string[],
        range: DateRange
    ): Promise<ContractUserWorkSchedule[]>;
    findHolidays(countries: readonly string[], range: DateRange): Promise<Holiday[]>;
    /** Leave dates of approved leaves, dated by the local date of `startsAt` */
    findApprovedLeaveDates(userIds: readonly string[], range: DateRange): Promise<LeaveDateWithLeave[]>;
    findPerformances(userIds: readonly string[], range: DateRange): Promise<OwnedPerformance[]>;
    findPerformancesByRedmineIds(redmineIds: readonly string[]): Promise<OwnedPerformance[]>;
    findTimesheet(userId: string, year: number, month: number): Promise<Timesheet | null>;
    findContractUsers(userIds: readonly string[]): Promise<ContractUser[]>;
    findContracts(contractIds: readonly string[]): Promise<Contract[]>;
    findUserInfo(userId: string): Promise<UserInfo | null>;
    /**
     * Validates and commits a record (insert or update by id).
     * @throws ValidationConflictError
     */
    save(record: StoreRecord): Promise<void>;
    /** Stores that support write hooks notify listeners after each commit */
    addWriteListener?(listener: WriteListener): void;
}

/**
 * Write hook, e.g. TtlCache#onWrite.
 */
export interface WriteListener {
    onWrite(type: StoreRecordType): void;
}

// ==================== MEMORY STORE ====================

export class MemoryIntervalStore implements IntervalStore {
    private readonly workSchedules = new Map<string, WorkSchedule>();
    private readonly employmentContracts = new Map<string, EmploymentContract>();
    private readonly contracts = new Map<string, Contract>();
    private readonly contractUsers = new Map<string, ContractUser>();
    private readonly contractUserWorkSchedules = new Map<string, ContractUserWorkSchedule>();
    private readonly holidays = new Map<string, Holiday>();
    private readonly leaves = new Map<string, Leave>();
    private readonly leaveDates = new Map<string, LeaveDate>();
    private readonly whereabouts = new Map<string, Whereabout>();
    private readonly timesheets = new Map<string, Timesheet>();
    private readonly performanceTypes = new Map<string, PerformanceType>();
    private readonly performances = new Map<string, Performance>();
    private readonly userInfos = new Map<string, UserInfo>();
    private readonly listeners: WriteListener[] = [];

    constructor(listeners: readonly WriteListener[] = []) {
        this.listeners.push(...listeners);
    }

    addWriteListener(listener: WriteListener): void {
        this.listeners.push(listener);
    }

    // ---------- reads ----------

    async findEmploymentContracts(userIds: readonly string[], range: DateRange): Promise<EmploymentContract[]> {
        const users = new Set(userIds);
        return structuredClone(
            [...this.employmentContracts.values()].filter(
                (ec) => users.has(ec.userId) && dateIntervalsOverlap(ec.startedAt, ec.endedAt, range.start, range.end)
            )
        );
    }

    async findContractUserWorkSchedules(
        userIds: readonly string[],
        range: DateRange
    ): Promise<ContractUserWorkSchedule[]> {
        const users = new Set(userIds);
        return structuredClone(
            [...this.contractUserWorkSchedules.values()].filter(
                (cuws) =>
                    users.has(cuws.userId) && dateIntervalsOverlap(cuws.startsAt, cuws.endsAt, range.start, range.end)
            )
        );
    }

    async findHolidays(countries: readonly string[], range: DateRange): Promise<Holiday[]> {
        const wanted = new Set(countries);
        return structuredClone(
            [...this.holidays.values()].filter(
                (h) => wanted.has(h.country) && h.date >= range.start && h.date <= range.end
            )
        );
    }

    async findApprovedLeaveDates(userIds: readonly string[], range: DateRange): Promise<LeaveDateWithLeave[]> {
        return structuredClone(
            this.leaveDatesOf(userIds).filter((ld) => {
                const date = IsoUtils.extractDateKey(ld.startsAt);
                return ld.leave.status === 'approved' && date !== null && date >= range.start && date <= range.end;
            })
        );
    }

    async findPerformances(userIds: readonly string[], range: DateRange): Promise<OwnedPerformance[]> {
        const users = new Set(userIds);
        return structuredClone(
            this.ownedPerformances().filter((p) => users.has(p.userId) && p.date >= range.start && p.date <= range.end)
        );
    }

    async findPerformancesByRedmineIds(redmineIds: readonly string[]): Promise<OwnedPerformance[]> {
        const ids = new Set(redmineIds);
        return structuredClone(this.ownedPerformances().filter((p) => p.redmineId !== null && ids.has(p.redmineId)));
    }

    async findTimesheet(userId: string, year: number, month: number): Promise<Timesheet | null> {
        for (const timesheet of this.timesheets.values()) {
            if (timesheet.userId === userId && timesheet.year === year && timesheet.month === month) {
                return structuredClone(timesheet);
            }
        }
        return null;
    }

    async findContractUsers(userIds: readonly string[]): Promise<ContractUser[]> {
        const users = new Set(userIds);
        return structuredClone([...this.contractUsers.values()].filter((cu) => users.has(cu.userId)));
    }

    async findContracts(contractIds: readonly string[]): Promise<Contract[]> {
        return contractIds.flatMap((id) => {
            const contract = this.contracts.get(id);
            return contract ? [structuredClone(contract)] : [];
        });
    }

    async findUserInfo(userId: string): Promise<UserInfo | null> {
        const info = this.userInfos.get(userId);
        return info ? structuredClone(info) : null;
    }

    // ---------- writes ----------

    async save(record: StoreRecord): Promise<void> {
        assertValid(this.validate(record));
        this.commit(record);
        logger.debug(`Saved ${record.type} ${this.recordKey(record)}`);

        for (const listener of this.listeners) {
            listener.onWrite(record.type);
        }
    }

    private validate(record: StoreRecord): ValidationResult {
        switch (record.type) {
            case 'workSchedule':
                return validateWorkSchedule(record.value);
            case 'employmentContract': {
                const candidate = record.value;
                const existing = [...this.employmentContracts.values()].filter((ec) => ec.userId === candidate.userId);
                const schedule = validateWorkSchedule(candidate.workSchedule);
                return schedule.ok ? validateEmploymentContract(candidate, existing) : schedule;
            }
            case 'contract':
                return validateContract(record.value);
            case 'contractUser':
            case 'userInfo':
                return { ok: true };
            case 'leave': {
                const candidate = record.value;
                return validateLeave(candidate, {
                    leaveDates: [...this.leaveDates.values()].filter((ld) => ld.leaveId === candidate.id),
                    existing: this.leaveDatesOf([candidate.userId]),
                });
            }
            case 'contractUserWorkSchedule': {
                const candidate = record.value;
                const existing = [...this.contractUserWorkSchedules.values()].filter(
                    (cuws) => cuws.userId === candidate.userId
                );
                return validateContractUserWorkSchedule(candidate, existing);
            }
            case 'holiday':
                return validateHoliday(record.value, [...this.holidays.values()]);
            case 'leaveDate': {
                const candidate = record.value;
                const leave = this.leaves.get(candidate.leaveId) ?? null;
                return validateLeaveDate(candidate, {
                    leave,
                    timesheet: this.timesheets.get(candidate.timesheetId) ?? null,
                    existing: leave ? this.leaveDatesOf([leave.userId]) : [],
                });
            }
            case 'whereabout': {
                const candidate = record.value;
                const timesheet = this.timesheets.get(candidate.timesheetId) ?? null;
                return validateWhereabout(candidate, {
                    timesheet,
                    existing: timesheet ? this.whereaboutsOf(timesheet.userId) : [],
                });
            }
            case 'timesheet': {
                const candidate = record.value;
                return validateTimesheet(
                    candidate,
                    this.timesheets.get(candidate.id) ?? null,
                    [...this.timesheets.values()].filter((t) => t.userId === candidate.userId)
                );
            }
            case 'performanceType':
                return validatePerformanceType(record.value);
            case 'performance': {
                const candidate = record.value;
                const timesheet = this.timesheets.get(candidate.timesheetId) ?? null;
                return validatePerformance(candidate, {
                    timesheet,
                    contract: candidate.contractId !== null ? this.contracts.get(candidate.contractId) ?? null : null,
                    contractUsers: timesheet
                        ? [...this.contractUsers.values()].filter((cu) => cu.userId === timesheet.userId)
                        : [],
                    existing: [...this.performances.values()].filter((p) => p.timesheetId === candidate.timesheetId),
                });
            }
        }
    }

    /** Stores a copy; records change only through save(). */
    private commit(record: StoreRecord): void {
        switch (record.type) {
            case 'workSchedule':
                this.workSchedules.set(record.value.id, structuredClone(record.value));
                break;
            case 'employmentContract':
                this.employmentContracts.set(record.value.id, structuredClone(record.value));
                break;
            case 'contract':
                this.contracts.set(record.value.id, structuredClone(record.value));
                break;
            case 'contractUser':
                this.contractUsers.set(record.value.id, structuredClone(record.value));
                break;
            case 'contractUserWorkSchedule':
                this.contractUserWorkSchedules.set(record.value.id, structuredClone(record.value));
                break;
            case 'holiday':
                this.holidays.set(record.value.id, structuredClone(record.value));
                break;
            case 'leave':
                this.leaves.set(record.value.id, structuredClone(record.value));
                break;
            case 'leaveDate':
                this.leaveDates.set(record.value.id, structuredClone(record.value));
                break;
            case 'whereabout':
                this.whereabouts.set(record.value.id, structuredClone(record.value));
                break;
            case 'timesheet':
                this.timesheets.set(record.value.id, structuredClone(record.value));
                break;
            case 'performanceType':
                this.performanceTypes.set(record.value.id, structuredClone(record.value));
                break;
            case 'performance':
                this.performances.set(record.value.id, structuredClone(record.value));
                break;
            case 'userInfo':
                this.userInfos.set(record.value.userId, structuredClone(record.value));
                break;
        }
    }

    private recordKey(record: StoreRecord): string {
        return record.type === 'userInfo' ? record.value.userId : record.value.id;
    }

    // ---------- joins ----------

    private leaveDatesOf(userIds: readonly string[]): LeaveDateWithLeave[] {
        const users = new Set(userIds);
        const joined: LeaveDateWithLeave[] = [];
        for (const leaveDate of this.leaveDates.values()) {
            const leave = this.leaves.get(leaveDate.leaveId);
            if (leave && users.has(leave.userId)) {
                joined.push({ ...leaveDate, leave });
            }
        }
        return joined;
    }

    private whereaboutsOf(userId: string): Whereabout[] {
        return [...this.whereabouts.values()].filter(
            (w) => this.timesheets.get(w.timesheetId)?.userId === userId
        );
    }

    private ownedPerformances(): OwnedPerformance[] {
        const owned: OwnedPerformance[] = [];
        for (const performance of this.performances.values()) {
            const timesheet = this.timesheets.get(performance.timesheetId);
            if (timesheet) {
                owned.push({ ...performance, userId: timesheet.userId });
            }
        }
        return owned;
    }
}
