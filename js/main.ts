/**
 * @fileoverview Main Entry Point / Engine Facade
 * Wires the store, configuration, Redmine connector and choices cache into
 * the report operations, and re-exports the public API.
 *
 * ## Data Flow
 *
 * ```
 * ┌──────────────────────────────────────────────────────────────────────┐
 * │                         WRITE PATH                                   │
 * │  store.save(record) ──► validation.ts ──► commit ──► cache.onWrite() │
 * └──────────────────────────────────────────────────────────────────────┘
 *
 * ┌──────────────────────────────────────────────────────────────────────┐
 * │                          READ PATH                                   │
 * │                                                                      │
 * │  getRangeInfo / getAvailabilityInfo / getOvertimeSeries              │
 * │         │                                                            │
 * │         ▼  per batch of users (one query per record type)            │
 * │  loadUserRecords() ──► resolveDayDetail() per user per day           │
 * │         │                                                            │
 * │         ▼                                                            │
 * │  RangeInfo totals / daily details / contract summary                 │
 * └──────────────────────────────────────────────────────────────────────┘
 *
 * ┌──────────────────────────────────────────────────────────────────────┐
 * │                        RECONCILIATION                                │
 * │  Redmine time entries ──► issue hierarchy walk ──► candidates        │
 * │  candidates ──► commitExternalPerformances() ──► store.save()        │
 * └──────────────────────────────────────────────────────────────────────┘
 * ```
 */

import { createRedmineConnector, type RedmineConnector, type RequestOptions } from './api.js';
import {
    defaultIssueColorPolicy,
    getAvailabilityInfo,
    getInternalAvailabilityInfo,
    type IssueColorPolicy,
} from './availability.js';
import { TtlCache } from './cache.js';
import { getRangeInfo, resolveDay, type CalcDeps } from './calc.js';
import { loadConfig, type EngineConfig } from './config.js';
import { addBreadcrumb, initErrorReporting, reportError } from './error-reporting.js';
import { createLogger } from './logger.js';
import { getOvertimeSeries } from './overtime.js';
import {
    commitExternalPerformances,
    getRedmineProjectChoices,
    getRedmineUserChoices,
    getUserExternalPerformances,
    type CommitResult,
} from './redmine.js';
import type { IntervalStore } from './store.js';
import type {
    AvailabilityInfo,
    ChoiceOption,
    DateKey,
    DayDetail,
    InternalAvailabilityInfo,
    OvertimeMonth,
    PerformanceCandidate,
    PerformanceType,
    RangeInfo,
    RangeOptions,
} from './types.js';
import { ValidationConflictError } from './utils.js';

const logger = createLogger('Engine');

export interface EngineOptions {
    store: IntervalStore;
    /** Defaults to loadConfig() */
    config?: EngineConfig;
    /** Defaults to a connector built from config.redmine */
    connector?: RedmineConnector;
    /** Dropdown choices cache; invalidated on every store write */
    cache?: TtlCache<ChoiceOption[]>;
    now?: () => Date;
    issueColorPolicy?: IssueColorPolicy;
}

export interface Engine {
    readonly config: EngineConfig;
    getRangeInfo(
        userIds: readonly string[],
        from: DateKey,
        until: DateKey,
        options?: RangeOptions
    ): Promise<Map<string, RangeInfo>>;
    resolveDay(userId: string, date: DateKey, options?: { detailed?: boolean }): Promise<DayDetail>;
    getAvailabilityInfo(
        userIds: readonly string[],
        from: DateKey,
        until: DateKey
    ): Promise<Map<string, Map<DateKey, AvailabilityInfo>>>;
    getInternalAvailabilityInfo(
        userIds: readonly string[],
        date: DateKey,
        options?: RequestOptions
    ): Promise<Map<string, InternalAvailabilityInfo>>;
    getOvertimeSeries(userId: string, from: DateKey, until: DateKey): Promise<OvertimeMonth[]>;
    getUserExternalPerformances(
        userId: string,
        from?: DateKey,
        until?: DateKey,
        options?: RequestOptions
    ): Promise<PerformanceCandidate[]>;
    commitExternalPerformances(
        userId: string,
        candidates: readonly PerformanceCandidate[],
        performanceType: PerformanceType
    ): Promise<CommitResult>;
    getRedmineUserChoices(): Promise<ChoiceOption[]>;
    getRedmineProjectChoices(): Promise<ChoiceOption[]>;
}

/**
 * Reports unexpected failures (store outages, bugs) and rethrows them.
 * Validation conflicts are the caller's to correct and are not reported.
 */
async function withReporting<T>(operation: string, run: () => Promise<T>): Promise<T> {
    addBreadcrumb('engine', operation);
    try {
        return await run();
    } catch (error) {
        if (!(error instanceof ValidationConflictError)) {
            reportError(error instanceof Error ? error : String(error), { module: 'Engine', operation });
        }
        throw error;
    }
}

/**
 * Creates the engine facade.
 */
export function createEngine(options: EngineOptions): Engine {
    const config = options.config ?? loadConfig();
    const { store } = options;
    const connector = options.connector ?? createRedmineConnector({ config: config.redmine });
    const cache = options.cache ?? new TtlCache<ChoiceOption[]>();
    const now = options.now ?? (() => new Date());
    const issueColorPolicy = options.issueColorPolicy ?? defaultIssueColorPolicy;

    store.addWriteListener?.(cache);
    initErrorReporting({ dsn: config.sentryDsn, environment: config.environment });

    const calcDeps: CalcDeps = { store, userBatchSize: config.userBatchSize };
    const redmineDeps = {
        store,
        connector,
        issueContractField: config.redmine.issueContractField,
        now,
    };

    logger.debug(`Engine created (Redmine ${connector.configured ? 'enabled' : 'disabled'})`);

    return {
        config,

        getRangeInfo: (userIds, from, until, rangeOptions) =>
            withReporting('getRangeInfo', () => getRangeInfo(calcDeps, userIds, from, until, rangeOptions)),

        resolveDay: (userId, date, dayOptions) =>
            withReporting('resolveDay', () => resolveDay(calcDeps, userId, date, dayOptions)),

        getAvailabilityInfo: (userIds, from, until) =>
            withReporting('getAvailabilityInfo', () => getAvailabilityInfo(calcDeps, userIds, from, until)),

        getInternalAvailabilityInfo: (userIds, date, requestOptions) =>
            withReporting('getInternalAvailabilityInfo', () =>
                getInternalAvailabilityInfo(
                    {
                        ...calcDeps,
                        connector,
                        issueColorPolicy,
                        inProgressStatusIds: config.redmine.inProgressStatusIds,
                        now,
                    },
                    userIds,
                    date,
                    requestOptions
                )
            ),

        getOvertimeSeries: (userId, from, until) =>
            withReporting('getOvertimeSeries', () => getOvertimeSeries(calcDeps, userId, from, until)),

        getUserExternalPerformances: (userId, from, until, requestOptions) =>
            withReporting('getUserExternalPerformances', () =>
                getUserExternalPerformances(redmineDeps, userId, from, until, requestOptions)
            ),

        commitExternalPerformances: (userId, candidates, performanceType) =>
            withReporting('commitExternalPerformances', () =>
                commitExternalPerformances({ store }, userId, candidates, performanceType)
            ),

        getRedmineUserChoices: () =>
            withReporting('getRedmineUserChoices', () => getRedmineUserChoices(connector, cache)),

        getRedmineProjectChoices: () =>
            withReporting('getRedmineProjectChoices', () => getRedmineProjectChoices(connector, cache)),
    };
}

// ==================== PUBLIC API ====================

export * from './types.js';
export { createRedmineConnector } from './api.js';
export type { FetchLike, RedmineConnector, RedmineConnectorOptions, RequestOptions } from './api.js';
export { defaultIssueColorPolicy, serializeAvailability } from './availability.js';
export type { IssueColorContext, IssueColorPolicy } from './availability.js';
export { TtlCache } from './cache.js';
export { resolveDayDetail, serializeRangeInfo } from './calc.js';
export type { SerializedRangeInfo, UserRecords } from './calc.js';
export { loadConfig } from './config.js';
export type { EngineConfig, RedmineConfig } from './config.js';
export { flushErrorReports, initErrorReporting } from './error-reporting.js';
export { LogLevel, configureLogger, createLogger, setLogLevel } from './logger.js';
export { MemoryIntervalStore } from './store.js';
export type { IntervalStore, StoreRecord, StoreRecordType, WriteListener } from './store.js';
export type { CommitResult } from './redmine.js';
export { ValidationConflictError, classifyError, createUserFriendlyError } from './utils.js';
export * as validation from './validation.js';
