/**
 * @fileoverview Redmine Reconciler
 * Attributes Redmine time entries to internal contracts and turns them into
 * performance candidates. Attribution precedence:
 *   1. the contract custom field of the entry's issue, or of the nearest
 *      ancestor issue carrying it (parent chain walked with a visited set);
 *   2. the contract mapped to the entry's Redmine project.
 * Entries whose contract is not one of the user's contracts are skipped.
 * Re-imports are idempotent: candidates for already imported entries carry
 * the existing performance ID, so committing them updates instead of inserting.
 */

import { randomUUID } from 'node:crypto';
import type { RedmineConnector, RequestOptions } from './api.js';
import type { TtlCache } from './cache.js';
import { CACHE_KEYS, EMPTY_CHOICE_LABEL } from './constants.js';
import { createLogger } from './logger.js';
import type { IntervalStore } from './store.js';
import type {
    ActivityPerformance,
    ChoiceOption,
    DateKey,
    PerformanceCandidate,
    PerformanceType,
    RedmineIssue,
    RedmineTimeEntry,
} from './types.js';
import { IsoUtils, ValidationConflictError, round } from './utils.js';

const logger = createLogger('Reconciler');

export interface RedmineDeps {
    store: IntervalStore;
    connector: RedmineConnector;
    /** Name of the issue custom field holding "<contract id>|<label>" */
    issueContractField: string;
    now?: () => Date;
}

// ==================== ISSUE HIERARCHY ====================

/**
 * Contract ID stored on the issue itself, if any. Every custom field is
 * inspected; values look like "<contract id>|<label>".
 */
export function getIssueContractId(issue: RedmineIssue, field: string): string | null {
    for (const customField of issue.custom_fields ?? []) {
        if (customField.name !== field) continue;

        const value = Array.isArray(customField.value) ? customField.value[0] : customField.value;
        const contractId = value?.split('|')[0]?.trim();
        if (contractId) return contractId;
    }
    return null;
}

/**
 * Walks from an issue up its parent chain until an issue names a contract.
 * Issues missing from `issues` end the walk; a cycle ends it too.
 */
export function resolveContractId(
    issueId: number,
    issues: ReadonlyMap<number, RedmineIssue>,
    field: string
): string | null {
    const visited = new Set<number>();
    let current = issues.get(issueId);

    while (current && !visited.has(current.id)) {
        visited.add(current.id);

        const contractId = getIssueContractId(current, field);
        if (contractId) return contractId;

        current = current.parent ? issues.get(current.parent.id) : undefined;
    }

    if (current) {
        logger.warn(`Cycle in Redmine issue hierarchy at issue ${current.id}`);
    }
    return null;
}

/**
 * Fetches the given issues plus, level by level, the parents of every issue
 * that does not name a contract itself. No issue is requested twice.
 */
export async function collectIssueHierarchy(
    connector: RedmineConnector,
    issueIds: readonly number[],
    field: string,
    options: RequestOptions = {}
): Promise<Map<number, RedmineIssue>> {
    const issues = new Map<number, RedmineIssue>();
    const requested = new Set<number>();
    let pending = [...new Set(issueIds)];

    while (pending.length > 0) {
        pending.forEach((id) => requested.add(id));
        const fetched = await connector.listIssuesByIds(pending, options);

        const parents = new Set<number>();
        for (const issue of fetched) {
            issues.set(issue.id, issue);
            if (issue.parent && !getIssueContractId(issue, field) && !requested.has(issue.parent.id)) {
                parents.add(issue.parent.id);
            }
        }
        pending = [...parents];
    }

    return issues;
}

// ==================== IDENTITY ====================

/**
 * Redmine user ID of a user: the stored mapping, else the only Redmine user
 * matching the username (users without an e-mail address are not looked up).
 */
export async function getUserRedmineId(
    deps: Pick<RedmineDeps, 'store' | 'connector'>,
    userId: string,
    options: RequestOptions = {}
): Promise<string | null> {
    const info = await deps.store.findUserInfo(userId);
    if (!info) return null;
    if (info.redmineId) return info.redmineId;

    if (info.email && deps.connector.configured) {
        return deps.connector.findUserIdByLogin(info.username, options);
    }
    return null;
}

// ==================== CANDIDATES ====================

function describeEntry(entry: RedmineTimeEntry, baseUrl: string | null): string {
    const link = entry.issue
        ? `_See [#${entry.issue.id}](${baseUrl ?? ''}/issues/${entry.issue.id})._`
        : '_No issue linked._';
    return entry.comments ? `${entry.comments}\n${link}` : link;
}

/**
 * Performance candidates for the user's Redmine time entries in `[from, until]`.
 * Both bounds default to today. Redmine failures yield fewer (or no)
 * candidates; store failures propagate.
 */
export async function getUserExternalPerformances(
    deps: RedmineDeps,
    userId: string,
    from?: DateKey,
    until?: DateKey,
    options: RequestOptions = {}
): Promise<PerformanceCandidate[]> {
    const { store, connector, issueContractField } = deps;
    if (!connector.configured) {
        logger.debug('Redmine is not configured; no external performances');
        return [];
    }

    const today = IsoUtils.toLocalISODate((deps.now ?? (() => new Date()))());
    const fromDate = from ?? today;
    const untilDate = until ?? today;

    const redmineUserId = await getUserRedmineId(deps, userId, options);
    if (!redmineUserId) {
        logger.debug(`No Redmine user ID found for user ${userId}`);
        return [];
    }

    const entries = await connector.listTimeEntries(redmineUserId, fromDate, untilDate, options);
    if (entries.length === 0) return [];

    const issueIds = entries.flatMap((entry) => (entry.issue ? [entry.issue.id] : []));
    const issues = await collectIssueHierarchy(connector, issueIds, issueContractField, options);

    const contractUsers = await store.findContractUsers([userId]);
    const contracts = await store.findContracts([...new Set(contractUsers.map((cu) => cu.contractId))]);
    const userContractIds = new Set(contracts.map((contract) => contract.id));
    const contractsByProject = new Map<string, string>();
    for (const contract of contracts) {
        if (contract.redmineId) contractsByProject.set(contract.redmineId, contract.id);
    }

    const imported = await store.findPerformancesByRedmineIds(entries.map((entry) => String(entry.id)));
    const performanceIds = new Map<string, string>();
    for (const performance of imported) {
        if (performance.userId === userId && performance.redmineId) {
            performanceIds.set(performance.redmineId, performance.id);
        }
    }

    const candidates: PerformanceCandidate[] = [];
    for (const entry of entries) {
        const contractId =
            (entry.issue ? resolveContractId(entry.issue.id, issues, issueContractField) : null) ??
            contractsByProject.get(String(entry.project.id)) ??
            null;

        if (!contractId || !userContractIds.has(contractId)) {
            logger.debug(`No contract found for Redmine time entry with ID ${entry.id}`);
            continue;
        }

        const redmineId = String(entry.id);
        candidates.push({
            id: performanceIds.get(redmineId) ?? null,
            contractId,
            redmineId,
            duration: round(entry.hours, 2),
            description: describeEntry(entry, connector.baseUrl),
            date: entry.spent_on,
        });
    }

    logger.debug(`${candidates.length}/${entries.length} Redmine time entries attributed for user ${userId}`);
    return candidates;
}

// ==================== COMMIT ====================

export interface CommitResult {
    saved: ActivityPerformance[];
    rejected: { candidate: PerformanceCandidate; error: ValidationConflictError }[];
}

/**
 * Saves candidates as activity performances of `performanceType`.
 * Candidates with an `id`, or whose Redmine entry the user already imported,
 * update the existing performance, so a retried commit never duplicates.
 * Validation conflicts are collected per candidate; other store errors propagate.
 */
export async function commitExternalPerformances(
    deps: Pick<RedmineDeps, 'store'>,
    userId: string,
    candidates: readonly PerformanceCandidate[],
    performanceType: PerformanceType
): Promise<CommitResult> {
    const { store } = deps;
    const contractUsers = await store.findContractUsers([userId]);
    const result: CommitResult = { saved: [], rejected: [] };

    const performanceIds = new Map<string, string>();
    const imported = await store.findPerformancesByRedmineIds(
        candidates.filter((candidate) => candidate.id === null).map((candidate) => candidate.redmineId)
    );
    for (const performance of imported) {
        if (performance.userId === userId && performance.redmineId) {
            performanceIds.set(performance.redmineId, performance.id);
        }
    }

    for (const candidate of candidates) {
        const { year, month } = IsoUtils.yearMonth(candidate.date);
        const timesheet = await store.findTimesheet(userId, year, month);
        if (!timesheet) {
            result.rejected.push({
                candidate,
                error: new ValidationConflictError({
                    kind: 'invalid_reference',
                    field: 'timesheet',
                    message: `No timesheet exists for ${year}-${String(month).padStart(2, '0')}.`,
                }),
            });
            continue;
        }

        const contractUser = contractUsers.find((cu) => cu.contractId === candidate.contractId);
        if (!contractUser) {
            result.rejected.push({
                candidate,
                error: new ValidationConflictError({
                    kind: 'invalid_reference',
                    field: 'contract_role',
                    message: 'The user has no role on the selected contract.',
                }),
            });
            continue;
        }

        const performance: ActivityPerformance = {
            kind: 'activity',
            id: candidate.id ?? performanceIds.get(candidate.redmineId) ?? randomUUID(),
            timesheetId: timesheet.id,
            date: candidate.date,
            contractId: candidate.contractId,
            redmineId: candidate.redmineId,
            performanceType,
            contractRoleId: contractUser.contractRoleId,
            description: candidate.description,
            duration: candidate.duration,
        };

        try {
            await store.save({ type: 'performance', value: performance });
            performanceIds.set(candidate.redmineId, performance.id);
            result.saved.push(performance);
        } catch (error) {
            if (!(error instanceof ValidationConflictError)) throw error;
            logger.debug(`Redmine time entry ${candidate.redmineId} rejected: ${error.message}`);
            result.rejected.push({ candidate, error });
        }
    }

    return result;
}

// ==================== DROPDOWN CHOICES ====================

function withEmptyChoice(options: ChoiceOption[]): ChoiceOption[] {
    options.sort((a, b) => a.label.toLowerCase().localeCompare(b.label.toLowerCase()));
    return [{ value: null, label: EMPTY_CHOICE_LABEL }, ...options];
}

// An empty listing is what a failed or unconfigured connector returns; retry it next time.
const CACHE_NON_EMPTY = { shouldCache: (choices: ChoiceOption[]) => choices.length > 1 };

/**
 * Redmine users as dropdown choices, cached until the TTL expires or the store is written.
 */
export async function getRedmineUserChoices(
    connector: RedmineConnector,
    cache: TtlCache<ChoiceOption[]>
): Promise<ChoiceOption[]> {
    return cache.getOrSet(CACHE_KEYS.REDMINE_USER_CHOICES, async () => {
        const users = await connector.listUsers();
        return withEmptyChoice(
            users.map((user) => ({
                value: String(user.id),
                label: `${user.firstname} ${user.lastname} [${user.mail ? `${user.login}, ${user.mail}` : user.login}]`,
            }))
        );
    }, CACHE_NON_EMPTY);
}

export async function getRedmineProjectChoices(
    connector: RedmineConnector,
    cache: TtlCache<ChoiceOption[]>
): Promise<ChoiceOption[]> {
    return cache.getOrSet(CACHE_KEYS.REDMINE_PROJECT_CHOICES, async () => {
        const projects = await connector.listProjects();
        return withEmptyChoice(projects.map((project) => ({ value: String(project.id), label: project.name })));
    }, CACHE_NON_EMPTY);
}
