import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { TtlCache } from '../../js/cache.js';
import {
    collectIssueHierarchy,
    commitExternalPerformances,
    getIssueContractId,
    getRedmineProjectChoices,
    getRedmineUserChoices,
    getUserExternalPerformances,
    getUserRedmineId,
    resolveContractId,
    type RedmineDeps,
} from '../../js/redmine.js';
import { MemoryIntervalStore } from '../../js/store.js';
import type { ChoiceOption, PerformanceCandidate, RedmineIssue, RedmineTimeEntry } from '../../js/types.js';
import { Api, createMockConnector, resetApiMocks, setupDefaultMocks } from '../../js/__mocks__/api.js';
import { normalType, projectContract, seedStore } from './helpers/fixtures.js';

const FIELD = '925r_contract';

const ISSUES: Record<number, RedmineIssue> = {
    10: { id: 10, parent: { id: 11 }, custom_fields: [{ id: 1, name: 'Severity', value: 'high' }] },
    11: { id: 11, custom_fields: [{ id: 2, name: FIELD, value: 'contract-alpha|Alpha' }] },
    20: { id: 20, custom_fields: [{ id: 2, name: FIELD, value: 'contract-foreign|Foreign' }] },
};

const ENTRIES: RedmineTimeEntry[] = [
    { id: 501, project: { id: 3 }, issue: { id: 10 }, hours: 1.5, comments: 'Fixed login', spent_on: '2024-05-02' },
    { id: 502, project: { id: 3 }, hours: 2, comments: null, spent_on: '2024-05-03' },
    { id: 503, project: { id: 99 }, issue: { id: 20 }, hours: 1, spent_on: '2024-05-03' },
    { id: 504, project: { id: 99 }, hours: 1, spent_on: '2024-05-06' },
];

function serveIssues(issues: Record<number, RedmineIssue>): void {
    Api.listIssuesByIds.mockImplementation(async (ids) =>
        ids.flatMap((id) => (issues[id] ? [issues[id]] : []))
    );
}

afterEach(() => {
    jest.restoreAllMocks();
});

describe('issue hierarchy', () => {
    it('reads the contract id from the matching custom field', () => {
        const issue: RedmineIssue = {
            id: 1,
            custom_fields: [
                { id: 1, name: 'Severity', value: 'contract-wrong|Nope' },
                { id: 2, name: FIELD, value: ['contract-alpha|Alpha'] },
            ],
        };
        expect(getIssueContractId(issue, FIELD)).toBe('contract-alpha');
        expect(getIssueContractId({ id: 2, custom_fields: [{ id: 2, name: FIELD, value: null }] }, FIELD)).toBeNull();
        expect(getIssueContractId({ id: 3 }, FIELD)).toBeNull();
    });

    it('walks up to the nearest ancestor naming a contract', () => {
        const issues = new Map(Object.values(ISSUES).map((issue) => [issue.id, issue]));
        expect(resolveContractId(10, issues, FIELD)).toBe('contract-alpha');
        expect(resolveContractId(404, issues, FIELD)).toBeNull();
    });

    it('stops on a cycle', () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const issues = new Map<number, RedmineIssue>([
            [1, { id: 1, parent: { id: 2 } }],
            [2, { id: 2, parent: { id: 1 } }],
        ]);

        expect(resolveContractId(1, issues, FIELD)).toBeNull();
        expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Cycle in Redmine issue hierarchy at issue 1'));
    });

    it('fetches parents level by level without repeating requests', async () => {
        resetApiMocks();
        serveIssues({
            1: { id: 1, parent: { id: 2 } },
            2: { id: 2, parent: { id: 1 } },
        });

        const issues = await collectIssueHierarchy(createMockConnector(), [1, 1], FIELD);

        expect([...issues.keys()]).toEqual([1, 2]);
        expect(Api.listIssuesByIds.mock.calls.map(([ids]) => ids)).toEqual([[1], [2]]);
    });
});

describe('reconciliation', () => {
    let store: MemoryIntervalStore;
    let deps: RedmineDeps;

    beforeEach(async () => {
        resetApiMocks();
        setupDefaultMocks();
        store = await seedStore();
        await store.save({
            type: 'contract',
            value: projectContract({ id: 'contract-beta', name: 'Beta', redmineId: '3' }),
        });
        await store.save({
            type: 'contractUser',
            value: { id: 'cu-2', userId: 'user-1', contractId: 'contract-beta', contractRoleId: 'role-dev' },
        });
        await store.save({ type: 'userInfo', value: { userId: 'user-1', username: 'ann', redmineId: '7' } });
        deps = {
            store,
            connector: createMockConnector(),
            issueContractField: FIELD,
            now: () => new Date('2024-05-20T12:00:00'),
        };
    });

    describe('getUserRedmineId', () => {
        it('prefers the stored mapping', async () => {
            expect(await getUserRedmineId(deps, 'user-1')).toBe('7');
            expect(Api.findUserIdByLogin).not.toHaveBeenCalled();
        });

        it('looks users up by login only when they have an e-mail address', async () => {
            Api.findUserIdByLogin.mockResolvedValue('8');
            await store.save({ type: 'userInfo', value: { userId: 'user-2', username: 'bob' } });
            await store.save({ type: 'userInfo', value: { userId: 'user-3', username: 'cy', email: 'cy@example.com' } });

            expect(await getUserRedmineId(deps, 'user-2')).toBeNull();
            expect(await getUserRedmineId(deps, 'user-3')).toBe('8');
            expect(await getUserRedmineId(deps, 'user-4')).toBeNull();
            expect(Api.findUserIdByLogin).toHaveBeenCalledTimes(1);
            expect(Api.findUserIdByLogin).toHaveBeenCalledWith('cy', {});
        });
    });

    describe('getUserExternalPerformances', () => {
        beforeEach(() => {
            Api.listTimeEntries.mockResolvedValue(ENTRIES);
            serveIssues(ISSUES);
        });

        it('attributes entries by issue hierarchy, then by project', async () => {
            const candidates = await getUserExternalPerformances(deps, 'user-1', '2024-05-01', '2024-05-31');

            expect(candidates).toEqual([
                {
                    id: null,
                    contractId: 'contract-alpha',
                    redmineId: '501',
                    duration: 1.5,
                    description: 'Fixed login\n_See [#10](https://redmine.test/issues/10)._',
                    date: '2024-05-02',
                },
                {
                    id: null,
                    contractId: 'contract-beta',
                    redmineId: '502',
                    duration: 2,
                    description: '_No issue linked._',
                    date: '2024-05-03',
                },
            ]);
            expect(Api.listTimeEntries).toHaveBeenCalledWith('7', '2024-05-01', '2024-05-31', {});
            expect(Api.listIssuesByIds.mock.calls.map(([ids]) => ids)).toEqual([[10, 20], [11]]);
        });

        it('defaults both bounds to today', async () => {
            await getUserExternalPerformances(deps, 'user-1');
            expect(Api.listTimeEntries).toHaveBeenCalledWith('7', '2024-05-20', '2024-05-20', {});
        });

        it('does nothing when Redmine is not configured', async () => {
            const candidates = await getUserExternalPerformances(
                { ...deps, connector: createMockConnector({ configured: false }) },
                'user-1'
            );

            expect(candidates).toEqual([]);
            expect(Api.listTimeEntries).not.toHaveBeenCalled();
        });

        it('is idempotent across imports', async () => {
            const first = await getUserExternalPerformances(deps, 'user-1', '2024-05-01', '2024-05-31');
            const firstCommit = await commitExternalPerformances(deps, 'user-1', first, normalType);
            expect(firstCommit.saved).toHaveLength(2);
            expect(firstCommit.rejected).toEqual([]);

            const second = await getUserExternalPerformances(deps, 'user-1', '2024-05-01', '2024-05-31');
            expect(second.map((c) => c.id)).toEqual(firstCommit.saved.map((p) => p.id));
            await commitExternalPerformances(deps, 'user-1', second, normalType);

            const stored = await store.findPerformances(['user-1'], { start: '2024-05-01', end: '2024-05-31' });
            expect(stored.map((p) => p.redmineId).sort()).toEqual(['501', '502']);
            expect(stored).toHaveLength(2);
        });
    });

    describe('commitExternalPerformances', () => {
        const candidate = (overrides: Partial<PerformanceCandidate>): PerformanceCandidate => ({
            id: null,
            contractId: 'contract-alpha',
            redmineId: '601',
            duration: 3,
            description: '_No issue linked._',
            date: '2024-05-06',
            ...overrides,
        });

        it('saves activities with the contract role of the user', async () => {
            const result = await commitExternalPerformances(deps, 'user-1', [candidate({})], normalType);

            expect(result.saved).toHaveLength(1);
            expect(result.saved[0]).toMatchObject({
                kind: 'activity',
                timesheetId: 'ts-2024-05',
                contractRoleId: 'role-dev',
                performanceType: normalType,
                redmineId: '601',
                duration: 3,
            });
        });

        it('collects conflicts per candidate', async () => {
            const result = await commitExternalPerformances(
                deps,
                'user-1',
                [
                    candidate({ redmineId: '602', date: '2024-06-03' }),
                    candidate({ redmineId: '603', contractId: 'contract-unassigned' }),
                    candidate({ redmineId: '604', duration: 30 }),
                    candidate({ redmineId: '605' }),
                ],
                normalType
            );

            expect(result.saved.map((p) => p.redmineId)).toEqual(['605']);
            expect(result.rejected.map(({ candidate: c, error }) => `${c.redmineId}:${error.field}`)).toEqual([
                '602:timesheet',
                '603:contract_role',
                '604:duration',
            ]);
            expect(result.rejected[0].error.message).toBe('No timesheet exists for 2024-06.');
        });

        it('updates earlier imports when the same candidates are committed again', async () => {
            const retried = [candidate({ redmineId: '701' })];

            const first = await commitExternalPerformances(deps, 'user-1', retried, normalType);
            const second = await commitExternalPerformances(deps, 'user-1', retried, normalType);

            expect(second.saved[0].id).toBe(first.saved[0].id);
            expect(await store.findPerformancesByRedmineIds(['701'])).toHaveLength(1);
        });

        it('keeps one performance per Redmine entry within a commit', async () => {
            await commitExternalPerformances(
                deps,
                'user-1',
                [candidate({ redmineId: '702' }), candidate({ redmineId: '702', duration: 5 })],
                normalType
            );

            const stored = await store.findPerformancesByRedmineIds(['702']);
            expect(stored).toHaveLength(1);
            expect(stored[0]).toMatchObject({ kind: 'activity', duration: 5 });
        });

        it('propagates store failures', async () => {
            jest.spyOn(store, 'save').mockRejectedValueOnce(new Error('disk full'));

            await expect(commitExternalPerformances(deps, 'user-1', [candidate({})], normalType)).rejects.toThrow(
                'disk full'
            );
        });
    });
});

describe('dropdown choices', () => {
    beforeEach(() => {
        resetApiMocks();
        setupDefaultMocks();
    });

    it('lists users sorted by label after an empty choice, cached until a write', async () => {
        Api.listUsers.mockResolvedValue([
            { id: 2, login: 'bob', firstname: 'Bob', lastname: 'Zed' },
            { id: 1, login: 'ann', firstname: 'ann', lastname: 'Ames', mail: 'ann@example.com' },
        ]);
        const cache = new TtlCache<ChoiceOption[]>();
        const connector = createMockConnector();

        const choices = await getRedmineUserChoices(connector, cache);
        await getRedmineUserChoices(connector, cache);

        expect(choices).toEqual([
            { value: null, label: '-----------' },
            { value: '1', label: 'ann Ames [ann, ann@example.com]' },
            { value: '2', label: 'Bob Zed [bob]' },
        ]);
        expect(Api.listUsers).toHaveBeenCalledTimes(1);

        cache.onWrite();
        await getRedmineUserChoices(connector, cache);
        expect(Api.listUsers).toHaveBeenCalledTimes(2);
    });

    it('does not keep an empty listing', async () => {
        Api.listProjects.mockResolvedValueOnce([]).mockResolvedValueOnce([{ id: 3, name: 'Intranet' }]);
        const cache = new TtlCache<ChoiceOption[]>();
        const connector = createMockConnector();

        expect(await getRedmineProjectChoices(connector, cache)).toEqual([{ value: null, label: '-----------' }]);
        expect(await getRedmineProjectChoices(connector, cache)).toHaveLength(2);
        expect(await getRedmineProjectChoices(connector, cache)).toHaveLength(2);
        expect(Api.listProjects).toHaveBeenCalledTimes(2);
    });

    it('lists projects', async () => {
        Api.listProjects.mockResolvedValue([
            { id: 4, name: 'Website' },
            { id: 3, name: 'Intranet' },
        ]);

        expect(await getRedmineProjectChoices(createMockConnector(), new TtlCache<ChoiceOption[]>())).toEqual([
            { value: null, label: '-----------' },
            { value: '3', label: 'Intranet' },
            { value: '4', label: 'Website' },
        ]);
    });
});
