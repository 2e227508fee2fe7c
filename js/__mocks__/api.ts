/**
 * @fileoverview Mock Redmine connector for testing
 */

import { jest } from '@jest/globals';
import type { RedmineConnector, RequestOptions } from '../api.js';
import type { RedmineIssue, RedmineProject, RedmineTimeEntry, RedmineUser } from '../types.js';

export const Api = {
    listUserIssues: jest.fn<(redmineUserId: string, options?: RequestOptions) => Promise<RedmineIssue[]>>(),
    listTimeEntries:
        jest.fn<
            (redmineUserId: string, from: string, until: string, options?: RequestOptions) => Promise<RedmineTimeEntry[]>
        >(),
    getIssue: jest.fn<(id: number, options?: RequestOptions) => Promise<RedmineIssue | null>>(),
    listIssuesByIds: jest.fn<(ids: readonly number[], options?: RequestOptions) => Promise<RedmineIssue[]>>(),
    findUserIdByLogin: jest.fn<(login: string, options?: RequestOptions) => Promise<string | null>>(),
    listUsers: jest.fn<(options?: RequestOptions) => Promise<RedmineUser[]>>(),
    listProjects: jest.fn<(options?: RequestOptions) => Promise<RedmineProject[]>>(),
};

/**
 * Connector backed by the mock functions above.
 */
export function createMockConnector(
    { configured = true, baseUrl = 'https://redmine.test' }: { configured?: boolean; baseUrl?: string } = {}
): RedmineConnector {
    return {
        configured,
        baseUrl: configured ? baseUrl : null,
        ...Api,
    };
}

/**
 * Reset all mock functions
 */
export function resetApiMocks(): void {
    Object.values(Api).forEach((fn) => fn.mockReset());
}

/**
 * Set up default successful mock responses
 */
export function setupDefaultMocks(): void {
    Api.listUserIssues.mockResolvedValue([]);
    Api.listTimeEntries.mockResolvedValue([]);
    Api.getIssue.mockResolvedValue(null);
    Api.listIssuesByIds.mockResolvedValue([]);
    Api.findUserIdByLogin.mockResolvedValue(null);
    Api.listUsers.mockResolvedValue([]);
    Api.listProjects.mockResolvedValue([]);
}
