/**
 * @fileoverview Redmine Connector
 * Handles all network communication with Redmine, including authentication,
 * rate limiting, timeouts, pagination and error handling.
 *
 * The connector never throws into report generation: every failure degrades
 * to empty (or partial) data and is reported. Without URL and API key every
 * call is a deterministic no-op returning empty data.
 */

import { isRedmineConfigured, type RedmineConfig } from './config.js';
import { DEFAULT_MAX_PAGES, HARD_MAX_PAGES_LIMIT, REDMINE_DEFAULTS } from './constants.js';
import { reportMessage } from './error-reporting.js';
import { createLogger } from './logger.js';
import type {
    ApiResponse,
    DateKey,
    RedmineIssue,
    RedmineProject,
    RedmineTimeEntry,
    RedmineUser,
} from './types.js';
import { classifyError } from './utils.js';

const logger = createLogger('Redmine');

// ==================== CONSTANTS ====================

/** Max requests allowed per refill interval. */
const RATE_LIMIT = 10;
/** Interval in ms to refill the token bucket. */
const REFILL_INTERVAL = 1000;
/** Redmine accepts at most this many ids in one issue_id filter. */
const ISSUE_ID_BATCH_SIZE = 100;

// ==================== TYPES ====================

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RequestOptions {
    /** Cancels the request (and any remaining pages) */
    signal?: AbortSignal;
}

export interface RedmineConnectorOptions {
    config: RedmineConfig;
    /** Defaults to the global fetch */
    fetchImpl?: FetchLike;
    /** Retries for network/5xx failures. Off by default: the calling job owns retry policy. */
    maxRetries?: number;
    /** Requests per second */
    rateLimit?: number;
}

/**
 * Connector surface consumed by the reconciler and the availability tagger.
 */
export interface RedmineConnector {
    readonly configured: boolean;
    /** Base URL, used for issue links */
    readonly baseUrl: string | null;
    listUserIssues(redmineUserId: string, options?: RequestOptions): Promise<RedmineIssue[]>;
    listTimeEntries(
        redmineUserId: string,
        from: DateKey,
        until: DateKey,
        options?: RequestOptions
    ): Promise<RedmineTimeEntry[]>;
    getIssue(id: number, options?: RequestOptions): Promise<RedmineIssue | null>;
    /** Issues of any status, fetched in batches */
    listIssuesByIds(ids: readonly number[], options?: RequestOptions): Promise<RedmineIssue[]>;
    /** Redmine user ID of the only user matching `login`, else null */
    findUserIdByLogin(login: string, options?: RequestOptions): Promise<string | null>;
    listUsers(options?: RequestOptions): Promise<RedmineUser[]>;
    listProjects(options?: RequestOptions): Promise<RedmineProject[]>;
}

// ==================== PAYLOAD GUARDS ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasNumericId(value: unknown): value is { id: number } & Record<string, unknown> {
    return isRecord(value) && typeof value.id === 'number';
}

export function isRedmineIssue(value: unknown): value is RedmineIssue {
    return hasNumericId(value);
}

export function isRedmineTimeEntry(value: unknown): value is RedmineTimeEntry {
    return (
        hasNumericId(value) &&
        hasNumericId(value.project) &&
        typeof value.hours === 'number' &&
        typeof value.spent_on === 'string'
    );
}

export function isRedmineUser(value: unknown): value is RedmineUser {
    return hasNumericId(value) && typeof value.login === 'string';
}

export function isRedmineProject(value: unknown): value is RedmineProject {
    return hasNumericId(value) && typeof value.name === 'string';
}

/**
 * Picks the typed items of a Redmine list payload (`{ <key>: [...], total_count }`).
 * Malformed items are skipped.
 */
function readList<T>(
    payload: unknown,
    key: string,
    guard: (value: unknown) => value is T
): { items: T[]; total: number | null; received: number } {
    if (!isRecord(payload)) return { items: [], total: null, received: 0 };
    const raw = payload[key];
    const list = Array.isArray(raw) ? raw : [];
    const total = typeof payload.total_count === 'number' ? payload.total_count : null;
    const items = list.filter(guard);
    if (items.length !== list.length) {
        logger.warn(`Skipped ${list.length - items.length} malformed ${key} item(s)`);
    }
    return { items, total, received: list.length };
}

// ==================== CONNECTOR ====================

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Creates a Redmine connector. Each connector owns its own rate limiter.
 */
export function createRedmineConnector(options: RedmineConnectorOptions): RedmineConnector {
    const { config } = options;
    const configured = isRedmineConfigured(config);
    const baseUrl = configured ? config.url : null;
    const apiKey = configured ? config.apiKey : null;
    const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
    const retries = options.maxRetries ?? 0;
    const rateLimit = options.rateLimit ?? RATE_LIMIT;

    const configuredMaxPages = Number.isInteger(config.maxPages) ? config.maxPages : DEFAULT_MAX_PAGES;
    const effectiveMaxPages =
        configuredMaxPages === 0 ? HARD_MAX_PAGES_LIMIT : Math.min(configuredMaxPages, HARD_MAX_PAGES_LIMIT);

    if (!configured) {
        logger.debug('No base URL and API key provided for connecting to Redmine');
    }

    // Rate Limiting State
    let tokens = rateLimit;
    let lastRefill = Date.now();

    /**
     * Waits until a rate limit token is available.
     */
    async function waitForToken(): Promise<void> {
        while (true) {
            const now = Date.now();
            if (now - lastRefill >= REFILL_INTERVAL) {
                tokens = rateLimit;
                lastRefill = now;
            }

            if (tokens > 0) {
                tokens--;
                return;
            }

            await delay(REFILL_INTERVAL - (now - lastRefill));
        }
    }

    /**
     * Single request with API key, rate limiting, timeout and optional retries.
     */
    async function fetchWithAuth<T>(
        path: string,
        guard: (value: unknown) => value is T,
        requestOptions: RequestOptions = {}
    ): Promise<ApiResponse<T>> {
        if (!baseUrl || !apiKey) {
            return { data: null, failed: false, status: 0 };
        }
        const url = `${baseUrl}${path}`;

        for (let attempt = 0; attempt <= retries; attempt++) {
            if (requestOptions.signal?.aborted) {
                return { data: null, failed: true, status: 0 };
            }
            await waitForToken();

            const controller = new AbortController();
            const timer = setTimeout(() => controller.abort(), config.timeoutMs || REDMINE_DEFAULTS.TIMEOUT_MS);
            const forwardAbort = () => controller.abort();
            requestOptions.signal?.addEventListener('abort', forwardAbort, { once: true });

            try {
                const response = await fetchImpl(url, {
                    headers: {
                        'X-Redmine-API-Key': apiKey,
                        Accept: 'application/json',
                    },
                    signal: controller.signal,
                });

                // Not retryable: bad key, no permission, missing resource
                if (response.status === 401 || response.status === 403 || response.status === 404) {
                    return { data: null, failed: true, status: response.status };
                }

                if (response.status === 429 && attempt < retries) {
                    const retryAfter = parseInt(response.headers.get('Retry-After') ?? '', 10);
                    const waitMs = isNaN(retryAfter) ? 5000 : retryAfter * 1000;
                    logger.warn(`Rate limit exceeded (attempt ${attempt + 1}/${retries + 1}). Retrying after ${waitMs}ms`);
                    await delay(waitMs);
                    continue;
                }

                if (!response.ok) {
                    if (response.status >= 500 && attempt < retries) {
                        await delay(Math.pow(2, attempt) * 1000);
                        continue;
                    }
                    return { data: null, failed: true, status: response.status };
                }

                const payload: unknown = await response.json();
                if (!guard(payload)) {
                    logger.warn(`Unexpected response shape from ${path}`);
                    return { data: null, failed: true, status: response.status };
                }
                return { data: payload, failed: false, status: response.status };
            } catch (error) {
                const errorType = classifyError(error);
                if (requestOptions.signal?.aborted) {
                    logger.debug(`Request cancelled: ${path}`);
                    return { data: null, failed: true, status: 0 };
                }
                if (attempt < retries) {
                    const backoffTime = Math.pow(2, attempt) * 1000; // 1s, 2s, 4s...
                    logger.warn(`Retry ${attempt + 1}/${retries} after ${backoffTime}ms (${errorType}): ${path}`);
                    await delay(backoffTime);
                    continue;
                }
                logger.warn(`Fetch error (${errorType}): ${path}`, error);
                return { data: null, failed: true, status: 0 };
            } finally {
                clearTimeout(timer);
                requestOptions.signal?.removeEventListener('abort', forwardAbort);
            }
        }

        return { data: null, failed: true, status: 0 };
    }

    function reportFailure(operation: string, status: number): void {
        reportMessage(`Redmine request failed (status ${status}); continuing without external data`, 'warning', {
            module: 'Redmine',
            operation,
        });
    }

    /**
     * Fetches all pages of a list endpoint (offset/limit), up to the page limit.
     * A failing page ends the walk; pages fetched so far are kept.
     */
    async function fetchPaginated<T>(
        operation: string,
        path: string,
        key: string,
        guard: (value: unknown) => value is T,
        requestOptions: RequestOptions = {}
    ): Promise<T[]> {
        if (!configured) return [];

        const all: T[] = [];
        const separator = path.includes('?') ? '&' : '?';
        let offset = 0;

        for (let page = 1; page <= effectiveMaxPages; page++) {
            const { data, failed, status } = await fetchWithAuth(
                `${path}${separator}offset=${offset}&limit=${REDMINE_DEFAULTS.PAGE_SIZE}`,
                isRecord,
                requestOptions
            );

            if (failed) {
                reportFailure(operation, status);
                break;
            }

            const { items, total, received } = readList(data, key, guard);
            all.push(...items);
            offset += received;

            if (received < REDMINE_DEFAULTS.PAGE_SIZE) break; // Reached last page
            if (total !== null && offset >= total) break;
            if (page === effectiveMaxPages) {
                logger.warn(`${operation}: stopped after ${effectiveMaxPages} page(s)`);
            }
        }

        return all;
    }

    return {
        configured,
        baseUrl,

        async listUserIssues(redmineUserId, requestOptions) {
            return fetchPaginated(
                'listUserIssues',
                `/issues.json?assigned_to_id=${encodeURIComponent(redmineUserId)}`,
                'issues',
                isRedmineIssue,
                requestOptions
            );
        },

        async listTimeEntries(redmineUserId, from, until, requestOptions) {
            const query = new URLSearchParams({ user_id: redmineUserId, from, to: until });
            return fetchPaginated(
                'listTimeEntries',
                `/time_entries.json?${query.toString()}`,
                'time_entries',
                isRedmineTimeEntry,
                requestOptions
            );
        },

        async getIssue(id, requestOptions) {
            if (!configured) return null;
            const { data, failed, status } = await fetchWithAuth(
                `/issues/${encodeURIComponent(String(id))}.json`,
                isRecord,
                requestOptions
            );
            if (failed) {
                if (status !== 404) reportFailure('getIssue', status);
                return null;
            }
            const issue = data?.issue;
            return isRedmineIssue(issue) ? issue : null;
        },

        async listIssuesByIds(ids, requestOptions) {
            const unique = [...new Set(ids)];
            const issues: RedmineIssue[] = [];
            for (let i = 0; i < unique.length; i += ISSUE_ID_BATCH_SIZE) {
                const batch = unique.slice(i, i + ISSUE_ID_BATCH_SIZE);
                issues.push(
                    ...(await fetchPaginated(
                        'listIssuesByIds',
                        `/issues.json?issue_id=${batch.join(',')}&status_id=*`,
                        'issues',
                        isRedmineIssue,
                        requestOptions
                    ))
                );
            }
            return issues;
        },

        async findUserIdByLogin(login, requestOptions) {
            if (!configured) return null;
            const { data, failed, status } = await fetchWithAuth(
                `/users.json?name=${encodeURIComponent(login)}&limit=2`,
                isRecord,
                requestOptions
            );
            if (failed) {
                reportFailure('findUserIdByLogin', status);
                return null;
            }
            const { items } = readList(data, 'users', isRedmineUser);
            return items.length === 1 ? String(items[0].id) : null;
        },

        async listUsers(requestOptions) {
            return fetchPaginated('listUsers', '/users.json', 'users', isRedmineUser, requestOptions);
        },

        async listProjects(requestOptions) {
            return fetchPaginated('listProjects', '/projects.json', 'projects', isRedmineProject, requestOptions);
        },
    };
}
