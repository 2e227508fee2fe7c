/**
 * @fileoverview Engine configuration
 * Builds a typed EngineConfig from environment variables. Nothing else in
 * the engine reads process.env apart from the logger defaults; components
 * receive this object explicitly.
 */

import {
    CONSTANTS,
    DEFAULT_MAX_PAGES,
    ENV_KEYS,
    REDMINE_DEFAULTS,
} from './constants.js';
import { createLogger } from './logger.js';

const logger = createLogger('Config');

export interface RedmineConfig {
    /** Base URL without trailing slash; null when not configured */
    url: string | null;
    apiKey: string | null;
    issueContractField: string;
    timeoutMs: number;
    /** 0 means "up to the hard page limit" */
    maxPages: number;
    inProgressStatusIds: number[];
}

export interface EngineConfig {
    redmine: RedmineConfig;
    sentryDsn: string | null;
    environment: string;
    userBatchSize: number;
}

/**
 * Parses a non-negative integer, falling back (with a warning) when invalid.
 */
function readInteger(
    env: NodeJS.ProcessEnv,
    key: string,
    fallback: number,
    { min = 0 }: { min?: number } = {}
): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        logger.warn(`Invalid ${key}="${raw}", using default ${fallback}`);
        return fallback;
    }
    return value;
}

function readIdList(env: NodeJS.ProcessEnv, key: string, fallback: readonly number[]): number[] {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return [...fallback];

    const ids = raw
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part !== '')
        .map(Number);
    if (ids.length === 0 || ids.some((id) => !Number.isInteger(id))) {
        logger.warn(`Invalid ${key}="${raw}", using default ${fallback.join(',')}`);
        return [...fallback];
    }
    return ids;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | null {
    const value = env[key]?.trim();
    return value ? value : null;
}

/**
 * Loads engine configuration from the given environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const url = readString(env, ENV_KEYS.REDMINE_URL);

    return {
        redmine: {
            url: url ? url.replace(/\/+$/, '') : null,
            apiKey: readString(env, ENV_KEYS.REDMINE_API_KEY),
            issueContractField:
                readString(env, ENV_KEYS.REDMINE_ISSUE_CONTRACT_FIELD) ?? REDMINE_DEFAULTS.ISSUE_CONTRACT_FIELD,
            timeoutMs: readInteger(env, ENV_KEYS.REDMINE_TIMEOUT_MS, REDMINE_DEFAULTS.TIMEOUT_MS, { min: 1 }),
            maxPages: readInteger(env, ENV_KEYS.REDMINE_MAX_PAGES, DEFAULT_MAX_PAGES),
            inProgressStatusIds: readIdList(
                env,
                ENV_KEYS.REDMINE_IN_PROGRESS_STATUS_IDS,
                REDMINE_DEFAULTS.IN_PROGRESS_STATUS_IDS
            ),
        },
        sentryDsn: readString(env, ENV_KEYS.SENTRY_DSN),
        environment: readString(env, 'NODE_ENV') ?? 'development',
        userBatchSize: readInteger(env, ENV_KEYS.USER_BATCH_SIZE, CONSTANTS.DEFAULT_USER_BATCH_SIZE, { min: 1 }),
    };
}

/**
 * Whether both the Redmine URL and API key are configured.
 */
export function isRedmineConfigured(config: RedmineConfig): boolean {
    return Boolean(config.url && config.apiKey);
}
