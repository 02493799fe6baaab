/**
 * Application constants for hub-tags
 */

export const DOCKER_HUB = {
    BASE_URL: 'https://registry.hub.docker.com/v2',
    OFFICIAL_NAMESPACE: 'library',
    USER_AGENT: 'hub-tags/1.0',
    PAGE_SIZE: 100,
    MAX_PAGE_SIZE: 100,
    TIMEOUT_MS: 30000,
    MAX_PAGES: 1000,
} as const;

export const DEFAULTS = {
    ARCHITECTURE: 'amd64',
    ANY_ARCHITECTURE: '*',
    FORMAT: 'text',
    TAG_SEPARATOR: ', ',
} as const;

export const HTTP_STATUS = {
    BAD_REQUEST: 400,
    NOT_FOUND: 404,
    INTERNAL_SERVER_ERROR: 500,
} as const;

export const OUTPUT_FORMATS = ['text', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface HubConfig {
    baseUrl: string;
    pageSize: number;
    timeoutMs: number;
    maxPages: number;
    userAgent: string;
    logLevel?: string;
}

export type Environment = Record<string, string | undefined>;

function readPositiveInt(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') {
        return fallback;
    }
    const parsed = parseInt(value, 10);
    return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/**
 * Build the Hub configuration from environment overrides
 */
export function loadConfig(env: Environment = process.env): HubConfig {
    const baseUrl = (env['DOCKER_HUB_URL'] || DOCKER_HUB.BASE_URL).replace(/\/+$/, '');
    const pageSize = Math.min(
        readPositiveInt(env['HUB_PAGE_SIZE'], DOCKER_HUB.PAGE_SIZE),
        DOCKER_HUB.MAX_PAGE_SIZE
    );

    return {
        baseUrl,
        pageSize,
        timeoutMs: readPositiveInt(env['HUB_TIMEOUT_MS'], DOCKER_HUB.TIMEOUT_MS),
        maxPages: readPositiveInt(env['HUB_MAX_PAGES'], DOCKER_HUB.MAX_PAGES),
        userAgent: DOCKER_HUB.USER_AGENT,
        logLevel: env['LOG_LEVEL'],
    };
}
