/**
 * Unit tests for configuration
 */

import { DEFAULTS, DOCKER_HUB, loadConfig } from '../../../src/config/constants';

describe('Configuration', () => {
    test('should use defaults without overrides', () => {
        expect(loadConfig({})).toEqual({
            baseUrl: 'https://registry.hub.docker.com/v2',
            pageSize: 100,
            timeoutMs: 30000,
            maxPages: 1000,
            userAgent: 'hub-tags/1.0',
            logLevel: undefined,
        });
    });

    test('should read environment overrides', () => {
        const config = loadConfig({
            DOCKER_HUB_URL: 'https://hub.test/v2/',
            HUB_PAGE_SIZE: '25',
            HUB_TIMEOUT_MS: '5000',
            HUB_MAX_PAGES: '3',
            LOG_LEVEL: 'debug',
        });

        expect(config).toEqual({
            baseUrl: 'https://hub.test/v2',
            pageSize: 25,
            timeoutMs: 5000,
            maxPages: 3,
            userAgent: 'hub-tags/1.0',
            logLevel: 'debug',
        });
    });

    test('should cap the page size at the Hub maximum', () => {
        expect(loadConfig({ HUB_PAGE_SIZE: '500' }).pageSize).toBe(DOCKER_HUB.MAX_PAGE_SIZE);
    });

    test('should ignore invalid numbers', () => {
        const config = loadConfig({ HUB_PAGE_SIZE: 'many', HUB_TIMEOUT_MS: '-1', HUB_MAX_PAGES: '' });

        expect(config.pageSize).toBe(DOCKER_HUB.PAGE_SIZE);
        expect(config.timeoutMs).toBe(DOCKER_HUB.TIMEOUT_MS);
        expect(config.maxPages).toBe(DOCKER_HUB.MAX_PAGES);
    });

    test('should default to amd64', () => {
        expect(DEFAULTS.ARCHITECTURE).toBe('amd64');
    });
});
