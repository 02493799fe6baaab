/**
 * Docker Hub Service
 * @fileoverview Fetches every tag of a repository from the Docker Hub tags API, following pagination
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { HTTP_STATUS, HubConfig, loadConfig } from '../config/constants';
import { HubTag } from '../types/hub';
import { HubRequestError, getErrorMessage } from '../utils/errors';
import { parseTagsPage } from '../utils/hub-parser';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { buildTagsUrl, normalizeRepository } from '../utils/repository-utils';

export interface HubServiceConfig extends Partial<Omit<HubConfig, 'logLevel'>> {
    logger?: Logger;
}

export class HubService {
    private readonly httpClient: AxiosInstance;
    private readonly config: HubConfig;
    private readonly logger: Logger;

    constructor(config: HubServiceConfig = {}) {
        const defaults = loadConfig();
        this.config = {
            baseUrl: (config.baseUrl ?? defaults.baseUrl).replace(/\/+$/, ''),
            pageSize: config.pageSize ?? defaults.pageSize,
            timeoutMs: config.timeoutMs ?? defaults.timeoutMs,
            maxPages: config.maxPages ?? defaults.maxPages,
            userAgent: config.userAgent ?? defaults.userAgent,
        };
        this.logger = config.logger || defaultLogger;
        this.httpClient = axios.create({
            timeout: this.config.timeoutMs,
            headers: {
                'User-Agent': this.config.userAgent,
                'Accept': 'application/json',
            },
        });
    }

    private async hubRequest(url: string): Promise<unknown> {
        const started = Date.now();
        let response: AxiosResponse<unknown>;
        try {
            response = await this.httpClient.get<unknown>(url, {
                validateStatus: (status) => status < HTTP_STATUS.INTERNAL_SERVER_ERROR,
            });
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new HubRequestError(`Docker Hub request failed: ${error.message}`, url, {
                    cause: error,
                    ...(error.response && { statusCode: error.response.status }),
                });
            }
            throw new HubRequestError(`Docker Hub request failed: ${getErrorMessage(error)}`, url, { cause: error });
        }

        this.logger.debug('Docker Hub response', {
            url,
            status: response.status,
            durationMs: Date.now() - started,
        });

        if (response.status >= HTTP_STATUS.BAD_REQUEST) {
            const message = response.status === HTTP_STATUS.NOT_FOUND
                ? 'Repository not found'
                : `HTTP ${response.status}: ${response.statusText}`;
            throw new HubRequestError(message, url, { statusCode: response.status });
        }

        return response.data;
    }

    /**
     * List every tag of a repository with its platform images
     */
    async listTags(repository: string): Promise<HubTag[]> {
        const normalized = normalizeRepository(repository);
        const allTags: HubTag[] = [];
        let url: string | null = buildTagsUrl(this.config.baseUrl, normalized, this.config.pageSize);
        let pages = 0;

        while (url) {
            if (pages >= this.config.maxPages) {
                throw new HubRequestError(
                    `Stopped after ${this.config.maxPages} pages of tags for ${normalized}`,
                    url
                );
            }
            const page = parseTagsPage(await this.hubRequest(url));
            pages += 1;
            allTags.push(...page.tags);
            this.logger.debug('Fetched tags page', {
                repository: normalized,
                page: pages,
                tags: page.tags.length,
                total: page.count,
            });
            const skipped = page.tags.reduce((total, tag) => total + tag.skippedImages, 0);
            if (skipped > 0) {
                this.logger.warn('Skipped image records without a digest', {
                    repository: normalized,
                    page: pages,
                    skipped,
                });
            }
            url = page.next;
        }

        this.logger.info('Fetched repository tags', { repository: normalized, tags: allTags.length, pages });
        return allTags;
    }
}
