/**
 * Repository summary
 * @fileoverview Fetch, group and rank the tags of a repository, and render the result
 */

import { OutputFormat } from '../config/constants';
import { HubTag } from '../types/hub';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { groupImages } from './grouping-service';
import { HubService } from './hub-service';
import { DEFAULT_FILTER, PlatformFilter, PlatformSummary, summarizePlatforms } from './ordering-service';

/**
 * Anything that can hand over the complete tag listing of a repository
 */
export interface TagSource {
    listTags(repository: string): Promise<HubTag[]>;
}

export interface SummaryServiceConfig {
    source?: TagSource;
    logger?: Logger;
}

export interface FormatOptions {
    format: OutputFormat;
    /** Print a heading per platform even when only one platform matched */
    showPlatform?: boolean;
}

export class SummaryService {
    private readonly source: TagSource;
    private readonly logger: Logger;

    constructor(config: SummaryServiceConfig = {}) {
        this.logger = config.logger || defaultLogger;
        this.source = config.source || new HubService({ logger: this.logger });
    }

    /**
     * Ranked merged images per platform matching the filter
     */
    async summarizeRepository(repository: string, filter: PlatformFilter = DEFAULT_FILTER): Promise<PlatformSummary[]> {
        const tags = await this.source.listTags(repository);
        const grouped = groupImages(tags);
        const summaries = summarizePlatforms(grouped, filter);

        this.logger.debug('Grouped repository images', {
            repository,
            platforms: grouped.size,
            matchedPlatforms: summaries.length,
            images: summaries.reduce((total, summary) => total + summary.lines.length, 0),
        });
        if (summaries.length === 0) {
            this.logger.warn('No images match the platform filter', { repository, filter });
        }

        return summaries;
    }
}

/**
 * Render summaries for stdout.
 * text: one "timestamp<TAB>tags" line per image; json: an array of platforms with their images.
 */
export function formatSummary(summaries: readonly PlatformSummary[], options: FormatOptions): string {
    if (options.format === 'json') {
        const payload = summaries.map((summary) => ({
            platform: summary.platform.toString(),
            architecture: summary.platform.architecture,
            os: summary.platform.os,
            variant: summary.platform.variant,
            images: summary.lines.map((line) => ({
                lastUpdated: line.lastUpdated.toISOString(),
                digest: line.digest,
                tags: line.tagNames,
                statuses: line.statuses,
            })),
        }));
        return JSON.stringify(payload, null, 2);
    }

    const withHeadings = options.showPlatform || summaries.length > 1;
    const lines: string[] = [];
    for (const summary of summaries) {
        if (withHeadings) {
            lines.push(`# ${summary.platform.toString()}`);
        }
        for (const line of summary.lines) {
            lines.push(`${line.lastUpdated.toISOString()}\t${line.tags}`);
        }
    }
    return lines.join('\n');
}
