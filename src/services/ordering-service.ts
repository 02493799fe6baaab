/**
 * Image ordering
 * @fileoverview Ranks merged images within a platform, most relevant first, and filters platforms
 */

import { DEFAULTS } from '../config/constants';
import { MergedImage, RankableImage } from '../models/merged-image';
import { Platform } from '../models/platform';
import { Ordering, compareOptional } from '../utils/compare-utils';
import { GroupedImages } from './grouping-service';

export interface PlatformFilter {
    /** Architecture to keep, or '*' for all */
    architecture: string;
    os?: string;
    variant?: string;
}

export interface SummaryLine {
    lastUpdated: Date;
    digest: string;
    tagNames: string[];
    /** Tag names joined for display */
    tags: string;
    /** Distinct statuses reported for the contributing image records */
    statuses: string[];
}

export interface PlatformSummary {
    platform: Platform;
    lines: SummaryLine[];
}

export const DEFAULT_FILTER: PlatformFilter = {
    architecture: DEFAULTS.ARCHITECTURE,
};

/**
 * Relevance comparison; an absent image ranks below any present one
 */
export function compareImages(a: RankableImage | null | undefined, b: RankableImage | null | undefined): Ordering {
    return compareOptional(a, b, MergedImage.compare);
}

/**
 * Most relevant first. Equal images keep their input order.
 */
export function rankImages<T extends RankableImage>(images: Iterable<T>): T[] {
    return [...images].sort((a, b) => MergedImage.compare(b, a));
}

export function matchesPlatform(platform: Platform, filter: PlatformFilter): boolean {
    if (filter.architecture !== DEFAULTS.ANY_ARCHITECTURE && platform.architecture !== filter.architecture) {
        return false;
    }
    if (filter.os !== undefined && platform.os !== filter.os) {
        return false;
    }
    if (filter.variant !== undefined && platform.variant !== filter.variant) {
        return false;
    }
    return true;
}

export function toSummaryLine(image: MergedImage): SummaryLine {
    const tagNames = image.tagNames;
    return {
        lastUpdated: image.lastUpdated,
        digest: image.digest,
        tagNames,
        tags: tagNames.join(DEFAULTS.TAG_SEPARATOR),
        statuses: image.statuses,
    };
}

/**
 * Ranked lines for every platform accepted by the filter, in first-seen platform order
 */
export function summarizePlatforms(grouped: GroupedImages, filter: PlatformFilter = DEFAULT_FILTER): PlatformSummary[] {
    const summaries: PlatformSummary[] = [];
    for (const { platform, items } of grouped.values()) {
        if (!matchesPlatform(platform, filter)) {
            continue;
        }
        summaries.push({
            platform,
            lines: rankImages(items.values()).map(toSummaryLine),
        });
    }
    return summaries;
}
