/**
 * Grouping pipeline
 * @fileoverview Partitions image records by platform, then folds each partition by digest into merged images
 */

import { MergedImage } from '../models/merged-image';
import { Platform } from '../models/platform';
import { HubImage, HubTag } from '../types/hub';

export interface PlatformBucket<T> {
    platform: Platform;
    items: T;
}

/**
 * Platform key -> merged images of that platform keyed by digest
 */
export type GroupedImages = Map<string, PlatformBucket<Map<string, MergedImage>>>;

/**
 * Every image record of every tag, in listing order
 */
export function flattenImages(tags: readonly HubTag[]): HubImage[] {
    return tags.flatMap((tag) => tag.images);
}

export function groupByPlatform(images: readonly HubImage[]): Map<string, PlatformBucket<HubImage[]>> {
    const buckets = new Map<string, PlatformBucket<HubImage[]>>();
    for (const image of images) {
        const platform = Platform.fromImage(image);
        const key = platform.key();
        const bucket = buckets.get(key);
        if (bucket) {
            bucket.items.push(image);
        } else {
            buckets.set(key, { platform, items: [image] });
        }
    }
    return buckets;
}

/**
 * Fold one record into the digest map: look up or insert, then update
 */
export function foldImage(byDigest: Map<string, MergedImage>, image: HubImage): Map<string, MergedImage> {
    const existing = byDigest.get(image.digest);
    if (existing) {
        existing.addImage(image);
    } else {
        byDigest.set(image.digest, new MergedImage(image));
    }
    return byDigest;
}

/**
 * Merge records of a single platform by digest.
 * A record from another platform raises InvariantViolationError from the merged image.
 */
export function groupByDigest(images: readonly HubImage[]): Map<string, MergedImage> {
    return images.reduce(foldImage, new Map<string, MergedImage>());
}

/**
 * Full pipeline from parsed tags to merged images per platform
 */
export function groupImages(tags: readonly HubTag[]): GroupedImages {
    const grouped: GroupedImages = new Map();
    for (const [key, bucket] of groupByPlatform(flattenImages(tags))) {
        grouped.set(key, { platform: bucket.platform, items: groupByDigest(bucket.items) });
    }
    return grouped;
}
