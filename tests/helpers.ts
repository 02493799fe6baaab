/**
 * Builders for Hub tag and image records used across the unit tests
 */

import { HubImage, HubImageJson, HubTag } from '../src/types/hub';
import { parseTag } from '../src/utils/hub-parser';

export const AMD64: Partial<HubImageJson> = { architecture: 'amd64', os: 'linux' };
export const ARM64: Partial<HubImageJson> = { architecture: 'arm64', os: 'linux', variant: 'v8' };

export interface TagOptions {
    lastUpdated?: string | null;
    status?: string;
    images?: Array<Partial<HubImageJson>>;
}

export function hubTag(name: string, options: TagOptions = {}): HubTag {
    const images = options.images ?? [{}];
    return parseTag({
        name,
        last_updated: options.lastUpdated ?? null,
        tag_status: options.status ?? 'active',
        images: images.map((image) => ({
            ...AMD64,
            digest: 'sha256:aaa',
            status: 'active',
            last_pushed: null,
            ...image,
        })),
    });
}

export function hubImage(name: string, image: Partial<HubImageJson> = {}, tagLastUpdated: string | null = null): HubImage {
    const [first] = hubTag(name, { lastUpdated: tagLastUpdated, images: [image] }).images;
    if (!first) {
        throw new Error(`No image built for ${name}`);
    }
    return first;
}
