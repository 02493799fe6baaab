/**
 * Docker Hub response parsing
 * @fileoverview Turns raw tag listing JSON into HubTag / HubImage records
 */

import { HubImage, HubImageJson, HubTag, HubTagJson, HubTagsPage } from '../types/hub';
import { HubParseError } from './errors';

export const EPOCH = new Date(0);

/**
 * Parse an ISO-8601 timestamp.
 * Absent or unreadable values become the epoch so they sort as oldest.
 */
export function parseTimestamp(value: unknown): Date {
    if (typeof value !== 'string' || value.trim() === '') {
        return new Date(EPOCH.getTime());
    }
    const time = Date.parse(value);
    return isNaN(time) ? new Date(EPOCH.getTime()) : new Date(time);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

/**
 * Build the image record for one platform entry of a tag
 */
export function parseImage(json: HubImageJson, tag: HubTag): HubImage {
    const digest = optionalString(json.digest);
    if (!digest) {
        throw new HubParseError(`Image of tag "${tag.name}" has no digest`);
    }

    return {
        architecture: optionalString(json.architecture),
        features: optionalString(json.features),
        variant: optionalString(json.variant),
        os: optionalString(json.os),
        osFeatures: optionalString(json.os_features),
        osVersion: optionalString(json.os_version),
        digest,
        status: optionalString(json.status),
        lastUpdated: parseTimestamp(json.last_pushed),
        tag,
    };
}

function hasDigest(json: HubImageJson): boolean {
    return typeof json.digest === 'string' && json.digest !== '';
}

/**
 * Build a tag record together with its images.
 * Image entries without a digest cannot be grouped; they are left out and counted.
 */
export function parseTag(json: HubTagJson): HubTag {
    if (!isRecord(json) || typeof json.name !== 'string' || json.name === '') {
        throw new HubParseError('Tag entry has no name');
    }

    const rawImages = json.images ?? [];
    if (!Array.isArray(rawImages)) {
        throw new HubParseError(`Tag "${json.name}" has a malformed images list`);
    }
    const records: HubImageJson[] = [];
    for (const rawImage of rawImages) {
        if (!isRecord(rawImage)) {
            throw new HubParseError(`Tag "${json.name}" has a malformed image entry`);
        }
        records.push(rawImage);
    }
    const withDigest = records.filter(hasDigest);

    const images: HubImage[] = [];
    const tag: HubTag = {
        name: json.name,
        lastUpdated: parseTimestamp(json.last_updated),
        status: optionalString(json.tag_status),
        images,
        skippedImages: records.length - withDigest.length,
    };
    for (const record of withDigest) {
        images.push(parseImage(record, tag));
    }

    return tag;
}

function isTagJson(value: unknown): value is HubTagJson {
    return isRecord(value) && typeof value['name'] === 'string';
}

/**
 * Validate and parse one page of the tag listing
 */
export function parseTagsPage(body: unknown): HubTagsPage {
    if (!isRecord(body)) {
        throw new HubParseError('Tags response is not an object');
    }
    const results: unknown = body['results'];
    if (!Array.isArray(results)) {
        throw new HubParseError('Tags response has no results array');
    }

    const tags = results.map((entry: unknown, index: number) => {
        if (!isTagJson(entry)) {
            throw new HubParseError(`Tags response entry ${index} is not a tag`);
        }
        return parseTag(entry);
    });

    const next = body['next'];
    const count = body['count'];

    return {
        count: typeof count === 'number' ? count : null,
        next: typeof next === 'string' && next !== '' ? next : null,
        tags,
    };
}
