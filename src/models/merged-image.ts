/**
 * Merged image: every tag published for one (platform, digest) pair
 */

import { HubImage } from '../types/hub';
import {
    Ordering,
    compareDates,
    compareNumbers,
    compareOptional,
    compareStrings,
    compareTuple,
    maxDate,
} from '../utils/compare-utils';
import { InvariantViolationError } from '../utils/errors';
import { Platform } from './platform';
import { VersionKey } from './version-key';

/**
 * What image ordering looks at
 */
export interface RankableImage {
    readonly dominantTag: VersionKey | null;
    readonly lastUpdated: Date;
}

interface RankedTag {
    tag: VersionKey;
    satisfiedCount: number;
}

/**
 * Order tags so the most representative one comes first.
 *
 * Versioned tags with a compatible range are scored by how many versioned tags of the set
 * satisfy that range. Broader ranges win, then shorter names, then names.
 * Everything else follows, by name.
 */
export function rankTags(tags: readonly VersionKey[]): VersionKey[] {
    const versioned = tags.filter((tag) => tag.isVersioned());

    const ranked: RankedTag[] = [];
    const remaining: VersionKey[] = [];
    for (const tag of tags) {
        const range = tag.isVersioned() ? tag.compatibleRange() : null;
        if (!range) {
            remaining.push(tag);
            continue;
        }
        const satisfiedCount = versioned.filter((candidate) => candidate.satisfies(range)).length;
        ranked.push({ tag, satisfiedCount });
    }

    ranked.sort((a, b) => compareTuple(
        () => compareNumbers(b.satisfiedCount, a.satisfiedCount),
        () => compareNumbers(a.tag.name.length, b.tag.name.length),
        () => compareStrings(a.tag.name, b.tag.name)
    ));
    remaining.sort((a, b) => compareStrings(a.name, b.name));

    return [...ranked.map((entry) => entry.tag), ...remaining];
}

export class MergedImage implements RankableImage {
    readonly platform: Platform;
    readonly digest: string;
    private tagList: VersionKey[];
    private latest: Date;
    private readonly images: HubImage[];

    constructor(image: HubImage) {
        this.platform = Platform.fromImage(image);
        this.digest = image.digest;
        this.tagList = [new VersionKey(image.tag.name)];
        this.latest = maxDate(image.tag.lastUpdated, image.lastUpdated);
        this.images = [image];
    }

    get tags(): readonly VersionKey[] {
        return this.tagList;
    }

    get tagNames(): string[] {
        return this.tagList.map((tag) => tag.name);
    }

    /**
     * First tag after ranking, null only for an empty tag set
     */
    get dominantTag(): VersionKey | null {
        return this.tagList[0] ?? null;
    }

    get lastUpdated(): Date {
        return new Date(this.latest.getTime());
    }

    get sourceImages(): readonly HubImage[] {
        return this.images;
    }

    /**
     * Distinct image statuses seen across the contributing records
     */
    get statuses(): string[] {
        const seen = new Set<string>();
        for (const image of this.images) {
            if (image.status) {
                seen.add(image.status);
            }
        }
        return [...seen].sort(compareStrings);
    }

    hasTag(name: string): boolean {
        return this.tagList.some((tag) => tag.name === name);
    }

    /**
     * Fold another record with the same platform and digest into this image.
     * A record with a different key is rejected before anything changes.
     */
    addImage(image: HubImage): void {
        if (image.digest !== this.digest) {
            throw new InvariantViolationError('Cannot add image with a different digest', {
                expected: this.digest,
                actual: image.digest,
                tag: image.tag.name,
            });
        }
        const platform = Platform.fromImage(image);
        if (!platform.equals(this.platform)) {
            throw new InvariantViolationError('Cannot add image with a different platform', {
                expected: this.platform.toString(),
                actual: platform.toString(),
                tag: image.tag.name,
            });
        }

        if (!this.hasTag(image.tag.name)) {
            this.tagList.push(new VersionKey(image.tag.name));
        }
        this.tagList = rankTags(this.tagList);
        this.latest = maxDate(this.latest, maxDate(image.tag.lastUpdated, image.lastUpdated));
        if (!this.images.includes(image)) {
            this.images.push(image);
        }
    }

    /**
     * Relevance order. Absent other ranks lower; an image without a dominant tag ranks below one
     * with a tag; otherwise (dominant tag, last updated).
     */
    compareTo(other: RankableImage | null | undefined): Ordering {
        return compareOptional<RankableImage>(this, other, MergedImage.compare);
    }

    static compare(a: RankableImage, b: RankableImage): Ordering {
        const aTag = a.dominantTag;
        const bTag = b.dominantTag;
        if (!aTag && !bTag) {
            return compareDates(a.lastUpdated, b.lastUpdated);
        }
        return compareTuple(
            () => compareOptional(aTag, bTag, VersionKey.compare),
            () => compareDates(a.lastUpdated, b.lastUpdated)
        );
    }
}
