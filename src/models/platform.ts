/**
 * Platform key: the build target an image was published for
 */

import { HubImage } from '../types/hub';

export interface PlatformFields {
    architecture: string | null;
    features: string | null;
    variant: string | null;
    os: string | null;
    osFeatures: string | null;
    osVersion: string | null;
}

/**
 * Immutable (architecture, features, variant, os, os features, os version) tuple.
 * Used only for equality and grouping, never ordered.
 */
export class Platform implements PlatformFields {
    readonly architecture: string | null;
    readonly features: string | null;
    readonly variant: string | null;
    readonly os: string | null;
    readonly osFeatures: string | null;
    readonly osVersion: string | null;
    private readonly hashKey: string;

    constructor(fields: Partial<PlatformFields> = {}) {
        this.architecture = fields.architecture ?? null;
        this.features = fields.features ?? null;
        this.variant = fields.variant ?? null;
        this.os = fields.os ?? null;
        this.osFeatures = fields.osFeatures ?? null;
        this.osVersion = fields.osVersion ?? null;
        // JSON keeps null and "" apart
        this.hashKey = JSON.stringify(this.toTuple());
        Object.freeze(this);
    }

    static fromImage(image: HubImage): Platform {
        return new Platform({
            architecture: image.architecture,
            features: image.features,
            variant: image.variant,
            os: image.os,
            osFeatures: image.osFeatures,
            osVersion: image.osVersion,
        });
    }

    toTuple(): Array<string | null> {
        return [this.architecture, this.features, this.variant, this.os, this.osFeatures, this.osVersion];
    }

    /**
     * Map key; equal platforms produce equal keys
     */
    key(): string {
        return this.hashKey;
    }

    equals(other: Platform | null | undefined): boolean {
        return !!other && other.hashKey === this.hashKey;
    }

    /**
     * Label in the os/architecture/variant form used by docker, e.g. linux/arm64/v8
     */
    toString(): string {
        const parts = [this.os ?? 'unknown', this.architecture ?? 'unknown'];
        if (this.variant) {
            parts.push(this.variant);
        }
        let label = parts.join('/');
        if (this.osVersion) {
            label += ` (${this.osVersion})`;
        }
        return label;
    }
}
