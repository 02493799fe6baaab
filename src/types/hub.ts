/**
 * Docker Hub repository tags API type definitions
 * Wire shapes of GET /v2/repositories/{namespace}/{repository}/tags and the parsed records built from them
 */

/**
 * One page of the tags listing
 */
export interface HubTagsPageJson {
    count?: number;
    next?: string | null;
    previous?: string | null;
    results: HubTagJson[];
}

/**
 * Tag entry as returned by Docker Hub
 */
export interface HubTagJson {
    name: string;
    last_updated?: string | null;
    tag_status?: string | null;
    digest?: string | null;
    images?: HubImageJson[] | null;
}

/**
 * Platform-specific image entry under a tag
 */
export interface HubImageJson {
    architecture?: string | null;
    features?: string | null;
    variant?: string | null;
    os?: string | null;
    os_features?: string | null;
    os_version?: string | null;
    digest?: string | null;
    status?: string | null;
    size?: number | null;
    last_pushed?: string | null;
}

/**
 * Parsed tag record. Images keep a back-reference to it.
 */
export interface HubTag {
    readonly name: string;
    readonly lastUpdated: Date;
    readonly status: string | null;
    readonly images: readonly HubImage[];
    /** Image entries left out because they carry no digest */
    readonly skippedImages: number;
}

/**
 * Parsed image record, one per platform variant under a tag
 */
export interface HubImage {
    readonly architecture: string | null;
    readonly features: string | null;
    readonly variant: string | null;
    readonly os: string | null;
    readonly osFeatures: string | null;
    readonly osVersion: string | null;
    readonly digest: string;
    readonly status: string | null;
    readonly lastUpdated: Date;
    readonly tag: HubTag;
}

/**
 * Parsed page of tags with the link to the next one
 */
export interface HubTagsPage {
    count: number | null;
    next: string | null;
    tags: HubTag[];
}
