/**
 * Version key: a tag name with its optional semantic version
 * @fileoverview Parsing, ordering and compatible-release ranges for tag names
 */

import { Range, SemVer, compare as compareSemver, parse as parseSemver, satisfies } from 'semver';
import { Ordering, compareOptional, compareStrings, compareTuple } from '../utils/compare-utils';

/**
 * MAJOR[.MINOR[.PATCH]][-PRERELEASE][+BUILD] with numeric release components
 */
const VERSION_PATTERN =
    /^(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

export interface ParsedVersion {
    semver: SemVer;
    /** Number of release components written in the tag (1 to 3) */
    precision: 1 | 2 | 3;
}

/**
 * Parse a tag name as a version. Returns null for names that are not versions.
 */
export function parseVersion(name: string): ParsedVersion | null {
    const match = VERSION_PATTERN.exec(name);
    if (!match) {
        return null;
    }

    const [, major = '0', minor, patch, prerelease, build] = match;
    const precision = patch !== undefined ? 3 : minor !== undefined ? 2 : 1;

    let normalized = [major, minor ?? '0', patch ?? '0'].map((part) => String(Number(part))).join('.');
    if (prerelease !== undefined) {
        normalized += `-${prerelease}`;
    }
    if (build !== undefined) {
        normalized += `+${build}`;
    }

    const semver = parseSemver(normalized);
    return semver ? { semver, precision } : null;
}

export class VersionKey {
    readonly name: string;
    private readonly parsed: ParsedVersion | null;
    private cachedRange: Range | null | undefined;

    constructor(name: string) {
        this.name = name;
        this.parsed = parseVersion(name);
    }

    static parse(name: string): VersionKey {
        return new VersionKey(name);
    }

    get version(): SemVer | null {
        return this.parsed ? this.parsed.semver : null;
    }

    get precision(): number {
        return this.parsed ? this.parsed.precision : 0;
    }

    isVersioned(): boolean {
        return this.parsed !== null;
    }

    /**
     * Keys are identified by name alone
     */
    equals(other: VersionKey | null | undefined): boolean {
        return !!other && other.name === this.name;
    }

    /**
     * Three-way comparison. Absent other ranks lower; an unversioned side falls back to names;
     * otherwise (version, name).
     */
    compareTo(other: VersionKey | null | undefined): Ordering {
        return compareOptional<VersionKey>(this, other, VersionKey.compare);
    }

    static compare(a: VersionKey, b: VersionKey): Ordering {
        const aVersion = a.version;
        const bVersion = b.version;
        if (!aVersion || !bVersion) {
            return compareStrings(a.name, b.name);
        }
        return compareTuple(
            () => compareSemver(aVersion, bVersion),
            () => compareStrings(a.name, b.name)
        );
    }

    /**
     * Compatible-release (pessimistic) range of this version:
     * 1 and 1.2 admit anything below the next major, 1.2.3 anything below the next minor,
     * a pre-release only later pre-releases of the same release.
     * Null when the key is unversioned or no range can be built from it.
     */
    compatibleRange(): Range | null {
        if (this.cachedRange === undefined) {
            this.cachedRange = this.buildCompatibleRange();
        }
        return this.cachedRange;
    }

    private buildCompatibleRange(): Range | null {
        if (!this.parsed) {
            return null;
        }
        const { semver, precision } = this.parsed;
        if (semver.build.length > 0) {
            return null;
        }

        const { major, minor, patch } = semver;
        let upper: string;
        if (semver.prerelease.length > 0) {
            upper = `${major}.${minor}.${patch}`;
        } else if (precision < 3) {
            upper = `${major + 1}.0.0`;
        } else {
            upper = `${major}.${minor + 1}.0`;
        }

        try {
            return new Range(`>=${semver.version} <${upper}`);
        } catch {
            return null;
        }
    }

    /**
     * Whether this key's version falls inside the range; always false when unversioned
     */
    satisfies(range: Range): boolean {
        const version = this.version;
        return version !== null && satisfies(version, range);
    }

    toString(): string {
        return this.name;
    }
}
