/**
 * Comparison helpers shared by tag and image ordering
 * @fileoverview Three-way comparators returning -1, 0 or 1
 */

export type Ordering = -1 | 0 | 1;

export type Comparator<T> = (a: T, b: T) => Ordering;

/**
 * Clamp any numeric comparison result to -1, 0 or 1
 */
export function sign(value: number): Ordering {
    if (value < 0) return -1;
    if (value > 0) return 1;
    return 0;
}

/**
 * Compare two possibly absent values.
 * A present value ranks greater than an absent one; two absent values are equal.
 */
export function compareOptional<T>(
    a: T | null | undefined,
    b: T | null | undefined,
    compare: Comparator<T>
): Ordering {
    const aAbsent = a === null || a === undefined;
    const bAbsent = b === null || b === undefined;

    if (aAbsent && bAbsent) return 0;
    if (bAbsent) return 1;
    if (aAbsent) return -1;
    return compare(a, b);
}

/**
 * Lexicographic combination: the first non-zero result wins.
 * Results are passed as thunks so later keys are only computed on ties.
 */
export function compareTuple(...results: Array<() => Ordering>): Ordering {
    for (const result of results) {
        const value = result();
        if (value !== 0) {
            return value;
        }
    }
    return 0;
}

/**
 * Code-unit order, independent of locale
 */
export function compareStrings(a: string, b: string): Ordering {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function compareNumbers(a: number, b: number): Ordering {
    return sign(a - b);
}

export function compareDates(a: Date, b: Date): Ordering {
    return compareNumbers(a.getTime(), b.getTime());
}

/**
 * Later of two dates (the first one on a tie)
 */
export function maxDate(a: Date, b: Date): Date {
    return compareDates(b, a) > 0 ? b : a;
}
