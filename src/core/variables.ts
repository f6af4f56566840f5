/**
 * Dotted-path variable resolution over nested objects, arrays and strings.
 * Shared by `var`, `missing` and `missing_some`.
 */

import { isPlainObject } from './rule.js';

const INDEX_SEGMENT = /^-?\d+$/;

/**
 * Read one path segment from a container.
 * Returns [value, found]; a miss never throws.
 */
function step(container: unknown, segment: string): [unknown, boolean] {
    if (isPlainObject(container)) {
        return Object.hasOwn(container, segment) ? [container[segment], true] : [undefined, false];
    }

    if (Array.isArray(container) || typeof container === 'string') {
        if (!INDEX_SEGMENT.test(segment)) {
            return [undefined, false];
        }
        let index = Number(segment);
        if (index < 0) {
            index += container.length;
        }
        if (index < 0 || index >= container.length) {
            return [undefined, false];
        }
        return [container[index], true];
    }

    return [undefined, false];
}

/**
 * Get a variable from the data context.
 * A null, undefined or empty name returns the whole context.
 * "a.b.0" walks objects by key and arrays (or strings) by index.
 */
export function resolveVariable(data: unknown, name: unknown, fallback: unknown = null): unknown {
    if (name === null || name === undefined || name === '') {
        return data;
    }

    let current = data;
    for (const segment of String(name).split('.')) {
        const [next, found] = step(current, segment);
        if (!found) {
            return fallback;
        }
        current = next;
    }
    return current;
}

export function isMissingValue(value: unknown): boolean {
    return value === null || value === undefined || value === '';
}

/**
 * Names whose value resolves to null or "", in order, duplicates kept.
 */
export function findMissing(data: unknown, names: readonly unknown[]): unknown[] {
    return names.filter(name => isMissingValue(resolveVariable(data, name)));
}
