/**
 * Value coercion rules shared by comparison, arithmetic and string operators.
 * None of these throw: a failed coercion is reported through the `ok` flag
 * and callers fall back to `false` or `null`.
 */

import { isDeepStrictEqual } from 'node:util';
import { isPlainObject } from './rule.js';

const NUMERIC_STRING = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;
const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

export type TypeTag = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object' | 'other';

export function typeTag(value: unknown): TypeTag {
    if (value === null || value === undefined) return 'null';
    if (Array.isArray(value)) return 'array';
    switch (typeof value) {
        case 'boolean':
            return 'boolean';
        case 'number':
            return 'number';
        case 'string':
            return 'string';
        case 'object':
            return 'object';
        default:
            return 'other';
    }
}

/**
 * Determine if a value is "truthy".
 * nil, false, 0, NaN, "", empty arrays and empty objects are falsy. Everything else is truthy.
 */
export function isTruthy(value: unknown): boolean {
    if (value === null || value === undefined) {
        return false;
    }
    if (typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'number') {
        return value !== 0 && !Number.isNaN(value);
    }
    if (typeof value === 'string') {
        return value !== '';
    }
    if (Array.isArray(value)) {
        return value.length > 0;
    }
    if (typeof value === 'object') {
        return Object.keys(value).length > 0;
    }
    return true;
}

/**
 * String form used by `cat`, `substr`, `log` and loose equality.
 */
export function toText(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (value === null || value === undefined) {
        return 'null';
    }
    if (typeof value === 'object' && !(value instanceof Date)) {
        return JSON.stringify(value);
    }
    return String(value);
}

function looksNumeric(value: unknown): boolean {
    return typeof value === 'number' || (typeof value === 'string' && NUMERIC_STRING.test(value));
}

/**
 * Convert a value to a number for ordering comparisons.
 * Booleans count as 1/0; strings must be numeric literals.
 */
export function toNumber(v: unknown): [number, boolean] {
    if (typeof v === 'number') {
        return [v, !Number.isNaN(v)];
    }
    if (typeof v === 'boolean') {
        return [v ? 1 : 0, true];
    }
    if (typeof v === 'string' && NUMERIC_STRING.test(v)) {
        return [Number(v.trim()), true];
    }
    return [0, false];
}

/**
 * Integral results lose the sign of zero; non-finite results are rejected.
 */
export function normalizeNumber(n: number): [number, boolean] {
    if (!Number.isFinite(n)) {
        return [0, false];
    }
    return [Number.isInteger(n) ? n + 0 : n, true];
}

/**
 * Numeric normalization applied to every arithmetic operand:
 * a string containing "." parses as a float, any other string must be an integer literal.
 */
export function toNumeric(v: unknown): [number, boolean] {
    if (typeof v === 'number') {
        return normalizeNumber(v);
    }
    if (typeof v === 'boolean') {
        return [v ? 1 : 0, true];
    }
    if (typeof v === 'string') {
        const pattern = v.includes('.') ? NUMERIC_STRING : INTEGER_STRING;
        if (!pattern.test(v)) {
            return [0, false];
        }
        return normalizeNumber(Number(v.trim()));
    }
    return [0, false];
}

// Object literals and JSON objects; class instances such as Date fall through to isDeepStrictEqual
function isRecord(value: unknown): value is Record<string, unknown> {
    if (!isPlainObject(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Structural equality where numbers compare by value, so -0 equals 0.
 */
export function sameValue(a: unknown, b: unknown): boolean {
    if (typeof a === 'number' && typeof b === 'number') {
        return a === b;
    }
    if (Array.isArray(a) && Array.isArray(b)) {
        if (a.length !== b.length) {
            return false;
        }
        for (let i = 0; i < a.length; i++) {
            if (!sameValue(a[i], b[i])) {
                return false;
            }
        }
        return true;
    }
    if (isRecord(a) && isRecord(b)) {
        const keys = Object.keys(a);
        if (keys.length !== Object.keys(b).length) {
            return false;
        }
        for (const key of keys) {
            if (!Object.hasOwn(b, key) || !sameValue(a[key], b[key])) {
                return false;
            }
        }
        return true;
    }
    return isDeepStrictEqual(a ?? null, b ?? null);
}

/**
 * Loose equality ('==').
 * A string on either side compares string forms, a boolean compares truthiness,
 * anything else compares structurally.
 */
export function looseEqual(a: unknown, b: unknown): boolean {
    if (typeof a === 'string' || typeof b === 'string') {
        return toText(a) === toText(b);
    }
    if (typeof a === 'boolean' || typeof b === 'boolean') {
        return isTruthy(a) === isTruthy(b);
    }
    return sameValue(a, b);
}

/**
 * Strict equality ('===').
 * Integers and floats share the 'number' tag, so 1 and 1.0 are strictly equal.
 */
export function strictEqual(a: unknown, b: unknown): boolean {
    if (typeTag(a) !== typeTag(b)) {
        return false;
    }
    return sameValue(a, b);
}

/**
 * Binary core of '<'.
 * Numeric when either side looks numeric; two booleans order false before true;
 * two plain strings compare lexicographically.
 */
export function lessThan(a: unknown, b: unknown): boolean {
    if (looksNumeric(a) || looksNumeric(b)) {
        const [aNum, aOk] = toNumber(a);
        const [bNum, bOk] = toNumber(b);
        return aOk && bOk && aNum < bNum;
    }
    if (typeof a === 'boolean' && typeof b === 'boolean') {
        return Number(a) < Number(b);
    }
    if (typeof a === 'string' && typeof b === 'string') {
        return a < b;
    }
    return false;
}

export function lessOrEqual(a: unknown, b: unknown): boolean {
    return lessThan(a, b) || looseEqual(a, b);
}
