/**
 * Rule classification.
 * Turns a raw JSON value into an explicit literal / array / operation variant.
 */

import type { ParsedRule } from './types.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True iff the value is an object with exactly one key.
 * An array of rules is not a rule itself.
 */
export function isRule(value: unknown): value is Record<string, unknown> {
    return isPlainObject(value) && Object.keys(value).length === 1;
}

/**
 * Unary sugar: `{"var": "a"}` is the same as `{"var": ["a"]}`.
 */
export function normalizeArgs(values: unknown): unknown[] {
    return Array.isArray(values) ? values : [values];
}

export function classifyRule(rule: unknown): ParsedRule {
    if (Array.isArray(rule)) {
        return { kind: 'array', rules: rule };
    }

    if (isPlainObject(rule)) {
        const keys = Object.keys(rule);
        if (keys.length === 1) {
            const operator = keys[0];
            return { kind: 'operation', operator, args: normalizeArgs(rule[operator]) };
        }
    }

    // Empty and multi-key objects pass through as data
    return { kind: 'literal', value: rule };
}

/** Operator name of a single-key rule. */
export function operatorOf(rule: Record<string, unknown>): string {
    return Object.keys(rule)[0];
}

/** Raw (un-normalized) argument value of a single-key rule. */
export function argumentsOf(rule: Record<string, unknown>): unknown {
    return rule[operatorOf(rule)];
}
