/**
 * Built-in operator tables, one per category.
 * All operators are nil-safe: wrong arity or unusable operands return false, null
 * or an empty array instead of throwing.
 */

import type { BuiltinOperator, EvalState, ResolveFn } from './types.js';
import {
    isTruthy,
    looseEqual,
    strictEqual,
    lessThan,
    lessOrEqual,
    toText,
    toNumeric,
    normalizeNumber,
} from './coerce.js';
import { normalizeArgs } from './rule.js';
import { resolveVariable, findMissing } from './variables.js';

const VARIADIC = Infinity;

// ============================================================
// Helpers
// ============================================================

/**
 * Normalize every operand; one failure poisons the whole operation.
 */
function numericOperands(args: unknown[]): number[] | null {
    const operands: number[] = [];
    for (const arg of args) {
        const [n, ok] = toNumeric(arg);
        if (!ok) {
            return null;
        }
        operands.push(n);
    }
    return operands;
}

function numericResult(n: number): number | null {
    const [value, ok] = normalizeNumber(n);
    return ok ? value : null;
}

function arithmetic(args: unknown[], compute: (operands: number[]) => number): number | null {
    const operands = numericOperands(args);
    if (operands === null) {
        return null;
    }
    return numericResult(compute(operands));
}

function toInteger(v: unknown, fallback: number): number {
    const [n, ok] = toNumeric(v);
    return ok ? Math.trunc(n) : fallback;
}

/**
 * Slice by code points: start may count from the end, a negative length trims the end.
 */
function substring(source: unknown, start: unknown, length: unknown): string {
    const chars = Array.from(toText(source));
    const rest = chars.slice(toInteger(start, 0));
    if (length === null || length === undefined) {
        return rest.join('');
    }
    return rest.slice(0, toInteger(length, rest.length)).join('');
}

function contains(needle: unknown, haystack: unknown): boolean {
    if (Array.isArray(haystack)) {
        return haystack.some(item => strictEqual(item, needle));
    }
    if (typeof haystack === 'string') {
        return typeof needle === 'string' && haystack.includes(needle);
    }
    if (typeof haystack === 'object' && haystack !== null) {
        return typeof needle === 'string' && Object.hasOwn(haystack, needle);
    }
    return false;
}

function merge(args: unknown[]): unknown[] {
    const result: unknown[] = [];
    for (const arg of args) {
        if (Array.isArray(arg)) {
            for (const item of arg) {
                result.push(item);
            }
        } else {
            result.push(arg);
        }
    }
    return result;
}

// Members that lead to constructors or rewrite prototypes
const BLOCKED_MEMBERS: ReadonlySet<string> = new Set([
    'constructor',
    'prototype',
    '__proto__',
    '__defineGetter__',
    '__defineSetter__',
    '__lookupGetter__',
    '__lookupSetter__',
]);

/**
 * Property or method access on a host value.
 * Function members are invoked with `args`; other members are returned as-is.
 */
function invokeMember(target: unknown, name: unknown, args: unknown, state: EvalState): unknown {
    if (target === null || target === undefined || typeof name !== 'string' || BLOCKED_MEMBERS.has(name)) {
        return null;
    }

    const boxed: object = Object(target);
    if (!(name in boxed)) {
        return null;
    }

    const member: unknown = Reflect.get(boxed, name);
    if (typeof member !== 'function') {
        return member ?? null;
    }

    const callArgs = args === null || args === undefined ? [] : normalizeArgs(args);
    try {
        return Reflect.apply(member, target, callArgs) ?? null;
    } catch (err) {
        state.logger.warn(`method '${name}' failed: ${err instanceof Error ? err.message : String(err)}`);
        return null;
    }
}

function withData(state: EvalState, data: unknown): EvalState {
    return { ...state, data };
}

/**
 * Evaluate the scoped data argument against the outer context.
 * Returns null when it is not an array.
 */
function scopedItems(args: unknown[], state: EvalState, resolve: ResolveFn): unknown[] | null {
    const items = resolve(args[0], state);
    return Array.isArray(items) ? items : null;
}

/**
 * Elements whose scoped logic is truthy. Every element is evaluated.
 */
function filterItems(args: unknown[], state: EvalState, resolve: ResolveFn): unknown[] {
    const items = scopedItems(args, state, resolve);
    if (items === null) {
        return [];
    }
    const logic = args[1];
    return items.filter(item => isTruthy(resolve(logic, withData(state, item))));
}

/**
 * if/elif/else over raw arguments: (cond, then)* [else]
 */
function conditional(args: unknown[], state: EvalState, resolve: ResolveFn): unknown {
    for (let i = 0; i + 1 < args.length; i += 2) {
        if (isTruthy(resolve(args[i], state))) {
            return resolve(args[i + 1], state);
        }
    }

    // Else clause (odd number of elements = has else)
    if (args.length % 2 === 1) {
        return resolve(args[args.length - 1], state);
    }

    return null;
}

// ============================================================
// Logical: raw arguments, the operator drives evaluation
// ============================================================

export const LOGICAL_OPERATORS: Readonly<Record<string, BuiltinOperator>> = {
    'if': {
        arity: [0, VARIADIC],
        fn: conditional,
    },

    '?:': {
        arity: [3, 3],
        fn: (args, state, resolve) => {
            const [test = null, consequent = null, alternative = null] = args;
            return conditional([test, consequent, alternative], state, resolve);
        },
    },

    'and': {
        arity: [1, VARIADIC],
        fn: (args, state, resolve) => {
            let current: unknown = false;
            for (const arg of args) {
                current = resolve(arg, state);
                if (!isTruthy(current)) {
                    return current;
                }
            }
            return current;
        },
    },

    'or': {
        arity: [1, VARIADIC],
        fn: (args, state, resolve) => {
            let current: unknown = false;
            for (const arg of args) {
                current = resolve(arg, state);
                if (isTruthy(current)) {
                    return current;
                }
            }
            return current;
        },
    },
};

// ============================================================
// Scoped: (data, logic[, initial]) with a fresh context per element
// ============================================================

export const SCOPED_OPERATORS: Readonly<Record<string, BuiltinOperator>> = {
    'filter': {
        arity: [2, 2],
        fn: filterItems,
    },

    'map': {
        arity: [2, 2],
        fn: (args, state, resolve) => {
            const items = scopedItems(args, state, resolve);
            if (items === null) {
                return [];
            }
            const logic = args[1];
            return items.map(item => resolve(logic, withData(state, item)));
        },
    },

    'reduce': {
        arity: [2, 3],
        fn: (args, state, resolve) => {
            const initial = args.length > 2 ? resolve(args[2], state) : null;
            const items = scopedItems(args, state, resolve);
            if (items === null) {
                return initial;
            }
            const logic = args[1];
            return items.reduce<unknown>(
                (accumulator, current) => resolve(logic, withData(state, { accumulator, current })),
                initial
            );
        },
    },

    'all': {
        arity: [2, 2],
        fn: (args, state, resolve) => {
            const items = scopedItems(args, state, resolve);
            // "all" of an empty set is false
            if (items === null || items.length === 0) {
                return false;
            }
            const logic = args[1];
            for (const item of items) {
                if (!isTruthy(resolve(logic, withData(state, item)))) {
                    return false;
                }
            }
            return true;
        },
    },

    // none/some scan every element before answering
    'none': {
        arity: [2, 2],
        fn: (args, state, resolve) => filterItems(args, state, resolve).length === 0,
    },

    'some': {
        arity: [2, 2],
        fn: (args, state, resolve) => filterItems(args, state, resolve).length > 0,
    },
};

// ============================================================
// Data access: evaluated arguments, resolved against the current context
// ============================================================

export const DATA_OPERATORS: Readonly<Record<string, BuiltinOperator>> = {
    'var': {
        arity: [0, 2],
        fn: (args, state) => resolveVariable(state.data, args[0], args[1] ?? null),
    },

    'missing': {
        arity: [0, VARIADIC],
        fn: (args, state) => {
            const names = Array.isArray(args[0]) ? args[0] : args;
            return findMissing(state.data, names);
        },
    },

    'missing_some': {
        arity: [2, 2],
        fn: (args, state) => {
            const [need, names] = args;
            const list = names === null || names === undefined ? [] : normalizeArgs(names);
            const missing = findMissing(state.data, list);
            if (list.length - missing.length >= toInteger(need, 0)) {
                return [];
            }
            return missing;
        },
    },
};

// ============================================================
// Common: evaluated arguments, depth first
// ============================================================

export const COMMON_OPERATORS: Readonly<Record<string, BuiltinOperator>> = {
    // === Comparison Operators ===
    '==': { arity: [2, 2], fn: ([a, b]) => looseEqual(a, b) },
    '===': { arity: [2, 2], fn: ([a, b]) => strictEqual(a, b) },
    '!=': { arity: [2, 2], fn: ([a, b]) => !looseEqual(a, b) },
    '!==': { arity: [2, 2], fn: ([a, b]) => !strictEqual(a, b) },

    '<': {
        arity: [2, 3],
        fn: (args) => {
            const [a, b, c] = args;
            return lessThan(a, b) && (args.length < 3 || lessThan(b, c));
        },
    },

    '<=': {
        arity: [2, 3],
        fn: (args) => {
            const [a, b, c] = args;
            return lessOrEqual(a, b) && (args.length < 3 || lessOrEqual(b, c));
        },
    },

    '>': { arity: [2, 2], fn: ([a, b]) => lessThan(b, a) },
    '>=': { arity: [2, 2], fn: ([a, b]) => lessOrEqual(b, a) },

    // === Truthiness ===
    '!!': { arity: [1, 1], fn: ([a]) => isTruthy(a) },
    '!': { arity: [1, 1], fn: ([a]) => !isTruthy(a) },

    // === Misc ===
    'log': {
        arity: [1, 1],
        fn: ([value = null], state) => {
            state.logger.info(toText(value));
            return value;
        },
    },

    'in': { arity: [2, 2], fn: ([needle, haystack]) => contains(needle, haystack) },

    'method': {
        arity: [2, 3],
        fn: ([target, name, args], state) => invokeMember(target, name, args, state),
    },

    // === String Operators ===
    'cat': { arity: [0, VARIADIC], fn: (args) => args.map(toText).join('') },
    'substr': { arity: [2, 3], fn: ([source, start, length]) => substring(source, start, length) },

    // === Arithmetic Operators ===
    '+': {
        arity: [0, VARIADIC],
        fn: (args) => arithmetic(args, ops => ops.reduce((sum, n) => sum + n, 0)),
    },

    '-': {
        arity: [1, 2],
        fn: (args) => {
            if (args.length === 0) {
                return null;
            }
            if (args.length === 1) {
                return arithmetic(args, ([a]) => -a);
            }
            return arithmetic(args.slice(0, 2), ([a, b]) => a - b);
        },
    },

    '*': {
        arity: [0, VARIADIC],
        fn: (args) => arithmetic(args, ops => ops.reduce((product, n) => product * n, 1)),
    },

    // Division or modulo by zero is non-finite and normalizes to null
    '/': { arity: [2, 2], fn: (args) => arithmetic(args.slice(0, 2), ([a, b]) => a / b) },
    // Floored: the result takes the sign of the divisor
    '%': { arity: [2, 2], fn: (args) => arithmetic(args.slice(0, 2), ([a, b]) => a - b * Math.floor(a / b)) },

    'min': { arity: [1, VARIADIC], fn: (args) => arithmetic(args, ops => ops.reduce((low, n) => Math.min(low, n), Infinity)) },
    'max': { arity: [1, VARIADIC], fn: (args) => arithmetic(args, ops => ops.reduce((high, n) => Math.max(high, n), -Infinity)) },

    // === Array Operators ===
    'merge': { arity: [0, VARIADIC], fn: merge },
};

// ============================================================
// Deprecated: kept for compatibility, dispatched last with a warning
// ============================================================

export const DEPRECATED_OPERATORS: Readonly<Record<string, BuiltinOperator>> = {
    'count': {
        arity: [0, VARIADIC],
        fn: (args) => args.filter(isTruthy).length,
    },
};
