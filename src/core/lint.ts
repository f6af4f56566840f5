/**
 * Static rule analysis.
 * Walks rules without evaluating them: referenced variables, structural
 * pattern matching, and lint checks against an operator registry.
 */

import { isDeepStrictEqual } from 'node:util';
import type { OperatorRegistry } from './registry.js';
import { defaultRegistry } from './registry.js';
import { isRule, operatorOf, argumentsOf, normalizeArgs } from './rule.js';

// ============================================================
// Public types
// ============================================================

export type LintSeverity = 'error' | 'warning';

export type LintCode =
    | 'unknown_operator'
    | 'deprecated_operator'
    | 'arity_mismatch'
    | 'dynamic_variable_path';

export interface LintIssue {
    severity: LintSeverity;
    code: LintCode;
    message: string;
    /** Location inside the rule, e.g. `$.if[0].var` */
    path: string;
    operator?: string;
}

export interface LintResult {
    valid: boolean;
    issues: LintIssue[];
}

// ============================================================
// Internal types
// ============================================================

interface LintContext {
    registry: OperatorRegistry;
    issues: LintIssue[];
}

const ROOT_PATH = '$';

// Type-class tokens understood by ruleMatchesPattern
const ANY = '@';

// ============================================================
// Referenced variables
// ============================================================

function collectVarRefs(node: unknown, refs: Set<string>): void {
    if (Array.isArray(node)) {
        for (const item of node) {
            collectVarRefs(item, refs);
        }
        return;
    }

    if (!isRule(node)) {
        return;
    }

    const op = operatorOf(node);
    const args = normalizeArgs(argumentsOf(node));
    if (op === 'var') {
        const name = args[0];
        // A path computed by a nested rule is only known at evaluation time
        if (typeof name === 'string' || typeof name === 'number') {
            refs.add(String(name));
        }
        return;
    }

    for (const arg of args) {
        collectVarRefs(arg, refs);
    }
}

/**
 * Literal `var` paths used anywhere in a rule, in first-seen order, without duplicates.
 */
export function collectReferencedVariables(rule: unknown): string[] {
    const refs = new Set<string>();
    collectVarRefs(rule, refs);
    return [...refs];
}

// ============================================================
// Pattern matching
// ============================================================

/**
 * Structural match of a rule against a pattern.
 * "@" matches anything; "number", "string" and "array" match by type;
 * a single-key pattern matches a rule with the same operator (or "@")
 * and matching arguments; array patterns match element-wise.
 */
export function ruleMatchesPattern(rule: unknown, pattern: unknown): boolean {
    if (isDeepStrictEqual(rule, pattern)) return true;
    if (pattern === ANY) return true;
    if (pattern === 'number') return typeof rule === 'number';
    if (pattern === 'string') return typeof rule === 'string';
    if (pattern === 'array') return Array.isArray(rule);

    if (isRule(pattern)) {
        if (!isRule(rule)) {
            return false;
        }
        const patternOp = operatorOf(pattern);
        if (patternOp !== ANY && patternOp !== operatorOf(rule)) {
            return false;
        }
        return ruleMatchesPattern(argumentsOf(rule), argumentsOf(pattern));
    }

    if (Array.isArray(pattern)) {
        if (!Array.isArray(rule) || rule.length !== pattern.length) {
            return false;
        }
        return pattern.every((item, i) => ruleMatchesPattern(rule[i], item));
    }

    return false;
}

// ============================================================
// Lint checks
// ============================================================

function addIssue(
    ctx: LintContext,
    severity: LintSeverity,
    code: LintCode,
    message: string,
    path: string,
    operator?: string
): void {
    ctx.issues.push({ severity, code, message, path, operator });
}

function checkNode(node: unknown, ctx: LintContext, path: string): void {
    if (Array.isArray(node)) {
        node.forEach((item, i) => checkNode(item, ctx, `${path}[${i}]`));
        return;
    }

    if (!isRule(node)) {
        return;
    }

    const op = operatorOf(node);
    const args = normalizeArgs(argumentsOf(node));
    const opPath = `${path}.${op}`;
    const descriptor = ctx.registry.describe(op);

    if (!descriptor) {
        addIssue(ctx, 'error', 'unknown_operator', `Unknown operator '${op}'`, opPath, op);
    } else {
        if (descriptor.category === 'deprecated') {
            addIssue(ctx, 'warning', 'deprecated_operator',
                `Operator '${op}' is deprecated and may not be supported by other implementations`, opPath, op);
        }
        if (descriptor.arity) {
            const [min, max] = descriptor.arity;
            if (args.length < min || args.length > max) {
                const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
                addIssue(ctx, 'warning', 'arity_mismatch',
                    `Operator '${op}' expects ${expected} argument(s), got ${args.length}`, opPath, op);
            }
        }
    }

    if (op === 'var' && isRule(args[0])) {
        addIssue(ctx, 'warning', 'dynamic_variable_path',
            'Variable path is computed at evaluation time and cannot be analyzed statically', opPath, op);
    }

    args.forEach((arg, i) => checkNode(arg, ctx, `${opPath}[${i}]`));
}

/**
 * Perform static analysis on a rule without evaluating it.
 *
 * @param rule - The rule to check
 * @param registry - Registry that decides which operators are known
 * @returns Lint result; `valid` is false when any error was found
 */
export function lintRule(rule: unknown, registry: OperatorRegistry = defaultRegistry): LintResult {
    const ctx: LintContext = { registry, issues: [] };
    checkNode(rule, ctx, ROOT_PATH);
    return {
        valid: !ctx.issues.some(issue => issue.severity === 'error'),
        issues: ctx.issues,
    };
}
