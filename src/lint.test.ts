/**
 * Tests for static rule analysis: lintRule(), referenced variables and
 * pattern matching.
 * Organized into: Errors, Warnings, Valid rules, Variables, Patterns.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { lintRule, collectReferencedVariables, ruleMatchesPattern, OperatorRegistry } from './index.js';
import type { LintResult } from './index.js';

// Helper: assert a specific issue code exists
function expectIssue(result: LintResult, code: string, severity?: 'error' | 'warning') {
    const found = result.issues.find(i => i.code === code && (!severity || i.severity === severity));
    assert.ok(found, `Expected issue '${code}' (${severity ?? 'any'}) but got: ${JSON.stringify(result.issues.map(i => i.code))}`);
    return found;
}

// ===========================================================================
// Group 1: Errors (valid: false)
// ===========================================================================

describe('Lint Errors', () => {
    it('E1: unknown_operator at the root', () => {
        const result = lintRule({ frobnicate: [1] });
        assert.strictEqual(result.valid, false);
        assert.deepStrictEqual(result.issues, [{
            severity: 'error',
            code: 'unknown_operator',
            message: "Unknown operator 'frobnicate'",
            path: '$.frobnicate',
            operator: 'frobnicate',
        }]);
    });

    it('E2: unknown_operator nested inside arguments', () => {
        const result = lintRule({ and: [true, { nope: 1 }] });
        assert.strictEqual(result.valid, false);
        assert.strictEqual(expectIssue(result, 'unknown_operator', 'error').path, '$.and[1].nope');
    });

    it('E3: unknown_operator inside an array of rules', () => {
        const result = lintRule([1, { '==': [1, 1] }, { nope: [] }]);
        assert.strictEqual(result.valid, false);
        assert.strictEqual(expectIssue(result, 'unknown_operator').path, '$[2].nope');
    });

    it('E4: operators removed from the registry are unknown', () => {
        const registry = new OperatorRegistry();
        registry.register('double', (value: unknown) => Number(value) * 2);
        assert.strictEqual(lintRule({ double: 1 }, registry).valid, true);
        registry.unregister('double');
        assert.strictEqual(lintRule({ double: 1 }, registry).valid, false);
    });
});

// ===========================================================================
// Group 2: Warnings (valid: true)
// ===========================================================================

describe('Lint Warnings', () => {
    it('W1: deprecated_operator', () => {
        const result = lintRule({ count: [1, 2] });
        assert.strictEqual(result.valid, true);
        const issue = expectIssue(result, 'deprecated_operator', 'warning');
        assert.strictEqual(issue.message, "Operator 'count' is deprecated and may not be supported by other implementations");
        assert.strictEqual(issue.path, '$.count');
    });

    it('W2: arity_mismatch with an exact count', () => {
        const result = lintRule({ '==': [1] });
        assert.strictEqual(result.valid, true);
        assert.strictEqual(expectIssue(result, 'arity_mismatch', 'warning').message, "Operator '==' expects 2 argument(s), got 1");
    });

    it('W3: arity_mismatch with a lower bound', () => {
        const result = lintRule({ and: [] });
        assert.strictEqual(expectIssue(result, 'arity_mismatch').message, "Operator 'and' expects at least 1 argument(s), got 0");
    });

    it('W4: arity_mismatch with a range', () => {
        const result = lintRule({ substr: 'abc' });
        assert.strictEqual(expectIssue(result, 'arity_mismatch').message, "Operator 'substr' expects 2 to 3 argument(s), got 1");
    });

    it('W5: dynamic_variable_path', () => {
        const result = lintRule({ var: { cat: ['a', '.b'] } });
        assert.strictEqual(result.valid, true);
        assert.strictEqual(result.issues.length, 1);
        assert.strictEqual(expectIssue(result, 'dynamic_variable_path', 'warning').path, '$.var');
    });
});

// ===========================================================================
// Group 3: Valid rules (no issues)
// ===========================================================================

describe('Valid rules', () => {
    it('V1: nested built-in operators', () => {
        const result = lintRule({
            if: [
                { '<': [{ var: 'temp' }, 0] }, 'freezing',
                { '<': [{ var: 'temp' }, 100] }, 'liquid',
                'gas',
            ],
        });
        assert.deepStrictEqual(result, { valid: true, issues: [] });
    });

    it('V2: literals and data objects', () => {
        assert.deepStrictEqual(lintRule(42), { valid: true, issues: [] });
        assert.deepStrictEqual(lintRule({ a: 1, b: 2 }), { valid: true, issues: [] });
        assert.deepStrictEqual(lintRule({}), { valid: true, issues: [] });
    });

    it('V3: custom operators have no arity to check', () => {
        const registry = new OperatorRegistry();
        registry.register('sum_all', (...values: unknown[]) => values.length);
        assert.deepStrictEqual(lintRule({ sum_all: [1, 2, 3, 4] }, registry), { valid: true, issues: [] });
    });
});

// ===========================================================================
// Group 4: Referenced variables
// ===========================================================================

describe('collectReferencedVariables', () => {
    it('collects var paths in first-seen order', () => {
        const rule = {
            and: [
                { '<': [{ var: 'temp' }, 110] },
                { '==': [{ var: 'pie.filling' }, 'apple'] },
                { '>': [{ var: 'temp' }, 0] },
            ],
        };
        assert.deepStrictEqual(collectReferencedVariables(rule), ['temp', 'pie.filling']);
    });

    it('stringifies numeric paths and ignores defaults', () => {
        assert.deepStrictEqual(collectReferencedVariables([{ var: 1 }, { var: '1' }, { var: ['a', 0] }]), ['1', 'a']);
    });

    it('includes paths used inside scoped operators', () => {
        const rule = { map: [{ var: 'items' }, { '*': [{ var: '' }, 2] }] };
        assert.deepStrictEqual(collectReferencedVariables(rule), ['items', '']);
    });

    it('skips computed paths', () => {
        assert.deepStrictEqual(collectReferencedVariables({ var: { var: 'key' } }), []);
        assert.deepStrictEqual(collectReferencedVariables(7), []);
    });
});

// ===========================================================================
// Group 5: Pattern matching
// ===========================================================================

describe('ruleMatchesPattern', () => {
    it('matches identical rules and the wildcard', () => {
        assert.strictEqual(ruleMatchesPattern({ var: 'a' }, { var: 'a' }), true);
        assert.strictEqual(ruleMatchesPattern(5, 5), true);
        assert.strictEqual(ruleMatchesPattern({ var: 'a' }, '@'), true);
    });

    it('matches type classes', () => {
        assert.strictEqual(ruleMatchesPattern(3, 'number'), true);
        assert.strictEqual(ruleMatchesPattern('a', 'number'), false);
        assert.strictEqual(ruleMatchesPattern('a', 'string'), true);
        assert.strictEqual(ruleMatchesPattern([1, 2], 'array'), true);
    });

    it('matches operators and their arguments', () => {
        assert.strictEqual(ruleMatchesPattern({ '+': [1, 2] }, { '+': '@' }), true);
        assert.strictEqual(ruleMatchesPattern({ '+': [1, 2] }, { '+': ['number', 'number'] }), true);
        assert.strictEqual(ruleMatchesPattern({ '+': [1, 'a'] }, { '+': ['number', 'number'] }), false);
        assert.strictEqual(ruleMatchesPattern({ '+': [1, 2] }, { '-': '@' }), false);
    });

    it('matches any operator with "@" as the key', () => {
        const pattern = { '@': [{ var: 'string' }, 'number'] };
        assert.strictEqual(ruleMatchesPattern({ '<': [{ var: 'temp' }, 110] }, pattern), true);
        assert.strictEqual(ruleMatchesPattern({ '<': [{ var: 'temp' }, 'x'] }, pattern), false);
    });

    it('requires arrays of the same length', () => {
        assert.strictEqual(ruleMatchesPattern([1, 2], [1]), false);
        assert.strictEqual(ruleMatchesPattern([1, 'a'], ['number', 'string']), true);
        assert.strictEqual(ruleMatchesPattern({ var: 'a' }, ['string']), false);
    });
});
