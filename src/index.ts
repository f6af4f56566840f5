/**
 * JSON rule evaluator.
 *
 * A rule is a JSON value: a literal, an array of rules, or a single-key object
 * naming an operator, e.g. `{"<": [{"var": "temp"}, 110]}`.
 */

import type { OperatorEntry } from './core/types.js';
import { OperatorRegistry, defaultRegistry } from './core/registry.js';

export { evaluate } from './core/engine.js';
export { isRule, classifyRule } from './core/rule.js';
export { collectReferencedVariables, ruleMatchesPattern, lintRule } from './core/lint.js';
export type { LintIssue, LintResult, LintSeverity, LintCode } from './core/lint.js';
export { OperatorRegistry, defaultRegistry, BUILTIN_TABLES } from './core/registry.js';
export type { OperatorTables, RegistryOptions } from './core/registry.js';
export { toTree, formatTree, Operation, Var, If, Missing, MissingSome, registerNodeClass, unregisterNodeClass } from './core/tree.js';
export type { TreeNode, OperationClass } from './core/tree.js';
export { RuleEngineError, UnrecognizedOperatorError, RegistryConflictError } from './core/errors.js';
export { isTruthy, looseEqual, strictEqual } from './core/coerce.js';
export { logger, createLogger } from './core/logger.js';
export { loadConfig } from './core/config.js';
export type { EngineConfig, LogLevel } from './core/config.js';
export type {
    JsonPrimitive,
    JsonValue,
    Rule,
    ParsedRule,
    OperatorCategory,
    OperatorDescriptor,
    CustomOperator,
    OperatorNamespace,
    OperatorClass,
    OperatorEntry,
    EvaluateOptions,
    LogSink,
    Arity,
} from './core/types.js';

/**
 * Register a custom operator, or a namespace object or class for dotted names.
 * Throws RegistryConflictError for logical, scoped and data-access names.
 */
export function registerOperator(
    name: string,
    operator: OperatorEntry,
    registry: OperatorRegistry = defaultRegistry
): void {
    registry.register(name, operator);
}

/**
 * Remove a custom operator; a common operator it shadowed becomes visible again.
 */
export function unregisterOperator(name: string, registry: OperatorRegistry = defaultRegistry): boolean {
    return registry.unregister(name);
}
