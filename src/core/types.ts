/**
 * All type definitions for the rule evaluator.
 * Other modules import their types from here.
 */

import type { OperatorRegistry } from './registry.js';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** A JSON value interpreted as a program. */
export type Rule = JsonValue;

/**
 * Result of classifying a rule before dispatch.
 * `args` is already normalized: a non-array argument becomes a one-element list.
 */
export type ParsedRule =
    | { kind: 'literal'; value: unknown }
    | { kind: 'array'; rules: unknown[] }
    | { kind: 'operation'; operator: string; args: unknown[] };

/**
 * Evaluation-order contract of an operator.
 * Lookup walks the categories in this order.
 */
export type OperatorCategory = 'logical' | 'scoped' | 'data' | 'custom' | 'common' | 'deprecated';

/** Inclusive [min, max] argument count. `max` may be Infinity. */
export type Arity = readonly [number, number];

/** Minimal logger surface used during evaluation. A winston Logger satisfies it. */
export interface LogSink {
    info(message: string, meta?: Record<string, unknown>): unknown;
    warn(message: string, meta?: Record<string, unknown>): unknown;
    debug(message: string, meta?: Record<string, unknown>): unknown;
}

/**
 * Internal state during rule evaluation.
 * Scoped operators derive a child state with a different `data`; the parent is never mutated.
 */
export interface EvalState {
    /** Current data context that `var` resolves against */
    readonly data: unknown;
    readonly registry: OperatorRegistry;
    readonly logger: LogSink;
    readonly warnOnDeprecated: boolean;
}

export type ResolveFn = (rule: unknown, state: EvalState) => unknown;

/**
 * Built-in operator implementation.
 * Logical and scoped operators receive raw arguments; every other category receives evaluated ones.
 */
export type OperatorFn = (args: unknown[], state: EvalState, resolve: ResolveFn) => unknown;

export interface BuiltinOperator {
    arity: Arity;
    fn: OperatorFn;
}

/** User-registered operator: called with its evaluated arguments. */
export type CustomOperator = (...args: unknown[]) => unknown;

/** Class whose static methods are addressable with dotted names, e.g. `{"time.Clock.now": []}`. */
export type OperatorClass = abstract new (...args: never[]) => unknown;

/** Object of operators addressable with dotted names, e.g. `{"math.abs": [-2]}`. */
export interface OperatorNamespace {
    readonly [segment: string]: OperatorEntry;
}

/** Anything that can be registered under a name. */
export type OperatorEntry = CustomOperator | OperatorNamespace | OperatorClass;

export interface OperatorDescriptor {
    name: string;
    category: OperatorCategory;
    /** Unknown for custom operators */
    arity?: Arity;
}

/** Operator found by a registry lookup, ready to be applied. */
export type ResolvedOperator =
    | { category: Exclude<OperatorCategory, 'custom'>; name: string; operator: BuiltinOperator }
    | { category: 'custom'; name: string; fn: CustomOperator; receiver?: unknown };

export interface EvaluateOptions {
    registry?: OperatorRegistry;
    logger?: LogSink;
    /** Emit a warning each time a deprecated operator runs */
    warnOnDeprecated?: boolean;
}
