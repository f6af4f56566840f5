/**
 * Evaluator entry point.
 * Builds the evaluation state and hands the rule to the resolver.
 */

import type { EvalState, EvaluateOptions, Rule } from './types.js';
import { resolve } from './resolver.js';
import { defaultRegistry } from './registry.js';
import { logger } from './logger.js';
import { loadConfig } from './config.js';

const { warnOnDeprecated } = loadConfig();

/**
 * Evaluate a rule against a data context.
 *
 * @param rule - Literal, array of rules, or single-key operator object
 * @param data - Context for `var`, `missing` and `missing_some`; defaults to `{}`
 * @returns The rule's value. Only an unknown operator throws (UnrecognizedOperatorError).
 */
export function evaluate(rule: Rule, data: unknown = {}, options: EvaluateOptions = {}): unknown {
    const state: EvalState = {
        data,
        registry: options.registry ?? defaultRegistry,
        logger: options.logger ?? logger,
        warnOnDeprecated: options.warnOnDeprecated ?? warnOnDeprecated,
    };
    return resolve(rule, state);
}
