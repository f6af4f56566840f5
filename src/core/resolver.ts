/**
 * Rule resolver.
 * Recursively evaluates rules and returns their values.
 * This is the recursive core of the evaluator.
 */

import type { EvalState } from './types.js';
import { classifyRule } from './rule.js';

/**
 * Resolve any rule and return its value.
 * Arrays evaluate element-wise against the same data, literals pass through,
 * and single-key objects dispatch on their operator's category.
 */
export function resolve(rule: unknown, state: EvalState): unknown {
    const parsed = classifyRule(rule);

    switch (parsed.kind) {
        case 'literal':
            return parsed.value;
        case 'array':
            return parsed.rules.map(elem => resolve(elem, state));
        case 'operation':
            return applyOperation(parsed.operator, parsed.args, state);
    }
}

/**
 * Apply an operator to its (raw) arguments.
 * Logical and scoped operators manage their own recursion; every other
 * category gets its arguments evaluated depth-first first.
 */
export function applyOperation(op: string, args: unknown[], state: EvalState): unknown {
    const found = state.registry.lookup(op);

    if (found.category === 'logical' || found.category === 'scoped') {
        return found.operator.fn(args, state, resolve);
    }

    const values = args.map(arg => resolve(arg, state));

    switch (found.category) {
        case 'custom':
            return Reflect.apply(found.fn, found.receiver, values);
        case 'deprecated':
            if (state.warnOnDeprecated) {
                state.logger.warn(
                    `'${op}' operation is not part of the core operator set and may not be supported by other implementations`
                );
            }
            return found.operator.fn(values, state, resolve);
        default:
            return found.operator.fn(values, state, resolve);
    }
}
