import type { OperatorCategory } from './types.js';

/**
 * Base class for errors raised by the rule engine.
 */
export class RuleEngineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Operator name not found in any category.
 * For dotted names, `path` is the prefix up to the segment that failed to resolve.
 */
export class UnrecognizedOperatorError extends RuleEngineError {
    readonly operator: string;
    readonly path: string;

    constructor(operator: string, path: string = operator) {
        super(`Unrecognized operation '${path}'`);
        this.operator = operator;
        this.path = path;
    }
}

/**
 * Attempt to register a name owned by a protected category (logical, scoped, data).
 */
export class RegistryConflictError extends RuleEngineError {
    readonly operator: string;
    readonly category: OperatorCategory;

    constructor(operator: string, category: OperatorCategory) {
        super(`Operator '${operator}' is a built-in ${category} operator and cannot be overridden`);
        this.operator = operator;
        this.category = category;
    }
}
