/**
 * Operator registry.
 * Built-in categories live in separate tables; only the custom table is mutable.
 * Logical, scoped and data-access names are protected so control flow cannot be redefined.
 */

import type {
    BuiltinOperator,
    CustomOperator,
    LogSink,
    OperatorCategory,
    OperatorDescriptor,
    OperatorEntry,
    ResolvedOperator,
} from './types.js';
import { UnrecognizedOperatorError, RegistryConflictError } from './errors.js';
import {
    LOGICAL_OPERATORS,
    SCOPED_OPERATORS,
    DATA_OPERATORS,
    COMMON_OPERATORS,
    DEPRECATED_OPERATORS,
} from './operators.js';

type BuiltinCategory = Exclude<OperatorCategory, 'custom'>;

export interface OperatorTables {
    logical: Readonly<Record<string, BuiltinOperator>>;
    scoped: Readonly<Record<string, BuiltinOperator>>;
    data: Readonly<Record<string, BuiltinOperator>>;
    common: Readonly<Record<string, BuiltinOperator>>;
    deprecated: Readonly<Record<string, BuiltinOperator>>;
}

export const BUILTIN_TABLES: OperatorTables = {
    logical: LOGICAL_OPERATORS,
    scoped: SCOPED_OPERATORS,
    data: DATA_OPERATORS,
    common: COMMON_OPERATORS,
    deprecated: DEPRECATED_OPERATORS,
};

const PROTECTED: readonly BuiltinCategory[] = ['logical', 'scoped', 'data'];

export interface RegistryOptions {
    tables?: OperatorTables;
    /** Receives a debug line for every registration change */
    logger?: LogSink;
}

function isCallable(value: unknown): value is CustomOperator {
    return typeof value === 'function';
}

function isContainer(value: unknown): value is object {
    return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

export class OperatorRegistry {
    private readonly builtins: ReadonlyMap<BuiltinCategory, ReadonlyMap<string, BuiltinOperator>>;
    private readonly custom = new Map<string, OperatorEntry>();
    private readonly logger?: LogSink;

    constructor(options: RegistryOptions = {}) {
        const tables = options.tables ?? BUILTIN_TABLES;
        this.builtins = new Map<BuiltinCategory, ReadonlyMap<string, BuiltinOperator>>([
            ['logical', new Map(Object.entries(tables.logical))],
            ['scoped', new Map(Object.entries(tables.scoped))],
            ['data', new Map(Object.entries(tables.data))],
            ['common', new Map(Object.entries(tables.common))],
            ['deprecated', new Map(Object.entries(tables.deprecated))],
        ]);
        this.logger = options.logger;
    }

    /**
     * Add a custom operator, or a namespace (object or class) of operators reachable with dotted names.
     * Shadows a common or deprecated operator of the same name until unregistered.
     */
    register(name: string, operator: OperatorEntry): void {
        for (const category of PROTECTED) {
            if (this.builtin(category, name)) {
                throw new RegistryConflictError(name, category);
            }
        }
        this.custom.set(name, operator);
        this.logger?.debug(`registered operator '${name}'`);
    }

    /**
     * Remove a custom operator. Returns false when nothing was registered under the name.
     */
    unregister(name: string): boolean {
        const removed = this.custom.delete(name);
        if (removed) {
            this.logger?.debug(`unregistered operator '${name}'`);
        }
        return removed;
    }

    has(name: string): boolean {
        return this.find(name) !== undefined;
    }

    /**
     * Descriptor of the operator a rule with this name dispatches to, if any.
     */
    describe(name: string): OperatorDescriptor | undefined {
        const found = this.find(name);
        if (!found) {
            return undefined;
        }
        if (found.category === 'custom') {
            return { name, category: 'custom' };
        }
        return { name, category: found.category, arity: found.operator.arity };
    }

    /**
     * Every dispatchable name with the category that wins for it.
     */
    list(): OperatorDescriptor[] {
        const names = new Set<string>();
        for (const table of this.builtins.values()) {
            for (const name of table.keys()) {
                names.add(name);
            }
        }
        for (const name of this.custom.keys()) {
            names.add(name);
        }

        const descriptors: OperatorDescriptor[] = [];
        for (const name of names) {
            const descriptor = this.describe(name);
            if (descriptor) {
                descriptors.push(descriptor);
            }
        }
        return descriptors;
    }

    /**
     * Find the operator for a name, in dispatch order:
     * logical → scoped → data → custom → common → deprecated.
     * Throws UnrecognizedOperatorError when nothing matches; for a dotted name
     * through a registered namespace the error reports the first failing segment.
     */
    lookup(name: string): ResolvedOperator {
        const found = this.find(name);
        if (!found) {
            throw new UnrecognizedOperatorError(name, this.walkNamespace(name).failedAt ?? name);
        }
        return found;
    }

    private find(name: string): ResolvedOperator | undefined {
        for (const category of PROTECTED) {
            const operator = this.builtin(category, name);
            if (operator) {
                return { category, name, operator };
            }
        }

        const { fn, receiver } = this.walkNamespace(name);
        if (fn) {
            return { category: 'custom', name, fn, receiver };
        }

        for (const category of ['common', 'deprecated'] as const) {
            const operator = this.builtin(category, name);
            if (operator) {
                return { category, name, operator };
            }
        }
        return undefined;
    }

    private builtin(category: BuiltinCategory, name: string): BuiltinOperator | undefined {
        return this.builtins.get(category)?.get(name);
    }

    /**
     * Exact custom name first, then a dotted walk through a registered namespace.
     * The walk follows own properties of objects and functions (class statics);
     * `receiver` is the object that owns the resolved function.
     * `failedAt` is the dotted prefix ending at the segment that did not resolve.
     */
    private walkNamespace(name: string): { fn?: CustomOperator; receiver?: unknown; failedAt?: string } {
        const exact = this.custom.get(name);
        if (isCallable(exact)) {
            return { fn: exact };
        }

        const segments = name.split('.');
        let current: unknown = this.custom.get(segments[0]);
        if (current === undefined || segments.length < 2) {
            return {};
        }

        let receiver: unknown;
        for (let i = 1; i < segments.length; i++) {
            const segment = segments[i];
            if (!isContainer(current) || !Object.hasOwn(current, segment)) {
                return { failedAt: segments.slice(0, i + 1).join('.') };
            }
            receiver = current;
            current = Reflect.get(current, segment);
        }

        if (!isCallable(current)) {
            return { failedAt: name };
        }
        return { fn: current, receiver };
    }
}

/** Process-wide registry used when no registry is passed explicitly. */
export const defaultRegistry = new OperatorRegistry();
