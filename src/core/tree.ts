/**
 * Introspection helpers.
 * Converts rules into a tree of Operation nodes that can be inspected
 * statically and pretty-printed with box-drawing characters.
 */

import type { JsonPrimitive } from './types.js';
import type { OperatorRegistry } from './registry.js';
import { defaultRegistry } from './registry.js';
import { UnrecognizedOperatorError } from './errors.js';
import { classifyRule, isPlainObject } from './rule.js';

export type TreeNode = Operation | JsonPrimitive | Record<string, unknown> | TreeNode[];

export type OperationClass = new (operator: string, args?: TreeNode[], registry?: OperatorRegistry) => Operation;

const NODE_CLASSES = new Map<string, OperationClass>();

function formatPrimitive(value: JsonPrimitive): string {
    if (typeof value === 'string') {
        return `'${value}'`;
    }
    return String(value);
}

function lines(node: TreeNode): string[] {
    return formatTree(node).split('\n');
}

/**
 * Render children under a parent line:
 *   ├─ child
 *   │    grandchild
 *   └─ last child
 */
function renderChildren(children: readonly TreeNode[]): string[] {
    const last = children.length - 1;
    return children.map((child, index) => {
        const firstPrefix = index !== last ? '  ├─' : '  └─';
        const separator = index !== last ? '  │ ' : '    ';
        const [head, ...rest] = lines(child);
        return [`${firstPrefix} ${head}`, ...rest.map(line => `${separator} ${line}`)].join('\n');
    });
}

export class Operation {
    readonly operator: string;
    /** Evaluated depth-first when an argument is an operation itself */
    readonly args: TreeNode[];

    constructor(operator: string, args: TreeNode[] = [], registry: OperatorRegistry = defaultRegistry) {
        this.operator = operator;
        this.args = args;
        if (this.checksRegistration && !registry.has(operator)) {
            throw new UnrecognizedOperatorError(operator);
        }
    }

    /** Data-access nodes skip the registry check */
    protected get checksRegistration(): boolean {
        return true;
    }

    get label(): string {
        return `${this.constructor.name}(${this.operator})`;
    }

    toString(): string {
        return [this.label, ...renderChildren(this.args)].join('\n');
    }

    static forOperator(operator: string, args: TreeNode[] = [], registry: OperatorRegistry = defaultRegistry): Operation {
        const NodeClass = NODE_CLASSES.get(operator) ?? Operation;
        return new NodeClass(operator, args, registry);
    }
}

export class Var extends Operation {
    protected override get checksRegistration(): boolean {
        return false;
    }

    override toString(): string {
        const [path = ''] = this.args;
        return `$${typeof path === 'string' || typeof path === 'number' ? path : formatTree(path)}`;
    }
}

export class If extends Operation {
    override toString(): string {
        // simple "if a then b" keeps the default layout
        if (this.args.length <= 2) {
            return super.toString();
        }

        const bits = ['Conditional'];
        for (let i = 0; i + 1 < this.args.length; i += 2) {
            const [conditionHead, ...conditionRest] = lines(this.args[i]);
            const [outcomeHead, ...outcomeRest] = lines(this.args[i + 1]);
            bits.push(
                i === 0 ? '  If' : '  Elif',
                `  ├─ ${conditionHead}`,
                ...conditionRest.map(line => `  │  ${line}`),
                '  └─ Then',
                `       └─ ${outcomeHead}`,
                ...outcomeRest.map(line => `          ${line}`)
            );
        }

        if (this.args.length % 2 === 1) {
            const [elseHead, ...elseRest] = lines(this.args[this.args.length - 1]);
            bits.push('  Else', `  └─ ${elseHead}`, ...elseRest.map(line => `     ${line}`));
        }

        return bits.join('\n');
    }
}

export class Missing extends Operation {
    protected override get checksRegistration(): boolean {
        return false;
    }
}

export class MissingSome extends Operation {
    protected override get checksRegistration(): boolean {
        return false;
    }
}

/**
 * Use a dedicated Operation subclass for an operator when building trees.
 */
export function registerNodeClass(operator: string, NodeClass: OperationClass): void {
    NODE_CLASSES.set(operator, NodeClass);
}

export function unregisterNodeClass(operator: string): boolean {
    return NODE_CLASSES.delete(operator);
}

registerNodeClass('var', Var);
registerNodeClass('if', If);
registerNodeClass('missing', Missing);
registerNodeClass('missing_some', MissingSome);

/**
 * Convert a rule into a tree. Arguments are normalized (unary sugar removed)
 * at every level.
 *
 * @throws UnrecognizedOperatorError for an operator the registry does not know
 */
export function toTree(rule: unknown, registry: OperatorRegistry = defaultRegistry): TreeNode {
    const parsed = classifyRule(rule);
    switch (parsed.kind) {
        case 'array':
            return parsed.rules.map(child => toTree(child, registry));
        case 'operation':
            return Operation.forOperator(
                parsed.operator,
                parsed.args.map(arg => toTree(arg, registry)),
                registry
            );
        case 'literal': {
            const { value } = parsed;
            if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                return value;
            }
            return isPlainObject(value) ? value : null;
        }
    }
}

/**
 * Pretty-print a tree node. Strings are single-quoted; a literal object prints as JSON.
 */
export function formatTree(node: TreeNode): string {
    if (node instanceof Operation) {
        return node.toString();
    }
    if (Array.isArray(node)) {
        if (node.every(item => !(item instanceof Operation) && !Array.isArray(item))) {
            return `[${node.map(item => formatTree(item)).join(', ')}]`;
        }
        return ['Array', ...renderChildren(node)].join('\n');
    }
    if (node !== null && typeof node === 'object') {
        return JSON.stringify(node);
    }
    return formatPrimitive(node);
}
