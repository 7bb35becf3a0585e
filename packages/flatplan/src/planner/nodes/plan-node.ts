import { PlanNodeType } from './plan-node-type.js';
import type { ScalarType } from '../../common/datatype.js';
import { flatplanError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';

/**
 * One column of a relation's row type. Columns are addressed by position.
 */
export interface Attribute {
	/** Human-readable name (may not be unique) */
	readonly name: string;
	readonly type: ScalarType;
}

/**
 * Base class for all nodes of a plan, relational and scalar alike.
 * PlanNodes are immutable once constructed; rewrites build replacements.
 */
export abstract class PlanNode {
	private static nextId = 0;

	/** Diagnostic identifier, unique per constructed node */
	readonly id: string;
	abstract readonly nodeType: PlanNodeType;

	constructor() {
		this.id = `${PlanNode.nextId++}`;
	}

	/** All children, scalar and relational, in a fixed order matching withChildren() */
	abstract getChildren(): readonly PlanNode[];

	/**
	 * Default implementation of getRelations() that filters getChildren()
	 */
	getRelations(): readonly RelationalPlanNode[] {
		return this.getChildren().filter(isRelationalNode);
	}

	/**
	 * Return this node with its children replaced by newChildren.
	 *
	 * Implementations must:
	 *   1. Verify arity (throw if length mismatch)
	 *   2. Return `this` if nothing changed
	 *   3. Otherwise construct a new instance copying all immutable properties
	 */
	abstract withChildren(newChildren: readonly PlanNode[]): PlanNode;

	visit(visitor: PlanNodeVisitor): void {
		visitor(this);
		this.getChildren().forEach(child => child.visit(visitor));
	}

	toString(): string {
		return `${this.nodeType} [${this.id}]`;
	}

	/**
	 * Node-specific properties for diagnostics.
	 */
	getLogicalAttributes(): Record<string, unknown> {
		return {};
	}
}

export type PlanNodeVisitor = (node: PlanNode) => void;

/**
 * Base interface for PlanNodes that produce a relation (a set of rows).
 */
export interface RelationalPlanNode extends PlanNode {
	/** The ordered row type of this relation */
	getAttributes(): readonly Attribute[];
}

/**
 * Base interface for PlanNodes that produce a scalar value (expression nodes).
 */
export interface ScalarPlanNode extends PlanNode {
	getType(): ScalarType;
}

export function isRelationalNode(node: PlanNode): node is RelationalPlanNode {
	return 'getAttributes' in node && typeof node.getAttributes === 'function';
}

export function isScalarNode(node: PlanNode): node is ScalarPlanNode {
	return 'getType' in node && typeof node.getType === 'function';
}

/** Narrow a child handed to withChildren() to a relation */
export function expectRelational(node: PlanNode | undefined, owner: PlanNodeType): RelationalPlanNode {
	if (!node || !isRelationalNode(node)) {
		flatplanError(`${owner}: expected a relational child, got ${node?.nodeType ?? 'nothing'}`, StatusCode.INTERNAL);
	}
	return node;
}

/** Narrow a child handed to withChildren() to a scalar expression */
export function expectScalar(node: PlanNode | undefined, owner: PlanNodeType): ScalarPlanNode {
	if (!node || !isScalarNode(node)) {
		flatplanError(`${owner}: expected a scalar child, got ${node?.nodeType ?? 'nothing'}`, StatusCode.INTERNAL);
	}
	return node;
}

export function expectArity(children: readonly PlanNode[], expected: number, owner: PlanNodeType): void {
	if (children.length !== expected) {
		flatplanError(`${owner} expects ${expected} children, got ${children.length}`, StatusCode.INTERNAL);
	}
}

/**
 * The scalar expressions a relational node evaluates itself, excluding those of its inputs.
 */
export function ownExpressions(node: PlanNode): ScalarPlanNode[] {
	return node.getChildren().filter(isScalarNode);
}

// --- Arity-based base classes ---

/**
 * Base class for relational nodes with no inputs (leaf nodes)
 */
export abstract class ZeroAryRelationalBase extends PlanNode implements RelationalPlanNode {
	abstract getAttributes(): readonly Attribute[];

	getChildren(): readonly PlanNode[] {
		return [];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 0, this.nodeType);
		return this;
	}
}

/**
 * Base class for relational nodes with one relational input and no expressions
 */
export abstract class UnaryRelationalBase extends PlanNode implements RelationalPlanNode {
	abstract readonly source: RelationalPlanNode;

	getAttributes(): readonly Attribute[] {
		return this.source.getAttributes();
	}

	getChildren(): readonly PlanNode[] {
		return [this.source];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 1, this.nodeType);
		const newSource = expectRelational(newChildren[0], this.nodeType);
		return newSource === this.source ? this : this.withSource(newSource);
	}

	protected abstract withSource(source: RelationalPlanNode): PlanNode;
}
