import type { ScalarType } from '../../common/datatype.js';
import { PlanNode, expectArity, type ScalarPlanNode } from './plan-node.js';
import { PlanNodeType } from './plan-node-type.js';

/**
 * Opaque token naming the current row of one Correlate node's left input.
 * Tokens compare by identity; the name is for display only.
 */
export class CorrelationId {
	private static nextId = 0;

	private constructor(public readonly name: string) {}

	/** Mint a fresh, globally unique identifier */
	static mint(): CorrelationId {
		return new CorrelationId(`$cor${CorrelationId.nextId++}`);
	}

	toString(): string {
		return this.name;
	}
}

/**
 * Reference to a column of the consuming node's input row, by position.
 * For join conditions the input row is the left row followed by the right row.
 */
export class ColumnReferenceNode extends PlanNode implements ScalarPlanNode {
	override readonly nodeType = PlanNodeType.ColumnReference;

	constructor(
		public readonly index: number,
		public readonly type: ScalarType,
		/** Name of the referenced column, carried for display and output naming */
		public readonly name?: string,
	) {
		super();
	}

	getType(): ScalarType {
		return this.type;
	}

	getChildren(): readonly [] {
		return [];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 0, this.nodeType);
		return this;
	}

	override toString(): string {
		return `$${this.index}`;
	}

	override getLogicalAttributes(): Record<string, unknown> {
		return { index: this.index, name: this.name };
	}
}

/**
 * Reads one field of the row named by a correlation identifier.
 */
export class CorrelationReferenceNode extends PlanNode implements ScalarPlanNode {
	override readonly nodeType = PlanNodeType.CorrelationReference;

	constructor(
		public readonly correlationId: CorrelationId,
		/** Offset into the defining Correlate's left row type */
		public readonly field: number,
		public readonly type: ScalarType,
		public readonly name?: string,
	) {
		super();
	}

	getType(): ScalarType {
		return this.type;
	}

	getChildren(): readonly [] {
		return [];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 0, this.nodeType);
		return this;
	}

	override toString(): string {
		return `${this.correlationId.name}.$${this.field}`;
	}

	override getLogicalAttributes(): Record<string, unknown> {
		return { correlationId: this.correlationId.name, field: this.field };
	}
}
