import { PlanNode, expectArity, expectRelational, expectScalar } from './plan-node.js';
import type { RelationalPlanNode, Attribute, ScalarPlanNode } from './plan-node.js';
import { PlanNodeType } from './plan-node-type.js';
import { asNullable } from '../../common/datatype.js';

/**
 * inner and left produce left ++ right rows; semi and anti produce left rows only.
 */
export type JoinType = 'inner' | 'left' | 'semi' | 'anti';

/**
 * Row type produced by a join (or correlate) of the given kind.
 */
export function joinAttributes(left: RelationalPlanNode, right: RelationalPlanNode, joinType: JoinType): Attribute[] {
	const leftAttrs = left.getAttributes();
	switch (joinType) {
		case 'semi':
		case 'anti':
			return [...leftAttrs];
		case 'left':
			return [...leftAttrs, ...right.getAttributes().map(attr => ({ name: attr.name, type: asNullable(attr.type) }))];
		case 'inner':
			return [...leftAttrs, ...right.getAttributes()];
	}
}

/**
 * Represents a logical JOIN operation between two relations.
 * The condition sees the left row followed by the right row.
 */
export class JoinNode extends PlanNode implements RelationalPlanNode {
	override readonly nodeType = PlanNodeType.Join;
	private attributes?: readonly Attribute[];

	constructor(
		public readonly left: RelationalPlanNode,
		public readonly right: RelationalPlanNode,
		public readonly joinType: JoinType,
		/** Absent condition joins every pair of rows */
		public readonly condition?: ScalarPlanNode,
	) {
		super();
	}

	getAttributes(): readonly Attribute[] {
		if (!this.attributes) {
			this.attributes = joinAttributes(this.left, this.right, this.joinType);
		}
		return this.attributes;
	}

	getChildren(): readonly PlanNode[] {
		return this.condition
			? [this.left, this.right, this.condition]
			: [this.left, this.right];
	}

	override getRelations(): readonly [RelationalPlanNode, RelationalPlanNode] {
		return [this.left, this.right];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, this.condition ? 3 : 2, this.nodeType);
		const newLeft = expectRelational(newChildren[0], this.nodeType);
		const newRight = expectRelational(newChildren[1], this.nodeType);
		const newCondition = this.condition ? expectScalar(newChildren[2], this.nodeType) : undefined;

		if (newLeft === this.left && newRight === this.right && newCondition === this.condition) {
			return this;
		}
		return new JoinNode(newLeft, newRight, this.joinType, newCondition);
	}

	override toString(): string {
		const on = this.condition ? ` ON ${this.condition.toString()}` : '';
		return `Join[${this.joinType}]${on}`;
	}

	override getLogicalAttributes(): Record<string, unknown> {
		return {
			joinType: this.joinType,
			condition: this.condition?.toString(),
		};
	}
}
