import { PlanNode, expectArity, expectRelational, type Attribute, type RelationalPlanNode } from './plan-node.js';
import { PlanNodeType } from './plan-node-type.js';
import { joinAttributes, type JoinType } from './join-node.js';
import { CorrelationId } from './reference.js';

/**
 * Pairs each row of `left` with the rows of `right` evaluated against that row.
 * Scalars inside `right` read the current left row through CorrelationReference
 * nodes naming `correlationId`. Output follows the JoinNode of the same type.
 */
export class CorrelateNode extends PlanNode implements RelationalPlanNode {
	override readonly nodeType = PlanNodeType.Correlate;
	private attributes?: readonly Attribute[];

	constructor(
		public readonly left: RelationalPlanNode,
		public readonly right: RelationalPlanNode,
		public readonly correlationId: CorrelationId,
		public readonly joinType: JoinType = 'inner',
	) {
		super();
	}

	getAttributes(): readonly Attribute[] {
		if (!this.attributes) {
			this.attributes = joinAttributes(this.left, this.right, this.joinType);
		}
		return this.attributes;
	}

	getChildren(): readonly [RelationalPlanNode, RelationalPlanNode] {
		return [this.left, this.right];
	}

	override getRelations(): readonly [RelationalPlanNode, RelationalPlanNode] {
		return [this.left, this.right];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 2, this.nodeType);
		const newLeft = expectRelational(newChildren[0], this.nodeType);
		const newRight = expectRelational(newChildren[1], this.nodeType);
		if (newLeft === this.left && newRight === this.right) {
			return this;
		}
		return new CorrelateNode(newLeft, newRight, this.correlationId, this.joinType);
	}

	override toString(): string {
		return `Correlate[${this.joinType}] ${this.correlationId.name}`;
	}

	override getLogicalAttributes(): Record<string, unknown> {
		return { correlationId: this.correlationId.name, joinType: this.joinType };
	}
}
