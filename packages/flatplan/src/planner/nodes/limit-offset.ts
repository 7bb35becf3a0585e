import { PlanNodeType } from './plan-node-type.js';
import { UnaryRelationalBase, type PlanNode, type RelationalPlanNode } from './plan-node.js';

/**
 * Skips `offset` rows, then passes at most `limit` rows.
 */
export class LimitOffsetNode extends UnaryRelationalBase {
	override readonly nodeType = PlanNodeType.LimitOffset;

	constructor(
		public readonly source: RelationalPlanNode,
		public readonly limit: number,
		public readonly offset = 0,
	) {
		super();
	}

	protected withSource(source: RelationalPlanNode): PlanNode {
		return new LimitOffsetNode(source, this.limit, this.offset);
	}

	override toString(): string {
		return this.offset ? `Limit(${this.limit} OFFSET ${this.offset})` : `Limit(${this.limit})`;
	}
}
