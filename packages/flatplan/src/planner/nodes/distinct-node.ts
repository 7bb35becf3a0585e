import { PlanNodeType } from './plan-node-type.js';
import { UnaryRelationalBase, type PlanNode, type RelationalPlanNode } from './plan-node.js';

/**
 * Removes duplicate rows.
 */
export class DistinctNode extends UnaryRelationalBase {
	override readonly nodeType = PlanNodeType.Distinct;

	constructor(public readonly source: RelationalPlanNode) {
		super();
	}

	protected withSource(source: RelationalPlanNode): PlanNode {
		return new DistinctNode(source);
	}

	override toString(): string {
		return 'Distinct';
	}
}
