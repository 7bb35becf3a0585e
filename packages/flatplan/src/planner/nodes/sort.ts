import { PlanNodeType } from './plan-node-type.js';
import { UnaryRelationalBase, type PlanNode, type RelationalPlanNode } from './plan-node.js';

export interface SortKey {
	readonly column: number;
	readonly desc: boolean;
}

/**
 * Orders its input by the given column keys.
 */
export class SortNode extends UnaryRelationalBase {
	override readonly nodeType = PlanNodeType.Sort;

	constructor(
		public readonly source: RelationalPlanNode,
		public readonly keys: readonly SortKey[],
	) {
		super();
	}

	protected withSource(source: RelationalPlanNode): PlanNode {
		return new SortNode(source, this.keys);
	}

	override toString(): string {
		return `Sort(${this.keys.map(k => `$${k.column} ${k.desc ? 'DESC' : 'ASC'}`).join(', ')})`;
	}
}
