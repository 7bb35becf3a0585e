import { PlanNodeType } from './plan-node-type.js';
import { PlanNode, expectArity, expectRelational, expectScalar, type Attribute, type RelationalPlanNode, type ScalarPlanNode } from './plan-node.js';

/**
 * Represents a filter operation (WHERE clause).
 * It takes an input relation and a predicate expression,
 * and outputs rows for which the predicate is true.
 */
export class FilterNode extends PlanNode implements RelationalPlanNode {
	override readonly nodeType = PlanNodeType.Filter;

	constructor(
		public readonly source: RelationalPlanNode,
		public readonly predicate: ScalarPlanNode,
	) {
		super();
	}

	getAttributes(): readonly Attribute[] {
		// Filter preserves the same attributes as its source
		return this.source.getAttributes();
	}

	getChildren(): readonly [RelationalPlanNode, ScalarPlanNode] {
		return [this.source, this.predicate];
	}

	override getRelations(): readonly [RelationalPlanNode] {
		return [this.source];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 2, this.nodeType);
		const newSource = expectRelational(newChildren[0], this.nodeType);
		const newPredicate = expectScalar(newChildren[1], this.nodeType);

		// Return same instance if nothing changed
		if (newSource === this.source && newPredicate === this.predicate) {
			return this;
		}
		return new FilterNode(newSource, newPredicate);
	}

	override toString(): string {
		return `Filter(${this.predicate.toString()})`;
	}

	override getLogicalAttributes(): Record<string, unknown> {
		return { predicate: this.predicate.toString() };
	}
}
