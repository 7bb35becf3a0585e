import { PlanNodeType } from './plan-node-type.js';
import { PlanNode, expectArity, expectRelational, expectScalar, type Attribute, type RelationalPlanNode, type ScalarPlanNode } from './plan-node.js';
import { ColumnReferenceNode, CorrelationReferenceNode } from './reference.js';

export interface Projection {
	node: ScalarPlanNode;
	/** Output column name; derived from the expression when absent */
	alias?: string;
}

/**
 * Computes one output column per projection from each input row.
 */
export class ProjectNode extends PlanNode implements RelationalPlanNode {
	override readonly nodeType = PlanNodeType.Project;
	private attributes?: readonly Attribute[];

	constructor(
		public readonly source: RelationalPlanNode,
		public readonly projections: readonly Projection[],
	) {
		super();
	}

	getAttributes(): readonly Attribute[] {
		if (!this.attributes) {
			this.attributes = this.projections.map(proj => ({
				name: proj.alias ?? defaultColumnName(proj.node),
				type: proj.node.getType(),
			}));
		}
		return this.attributes;
	}

	getChildren(): readonly PlanNode[] {
		return [this.source, ...this.projections.map(p => p.node)];
	}

	override getRelations(): readonly [RelationalPlanNode] {
		return [this.source];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 1 + this.projections.length, this.nodeType);
		const [first, ...rest] = newChildren;
		const newSource = expectRelational(first, this.nodeType);
		const newNodes = rest.map(child => expectScalar(child, this.nodeType));

		if (newSource === this.source && newNodes.every((n, i) => n === this.projections[i].node)) {
			return this;
		}

		return new ProjectNode(
			newSource,
			this.projections.map((proj, i) => ({ node: newNodes[i], alias: proj.alias }))
		);
	}

	override toString(): string {
		const list = this.projections.map(proj => {
			const text = proj.node.toString();
			return proj.alias && proj.alias !== text ? `${text} AS ${proj.alias}` : text;
		});
		return `Project(${list.join(', ')})`;
	}
}

function defaultColumnName(node: ScalarPlanNode): string {
	if (node instanceof ColumnReferenceNode || node instanceof CorrelationReferenceNode) {
		return node.name ?? node.toString();
	}
	return node.toString();
}
