import type { PlanNode, ScalarPlanNode } from '../planner/nodes/plan-node.js';

/**
 * Convert a ScalarPlanNode to its string representation for use in plan descriptions.
 */
export function formatExpression(node: ScalarPlanNode): string {
	return node.toString();
}


/**
 * Render a relational plan as an indented operator tree, one operator per line.
 *
 * ```
 * Project($0, $1)
 *   Correlate[inner] $cor0
 *     TableScan(t)
 *     ...
 * ```
 */
export function formatPlan(root: PlanNode, indent = '  '): string {
	const lines: string[] = [];
	const walk = (node: PlanNode, depth: number): void => {
		lines.push(`${indent.repeat(depth)}${node.toString()}`);
		for (const relation of node.getRelations()) {
			walk(relation, depth + 1);
		}
	};
	walk(root, 0);
	return lines.join('\n');
}

/**
 * One line of an explained plan: the operator, its position in the tree and
 * its logical properties as JSON (null when it has none).
 */
export interface ExplainRow {
	id: number;
	parentId: number | null;
	depth: number;
	nodeType: string;
	detail: string;
	properties: string | null;
}

/**
 * Flatten a relational plan into rows, parents before children.
 */
export function explainPlan(root: PlanNode): ExplainRow[] {
	const rows: ExplainRow[] = [];
	const stack: Array<{ node: PlanNode; parentId: number | null; depth: number }> = [{ node: root, parentId: null, depth: 0 }];

	for (let entry = stack.pop(); entry; entry = stack.pop()) {
		const { node, parentId, depth } = entry;
		const id = rows.length + 1;
		const attributes = node.getLogicalAttributes();
		rows.push({
			id,
			parentId,
			depth,
			nodeType: node.nodeType,
			detail: node.toString(),
			properties: Object.keys(attributes).length > 0 ? JSON.stringify(attributes) : null,
		});

		// Reverse order so children come out left to right
		const relations = node.getRelations();
		for (let i = relations.length - 1; i >= 0; i--) {
			stack.push({ node: relations[i], parentId: id, depth: depth + 1 });
		}
	}
	return rows;
}
