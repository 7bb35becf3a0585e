/**
 * Shape checks and rebuild helpers shared by the decorrelation pattern rules.
 */

import type { RelationalPlanNode, ScalarPlanNode } from '../../nodes/plan-node.js';
import type { CorrelateNode } from '../../nodes/correlate-node.js';
import { ValuesNode } from '../../nodes/values-node.js';
import { ProjectNode, type Projection } from '../../nodes/project-node.js';
import type { RewriteResult, RuleContext } from '../../framework/context.js';
import { isBareCorrelationReference, passthrough } from '../../util/expression-utils.js';

/**
 * Pattern rules only rewrite correlates that keep every left row exactly once.
 */
export function isRowPreserving(node: CorrelateNode): boolean {
	return node.joinType === 'inner' || node.joinType === 'left';
}

export function isSingleRowValues(node: RelationalPlanNode): node is ValuesNode {
	return node instanceof ValuesNode && node.rows.length === 1;
}

/**
 * For `Project(Values(one row))` whose every projection is a bare reference
 * to the correlate's identifier (checked against the map), the referenced
 * left fields in projection order; otherwise null.
 */
export function bareReferenceFields(node: RelationalPlanNode, correlate: CorrelateNode, context: RuleContext): number[] | null {
	if (!(node instanceof ProjectNode) || !isSingleRowValues(node.source) || node.projections.length === 0) {
		return null;
	}
	const refs = context.map.referencesOf(node);
	if (refs.length === 0 || refs.some(ref => ref.correlationId !== correlate.correlationId)) {
		return null;
	}

	const fields: number[] = [];
	for (const proj of node.projections) {
		if (!isBareCorrelationReference(proj.node, correlate.correlationId)) {
			return null;
		}
		fields.push(proj.node.field);
	}
	return fields;
}

/**
 * `Project(left, left columns ++ computed)`, named like the correlate's output,
 * with the map updated for the replacement.
 */
export function appendToLeft(
	correlate: CorrelateNode,
	source: RelationalPlanNode,
	leftColumns: readonly Projection[],
	computed: readonly ScalarPlanNode[],
	context: RuleContext
): RewriteResult {
	const names = correlate.right.getAttributes().map(attr => attr.name);
	const node = new ProjectNode(source, [
		...leftColumns,
		...computed.map((expr, i) => ({ node: expr, alias: names[i] })),
	]);
	return finish(correlate, node, context);
}

export function leftPassthrough(correlate: CorrelateNode): Projection[] {
	return passthrough(correlate.left.getAttributes());
}

export function finish(correlate: CorrelateNode, node: RelationalPlanNode, context: RuleContext): RewriteResult {
	return {
		node,
		map: context.map.reindex(correlate, node).withoutCorrelation(correlate.correlationId),
	};
}
