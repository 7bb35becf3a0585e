/**
 * Rule: Single-Row Aggregate Elimination
 *
 *   Correlate(L, Project[exprs](Aggregate(Values(one row))))
 *     →  Project[L.*, exprs'](L)
 *
 * An aggregate over one constant row yields one row whose values are known at
 * rewrite time. Those values are folded through the aggregate catalog and
 * inlined into the project as literals; correlation references become
 * references to the current left row.
 */

import type { CorrelateNode } from '../../nodes/correlate-node.js';
import type { ScalarPlanNode } from '../../nodes/plan-node.js';
import { ProjectNode } from '../../nodes/project-node.js';
import { AggregateNode, type AggregateCall } from '../../nodes/aggregate-node.js';
import { LiteralNode } from '../../nodes/scalar.js';
import type { RewriteResult, RuleContext } from '../../framework/context.js';
import type { SqlValue } from '../../../common/types.js';
import { getAggregateFunction } from '../../../func/aggregates.js';
import { ruleLog } from '../../debug/logger-utils.js';
import { columnRef, inlineColumns, substituteCorrelation } from '../../util/expression-utils.js';
import { appendToLeft, isRowPreserving, isSingleRowValues, leftPassthrough } from './rule-support.js';

const log = ruleLog('single-row-aggregate');

export function ruleSingleRowAggregate(node: CorrelateNode, context: RuleContext): RewriteResult | null {
	if (!isRowPreserving(node)) {
		return null;
	}

	const project = node.right;
	if (!(project instanceof ProjectNode) || !(project.source instanceof AggregateNode)) {
		return null;
	}
	const aggregate = project.source;
	if (!isSingleRowValues(aggregate.source)) {
		return null;
	}

	const row = aggregate.source.rows[0];
	const folded: SqlValue[] = [];
	for (const call of aggregate.aggregates) {
		const value = foldAggregate(call, row);
		if (value === undefined) {
			log('Cannot fold %s; leaving %s', call.functionName, node.correlationId.name);
			return null;
		}
		folded.push(value);
	}

	const aggAttrs = aggregate.getAttributes();
	const constants = [...aggregate.groupBy.map(index => row[index]), ...folded]
		.map((value, i) => new LiteralNode(value, aggAttrs[i].type));

	const leftAttrs = node.left.getAttributes();
	const exprs: ScalarPlanNode[] = project.projections.map(proj =>
		substituteCorrelation(inlineColumns(proj.node, constants), node.correlationId, ref => columnRef(leftAttrs, ref.field))
	);

	log('Folded %d aggregate(s) under %s', folded.length, node.correlationId.name);
	return appendToLeft(node, node.left, leftPassthrough(node), exprs, context);
}

/**
 * Value of one aggregate call over a single row, or undefined when the
 * function is unknown or called with an unsupported argument count.
 */
function foldAggregate(call: AggregateCall, row: readonly SqlValue[]): SqlValue | undefined {
	const schema = getAggregateFunction(call.functionName);
	if (!schema || call.args.length < schema.minArgs || call.args.length > schema.maxArgs) {
		return undefined;
	}
	// One row: DISTINCT changes nothing
	return schema.evaluate(call.args.length === 0 ? null : [row[call.args[0]]], 1);
}
