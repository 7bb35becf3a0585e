/**
 * Rule: Scalar Aggregate Elimination
 *
 *   Correlate(L, [Project →] Aggregate[no keys](Filter/Project chain(B)))
 *
 * B is free of correlation; the chain and the optional top project read only
 * this correlate's identifier. With D = Distinct(L.f) over the referenced
 * fields:
 *
 *   M = Project[D.*, chain exprs, TRUE](Join[inner](D, B, chain predicates))
 *   A = Aggregate[D.*](Join[left](D, M, D.f IS M.f))
 *   → Project[L.*, top exprs](Join[inner](L, A, L.f IS A.f))
 *
 * Every correlation value reaches A, those with no matching B rows as one
 * all-NULL row, so each aggregate sees its empty-group input there. COUNT(*)
 * counts the TRUE marker instead of rows; the catalog's empty-group values
 * are applied on top.
 */

import type { CorrelateNode } from '../../nodes/correlate-node.js';
import type { PlanNode, RelationalPlanNode, ScalarPlanNode } from '../../nodes/plan-node.js';
import { ProjectNode } from '../../nodes/project-node.js';
import { FilterNode } from '../../nodes/filter.js';
import { JoinNode } from '../../nodes/join-node.js';
import { DistinctNode } from '../../nodes/distinct-node.js';
import { AggregateNode, type AggregateCall } from '../../nodes/aggregate-node.js';
import { ColumnReferenceNode } from '../../nodes/reference.js';
import type { RewriteResult, RuleContext } from '../../framework/context.js';
import { getAggregateFunction } from '../../../func/aggregates.js';
import { ruleLog } from '../../debug/logger-utils.js';
import {
	columnRef,
	combineConjuncts,
	containsCorrelate,
	inlineColumns,
	nullSafeEquals,
	passthrough,
	referencedFields,
	shiftColumns,
	substituteCorrelation,
	subtreeCorrelationReferences,
	trueLiteral,
} from '../../util/expression-utils.js';
import { withEmptyDefault } from './generic-transform.js';
import { finish, isRowPreserving } from './rule-support.js';

const log = ruleLog('scalar-aggregate');

interface ScalarAggregateShape {
	top?: ProjectNode;
	aggregate: AggregateNode;
	/** Correlation-free input below the chain */
	base: RelationalPlanNode;
	/** Chain predicates, over base columns */
	predicates: ScalarPlanNode[];
	/** Chain output columns (the aggregate's input), over base columns */
	columns: ScalarPlanNode[];
}

export function ruleScalarAggregate(node: CorrelateNode, context: RuleContext): RewriteResult | null {
	if (!isRowPreserving(node)) {
		return null;
	}
	// The left input is referenced more than once in the result
	if (containsCorrelate(node.left)) {
		return null;
	}

	const shape = matchShape(node, context);
	if (!shape) {
		return null;
	}
	const fields = referencedFields(node.right, node.correlationId);
	if (fields.length === 0) {
		return null;
	}
	if (shape.aggregate.aggregates.some(call => !getAggregateFunction(call.functionName))) {
		return null;
	}

	const { aggregate, base, predicates, columns } = shape;
	const k = fields.length;
	const left = node.left;
	const leftAttrs = left.getAttributes();
	const leftWidth = leftAttrs.length;

	const values = new DistinctNode(new ProjectNode(left, fields.map(f => ({ node: columnRef(leftAttrs, f), alias: leftAttrs[f].name }))));
	const valueAttrs = values.getAttributes();

	// Chain expressions over (values ++ base)
	const bind = (expr: ScalarPlanNode): ScalarPlanNode =>
		substituteCorrelation(shiftColumns(expr, i => i + k), node.correlationId, ref =>
			new ColumnReferenceNode(fields.indexOf(ref.field), ref.type, ref.name)
		);

	const matchedJoin = new JoinNode(values, base, 'inner', combineConjuncts(predicates.map(bind)));
	const chainAttrs = aggregate.source.getAttributes();
	const matched = new ProjectNode(matchedJoin, [
		...passthrough(matchedJoin.getAttributes(), 0, k),
		...columns.map((expr, i) => ({ node: bind(expr), alias: chainAttrs[i].name })),
		{ node: trueLiteral(), alias: 'matched' },
	]);

	const paddedAttrs = [...valueAttrs, ...matched.getAttributes()];
	const padded = new JoinNode(values, matched, 'left', combineConjuncts(
		fields.map((_, j) => nullSafeEquals(columnRef(paddedAttrs, j), columnRef(paddedAttrs, k + j)))
	));

	const marker = 2 * k + columns.length;
	const grouped = new AggregateNode(
		padded,
		fields.map((_, j) => j),
		aggregate.aggregates.map(call => remapCall(call, 2 * k, marker))
	);

	const backAttrs = [...leftAttrs, ...grouped.getAttributes()];
	const back = new JoinNode(left, grouped, 'inner', combineConjuncts(
		fields.map((field, j) => nullSafeEquals(columnRef(backAttrs, field), columnRef(backAttrs, leftWidth + j)))
	));
	const joinedAttrs = back.getAttributes();

	const results = aggregate.aggregates.map((call, i) => withEmptyDefault(columnRef(joinedAttrs, leftWidth + k + i), call));
	const exprs = shape.top
		? shape.top.projections.map(proj =>
			substituteCorrelation(inlineColumns(proj.node, results), node.correlationId, ref => columnRef(leftAttrs, ref.field))
		)
		: results;

	const names = node.right.getAttributes().map(attr => attr.name);
	const result = new ProjectNode(back, [
		...passthrough(joinedAttrs, 0, leftWidth),
		...exprs.map((expr, i) => ({ node: expr, alias: names[i] })),
	]);

	log('Rewrote %s scalar aggregate over field(s) [%s]', node.correlationId.name, fields.join(', '));
	return finish(node, result, context);
}

function matchShape(node: CorrelateNode, context: RuleContext): ScalarAggregateShape | null {
	let top: ProjectNode | undefined;
	let aggregate: AggregateNode;
	if (node.right instanceof AggregateNode) {
		aggregate = node.right;
	} else if (node.right instanceof ProjectNode && node.right.source instanceof AggregateNode) {
		top = node.right;
		aggregate = node.right.source;
	} else {
		return null;
	}
	if (!aggregate.isScalarAggregate) {
		return null;
	}

	const onlyThisCorrelation = (consumer: PlanNode): boolean =>
		context.map.referencesOf(consumer).every(ref => ref.correlationId === node.correlationId);
	if (top && !onlyThisCorrelation(top)) {
		return null;
	}

	const chain: Array<FilterNode | ProjectNode> = [];
	let current = aggregate.source;
	while (current instanceof FilterNode || current instanceof ProjectNode) {
		if (!onlyThisCorrelation(current)) {
			return null;
		}
		chain.push(current);
		current = current.source;
	}
	const base = current;
	if (containsCorrelate(base) || subtreeCorrelationReferences(base).length > 0) {
		return null;
	}

	// Inline the chain bottom-up so everything reads base columns
	let columns: ScalarPlanNode[] = passthrough(base.getAttributes()).map(proj => proj.node);
	const predicates: ScalarPlanNode[] = [];
	for (const step of chain.reverse()) {
		if (step instanceof FilterNode) {
			predicates.push(inlineColumns(step.predicate, columns));
		} else {
			const below = columns;
			columns = step.projections.map(proj => inlineColumns(proj.node, below));
		}
	}

	return { top, aggregate, base, predicates, columns };
}

/**
 * Point an aggregate call at the padded row: arguments move past the value
 * columns, and COUNT(*) counts the marker column so padding is not counted.
 */
function remapCall(call: AggregateCall, offset: number, marker: number): AggregateCall {
	if (call.args.length === 0 && getAggregateFunction(call.functionName)?.name === 'COUNT') {
		return { ...call, args: [marker] };
	}
	return { ...call, args: call.args.map(arg => arg + offset) };
}
