/**
 * Generic decorrelation transform
 *
 * Eliminates one Correlate node of any shape. The distinct tuples of left
 * fields the right subtree reads (the "value source") are joined in at the
 * lowest operators that need them, and every rewritten operator carries those
 * values upward as extra trailing columns:
 *
 *   Correlate[t](L, R)  →  Project(Join[t](L, R', L.f IS R'.value_f))
 *
 * where R' produces R's columns followed by one column per correlated field.
 * Correlated filter conjuncts become the condition of the join that brings
 * the values in; aggregates group by the value columns; a scalar aggregate is
 * outer-joined from the value source so every value keeps its single row.
 */

import { createLogger } from '../../../common/logger.js';
import { MapConsistencyError, UnsupportedPatternError } from '../../../common/errors.js';
import type { RelationalPlanNode, ScalarPlanNode } from '../../nodes/plan-node.js';
import { CorrelateNode } from '../../nodes/correlate-node.js';
import { FilterNode } from '../../nodes/filter.js';
import { ProjectNode } from '../../nodes/project-node.js';
import { JoinNode } from '../../nodes/join-node.js';
import { AggregateNode, type AggregateCall } from '../../nodes/aggregate-node.js';
import { SortNode } from '../../nodes/sort.js';
import { DistinctNode } from '../../nodes/distinct-node.js';
import { CoalesceNode, LiteralNode } from '../../nodes/scalar.js';
import { ColumnReferenceNode, type CorrelationId } from '../../nodes/reference.js';
import type { CorrelationMap } from '../../analysis/correlation-map.js';
import type { RewriteResult } from '../../framework/context.js';
import { getAggregateFunction } from '../../../func/aggregates.js';
import { formatPlan } from '../../../util/plan-formatter.js';
import {
	columnRef,
	combineConjuncts,
	containsCorrelate,
	nullSafeEquals,
	passthrough,
	referencedFields,
	referencesCorrelation,
	shiftColumns,
	splitConjuncts,
	substituteCorrelation,
	subtreeReferences,
} from '../../util/expression-utils.js';

const log = createLogger('decorrelate:generic');

interface ValueSource {
	readonly correlationId: CorrelationId;
	/** Left fields read through the identifier, ascending */
	readonly fields: readonly number[];
	/** Distinct(Project(left, fields)) */
	readonly relation: RelationalPlanNode;
}

/**
 * Eliminate `correlate`, whose right subtree must hold no other Correlate.
 * @throws UnsupportedPatternError when the right subtree depends on the
 * identifier through an operator the transform cannot rewrite
 */
export function decorrelateCorrelate(correlate: CorrelateNode, map: CorrelationMap): RewriteResult {
	const { left, right, correlationId, joinType } = correlate;

	if (!map.isLive(correlationId)) {
		throw new MapConsistencyError(`Correlation ${correlationId.name} is not registered`, formatPlan(correlate));
	}
	if (containsCorrelate(right)) {
		throw new UnsupportedPatternError(
			`Correlate ${correlationId.name} still has a nested Correlate in its right input`,
			formatPlan(correlate)
		);
	}

	const leftAttrs = left.getAttributes();
	const fields = referencedFields(right, correlationId);
	let replacement: RelationalPlanNode;

	if (fields.length === 0) {
		log('%s is not referenced; replacing with a %s join', correlationId.name, joinType);
		replacement = new JoinNode(left, right, joinType);
	} else {
		const values: ValueSource = {
			correlationId,
			fields,
			relation: new DistinctNode(new ProjectNode(left, fields.map(f => ({ node: columnRef(leftAttrs, f), alias: leftAttrs[f].name })))),
		};
		const rewritten = rewrite(right, values) ?? withValues(right, values);

		const leftWidth = leftAttrs.length;
		const rightWidth = right.getAttributes().length;
		const combined = [...leftAttrs, ...rewritten.getAttributes()];
		const match = fields.map((field, j) =>
			nullSafeEquals(columnRef(combined, field), columnRef(combined, leftWidth + rightWidth + j))
		);
		const join = new JoinNode(left, rewritten, joinType, combineConjuncts(match));

		replacement = joinType === 'semi' || joinType === 'anti'
			? join
			: new ProjectNode(join, passthrough(join.getAttributes(), 0, leftWidth + rightWidth));
		log('Decorrelated %s over field(s) [%s]', correlationId.name, fields.join(', '));
	}

	const next = map.reindex(correlate, replacement).withoutCorrelation(correlationId);
	return { node: replacement, map: next };
}

/**
 * Rewrite a right-side subtree. Returns undefined when the subtree does not
 * depend on the identifier (it is kept as is); otherwise a correlation-free
 * relation producing the original columns followed by the value columns.
 */
function rewrite(node: RelationalPlanNode, values: ValueSource): RelationalPlanNode | undefined {
	if (!subtreeReferences(node, values.correlationId)) {
		return undefined;
	}

	if (node instanceof FilterNode) return rewriteFilter(node, values);
	if (node instanceof ProjectNode) return rewriteProject(node, values);
	if (node instanceof AggregateNode) return rewriteAggregate(node, values);
	if (node instanceof JoinNode) return rewriteJoin(node, values);
	if (node instanceof SortNode) {
		return new SortNode(rewrite(node.source, values) ?? withValues(node.source, values), node.keys);
	}
	if (node instanceof DistinctNode) {
		return new DistinctNode(rewrite(node.source, values) ?? withValues(node.source, values));
	}
	if (node instanceof CorrelateNode) {
		throw new UnsupportedPatternError(
			`Cannot push ${values.correlationId.name} through unresolved Correlate ${node.correlationId.name}`,
			formatPlan(node)
		);
	}

	throw new UnsupportedPatternError(
		`Cannot decorrelate ${values.correlationId.name} through ${node.nodeType}`,
		formatPlan(node)
	);
}

/** Cross `source` with the value source: source columns, then value columns */
function withValues(source: RelationalPlanNode, values: ValueSource, condition?: ScalarPlanNode): JoinNode {
	return new JoinNode(source, values.relation, 'inner', condition);
}

/** Turn references to the identifier into references to value columns starting at `base` */
function bindValues(expr: ScalarPlanNode, values: ValueSource, base: number): ScalarPlanNode {
	return substituteCorrelation(expr, values.correlationId, ref =>
		new ColumnReferenceNode(base + values.fields.indexOf(ref.field), ref.type, ref.name)
	);
}

function rewriteFilter(node: FilterNode, values: ValueSource): RelationalPlanNode {
	const width = node.source.getAttributes().length;
	const source = rewrite(node.source, values);
	if (source) {
		return new FilterNode(source, bindValues(node.predicate, values, width));
	}

	// Correlated conjuncts become the condition of the join introducing the values
	const correlated: ScalarPlanNode[] = [];
	const residual: ScalarPlanNode[] = [];
	for (const conjunct of splitConjuncts(node.predicate)) {
		if (referencesCorrelation(conjunct, values.correlationId)) {
			correlated.push(bindValues(conjunct, values, width));
		} else {
			residual.push(conjunct);
		}
	}

	const joined = withValues(node.source, values, combineConjuncts(correlated));
	const remaining = combineConjuncts(residual);
	return remaining ? new FilterNode(joined, remaining) : joined;
}

function rewriteProject(node: ProjectNode, values: ValueSource): RelationalPlanNode {
	const width = node.source.getAttributes().length;
	const source = rewrite(node.source, values) ?? withValues(node.source, values);
	const attrs = node.getAttributes();

	const projections = node.projections.map((proj, i) => ({
		node: bindValues(proj.node, values, width),
		alias: attrs[i].name,
	}));
	return new ProjectNode(source, [
		...projections,
		...passthrough(source.getAttributes(), width, values.fields.length),
	]);
}

function rewriteAggregate(node: AggregateNode, values: ValueSource): RelationalPlanNode {
	const width = node.source.getAttributes().length;
	const k = values.fields.length;
	const source = rewrite(node.source, values) ?? withValues(node.source, values);

	// Each correlation value gets its own groups
	const groupBy = [...values.fields.map((_, j) => width + j), ...node.groupBy];
	const aggregate = new AggregateNode(source, groupBy, node.aggregates);
	const aggAttrs = aggregate.getAttributes();
	const originalWidth = node.groupBy.length + node.aggregates.length;

	if (!node.isScalarAggregate) {
		// Compensating project: original columns first, value columns last
		return new ProjectNode(aggregate, [
			...passthrough(aggAttrs, k, originalWidth),
			...passthrough(aggAttrs, 0, k),
		]);
	}

	// A scalar aggregate yields one row per correlation value, even for values with no input rows
	const valueAttrs = values.relation.getAttributes();
	const combined = [...valueAttrs, ...aggAttrs];
	const match = values.fields.map((_, j) => nullSafeEquals(columnRef(combined, j), columnRef(combined, k + j)));
	const join = new JoinNode(values.relation, aggregate, 'left', combineConjuncts(match));
	const joinAttrs = join.getAttributes();
	const originalAttrs = node.getAttributes();

	const results = node.aggregates.map((call, i) => ({
		node: withEmptyDefault(columnRef(joinAttrs, 2 * k + i), call),
		alias: originalAttrs[i].name,
	}));
	return new ProjectNode(join, [...results, ...passthrough(joinAttrs, 0, k)]);
}

function rewriteJoin(node: JoinNode, values: ValueSource): RelationalPlanNode {
	const k = values.fields.length;
	const leftWidth = node.left.getAttributes().length;
	const rightWidth = node.right.getAttributes().length;

	// An independent side is crossed with the value source so both sides carry the values
	const left = rewrite(node.left, values) ?? withValues(node.left, values);
	const right = rewrite(node.right, values) ?? withValues(node.right, values);

	const condition = node.condition
		? bindValues(shiftColumns(node.condition, i => i < leftWidth ? i : i + k), values, leftWidth)
		: undefined;
	const combined = [...left.getAttributes(), ...right.getAttributes()];
	const match = values.fields.map((_, j) =>
		nullSafeEquals(columnRef(combined, leftWidth + j), columnRef(combined, leftWidth + k + rightWidth + j))
	);
	const join = new JoinNode(left, right, node.joinType, combineConjuncts(condition ? [condition, ...match] : match));

	if (node.joinType === 'semi' || node.joinType === 'anti') {
		// Output is the left side only, which already ends with the value columns
		return join;
	}

	const attrs = join.getAttributes();
	return new ProjectNode(join, [
		...passthrough(attrs, 0, leftWidth),
		...passthrough(attrs, leftWidth + k, rightWidth),
		...passthrough(attrs, leftWidth, k),
	]);
}

/**
 * Apply the catalog's empty-group value to an aggregate result that may be
 * NULL only because its group was empty.
 */
export function withEmptyDefault(result: ScalarPlanNode, call: AggregateCall): ScalarPlanNode {
	const schema = getAggregateFunction(call.functionName);
	if (!schema) {
		throw new UnsupportedPatternError(`Unknown aggregate function ${call.functionName}; its empty-group value is not known`);
	}
	if (schema.emptyValue === null) {
		return result;
	}
	return new CoalesceNode([result, new LiteralNode(schema.emptyValue)]);
}

