import { expect } from 'chai';
import { decorrelate } from '../../src/planner/decorrelator.js';
import { DEFAULT_DECORRELATOR_OPTIONS } from '../../src/planner/decorrelator-options.js';
import { buildCorrelationMap } from '../../src/planner/analysis/correlation-map.js';
import type { RuleContext } from '../../src/planner/framework/context.js';
import { ruleScalarProject } from '../../src/planner/rules/decorrelate/rule-scalar-project.js';
import { ruleSingletonValues } from '../../src/planner/rules/decorrelate/rule-singleton-values.js';
import { ruleSingleRowAggregate } from '../../src/planner/rules/decorrelate/rule-single-row-aggregate.js';
import { ruleScalarAggregate } from '../../src/planner/rules/decorrelate/rule-scalar-aggregate.js';
import type { PlanNode, RelationalPlanNode } from '../../src/planner/nodes/plan-node.js';
import { CorrelateNode } from '../../src/planner/nodes/correlate-node.js';
import { ProjectNode } from '../../src/planner/nodes/project-node.js';
import { FilterNode } from '../../src/planner/nodes/filter.js';
import { AggregateNode } from '../../src/planner/nodes/aggregate-node.js';
import { CorrelationId } from '../../src/planner/nodes/reference.js';
import { verifyNoCorrelation } from '../../src/planner/validation/correlation-validator.js';
import { col, cor, eq, expectNode, lit, op, project, scan, values } from '../util/plan-builders.js';
import { evaluatePlan, rowBag, type Tables } from '../util/reference-evaluator.js';

const TABLES: Tables = {
	t: [[1, 10], [2, 20], [1, 30]],
	u: [[1, 4], [1, 8], [3, 5]],
	s: [[1], [2]],
};

function contextFor(root: RelationalPlanNode): RuleContext {
	return { map: buildCorrelationMap(root), options: DEFAULT_DECORRELATOR_OPTIONS };
}

function expressions(node: ProjectNode): string[] {
	return node.projections.map(proj => proj.node.toString());
}

function names(node: RelationalPlanNode): string[] {
	return node.getAttributes().map(attr => attr.name);
}

function expectEquivalent(original: RelationalPlanNode, rewritten: PlanNode): void {
	expect(verifyNoCorrelation(rewritten).ok).to.equal(true);
	expect(rowBag(evaluatePlan(rewritten, TABLES))).to.deep.equal(rowBag(evaluatePlan(original, TABLES)));
}

describe('Decorrelation pattern rules', () => {
	describe('scalar-project', () => {
		it('turns a singleton project of a correlation reference into a left column', () => {
			const t = scan('t', 'a', 'b');
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(t, project(values([[]]), [cor(id, 1)], ['b2']), id);

			const result = expectNode(decorrelate(plan), ProjectNode);

			expect(result.source).to.equal(t);
			expect(expressions(result)).to.deep.equal(['$0', '$1', '$1']);
			expect(names(result)).to.deep.equal(['a', 'b', 'b2']);
			expectEquivalent(plan, result);
		});

		it('wins over singleton-values when both shapes match', () => {
			const t = scan('t', 'a', 'b');
			const left = project(t, [col(t, 0), col(t, 1)], ['a', 'b']);
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(left, project(values([[0]], 'x'), [cor(id, 0)], ['y']), id);

			const result = expectNode(decorrelate(plan), ProjectNode);

			expect(result.source).to.equal(left);
			expect(expressions(result)).to.deep.equal(['$0', '$1', '$0']);
		});

		it('rejects a computed expression over a correlation reference', () => {
			const t = scan('t', 'a', 'b');
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(t, project(values([[0]], 'x'), [op('+', cor(id, 0), lit(1))]), id);

			expect(ruleScalarProject(plan, contextFor(plan))).to.equal(null);
			expectEquivalent(plan, expectNode(decorrelate(plan), ProjectNode));
		});

		it('rejects Values with more than one row', () => {
			const t = scan('t', 'a', 'b');
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(t, project(values([[0], [1]], 'x'), [cor(id, 0)]), id);

			expect(ruleScalarProject(plan, contextFor(plan))).to.equal(null);
			expectEquivalent(plan, decorrelate(plan));
		});

		it('leaves semi and anti correlates to the generic transform', () => {
			const t = scan('t', 'a', 'b');
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(t, project(values([[0]], 'x'), [cor(id, 0)]), id, 'semi');

			expect(ruleScalarProject(plan, contextFor(plan))).to.equal(null);
		});
	});

	describe('singleton-values', () => {
		const options = { disabledRules: ['scalar-project'] };

		it('collapses the left project and the singleton project into one', () => {
			const t = scan('t', 'a', 'b');
			const left = project(t, [op('+', col(t, 0), lit(1)), col(t, 1)], ['a1', 'b']);
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(left, project(values([[0]], 'x'), [cor(id, 0), cor(id, 1)], ['y', 'z']), id, 'left');

			const result = expectNode(decorrelate(plan, options), ProjectNode);

			expect(result.source).to.equal(t);
			expect(expressions(result)).to.deep.equal(['($0 + 1)', '$1', '($0 + 1)', '$1']);
			expect(names(result)).to.deep.equal(['a1', 'b', 'y', 'z']);
			expectEquivalent(plan, result);
		});

		it('requires a project on the left', () => {
			const t = scan('t', 'a', 'b');
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(t, project(values([[0]], 'x'), [cor(id, 0)]), id);

			expect(ruleSingletonValues(plan, contextFor(plan))).to.equal(null);
		});

		it('rejects Values with more than one row and computed references', () => {
			const t = scan('t', 'a', 'b');
			const left = project(t, [col(t, 0)], ['a']);
			const twoRows = CorrelationId.mint();
			const computed = CorrelationId.mint();
			const first = new CorrelateNode(left, project(values([[0], [1]], 'x'), [cor(twoRows, 0)]), twoRows);
			const second = new CorrelateNode(left, project(values([[0]], 'x'), [op('+', cor(computed, 0), lit(1))]), computed);

			expect(ruleSingletonValues(first, contextFor(first))).to.equal(null);
			expect(ruleSingletonValues(second, contextFor(second))).to.equal(null);
			expectEquivalent(first, decorrelate(first, options));
			expectEquivalent(second, decorrelate(second, options));
		});
	});

	describe('single-row-aggregate', () => {
		it('folds the aggregate into literals over the left input', () => {
			const t = scan('t', 'a', 'b');
			const id = CorrelationId.mint();
			const aggregate = new AggregateNode(values([[4, 6]], 'x', 'y'), [], [
				{ functionName: 'SUM', args: [1] },
				{ functionName: 'COUNT', args: [] },
			]);
			const right = project(aggregate, [op('+', col(aggregate, 0), cor(id, 0)), col(aggregate, 1)], ['s', 'n']);
			const plan = new CorrelateNode(t, right, id);

			const result = expectNode(decorrelate(plan), ProjectNode);

			expect(result.source).to.equal(t);
			expect(expressions(result)).to.deep.equal(['$0', '$1', '(6 + $0)', '1']);
			expect(names(result)).to.deep.equal(['a', 'b', 's', 'n']);
			expectEquivalent(plan, result);
		});

		it('folds group keys of the single row', () => {
			const t = scan('t', 'a', 'b');
			const id = CorrelationId.mint();
			const aggregate = new AggregateNode(values([[7, null]], 'x', 'y'), [0], [{ functionName: 'MAX', args: [1] }]);
			const plan = new CorrelateNode(t, project(aggregate, [col(aggregate, 0), col(aggregate, 1)]), id, 'left');

			const result = expectNode(decorrelate(plan), ProjectNode);

			expect(expressions(result)).to.deep.equal(['$0', '$1', '7', 'NULL']);
			expectEquivalent(plan, result);
		});

		it('declines aggregates the catalog cannot fold', () => {
			const t = scan('t', 'a');
			const id = CorrelationId.mint();
			const aggregate = new AggregateNode(values([[1]], 'x'), [], [{ functionName: 'MEDIAN', args: [0] }]);
			const plan = new CorrelateNode(t, project(aggregate, [op('+', col(aggregate, 0), cor(id, 0))]), id);

			expect(ruleSingleRowAggregate(plan, contextFor(plan))).to.equal(null);
			expect(verifyNoCorrelation(decorrelate(plan)).ok).to.equal(true);
		});
	});

	describe('scalar-aggregate', () => {
		function avgOfMatches(joinType: 'inner' | 'left'): CorrelateNode {
			const t = scan('t', 'a', 'b');
			const u = scan('u', 'c', 'd');
			const id = CorrelationId.mint();
			const right = new AggregateNode(new FilterNode(u, eq(col(u, 0), cor(id, 0))), [], [
				{ functionName: 'AVG', args: [1], alias: 'avg_d' },
			]);
			return new CorrelateNode(t, right, id, joinType);
		}

		it('yields NULL for AVG over an empty correlated group instead of dropping the row', () => {
			const plan = avgOfMatches('left');

			const rewrite = ruleScalarAggregate(plan, contextFor(plan));
			expect(rewrite).to.not.equal(null);

			const result = decorrelate(plan);
			expect(rowBag(evaluatePlan(result, TABLES))).to.deep.equal(rowBag([[1, 10, 6], [2, 20, null], [1, 30, 6]]));
			expect(names(result)).to.deep.equal(['a', 'b', 'avg_d']);
			expectEquivalent(plan, result);
		});

		it('keeps every left row for an inner correlate too', () => {
			const plan = avgOfMatches('inner');
			expect(rowBag(evaluatePlan(decorrelate(plan), TABLES))).to.deep.equal(rowBag([[1, 10, 6], [2, 20, null], [1, 30, 6]]));
		});

		it('counts zero rows for an empty group', () => {
			const t = scan('t', 'a', 'b');
			const u = scan('u', 'c', 'd');
			const id = CorrelationId.mint();
			const right = new AggregateNode(new FilterNode(u, eq(col(u, 0), cor(id, 0))), [], [
				{ functionName: 'COUNT', args: [] },
				{ functionName: 'TOTAL', args: [1] },
			]);
			const plan = new CorrelateNode(t, right, id);

			expect(ruleScalarAggregate(plan, contextFor(plan))).to.not.equal(null);
			const result = decorrelate(plan);
			expect(rowBag(evaluatePlan(result, TABLES))).to.deep.equal(rowBag([[1, 10, 2, 12], [2, 20, 0, 0], [1, 30, 2, 12]]));
		});

		it('inlines a project chain and the top project', () => {
			const t = scan('t', 'a', 'b');
			const u = scan('u', 'c', 'd');
			const id = CorrelationId.mint();
			const chain = project(new FilterNode(u, op('<=', col(u, 0), cor(id, 0))), [op('*', col(u, 1), cor(id, 0))], ['scaled']);
			const aggregate = new AggregateNode(chain, [], [{ functionName: 'SUM', args: [0] }]);
			const right = project(aggregate, [op('+', col(aggregate, 0), cor(id, 1))], ['total']);
			const plan = new CorrelateNode(t, right, id, 'left');

			expect(ruleScalarAggregate(plan, contextFor(plan))).to.not.equal(null);
			const result = decorrelate(plan);
			// a=1: (4 + 8) * 1 + b; a=2: (4 + 8) * 2 + 20
			expect(rowBag(evaluatePlan(result, TABLES))).to.deep.equal(rowBag([[1, 10, 22], [2, 20, 44], [1, 30, 42]]));
			expectEquivalent(plan, result);
		});

		it('rejects grouped aggregates and correlated bases', () => {
			const t = scan('t', 'a', 'b');
			const u = scan('u', 'c', 'd');
			const grouped = CorrelationId.mint();
			const groupedPlan = new CorrelateNode(t, new AggregateNode(new FilterNode(u, eq(col(u, 0), cor(grouped, 0))), [0], [
				{ functionName: 'COUNT', args: [] },
			]), grouped);
			expect(ruleScalarAggregate(groupedPlan, contextFor(groupedPlan))).to.equal(null);

			const other = CorrelationId.mint();
			const inner = CorrelationId.mint();
			const innerPlan = new CorrelateNode(u, new AggregateNode(new FilterNode(scan('s', 'x'), eq(col(u, 0), cor(other, 0))), [], [
				{ functionName: 'COUNT', args: [] },
			]), inner);
			const outerPlan = new CorrelateNode(t, innerPlan, other);
			// Chain reads another identifier
			expect(ruleScalarAggregate(innerPlan, contextFor(outerPlan))).to.equal(null);
		});

		it('declines while the left input is still a Correlate', () => {
			const t = scan('t', 'a', 'b');
			const u = scan('u', 'c', 'd');
			const leftId = CorrelationId.mint();
			const left = new CorrelateNode(t, project(values([[0]], 'x'), [cor(leftId, 1)], ['v']), leftId);
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(left, new AggregateNode(new FilterNode(u, eq(col(u, 0), cor(id, 0))), [], [
				{ functionName: 'COUNT', args: [] },
			]), id);

			expect(ruleScalarAggregate(plan, contextFor(plan))).to.equal(null);
			// Once the left Correlate is gone the rule takes the outer one
			const result = decorrelate(plan);
			expect(rowBag(evaluatePlan(result, TABLES))).to.deep.equal(rowBag([[1, 10, 10, 2], [2, 20, 20, 0], [1, 30, 30, 2]]));
			expectEquivalent(plan, result);
		});

		it('declines a base that is itself a Correlate', () => {
			const t = scan('t', 'a', 'b');
			const u = scan('u', 'c', 'd');
			const baseId = CorrelationId.mint();
			const base = new CorrelateNode(u, project(values([[0]], 'x'), [cor(baseId, 1)], ['v']), baseId);
			const id = CorrelationId.mint();
			const plan = new CorrelateNode(t, new AggregateNode(new FilterNode(base, eq(col(base, 0), cor(id, 0))), [], [
				{ functionName: 'COUNT', args: [] },
			]), id);

			expect(ruleScalarAggregate(plan, contextFor(plan))).to.equal(null);
			expectEquivalent(plan, decorrelate(plan));
		});

		it('leaves the map matching a freshly built one', () => {
			const s = scan('s', 'x');
			const t = scan('t', 'a', 'b');
			const u = scan('u', 'c', 'd');
			const outerId = CorrelationId.mint();
			const innerId = CorrelationId.mint();
			const left = new FilterNode(t, eq(col(t, 0), cor(outerId, 0)));
			const inner = new CorrelateNode(left, new AggregateNode(new FilterNode(u, eq(col(u, 0), cor(innerId, 0))), [], [
				{ functionName: 'COUNT', args: [] },
			]), innerId);
			const outer = new CorrelateNode(s, inner, outerId);

			const rewrite = ruleScalarAggregate(inner, contextFor(outer));
			if (!rewrite) {
				throw new Error('scalar-aggregate did not apply');
			}
			const root = outer.withChildren([s, rewrite.node]);
			const map = rewrite.map.rekey(outer, root);

			expect(map.snapshot()).to.deep.equal(buildCorrelationMap(root).snapshot());
			expect(map.snapshot()).to.deep.equal({
				definitions: [`${outerId.name}@${root.id}`],
				references: [`${left.id}:${outerId.name}.$0`],
			});
			expect(map.isLive(innerId)).to.equal(false);
		});
	});

	it('removes the eliminated identifier from the map on every rule', () => {
		const t = scan('t', 'a', 'b');
		const id = CorrelationId.mint();
		const plan = new CorrelateNode(t, project(values([[0]], 'x'), [cor(id, 1)]), id);

		const rewrite = ruleScalarProject(plan, contextFor(plan));

		expect(rewrite?.map.hasCorrelation()).to.equal(false);
		expect(rewrite?.map.snapshot()).to.deep.equal({ definitions: [], references: [] });
	});
});
