import { expect } from 'chai';
import { assertNoCorrelation, verifyNoCorrelation } from '../../src/planner/validation/correlation-validator.js';
import { CorrelationRemainingError } from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';
import { CorrelateNode } from '../../src/planner/nodes/correlate-node.js';
import { FilterNode } from '../../src/planner/nodes/filter.js';
import { JoinNode } from '../../src/planner/nodes/join-node.js';
import { CorrelationId } from '../../src/planner/nodes/reference.js';
import { col, cor, eq, lit, project, scan } from '../util/plan-builders.js';

describe('Correlation verification', () => {
	it('accepts a plan with no Correlate and no correlation reference', () => {
		const t = scan('t', 'a', 'b');
		const u = scan('u', 'c');
		const plan = project(new JoinNode(t, u, 'left', eq(col(t, 0), lit(1))), [col(t, 1)]);

		expect(verifyNoCorrelation(plan)).to.deep.equal({ ok: true });
		expect(() => assertNoCorrelation(plan)).to.not.throw();
	});

	it('reports a surviving Correlate with its subtree', () => {
		const t = scan('t', 'a');
		const u = scan('u', 'c');
		const id = CorrelationId.mint();
		const plan = project(new CorrelateNode(t, u, id), [col(t, 0)]);

		const result = verifyNoCorrelation(plan);

		expect(result.ok).to.equal(false);
		if (!result.ok) {
			expect(result.error).to.be.instanceOf(CorrelationRemainingError);
			expect(result.error.code).to.equal(StatusCode.INTERNAL);
			expect(result.error.planDump).to.equal(`Correlate[inner] ${id.name}\n  TableScan(t)\n  TableScan(u)`);
			expect(result.error.message).to.equal(
				`Correlation remains after decorrelation: Correlate ${id.name}\nCorrelate[inner] ${id.name}\n  TableScan(t)\n  TableScan(u)`
			);
		}
	});

	it('reports a dangling correlation reference', () => {
		const t = scan('t', 'a');
		const id = CorrelationId.mint();
		const filter = new FilterNode(t, eq(col(t, 0), cor(id, 0)));
		const plan = project(filter, [col(t, 0)]);

		const result = verifyNoCorrelation(plan);

		expect(result.ok).to.equal(false);
		if (!result.ok) {
			expect(result.error.planDump).to.equal(`Filter(($0 = ${id.name}.$0))\n  TableScan(t)`);
			expect(result.error.message.split('\n')[0]).to.equal(
				`Correlation remains after decorrelation: reference ${id.name}.$0 in Filter(($0 = ${id.name}.$0))`
			);
		}
	});

	it('finds the first offending node in pre-order', () => {
		const t = scan('t', 'a');
		const first = CorrelationId.mint();
		const second = CorrelationId.mint();
		const plan = new JoinNode(
			project(t, [cor(first, 0)], ['x']),
			new FilterNode(scan('u', 'c'), eq(lit(1), cor(second, 0))),
			'inner'
		);

		expect(() => assertNoCorrelation(plan)).to.throw(CorrelationRemainingError, `reference ${first.name}.$0 in Project(${first.name}.$0 AS x)`);
	});
});
