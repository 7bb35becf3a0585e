import { expect } from 'chai';
import { decorrelate } from '../../src/planner/decorrelator.js';
import type { DecorrelatorOptions } from '../../src/planner/decorrelator-options.js';
import { verifyNoCorrelation } from '../../src/planner/validation/correlation-validator.js';
import { formatPlan } from '../../src/util/plan-formatter.js';
import { evaluatePlan, rowBag } from '../util/reference-evaluator.js';
import { FUZZ_TABLES, PlanGenerator, Random } from '../util/random-plans.js';

const SEEDS = 150;

const CONFIGURATIONS: ReadonlyArray<[string, Partial<DecorrelatorOptions>]> = [
	['default rules', {}],
	['generic transform only', {
		disabledRules: ['single-row-aggregate', 'scalar-project', 'scalar-aggregate', 'singleton-values'],
	}],
];

describe('Decorrelation equivalence over generated plans', () => {
	for (const [label, options] of CONFIGURATIONS) {
		it(`preserves results with ${label}`, () => {
			for (let seed = 1; seed <= SEEDS; seed++) {
				const plan = new PlanGenerator(new Random(seed)).correlatedPlan();
				const expected = rowBag(evaluatePlan(plan, FUZZ_TABLES));

				const result = decorrelate(plan, options);
				const context = `seed ${seed}\n${formatPlan(plan)}\n=>\n${formatPlan(result)}`;

				expect(verifyNoCorrelation(result).ok, context).to.equal(true);
				expect(rowBag(evaluatePlan(result, FUZZ_TABLES)), context).to.deep.equal(expected);
			}
		});
	}
});
