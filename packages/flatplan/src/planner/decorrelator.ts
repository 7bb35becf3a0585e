import { createLogger } from '../common/logger.js';
import { StatusCode } from '../common/types.js';
import { flatplanError } from '../common/errors.js';
import type { PlanNode } from './nodes/plan-node.js';
import type { CorrelateNode } from './nodes/correlate-node.js';
import { buildCorrelationMap, type CorrelationMap } from './analysis/correlation-map.js';
import type { RewriteResult } from './framework/context.js';
import type { RuleHandle, RuleSet } from './framework/registry.js';
import { resolveOptions, type DecorrelatorOptions } from './decorrelator-options.js';
import { getDefaultRuleSet } from './decorrelation-rules.js';
import { decorrelateCorrelate } from './rules/decorrelate/generic-transform.js';
import { assertNoCorrelation } from './validation/correlation-validator.js';
import { collectCorrelates, replaceSubtree } from './util/expression-utils.js';
import { formatPlan } from '../util/plan-formatter.js';

const log = createLogger('decorrelate:driver');

interface RewriteState {
	root: PlanNode;
	map: CorrelationMap;
}

/**
 * Removes every Correlate from a plan: pattern rules first, to a fixpoint,
 * then the generic transform on whatever they left, innermost first.
 *
 * Holds configuration only. Each call builds and threads its own correlation
 * map, so one instance may serve any number of plans.
 */
export class Decorrelator {
	public readonly options: DecorrelatorOptions;

	constructor(
		options?: Partial<DecorrelatorOptions>,
		private readonly rules: RuleSet = getDefaultRuleSet()
	) {
		this.options = resolveOptions(options);
	}

	decorrelate(root: PlanNode): PlanNode {
		const map = buildCorrelationMap(root);
		if (!map.hasCorrelation()) {
			log('No correlation found; plan unchanged');
			return root;
		}

		const afterRules = this.applyPatternRules({ root, map });
		if (log.enabled) {
			log('Plan after pattern rules:\n%s', formatPlan(afterRules.root));
		}

		const result = this.applyGenericTransform(afterRules.root);
		if (log.enabled) {
			log('Decorrelated plan:\n%s', formatPlan(result));
		}

		if (this.options.verify) {
			assertNoCorrelation(result);
		}
		return result;
	}

	/**
	 * Try the enabled rules on each Correlate, innermost first, restarting the
	 * scan after every successful rewrite until a full scan changes nothing.
	 */
	private applyPatternRules(initial: RewriteState): RewriteState {
		const rules = this.rules.enabledRules(this.options);
		let state = initial;
		let applications = 0;

		for (;;) {
			let applied: RewriteState | undefined;
			for (const correlate of collectCorrelates(state.root)) {
				const rewrite = this.tryRules(correlate, rules, state.map);
				if (rewrite) {
					applied = splice(state.root, correlate, rewrite);
					break;
				}
			}
			if (!applied) {
				return state;
			}

			applications++;
			if (applications > this.options.maxRuleApplications) {
				flatplanError(
					`Pattern rules applied more than ${this.options.maxRuleApplications} times; giving up`,
					StatusCode.INTERNAL
				);
			}
			state = applied;
		}
	}

	private tryRules(correlate: CorrelateNode, rules: readonly RuleHandle[], map: CorrelationMap): RewriteResult | null {
		for (const rule of rules) {
			const result = rule.fn(correlate, { map, options: this.options });
			if (result) {
				log('Rule %s eliminated %s', rule.id, correlate.correlationId.name);
				return result;
			}
		}
		return null;
	}

	/**
	 * Eliminate the remaining Correlate nodes one at a time, always picking one
	 * with no Correlate beneath it.
	 */
	private applyGenericTransform(root: PlanNode): PlanNode {
		// Start again from a map built for the tree as it now stands
		let state: RewriteState = { root, map: buildCorrelationMap(root) };

		let pending = collectCorrelates(state.root);
		while (pending.length > 0) {
			const next = pending[0];
			state = splice(state.root, next, decorrelateCorrelate(next, state.map));
			pending = collectCorrelates(state.root);
		}
		return state.root;
	}
}

/**
 * Put a rewritten subtree in place of the Correlate it replaces, carrying the
 * map entries of every rebuilt ancestor over to its replacement.
 */
function splice(root: PlanNode, target: CorrelateNode, rewrite: RewriteResult): RewriteState {
	const replaced = replaceSubtree(root, target, rewrite.node);
	const map = replaced.rebuilt.reduce((acc, [oldNode, newNode]) => acc.rekey(oldNode, newNode), rewrite.map);
	return { root: replaced.root, map };
}

/**
 * Decorrelate a plan with a one-off Decorrelator.
 */
export function decorrelate(root: PlanNode, options?: Partial<DecorrelatorOptions>): PlanNode {
	return new Decorrelator(options).decorrelate(root);
}
