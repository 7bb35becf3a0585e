/**
 * Rule registration for the decorrelation pattern rules
 * Keeps rules in priority order and filters disabled ones
 */

import { createLogger } from '../../common/logger.js';
import type { CorrelateNode } from '../nodes/correlate-node.js';
import type { RewriteResult, RuleContext } from './context.js';
import type { DecorrelatorOptions } from '../decorrelator-options.js';
import { StatusCode } from '../../common/types.js';
import { flatplanError } from '../../common/errors.js';

const log = createLogger('decorrelate:registry');

/**
 * Rule function signature: a structural match on one Correlate node,
 * returning null when the shape does not match.
 */
export type DecorrelationRuleFn = (node: CorrelateNode, context: RuleContext) => RewriteResult | null;

/**
 * Handle for registered decorrelation rules
 */
export interface RuleHandle {
	/** Unique identifier for this rule */
	id: string;
	/** One-line summary of the shape it rewrites */
	description: string;
	/** Rule implementation function */
	fn: DecorrelationRuleFn;
	/** Lower numbers are tried first */
	priority: number;
}

/**
 * Ordered collection of rules. Instances are built once and never mutated
 * after construction by the driver.
 */
export class RuleSet {
	private readonly rules: RuleHandle[] = [];

	/**
	 * Register a new rule, keeping priority order (stable for equal priorities)
	 */
	register(handle: RuleHandle): this {
		if (this.rules.some(r => r.id === handle.id)) {
			flatplanError(`Decorrelation rule '${handle.id}' already registered`, StatusCode.INTERNAL);
		}

		const insertIndex = this.rules.findIndex(r => r.priority > handle.priority);
		if (insertIndex === -1) {
			this.rules.push(handle);
		} else {
			this.rules.splice(insertIndex, 0, handle);
		}

		log('Registered rule %s (priority: %d)', handle.id, handle.priority);
		return this;
	}

	/**
	 * Rules to try, in priority order, with disabled rules removed
	 */
	enabledRules(options: DecorrelatorOptions): readonly RuleHandle[] {
		if (options.disabledRules.length === 0) {
			return this.rules;
		}
		const disabled = new Set(options.disabledRules);
		return this.rules.filter(rule => !disabled.has(rule.id));
	}

	/**
	 * All registered rules (for debugging/tooling)
	 */
	all(): readonly RuleHandle[] {
		return [...this.rules];
	}
}
