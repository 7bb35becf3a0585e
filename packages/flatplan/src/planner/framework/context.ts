import type { CorrelationMap } from '../analysis/correlation-map.js';
import type { RelationalPlanNode } from '../nodes/plan-node.js';
import type { DecorrelatorOptions } from '../decorrelator-options.js';

/**
 * State handed to a decorrelation rule for one application
 */
export interface RuleContext {
	/** Correlation map describing the tree the matched node belongs to */
	readonly map: CorrelationMap;
	readonly options: DecorrelatorOptions;
}

/**
 * Outcome of eliminating one Correlate: the replacement subtree and the map
 * with the eliminated identifier removed and the replacement indexed.
 */
export interface RewriteResult {
	readonly node: RelationalPlanNode;
	readonly map: CorrelationMap;
}
