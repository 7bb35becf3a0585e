/**
 * Correlation verification
 *
 * Read-only pass over a decorrelated tree. Finds the first Correlate node or
 * correlation variable reference, in pre-order, and reports the subtree
 * containing it. Nothing is thrown while walking; callers decide whether a
 * failure is fatal.
 */

import { CorrelationRemainingError } from '../../common/errors.js';
import { ownExpressions, type PlanNode } from '../nodes/plan-node.js';
import { CorrelateNode } from '../nodes/correlate-node.js';
import { collectCorrelationReferences } from '../util/expression-utils.js';
import { formatPlan } from '../../util/plan-formatter.js';
import { validateLog } from '../debug/logger-utils.js';

const log = validateLog();

export type VerificationResult =
	| { readonly ok: true }
	| { readonly ok: false; readonly error: CorrelationRemainingError };

interface Finding {
	node: PlanNode;
	reason: string;
}

export function verifyNoCorrelation(root: PlanNode): VerificationResult {
	const finding = findCorrelation(root);
	if (!finding) {
		log('Plan is correlation-free');
		return { ok: true };
	}

	log('Found %s', finding.reason);
	return {
		ok: false,
		error: new CorrelationRemainingError(`Correlation remains after decorrelation: ${finding.reason}`, formatPlan(finding.node)),
	};
}

/**
 * @throws CorrelationRemainingError naming the first offending subtree
 */
export function assertNoCorrelation(root: PlanNode): void {
	const result = verifyNoCorrelation(root);
	if (!result.ok) {
		throw result.error;
	}
}

function findCorrelation(node: PlanNode): Finding | undefined {
	if (node instanceof CorrelateNode) {
		return { node, reason: `Correlate ${node.correlationId.name}` };
	}

	for (const expr of ownExpressions(node)) {
		const [ref] = collectCorrelationReferences(expr);
		if (ref) {
			return { node, reason: `reference ${ref.toString()} in ${node.toString()}` };
		}
	}

	for (const relation of node.getRelations()) {
		const found = findCorrelation(relation);
		if (found) {
			return found;
		}
	}
	return undefined;
}
