/**
 * Rule: Scalar Project Elimination
 *
 *   Correlate(L, Project[$cor.$f, ...](Values(one row)))  →  Project[L.*, L.$f, ...](L)
 *
 * The right side only relabels columns of the current left row, so it is
 * replaced by references to those columns. A computed expression over a
 * correlation reference, or more than one Values row, falls through.
 */

import type { CorrelateNode } from '../../nodes/correlate-node.js';
import type { RewriteResult, RuleContext } from '../../framework/context.js';
import { ruleLog } from '../../debug/logger-utils.js';
import { columnRef } from '../../util/expression-utils.js';
import { appendToLeft, bareReferenceFields, isRowPreserving, leftPassthrough } from './rule-support.js';

const log = ruleLog('scalar-project');

export function ruleScalarProject(node: CorrelateNode, context: RuleContext): RewriteResult | null {
	if (!isRowPreserving(node)) {
		return null;
	}

	const fields = bareReferenceFields(node.right, node, context);
	if (!fields) {
		return null;
	}

	const leftAttrs = node.left.getAttributes();
	log('Replacing %s with left field(s) [%s]', node.correlationId.name, fields.join(', '));
	return appendToLeft(node, node.left, leftPassthrough(node), fields.map(field => columnRef(leftAttrs, field)), context);
}
