/**
 * Rule: Singleton Values Elimination
 *
 *   Correlate(Project[e0..en](X), Project[$cor.$f, ...](Values(one row)))
 *     →  Project[e0..en, e_f, ...](X)
 *
 * Same right-side restriction as the scalar-project rule, matched one level
 * out: when the left input is itself a Project, the referenced left columns
 * are its expressions, so both projects collapse into one over its input.
 */

import type { CorrelateNode } from '../../nodes/correlate-node.js';
import { ProjectNode } from '../../nodes/project-node.js';
import type { RewriteResult, RuleContext } from '../../framework/context.js';
import { ruleLog } from '../../debug/logger-utils.js';
import { appendToLeft, bareReferenceFields, isRowPreserving } from './rule-support.js';

const log = ruleLog('singleton-values');

export function ruleSingletonValues(node: CorrelateNode, context: RuleContext): RewriteResult | null {
	if (!isRowPreserving(node) || !(node.left instanceof ProjectNode)) {
		return null;
	}

	const fields = bareReferenceFields(node.right, node, context);
	if (!fields) {
		return null;
	}

	const left = node.left;
	const names = left.getAttributes().map(attr => attr.name);
	const leftColumns = left.projections.map((proj, i) => ({ node: proj.node, alias: names[i] }));

	log('Collapsing %s into the left project over field(s) [%s]', node.correlationId.name, fields.join(', '));
	return appendToLeft(node, left.source, leftColumns, fields.map(field => left.projections[field].node), context);
}
