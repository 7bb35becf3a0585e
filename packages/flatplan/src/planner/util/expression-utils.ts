/**
 * Helpers for relocating scalar expressions between plan positions.
 * Expressions are only ever moved (column offsets shifted, references
 * substituted); nothing here re-derives an expression.
 */

import { expectScalar, isRelationalNode, ownExpressions, type Attribute, type PlanNode, type RelationalPlanNode, type ScalarPlanNode } from '../nodes/plan-node.js';
import { BinaryOpNode, LiteralNode } from '../nodes/scalar.js';
import { ColumnReferenceNode, CorrelationReferenceNode, type CorrelationId } from '../nodes/reference.js';
import type { Projection } from '../nodes/project-node.js';
import { CorrelateNode } from '../nodes/correlate-node.js';

/**
 * Rebuild an expression top-down. `replace` returns a substitute for a node,
 * or undefined to keep the node and descend into its children.
 */
export function mapExpression(
	expr: ScalarPlanNode,
	replace: (node: ScalarPlanNode) => ScalarPlanNode | undefined
): ScalarPlanNode {
	const replaced = replace(expr);
	if (replaced) {
		return replaced;
	}
	const children = expr.getChildren();
	if (children.length === 0) {
		return expr;
	}
	const newChildren = children.map(child => mapExpression(expectScalar(child, expr.nodeType), replace));
	return expectScalar(expr.withChildren(newChildren), expr.nodeType);
}

/**
 * Renumber every column reference through `mapping`.
 */
export function shiftColumns(expr: ScalarPlanNode, mapping: (index: number) => number): ScalarPlanNode {
	return mapExpression(expr, node => {
		if (node instanceof ColumnReferenceNode) {
			const index = mapping(node.index);
			return index === node.index ? node : new ColumnReferenceNode(index, node.type, node.name);
		}
		return undefined;
	});
}

/**
 * Replace each column reference `$i` with `columns[i]`.
 */
export function inlineColumns(expr: ScalarPlanNode, columns: readonly ScalarPlanNode[]): ScalarPlanNode {
	return mapExpression(expr, node => node instanceof ColumnReferenceNode ? columns[node.index] : undefined);
}

/**
 * Replace every reference to `correlationId` with the expression `bind` returns for it.
 * References to other identifiers are left in place.
 */
export function substituteCorrelation(
	expr: ScalarPlanNode,
	correlationId: CorrelationId,
	bind: (ref: CorrelationReferenceNode) => ScalarPlanNode
): ScalarPlanNode {
	return mapExpression(expr, node =>
		node instanceof CorrelationReferenceNode && node.correlationId === correlationId ? bind(node) : undefined
	);
}

export function collectCorrelationReferences(expr: ScalarPlanNode): CorrelationReferenceNode[] {
	const refs: CorrelationReferenceNode[] = [];
	expr.visit(node => {
		if (node instanceof CorrelationReferenceNode) {
			refs.push(node);
		}
	});
	return refs;
}

export function referencesCorrelation(expr: ScalarPlanNode, correlationId: CorrelationId): boolean {
	return collectCorrelationReferences(expr).some(ref => ref.correlationId === correlationId);
}

/**
 * True when the expression is exactly a correlation variable reference to
 * `correlationId`, with no computation over it.
 */
export function isBareCorrelationReference(expr: ScalarPlanNode, correlationId: CorrelationId): expr is CorrelationReferenceNode {
	return expr instanceof CorrelationReferenceNode && expr.correlationId === correlationId;
}

/**
 * Correlation references found in the expressions of every relational node of a subtree.
 */
export function subtreeCorrelationReferences(root: RelationalPlanNode): CorrelationReferenceNode[] {
	const refs: CorrelationReferenceNode[] = [];
	const walk = (node: RelationalPlanNode): void => {
		for (const expr of ownExpressions(node)) {
			refs.push(...collectCorrelationReferences(expr));
		}
		node.getRelations().forEach(walk);
	};
	walk(root);
	return refs;
}

export function subtreeReferences(root: RelationalPlanNode, correlationId: CorrelationId): boolean {
	return subtreeCorrelationReferences(root).some(ref => ref.correlationId === correlationId);
}

/**
 * Sorted, de-duplicated field offsets read through `correlationId` below `root`.
 */
export function referencedFields(root: RelationalPlanNode, correlationId: CorrelationId): number[] {
	const fields = new Set<number>();
	for (const ref of subtreeCorrelationReferences(root)) {
		if (ref.correlationId === correlationId) {
			fields.add(ref.field);
		}
	}
	return [...fields].sort((a, b) => a - b);
}

/**
 * True when `root` is a Correlate or has one anywhere beneath it.
 */
export function containsCorrelate(root: RelationalPlanNode): boolean {
	return root instanceof CorrelateNode || root.getRelations().some(containsCorrelate);
}

/**
 * Correlate nodes of a tree in post-order, so every Correlate appears after
 * any Correlate nested beneath it.
 */
export function collectCorrelates(root: PlanNode): CorrelateNode[] {
	const result: CorrelateNode[] = [];
	const walk = (node: PlanNode): void => {
		node.getRelations().forEach(walk);
		if (node instanceof CorrelateNode) {
			result.push(node);
		}
	};
	walk(root);
	return result;
}

/**
 * Split an AND-tree into conjuncts.
 */
export function splitConjuncts(pred: ScalarPlanNode): ScalarPlanNode[] {
	if (pred instanceof BinaryOpNode && pred.operator === 'AND') {
		return [...splitConjuncts(pred.left), ...splitConjuncts(pred.right)];
	}
	return [pred];
}

/**
 * Combine conjuncts back into an AND-tree.
 */
export function combineConjuncts(conjuncts: readonly ScalarPlanNode[]): ScalarPlanNode | undefined {
	if (conjuncts.length === 0) return undefined;
	return conjuncts.reduce((acc, cur) => new BinaryOpNode('AND', acc, cur));
}

/** `left IS right`: equality that also matches NULL to NULL */
export function nullSafeEquals(left: ScalarPlanNode, right: ScalarPlanNode): BinaryOpNode {
	return new BinaryOpNode('IS', left, right);
}

/**
 * Reference to column `index` of a row whose type is `attributes`.
 */
export function columnRef(attributes: readonly Attribute[], index: number): ColumnReferenceNode {
	const attr = attributes[index];
	return new ColumnReferenceNode(index, attr.type, attr.name);
}

/**
 * Projections passing through columns `from..from+count-1` of `attributes` unchanged.
 */
export function passthrough(attributes: readonly Attribute[], from = 0, count = attributes.length - from): Projection[] {
	const result: Projection[] = [];
	for (let i = from; i < from + count; i++) {
		result.push({ node: columnRef(attributes, i), alias: attributes[i].name });
	}
	return result;
}

export function trueLiteral(): LiteralNode {
	return new LiteralNode(true);
}

/**
 * Replace `target` (by identity) inside the tree rooted at `root`.
 * Every ancestor on the path is rebuilt through withChildren(); the returned
 * pairs list each rebuilt ancestor with its replacement, innermost first.
 */
export function replaceSubtree(
	root: PlanNode,
	target: PlanNode,
	replacement: PlanNode
): { root: PlanNode; rebuilt: Array<[PlanNode, PlanNode]> } {
	const rebuilt: Array<[PlanNode, PlanNode]> = [];
	const walk = (node: PlanNode): PlanNode => {
		if (node === target) {
			return replacement;
		}
		const children = node.getChildren();
		const newChildren = children.map(child => isRelationalNode(child) ? walk(child) : child);
		if (newChildren.every((child, i) => child === children[i])) {
			return node;
		}
		const updated = node.withChildren(newChildren);
		rebuilt.push([node, updated]);
		return updated;
	};
	return { root: walk(root), rebuilt };
}

