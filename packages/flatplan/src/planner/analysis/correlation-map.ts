/**
 * Correlation map: the bidirectional index between correlation identifiers,
 * the Correlate nodes that define them, and the nodes whose scalar
 * expressions consume them.
 *
 * The map is an immutable value. Rules and the generic transform return an
 * updated map alongside the rewritten subtree instead of mutating shared state,
 * so each decorrelation run owns its map.
 */

import { createLogger } from '../../common/logger.js';
import { MapConsistencyError } from '../../common/errors.js';
import { ownExpressions, type PlanNode } from '../nodes/plan-node.js';
import { CorrelateNode } from '../nodes/correlate-node.js';
import type { CorrelationId } from '../nodes/reference.js';
import { collectCorrelationReferences } from '../util/expression-utils.js';
import { formatPlan } from '../../util/plan-formatter.js';

const log = createLogger('decorrelate:map');

/**
 * One distinct correlation variable reference made by a node's own expressions.
 */
export interface CorrelationReference {
	readonly consumer: PlanNode;
	readonly correlationId: CorrelationId;
	/** Offset into the defining Correlate's left row */
	readonly field: number;
}

/** Plain-data view of a map, keyed by node ids and identifier names */
export interface CorrelationMapSnapshot {
	definitions: string[];
	references: string[];
}

export class CorrelationMap {
	private constructor(
		private readonly definitions: ReadonlyMap<CorrelationId, CorrelateNode>,
		private readonly references: ReadonlyMap<PlanNode, readonly CorrelationReference[]>,
	) {}

	static empty(): CorrelationMap {
		return new CorrelationMap(new Map(), new Map());
	}

	/** True when any identifier is live or any reference is recorded */
	hasCorrelation(): boolean {
		return this.definitions.size > 0 || this.references.size > 0;
	}

	correlationIds(): CorrelationId[] {
		return [...this.definitions.keys()];
	}

	isLive(correlationId: CorrelationId): boolean {
		return this.definitions.has(correlationId);
	}

	/**
	 * References made by the node's own expressions (not those of its inputs).
	 */
	referencesOf(node: PlanNode): readonly CorrelationReference[] {
		return this.references.get(node) ?? [];
	}

	referencesTo(correlationId: CorrelationId): CorrelationReference[] {
		const result: CorrelationReference[] = [];
		for (const refs of this.references.values()) {
			result.push(...refs.filter(ref => ref.correlationId === correlationId));
		}
		return result;
	}

	definingNodeOf(correlationId: CorrelationId): CorrelateNode {
		const node = this.definitions.get(correlationId);
		if (!node) {
			throw new MapConsistencyError(`Correlation ${correlationId.name} has no defining Correlate`);
		}
		return node;
	}

	/**
	 * Drop an identifier's definition and every reference to it.
	 */
	withoutCorrelation(correlationId: CorrelationId): CorrelationMap {
		const definitions = new Map(this.definitions);
		definitions.delete(correlationId);

		const references = new Map<PlanNode, readonly CorrelationReference[]>();
		for (const [node, refs] of this.references) {
			const kept = refs.filter(ref => ref.correlationId !== correlationId);
			if (kept.length > 0) {
				references.set(node, kept);
			}
		}
		log('Removed %s', correlationId.name);
		return new CorrelationMap(definitions, references);
	}

	/**
	 * Move the entries of a node rebuilt with new children onto its replacement.
	 * The replacement must carry the same expressions.
	 */
	rekey(oldNode: PlanNode, newNode: PlanNode): CorrelationMap {
		let definitions = this.definitions;
		if (oldNode instanceof CorrelateNode && newNode instanceof CorrelateNode
			&& this.definitions.get(oldNode.correlationId) === oldNode) {
			const updated = new Map(this.definitions);
			updated.set(newNode.correlationId, newNode);
			definitions = updated;
		}

		let references = this.references;
		const refs = this.references.get(oldNode);
		if (refs) {
			const updated = new Map(this.references);
			updated.delete(oldNode);
			updated.set(newNode, refs.map(ref => ({ ...ref, consumer: newNode })));
			references = updated;
		}

		return definitions === this.definitions && references === this.references
			? this
			: new CorrelationMap(definitions, references);
	}

	/**
	 * Replace the entries contributed by `oldSubtree` with those of `newSubtree`.
	 * Every reference in the new subtree must name an identifier that is still
	 * defined once the old subtree's definitions are gone.
	 */
	reindex(oldSubtree: PlanNode, newSubtree: PlanNode): CorrelationMap {
		const removed = new Set<PlanNode>();
		collectRelational(oldSubtree, removed);

		const definitions = new Map<CorrelationId, CorrelateNode>();
		for (const [id, node] of this.definitions) {
			if (!removed.has(node)) {
				definitions.set(id, node);
			}
		}
		const references = new Map<PlanNode, readonly CorrelationReference[]>();
		for (const [node, refs] of this.references) {
			if (!removed.has(node)) {
				references.set(node, refs);
			}
		}

		const added = new Set<PlanNode>();
		collectRelational(newSubtree, added);
		for (const node of added) {
			if (node instanceof CorrelateNode) {
				definitions.set(node.correlationId, node);
			}
		}
		for (const node of added) {
			const refs = ownReferences(node);
			for (const ref of refs) {
				if (!definitions.has(ref.correlationId)) {
					throw new MapConsistencyError(
						`Correlation variable ${ref.correlationId.name}.$${ref.field} in ${node.toString()} refers to no live Correlate`,
						formatPlan(newSubtree)
					);
				}
			}
			if (refs.length > 0) {
				references.set(node, refs);
			}
		}

		return new CorrelationMap(definitions, references);
	}

	/**
	 * Stable textual view for diagnostics and tests.
	 */
	snapshot(): CorrelationMapSnapshot {
		return {
			definitions: [...this.definitions].map(([id, node]) => `${id.name}@${node.id}`).sort(),
			references: [...this.references.values()]
				.flatMap(refs => refs.map(ref => `${ref.consumer.id}:${ref.correlationId.name}.$${ref.field}`))
				.sort(),
		};
	}

	/** @internal used by buildCorrelationMap */
	static fromEntries(
		definitions: Map<CorrelationId, CorrelateNode>,
		references: Map<PlanNode, readonly CorrelationReference[]>
	): CorrelationMap {
		return new CorrelationMap(definitions, references);
	}
}

/**
 * Walk the tree once and index every Correlate and every correlation reference.
 * A Correlate's identifier is live only within its right subtree.
 * @throws MapConsistencyError for a reference outside the scope of its defining
 * Correlate, or an identifier defined by two Correlate nodes.
 */
export function buildCorrelationMap(root: PlanNode): CorrelationMap {
	const definitions = new Map<CorrelationId, CorrelateNode>();
	const references = new Map<PlanNode, readonly CorrelationReference[]>();

	const walk = (node: PlanNode, live: ReadonlySet<CorrelationId>): void => {
		if (node instanceof CorrelateNode) {
			if (definitions.has(node.correlationId)) {
				throw new MapConsistencyError(
					`Correlation ${node.correlationId.name} is defined by more than one Correlate`,
					formatPlan(root)
				);
			}
			definitions.set(node.correlationId, node);
			walk(node.left, live);
			walk(node.right, new Set([...live, node.correlationId]));
			return;
		}

		const refs = ownReferences(node);
		for (const ref of refs) {
			if (!live.has(ref.correlationId)) {
				throw new MapConsistencyError(
					`Correlation variable ${ref.correlationId.name}.$${ref.field} in ${node.toString()} is not within the right input of its Correlate`,
					formatPlan(root)
				);
			}
		}
		if (refs.length > 0) {
			references.set(node, refs);
		}
		for (const relation of node.getRelations()) {
			walk(relation, live);
		}
	};

	walk(root, new Set());
	log('Built map: %d correlation(s), %d consuming node(s)', definitions.size, references.size);
	return CorrelationMap.fromEntries(definitions, references);
}

/**
 * Distinct (identifier, field) pairs read by a node's own expressions.
 */
function ownReferences(node: PlanNode): CorrelationReference[] {
	const seen = new Set<string>();
	const result: CorrelationReference[] = [];
	for (const expr of ownExpressions(node)) {
		for (const ref of collectCorrelationReferences(expr)) {
			const key = `${ref.correlationId.name}.${ref.field}`;
			if (!seen.has(key)) {
				seen.add(key);
				result.push({ consumer: node, correlationId: ref.correlationId, field: ref.field });
			}
		}
	}
	return result;
}

function collectRelational(root: PlanNode, into: Set<PlanNode>): void {
	into.add(root);
	for (const relation of root.getRelations()) {
		collectRelational(relation, into);
	}
}
