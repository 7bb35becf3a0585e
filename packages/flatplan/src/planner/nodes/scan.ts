import { ZeroAryRelationalBase, type Attribute } from './plan-node.js';
import { PlanNodeType } from './plan-node-type.js';

/**
 * Reads a base table. Opaque to the decorrelation engine: a leaf it never rewrites.
 */
export class TableScanNode extends ZeroAryRelationalBase {
	override readonly nodeType = PlanNodeType.TableScan;

	constructor(
		public readonly tableName: string,
		private readonly attributes: readonly Attribute[],
	) {
		super();
	}

	getAttributes(): readonly Attribute[] {
		return this.attributes;
	}

	override toString(): string {
		return `TableScan(${this.tableName})`;
	}

	override getLogicalAttributes(): Record<string, unknown> {
		return { table: this.tableName, columns: this.attributes.map(a => a.name) };
	}
}
