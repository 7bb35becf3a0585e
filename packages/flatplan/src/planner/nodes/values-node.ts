import type { SqlValue } from '../../common/types.js';
import { ZeroAryRelationalBase, type Attribute } from './plan-node.js';
import { PlanNodeType } from './plan-node-type.js';
import { flatplanError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { formatLiteral } from './scalar.js';

/**
 * Represents a VALUES clause, producing a relation from literal rows.
 */
export class ValuesNode extends ZeroAryRelationalBase {
	override readonly nodeType = PlanNodeType.Values;

	constructor(
		public readonly rows: ReadonlyArray<ReadonlyArray<SqlValue>>,
		private readonly attributes: readonly Attribute[],
	) {
		super();
		for (const row of rows) {
			if (row.length !== attributes.length) {
				flatplanError(`VALUES row has ${row.length} values, expected ${attributes.length}`, StatusCode.MISMATCH);
			}
		}
	}

	getAttributes(): readonly Attribute[] {
		return this.attributes;
	}

	override toString(): string {
		const rows = this.rows.map(row => `(${row.map(formatLiteral).join(', ')})`);
		return `Values(${rows.join(', ')})`;
	}

	override getLogicalAttributes(): Record<string, unknown> {
		return { rowCount: this.rows.length };
	}
}
