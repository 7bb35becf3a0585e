import { PlanNodeType } from './plan-node-type.js';
import { UnaryRelationalBase, type Attribute, type PlanNode, type RelationalPlanNode } from './plan-node.js';
import { getAggregateFunction } from '../../func/aggregates.js';
import { scalarType } from '../../common/datatype.js';
import { SqlDataType, StatusCode } from '../../common/types.js';
import { flatplanError } from '../../common/errors.js';

/**
 * One aggregate computation. Arguments are offsets into the aggregate's input row;
 * an empty argument list is the COUNT(*) form.
 */
export interface AggregateCall {
	readonly functionName: string;
	readonly args: readonly number[];
	readonly distinct?: boolean;
	readonly alias?: string;
}

/**
 * Groups its input by the listed columns and computes the aggregate calls per group.
 * Output: the group columns, in groupBy order, then one column per aggregate call.
 * With no group columns exactly one row is produced, even for empty input.
 */
export class AggregateNode extends UnaryRelationalBase {
	override readonly nodeType = PlanNodeType.Aggregate;
	private attributes?: readonly Attribute[];

	constructor(
		public readonly source: RelationalPlanNode,
		public readonly groupBy: readonly number[],
		public readonly aggregates: readonly AggregateCall[],
	) {
		super();
		const width = source.getAttributes().length;
		for (const index of [...groupBy, ...aggregates.flatMap(call => call.args)]) {
			if (index < 0 || index >= width) {
				flatplanError(`Aggregate column ${index} out of range (0-${width - 1})`, StatusCode.RANGE);
			}
		}
	}

	override getAttributes(): readonly Attribute[] {
		if (!this.attributes) {
			const sourceAttrs = this.source.getAttributes();
			this.attributes = [
				...this.groupBy.map(index => sourceAttrs[index]),
				...this.aggregates.map(call => ({
					name: call.alias ?? formatAggregateCall(call),
					type: getAggregateFunction(call.functionName)?.returnType(call.args.map(i => sourceAttrs[i].type))
						?? scalarType(SqlDataType.ANY),
				})),
			];
		}
		return this.attributes;
	}

	get isScalarAggregate(): boolean {
		return this.groupBy.length === 0;
	}

	protected withSource(source: RelationalPlanNode): PlanNode {
		return new AggregateNode(source, this.groupBy, this.aggregates);
	}

	override toString(): string {
		const groups = this.groupBy.map(i => `$${i}`).join(', ');
		const calls = this.aggregates.map(formatAggregateCall).join(', ');
		return `Aggregate(group=[${groups}]${calls ? `, ${calls}` : ''})`;
	}
}

export function formatAggregateCall(call: AggregateCall): string {
	const args = call.args.length === 0 ? '*' : call.args.map(i => `$${i}`).join(', ');
	return `${call.functionName.toUpperCase()}(${call.distinct ? 'DISTINCT ' : ''}${args})`;
}
