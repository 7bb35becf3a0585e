/**
 * Aggregate function catalog.
 *
 * Each entry records the function's result type, how it folds a group's
 * argument values, and the value it yields over an empty group. The
 * decorrelation rules rely on `emptyValue` to preserve the semantics of a
 * scalar subquery that matches no rows, and on `evaluate` to fold an
 * aggregate over a single constant row.
 *
 * Invariant: a function with a non-null `emptyValue` never returns NULL
 * for a non-empty group.
 */

import { scalarType, type ScalarType } from '../common/datatype.js';
import { SqlDataType, type SqlValue } from '../common/types.js';
import { compareSqlValues } from '../util/comparison.js';

export interface AggregateFunctionSchema {
	readonly name: string;
	readonly minArgs: number;
	readonly maxArgs: number;
	/** Result over an empty group, per the SQL standard */
	readonly emptyValue: SqlValue;
	returnType(argTypes: readonly ScalarType[]): ScalarType;
	/**
	 * Fold one group.
	 * @param values The argument value of each row, or null for a zero-argument call such as COUNT(*)
	 * @param rowCount Number of rows in the group
	 */
	evaluate(values: readonly SqlValue[] | null, rowCount: number): SqlValue;
}

function numbers(values: readonly SqlValue[] | null): number[] {
	const result: number[] = [];
	for (const value of values ?? []) {
		if (typeof value === 'number') {
			result.push(value);
		} else if (typeof value === 'boolean') {
			result.push(value ? 1 : 0);
		}
	}
	return result;
}

function nonNull(values: readonly SqlValue[] | null): SqlValue[] {
	return (values ?? []).filter(value => value !== null);
}

const count: AggregateFunctionSchema = {
	name: 'COUNT',
	minArgs: 0,
	maxArgs: 1,
	emptyValue: 0,
	returnType: () => scalarType(SqlDataType.INTEGER, false),
	evaluate: (values, rowCount) => values === null ? rowCount : nonNull(values).length,
};

const sum: AggregateFunctionSchema = {
	name: 'SUM',
	minArgs: 1,
	maxArgs: 1,
	emptyValue: null,
	returnType: ([arg]) => scalarType(arg?.affinity === SqlDataType.INTEGER ? SqlDataType.INTEGER : SqlDataType.REAL, true),
	evaluate: (values) => {
		const nums = numbers(values);
		return nums.length === 0 ? null : nums.reduce((acc, n) => acc + n, 0);
	},
};

const total: AggregateFunctionSchema = {
	name: 'TOTAL',
	minArgs: 1,
	maxArgs: 1,
	emptyValue: 0,
	returnType: () => scalarType(SqlDataType.REAL, false),
	evaluate: (values) => numbers(values).reduce((acc, n) => acc + n, 0),
};

const avg: AggregateFunctionSchema = {
	name: 'AVG',
	minArgs: 1,
	maxArgs: 1,
	emptyValue: null,
	returnType: () => scalarType(SqlDataType.REAL, true),
	evaluate: (values) => {
		const nums = numbers(values);
		return nums.length === 0 ? null : nums.reduce((acc, n) => acc + n, 0) / nums.length;
	},
};

function extremum(name: string, sign: 1 | -1): AggregateFunctionSchema {
	return {
		name,
		minArgs: 1,
		maxArgs: 1,
		emptyValue: null,
		returnType: ([arg]) => scalarType(arg?.affinity ?? SqlDataType.ANY, true),
		evaluate: (values) => {
			let best: SqlValue = null;
			for (const value of nonNull(values)) {
				if (best === null || sign * compareSqlValues(value, best) > 0) {
					best = value;
				}
			}
			return best;
		},
	};
}

const BUILTIN_AGGREGATES: ReadonlyMap<string, AggregateFunctionSchema> = new Map(
	[count, sum, total, avg, extremum('MIN', -1), extremum('MAX', 1)]
		.map(schema => [schema.name, schema] as const)
);

/**
 * Look up an aggregate function by name (case-insensitive).
 */
export function getAggregateFunction(name: string): AggregateFunctionSchema | undefined {
	return BUILTIN_AGGREGATES.get(name.toUpperCase());
}

export function listAggregateFunctions(): string[] {
	return [...BUILTIN_AGGREGATES.keys()];
}
