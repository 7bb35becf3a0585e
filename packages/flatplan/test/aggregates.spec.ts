import { expect } from 'chai';
import { getAggregateFunction, listAggregateFunctions } from '../src/func/aggregates.js';
import { SqlDataType, type SqlValue } from '../src/common/types.js';
import { scalarType } from '../src/common/datatype.js';

function fold(name: string, values: SqlValue[] | null, rowCount = values?.length ?? 0): SqlValue {
	const schema = getAggregateFunction(name);
	if (!schema) {
		throw new Error(`missing ${name}`);
	}
	return schema.evaluate(values, rowCount);
}

describe('Aggregate catalog', () => {
	it('lists the built-in functions', () => {
		expect(listAggregateFunctions()).to.have.members(['COUNT', 'SUM', 'TOTAL', 'AVG', 'MIN', 'MAX']);
	});

	it('looks functions up case-insensitively', () => {
		expect(getAggregateFunction('count')?.name).to.equal('COUNT');
		expect(getAggregateFunction('median')).to.equal(undefined);
	});

	it('records the empty-group result of each function', () => {
		const empties = Object.fromEntries(listAggregateFunctions().map(name => [name, getAggregateFunction(name)?.emptyValue]));
		expect(empties).to.deep.equal({ COUNT: 0, SUM: null, TOTAL: 0, AVG: null, MIN: null, MAX: null });
	});

	it('folds a group, skipping NULLs', () => {
		expect(fold('COUNT', null, 3)).to.equal(3);
		expect(fold('COUNT', [1, null, 2])).to.equal(2);
		expect(fold('SUM', [1, null, 2])).to.equal(3);
		expect(fold('AVG', [1, 2, null])).to.equal(1.5);
		expect(fold('MIN', [3, null, 1, 2])).to.equal(1);
		expect(fold('MAX', ['a', 'c', 'b'])).to.equal('c');
		expect(fold('TOTAL', [1, 2])).to.equal(3);
	});

	it('matches the empty-group value on empty input', () => {
		for (const name of listAggregateFunctions()) {
			const args = name === 'COUNT' ? null : [];
			expect(fold(name, args, 0), name).to.equal(getAggregateFunction(name)?.emptyValue);
		}
	});

	it('never returns NULL for a non-empty group when the empty-group value is not NULL', () => {
		expect(fold('COUNT', [null, null])).to.equal(0);
		expect(fold('TOTAL', [null])).to.equal(0);
	});

	it('types COUNT as non-null and SUM after its argument', () => {
		const count = getAggregateFunction('COUNT');
		const sum = getAggregateFunction('SUM');
		expect(count?.returnType([]).nullable).to.equal(false);
		expect(sum?.returnType([scalarType(SqlDataType.INTEGER, false)])).to.deep.equal(scalarType(SqlDataType.INTEGER, true));
	});
});
