import type { SqlValue } from '../common/types.js';

/**
 * Storage class ordering used when values of different kinds meet:
 * NULL < numeric (booleans count as 0/1) < TEXT.
 */
function storageClass(value: SqlValue): number {
	if (value === null) return 0;
	if (typeof value === 'string') return 2;
	return 1;
}

function numericValue(value: number | boolean): number {
	return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

/**
 * Total ordering over SQL values, NULL sorting first.
 * @returns negative, zero or positive like Array.prototype.sort comparators
 */
export function compareSqlValues(a: SqlValue, b: SqlValue): number {
	const classA = storageClass(a);
	const classB = storageClass(b);
	if (classA !== classB) {
		return classA - classB;
	}
	if (a === null || b === null) {
		return 0;
	}
	if (typeof a === 'string' && typeof b === 'string') {
		return a < b ? -1 : a > b ? 1 : 0;
	}
	if (typeof a !== 'string' && typeof b !== 'string') {
		return numericValue(a) - numericValue(b);
	}
	return 0;
}
