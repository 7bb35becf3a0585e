import { SqlDataType, type SqlValue } from './types.js';

/** Type of a scalar expression or of one column of a relation */
export interface ScalarType {
	readonly affinity: SqlDataType;
	readonly nullable: boolean;
}

export function scalarType(affinity: SqlDataType, nullable = true): ScalarType {
	return { affinity, nullable };
}

/** Same affinity, nullable. Used for the null-padded side of an outer join. */
export function asNullable(type: ScalarType): ScalarType {
	return type.nullable ? type : { affinity: type.affinity, nullable: true };
}

/**
 * Infer the type of a literal value.
 */
export function typeOfValue(value: SqlValue): ScalarType {
	switch (typeof value) {
		case 'number':
			return scalarType(Number.isInteger(value) ? SqlDataType.INTEGER : SqlDataType.REAL, false);
		case 'string':
			return scalarType(SqlDataType.TEXT, false);
		case 'boolean':
			return scalarType(SqlDataType.BOOLEAN, false);
		default:
			return scalarType(SqlDataType.NULL, true);
	}
}
