/**
 * Primitive scalar values a plan can carry in literals and VALUES rows.
 */
export type SqlValue = string | number | boolean | null;

/**
 * Represents a row of data, which is an array of SqlValue.
 */
export type Row = SqlValue[];

/**
 * Status codes attached to every error the engine raises.
 * Numbering follows SQLite's result codes where one exists.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	ABORT = 4,
	MISMATCH = 20,
	MISUSE = 21,
	RANGE = 25,
	UNSUPPORTED = 30,
}

/**
 * Value affinities known to the plan model.
 */
export enum SqlDataType {
	NULL = 0,
	INTEGER = 1,
	REAL = 2,
	TEXT = 3,
	BOOLEAN = 4,
	ANY = 5,
}
