import { StatusCode } from './types.js';

/**
 * Base class for flatplan specific errors
 * Provides status code support and an optional dump of the offending plan
 */
export class FlatplanError extends Error {
	public code: number;
	public override cause?: Error;
	/** Formatted plan fragment the error was raised against, when one is known */
	public planDump?: string;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, planDump?: string) {
		super(planDump ? `${message}\n${planDump}` : message);
		this.code = code;
		this.name = 'FlatplanError';
		this.cause = cause;
		this.planDump = planDump;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, FlatplanError);
		}
	}
}

/**
 * A correlation variable reference that no live Correlate defines.
 * Always an upstream plan-construction defect.
 */
export class MapConsistencyError extends FlatplanError {
	constructor(message: string, planDump?: string) {
		super(message, StatusCode.INTERNAL, undefined, planDump);
		this.name = 'MapConsistencyError';
		Object.setPrototypeOf(this, MapConsistencyError.prototype);
	}
}

/**
 * Correlation must be pushed through an operator the engine cannot rewrite.
 */
export class UnsupportedPatternError extends FlatplanError {
	constructor(message: string, planDump?: string) {
		super(message, StatusCode.UNSUPPORTED, undefined, planDump);
		this.name = 'UnsupportedPatternError';
		Object.setPrototypeOf(this, UnsupportedPatternError.prototype);
	}
}

/**
 * Verification found a Correlate or a correlation variable reference after decorrelation.
 */
export class CorrelationRemainingError extends FlatplanError {
	constructor(message: string, planDump?: string) {
		super(message, StatusCode.INTERNAL, undefined, planDump);
		this.name = 'CorrelationRemainingError';
		Object.setPrototypeOf(this, CorrelationRemainingError.prototype);
	}
}

/**
 * Helper function to throw a FlatplanError
 * @param message Error message
 * @param code Status code (defaults to ERROR)
 * @param cause Optional underlying error
 * @returns Never (always throws)
 */
export function flatplanError(
	message: string,
	code: StatusCode = StatusCode.ERROR,
	cause?: Error
): never {
	throw new FlatplanError(message, code, cause);
}
