/**
 * Debug namespace utilities for the decorrelation engine
 * Provides standardized logger creation and debug conventions
 */

import { createLogger } from '../../common/logger.js';

/**
 * Create a logger for a decorrelation pattern rule
 * @param ruleName The id of the rule
 * @returns A debug logger with the standard decorrelate:rule namespace
 */
export function ruleLog(ruleName: string) {
	return createLogger(`decorrelate:rule:${ruleName}`);
}

/**
 * Create a logger for correlation verification
 */
export function validateLog(component: string = '') {
	const namespace = component ? `decorrelate:verify:${component}` : 'decorrelate:verify';
	return createLogger(namespace);
}

/**
 * Examples of debug namespace usage
 *
 * Enable all rules: DEBUG=flatplan:decorrelate:rule:* npm test
 * Enable plan dumps: DEBUG=flatplan:decorrelate:driver npm test
 * Enable everything: DEBUG=flatplan:* npm test
 */
