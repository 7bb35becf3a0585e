/**
 * Decorrelation options - centralized configuration for the rewrite driver
 */
export interface DecorrelatorOptions {
	/** Ids of pattern rules to skip; the generic transform covers what they would have matched */
	readonly disabledRules: readonly string[];

	/** Run the verification pass on the result and fail if any correlation survives */
	readonly verify: boolean;

	/** Upper bound on pattern rule applications in one run, guarding against rule loops */
	readonly maxRuleApplications: number;
}

/**
 * Default decorrelation options
 */
export const DEFAULT_DECORRELATOR_OPTIONS: DecorrelatorOptions = {
	disabledRules: [],
	verify: true,
	maxRuleApplications: 1000,
};

export function resolveOptions(options?: Partial<DecorrelatorOptions>): DecorrelatorOptions {
	return { ...DEFAULT_DECORRELATOR_OPTIONS, ...options };
}
