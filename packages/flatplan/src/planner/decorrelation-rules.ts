import { RuleSet, type RuleHandle } from './framework/registry.js';
import { ruleSingleRowAggregate } from './rules/decorrelate/rule-single-row-aggregate.js';
import { ruleScalarProject } from './rules/decorrelate/rule-scalar-project.js';
import { ruleScalarAggregate } from './rules/decorrelate/rule-scalar-aggregate.js';
import { ruleSingletonValues } from './rules/decorrelate/rule-singleton-values.js';

/**
 * The pattern rules in the order they are tried on each Correlate.
 * Anything they leave is handled by the generic transform.
 */
export function createDefaultRuleSet(): RuleSet {
	return new RuleSet()
		.register({
			id: 'single-row-aggregate',
			description: 'Fold an aggregate over one constant row into the left input',
			fn: ruleSingleRowAggregate,
			priority: 10,
		})
		.register({
			id: 'scalar-project',
			description: 'Replace a project of bare correlation references over one constant row with left columns',
			fn: ruleScalarProject,
			priority: 20,
		})
		.register({
			id: 'scalar-aggregate',
			description: 'Turn a correlated scalar aggregate into an outer join aggregated by the correlated values',
			fn: ruleScalarAggregate,
			priority: 30,
		})
		.register({
			// Shares its right-side shape with scalar-project, so only runs when that rule is disabled
			id: 'singleton-values',
			description: 'Collapse a left project and a singleton right project into one project',
			fn: ruleSingletonValues,
			priority: 40,
		});
}

const defaultRules = createDefaultRuleSet();

export function getDefaultRuleSet(): RuleSet {
	return defaultRules;
}

/**
 * Registered pattern rules, in priority order (for tooling)
 */
export function listRules(): ReadonlyArray<Pick<RuleHandle, 'id' | 'description' | 'priority'>> {
	return defaultRules.all().map(({ id, description, priority }) => ({ id, description, priority }));
}
