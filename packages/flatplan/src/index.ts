/**
 * flatplan - correlated subquery decorrelation for relational query plans
 *
 * Rewrites plans containing Correlate operators and correlation variable
 * references into equivalent plans built from joins, projections, filters
 * and aggregates, then verifies that no correlation survives.
 */

// Decorrelation
export { Decorrelator, decorrelate } from './planner/decorrelator.js';
export { DEFAULT_DECORRELATOR_OPTIONS, resolveOptions } from './planner/decorrelator-options.js';
export type { DecorrelatorOptions } from './planner/decorrelator-options.js';
export { createDefaultRuleSet, getDefaultRuleSet, listRules } from './planner/decorrelation-rules.js';
export { RuleSet } from './planner/framework/registry.js';
export type { RuleHandle, DecorrelationRuleFn } from './planner/framework/registry.js';
export type { RuleContext, RewriteResult } from './planner/framework/context.js';
export { decorrelateCorrelate } from './planner/rules/decorrelate/generic-transform.js';
export { ruleSingleRowAggregate } from './planner/rules/decorrelate/rule-single-row-aggregate.js';
export { ruleScalarProject } from './planner/rules/decorrelate/rule-scalar-project.js';
export { ruleScalarAggregate } from './planner/rules/decorrelate/rule-scalar-aggregate.js';
export { ruleSingletonValues } from './planner/rules/decorrelate/rule-singleton-values.js';

// Correlation map and verification
export { CorrelationMap, buildCorrelationMap } from './planner/analysis/correlation-map.js';
export type { CorrelationReference, CorrelationMapSnapshot } from './planner/analysis/correlation-map.js';
export { verifyNoCorrelation, assertNoCorrelation } from './planner/validation/correlation-validator.js';
export type { VerificationResult } from './planner/validation/correlation-validator.js';

// Plan model
export { PlanNode, isRelationalNode, isScalarNode } from './planner/nodes/plan-node.js';
export type { Attribute, RelationalPlanNode, ScalarPlanNode } from './planner/nodes/plan-node.js';
export { PlanNodeType } from './planner/nodes/plan-node-type.js';
export { TableScanNode } from './planner/nodes/scan.js';
export { ValuesNode } from './planner/nodes/values-node.js';
export { FilterNode } from './planner/nodes/filter.js';
export { ProjectNode } from './planner/nodes/project-node.js';
export type { Projection } from './planner/nodes/project-node.js';
export { JoinNode } from './planner/nodes/join-node.js';
export type { JoinType } from './planner/nodes/join-node.js';
export { AggregateNode } from './planner/nodes/aggregate-node.js';
export type { AggregateCall } from './planner/nodes/aggregate-node.js';
export { SortNode } from './planner/nodes/sort.js';
export type { SortKey } from './planner/nodes/sort.js';
export { DistinctNode } from './planner/nodes/distinct-node.js';
export { LimitOffsetNode } from './planner/nodes/limit-offset.js';
export { CorrelateNode } from './planner/nodes/correlate-node.js';
export { CorrelationId, ColumnReferenceNode, CorrelationReferenceNode } from './planner/nodes/reference.js';
export { LiteralNode, UnaryOpNode, BinaryOpNode, CoalesceNode } from './planner/nodes/scalar.js';
export type { UnaryOperator, BinaryOperator } from './planner/nodes/scalar.js';

// Aggregate catalog
export { getAggregateFunction, listAggregateFunctions } from './func/aggregates.js';
export type { AggregateFunctionSchema } from './func/aggregates.js';

// Common types, errors, logging, formatting
export { StatusCode, SqlDataType } from './common/types.js';
export type { SqlValue, Row } from './common/types.js';
export { scalarType } from './common/datatype.js';
export type { ScalarType } from './common/datatype.js';
export { FlatplanError, MapConsistencyError, UnsupportedPatternError, CorrelationRemainingError } from './common/errors.js';
export { enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
export { formatPlan, formatExpression, explainPlan } from './util/plan-formatter.js';
export type { ExplainRow } from './util/plan-formatter.js';
