export enum PlanNodeType {
	// Relational nodes
	TableScan = 'TableScan',
	Values = 'Values',
	Filter = 'Filter',
	Project = 'Project',
	Join = 'Join',
	Aggregate = 'Aggregate',
	Sort = 'Sort',
	Distinct = 'Distinct',
	LimitOffset = 'LimitOffset',
	Correlate = 'Correlate',

	// Scalar nodes
	Literal = 'Literal',
	ColumnReference = 'ColumnReference',
	CorrelationReference = 'CorrelationReference',
	UnaryOp = 'UnaryOp',
	BinaryOp = 'BinaryOp',
	Coalesce = 'Coalesce',
}
