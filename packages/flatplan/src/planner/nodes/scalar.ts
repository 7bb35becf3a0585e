import { scalarType, typeOfValue, type ScalarType } from '../../common/datatype.js';
import { SqlDataType, type SqlValue } from '../../common/types.js';
import { PlanNode, expectArity, expectScalar, type ScalarPlanNode } from './plan-node.js';
import { PlanNodeType } from './plan-node-type.js';

export class LiteralNode extends PlanNode implements ScalarPlanNode {
	override readonly nodeType = PlanNodeType.Literal;
	private readonly type: ScalarType;

	constructor(
		public readonly value: SqlValue,
		type?: ScalarType,
	) {
		super();
		this.type = type ?? typeOfValue(value);
	}

	getType(): ScalarType {
		return this.type;
	}

	getChildren(): readonly [] {
		return [];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 0, this.nodeType);
		return this;
	}

	override toString(): string {
		return formatLiteral(this.value);
	}
}

export function formatLiteral(value: SqlValue): string {
	if (value === null) return 'NULL';
	if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`;
	if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
	return String(value);
}

export type UnaryOperator = 'NOT' | '-' | 'IS NULL' | 'IS NOT NULL';

export class UnaryOpNode extends PlanNode implements ScalarPlanNode {
	override readonly nodeType = PlanNodeType.UnaryOp;

	constructor(
		public readonly operator: UnaryOperator,
		public readonly operand: ScalarPlanNode,
	) {
		super();
	}

	getType(): ScalarType {
		const operandType = this.operand.getType();
		switch (this.operator) {
			case 'IS NULL':
			case 'IS NOT NULL':
				return scalarType(SqlDataType.BOOLEAN, false);
			case 'NOT':
				return scalarType(SqlDataType.BOOLEAN, operandType.nullable);
			case '-':
				return operandType;
		}
	}

	getChildren(): readonly [ScalarPlanNode] {
		return [this.operand];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 1, this.nodeType);
		const newOperand = expectScalar(newChildren[0], this.nodeType);
		if (newOperand === this.operand) {
			return this;
		}
		return new UnaryOpNode(this.operator, newOperand);
	}

	override toString(): string {
		switch (this.operator) {
			case 'IS NULL':
			case 'IS NOT NULL':
				return `${this.operand.toString()} ${this.operator}`;
			case 'NOT':
				return `NOT ${this.operand.toString()}`;
			case '-':
				return `-${this.operand.toString()}`;
		}
	}
}

export type ComparisonOperator = '=' | '<>' | '<' | '<=' | '>' | '>=' | 'IS' | 'IS NOT';
export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type LogicalOperator = 'AND' | 'OR';
export type BinaryOperator = ComparisonOperator | ArithmeticOperator | LogicalOperator;

export class BinaryOpNode extends PlanNode implements ScalarPlanNode {
	override readonly nodeType = PlanNodeType.BinaryOp;

	constructor(
		public readonly operator: BinaryOperator,
		public readonly left: ScalarPlanNode,
		public readonly right: ScalarPlanNode,
	) {
		super();
	}

	getType(): ScalarType {
		const leftType = this.left.getType();
		const rightType = this.right.getType();
		const nullable = leftType.nullable || rightType.nullable;

		switch (this.operator) {
			case 'IS':
			case 'IS NOT':
				// Null-safe comparisons always produce a definite answer
				return scalarType(SqlDataType.BOOLEAN, false);
			case '=':
			case '<>':
			case '<':
			case '<=':
			case '>':
			case '>=':
			case 'AND':
			case 'OR':
				return scalarType(SqlDataType.BOOLEAN, nullable);
			case '/':
				// Division by zero yields NULL
				return scalarType(arithmeticAffinity(leftType, rightType), true);
			default:
				return scalarType(arithmeticAffinity(leftType, rightType), nullable);
		}
	}

	getChildren(): readonly [ScalarPlanNode, ScalarPlanNode] {
		return [this.left, this.right];
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, 2, this.nodeType);
		const newLeft = expectScalar(newChildren[0], this.nodeType);
		const newRight = expectScalar(newChildren[1], this.nodeType);
		if (newLeft === this.left && newRight === this.right) {
			return this;
		}
		return new BinaryOpNode(this.operator, newLeft, newRight);
	}

	override toString(): string {
		return `(${this.left.toString()} ${this.operator} ${this.right.toString()})`;
	}
}

function arithmeticAffinity(left: ScalarType, right: ScalarType): SqlDataType {
	if (left.affinity === SqlDataType.INTEGER && right.affinity === SqlDataType.INTEGER) {
		return SqlDataType.INTEGER;
	}
	return SqlDataType.REAL;
}

/**
 * COALESCE(a, b, ...): the first non-NULL operand.
 */
export class CoalesceNode extends PlanNode implements ScalarPlanNode {
	override readonly nodeType = PlanNodeType.Coalesce;

	constructor(public readonly operands: readonly ScalarPlanNode[]) {
		super();
	}

	getType(): ScalarType {
		const first = this.operands[0]?.getType() ?? scalarType(SqlDataType.NULL);
		return scalarType(first.affinity, this.operands.every(op => op.getType().nullable));
	}

	getChildren(): readonly ScalarPlanNode[] {
		return this.operands;
	}

	withChildren(newChildren: readonly PlanNode[]): PlanNode {
		expectArity(newChildren, this.operands.length, this.nodeType);
		const newOperands = newChildren.map(child => expectScalar(child, this.nodeType));
		if (newOperands.every((op, i) => op === this.operands[i])) {
			return this;
		}
		return new CoalesceNode(newOperands);
	}

	override toString(): string {
		return `COALESCE(${this.operands.map(op => op.toString()).join(', ')})`;
	}
}
