import { SourceLocation } from "./ast";

export type Expression =
    | NumberLiteral
    | StringLiteral
    | BoolLiteral
    | NilLiteral
    | VarReference
    | AssignmentExpression
    | UnaryExpression
    | BinaryExpression
    | LogicalExpression
    | CallExpression
    | MemberExpression
    | MemberAssignmentExpression
    | ThisExpression
    | SuperExpression
    | GroupingExpression;

export interface NumberLiteral {
    type: "NumberLiteral";
    value: number;
    loc: SourceLocation;
}

export interface StringLiteral {
    type: "StringLiteral";
    value: string;
    loc: SourceLocation;
}

export interface BoolLiteral {
    type: "BoolLiteral";
    value: boolean;
    loc: SourceLocation;
}

export interface NilLiteral {
    type: "NilLiteral";
    loc: SourceLocation;
}

export interface VarReference {
    type: "VarReference";
    varName: string;
    loc: SourceLocation;
}

export interface AssignmentExpression {
    type: "AssignmentExpression";
    varName: string;
    value: Expression;
    loc: SourceLocation;
}

export interface UnaryExpression {
    type: "UnaryExpression";
    operator: "!" | "-";
    value: Expression;
    loc: SourceLocation;
}

export type BinaryOperator =
    | "+"
    | "-"
    | "*"
    | "/"
    | "%"
    | "=="
    | "!="
    | "<"
    | "<="
    | ">"
    | ">=";

export interface BinaryExpression {
    type: "BinaryExpression";
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
    loc: SourceLocation;
}

/**
 * Short-circuiting `and` / `or`. Kept apart from BinaryExpression because the
 * right operand is evaluated conditionally.
 */
export interface LogicalExpression {
    type: "LogicalExpression";
    operator: "and" | "or";
    left: Expression;
    right: Expression;
    loc: SourceLocation;
}

export interface CallExpression {
    type: "CallExpression";
    callee: Expression;
    arguments: Expression[];
    loc: SourceLocation;
}

export interface MemberExpression {
    type: "MemberExpression";
    object: Expression;
    property: string;
    loc: SourceLocation;
}

export interface MemberAssignmentExpression {
    type: "MemberAssignmentExpression";
    object: Expression;
    property: string;
    value: Expression;
    loc: SourceLocation;
}

export interface ThisExpression {
    type: "ThisExpression";
    loc: SourceLocation;
}

export interface SuperExpression {
    type: "SuperExpression";
    method: string;
    loc: SourceLocation;
}

export interface GroupingExpression {
    type: "GroupingExpression";
    expression: Expression;
    loc: SourceLocation;
}

/** Expressions the resolver annotates with a scope distance. */
export type ResolvableExpression =
    | VarReference
    | AssignmentExpression
    | ThisExpression
    | SuperExpression;
