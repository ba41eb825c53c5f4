export type { AST, ASTNode, Loc, SourceLocation } from "../types/ast";
export * from "../types/expression";
