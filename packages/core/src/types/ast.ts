import { Statement } from "../parser/statements";
import { Expression } from "./expression";

export type { Statement };

export interface Loc {
    line: number;
    col: number;
    length?: number;
}

export type ASTNode = Statement | Expression;

export interface AST {
    statements: Statement[];
}

export interface SourceLocation {
    line: number;
    col: number;
    len?: number;
    endLine: number;
    endCol: number;
}
