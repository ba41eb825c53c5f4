import { ExpressionStatement } from "./ExpressionStatement";
import { PrintStatement } from "./PrintStatement";
import { LetStatement } from "./LetStatement";
import { BlockStatement } from "./BlockStatement";
import { IfStatement } from "./IfStatement";
import { WhileStatement } from "./WhileStatement";
import { ForStatement } from "./ForStatement";
import { FunctionStatement } from "./FunctionStatement";
import { ReturnStatement } from "./ReturnStatement";
import { ClassStatement } from "./ClassStatement";

export * from "./BaseStatement";
export * from "./ExpressionStatement";
export * from "./PrintStatement";
export * from "./LetStatement";
export * from "./BlockStatement";
export * from "./IfStatement";
export * from "./WhileStatement";
export * from "./ForStatement";
export * from "./FunctionStatement";
export * from "./ReturnStatement";
export * from "./ClassStatement";

export type Statement =
    | ExpressionStatement
    | PrintStatement
    | LetStatement
    | BlockStatement
    | IfStatement
    | WhileStatement
    | ForStatement
    | FunctionStatement
    | ReturnStatement
    | ClassStatement;
