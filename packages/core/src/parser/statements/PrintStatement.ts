import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";

export class PrintStatement implements BaseStatement {
    kind = "PrintStatement" as const;

    constructor(
        public expression: Expression,
        public loc: SourceLocation,
    ) {}
}
