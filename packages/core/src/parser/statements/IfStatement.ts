import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";
import { Statement } from "./index";

export class IfStatement implements BaseStatement {
    kind = "IfStatement" as const;

    constructor(
        public condition: Expression,
        public thenBranch: Statement,
        public elseBranch: Statement | undefined,
        public loc: SourceLocation,
    ) {}
}
