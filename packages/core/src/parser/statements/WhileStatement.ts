import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";
import { Statement } from "./index";

export class WhileStatement implements BaseStatement {
    kind = "WhileStatement" as const;

    constructor(
        public condition: Expression,
        public body: Statement,
        public loc: SourceLocation,
    ) {}
}
