import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";

export class LetStatement implements BaseStatement {
    kind = "LetStatement" as const;

    constructor(
        public name: string,
        public initializer: Expression | undefined,
        public loc: SourceLocation,
    ) {}
}
