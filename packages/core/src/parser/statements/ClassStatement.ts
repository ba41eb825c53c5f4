import { BaseStatement } from "./BaseStatement";
import { SourceLocation } from "../../types/ast";
import { VarReference } from "../../types/expression";
import { FunctionStatement } from "./FunctionStatement";

export class ClassStatement implements BaseStatement {
    kind = "ClassStatement" as const;

    constructor(
        public name: string,
        public superclass: VarReference | undefined,
        public methods: FunctionStatement[],
        public loc: SourceLocation,
    ) {}
}
