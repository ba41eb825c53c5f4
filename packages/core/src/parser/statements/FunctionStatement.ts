import { BaseStatement } from "./BaseStatement";
import { SourceLocation } from "../../types/ast";
import { Statement } from "./index";

export interface Param {
    name: string;
    loc: SourceLocation;
}

export class FunctionStatement implements BaseStatement {
    kind = "FunctionStatement" as const;

    constructor(
        public name: string,
        public params: Param[],
        public body: Statement[],
        public loc: SourceLocation,
    ) {}
}
