import { SourceLocation } from "../../types/ast";
import { Statement } from "./index";

export interface BlockStatement {
    kind: "BlockStatement";
    statements: Statement[];
    loc: SourceLocation;
}
