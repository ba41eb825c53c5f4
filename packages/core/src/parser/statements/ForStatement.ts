import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";
import { ExpressionStatement } from "./ExpressionStatement";
import { LetStatement } from "./LetStatement";
import { Statement } from "./index";

/**
 * `for (initializer; condition; increment) body`
 *
 * When the initializer is a `let`, every iteration runs in a fresh frame
 * holding its own copy of the loop variable, so closures created in the body
 * capture that iteration's value.
 */
export class ForStatement implements BaseStatement {
    kind = "ForStatement" as const;

    constructor(
        public initializer: LetStatement | ExpressionStatement | undefined,
        public condition: Expression | undefined,
        public increment: Expression | undefined,
        public body: Statement,
        public loc: SourceLocation,
    ) {}
}
