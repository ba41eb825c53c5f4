import { STATEMENT_STARTS, Token, TokenType } from "../types/token";
import { AST, SourceLocation } from "./types";
import {
    BinaryOperator,
    CallExpression,
    Expression,
    VarReference,
} from "../types/expression";
import {
    Statement,
    BlockStatement,
    ClassStatement,
    ExpressionStatement,
    ForStatement,
    FunctionStatement,
    IfStatement,
    LetStatement,
    Param,
    PrintStatement,
    ReturnStatement,
    WhileStatement,
} from "./statements";
import { makeError, RiftError } from "../utils/Error";

const MAX_ARGUMENTS = 255;

const BINARY_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    [TokenType.PlusOp]: "+",
    [TokenType.MinusOp]: "-",
    [TokenType.MultiplyOp]: "*",
    [TokenType.DivideOp]: "/",
    [TokenType.ModuloOp]: "%",
    [TokenType.Equal]: "==",
    [TokenType.NotEqual]: "!=",
    [TokenType.Less]: "<",
    [TokenType.LessEqual]: "<=",
    [TokenType.Greater]: ">",
    [TokenType.GreaterEqual]: ">=",
};

export class Parser {
    private tokens: Token[];
    private source: string;
    private current: number = 0;

    public errors: RiftError[] = [];
    /** Set when an error was raised at end of input, i.e. more text could fix it. */
    public incomplete: boolean = false;

    constructor(tokens: Token[], source: string = "") {
        this.tokens = tokens;
        this.source = source;
    }

    public parse(): AST {
        const statements: Statement[] = [];
        while (!this.isAtEnd()) {
            const stmt = this.declaration();
            if (stmt) statements.push(stmt);
        }
        return { statements };
    }

    private getLoc(token: Token): SourceLocation {
        const len = token.length || token.value.length;
        return {
            line: token.line,
            col: token.col,
            len,
            endLine: token.line,
            endCol: token.col + len,
        };
    }

    private mergeLoc(start: SourceLocation, end: SourceLocation): SourceLocation {
        const len =
            start.line === end.endLine ? end.endCol - start.col : start.len;

        return {
            line: start.line,
            col: start.col,
            len,
            endLine: end.endLine,
            endCol: end.endCol,
        };
    }

    // --- Declarations ---

    private declaration(): Statement | null {
        try {
            if (this.match(TokenType.Class)) {
                return this.classDeclaration();
            }
            if (this.match(TokenType.Fn)) {
                return this.functionDeclaration("function", this.previous());
            }
            if (this.match(TokenType.Let)) {
                return this.letDeclaration();
            }
            return this.statement();
        } catch (e) {
            if (!(e instanceof RiftError)) throw e;
            // Already recorded by error(), skip to the next statement
            this.synchronize();
            return null;
        }
    }

    private classDeclaration(): ClassStatement {
        const startToken = this.previous();
        const name = this.consume(TokenType.Identifier, "Expected class name");

        let superclass: VarReference | undefined;
        if (this.match(TokenType.Less)) {
            const superToken = this.consume(
                TokenType.Identifier,
                "Expected superclass name",
            );
            superclass = {
                type: "VarReference",
                varName: superToken.value,
                loc: this.getLoc(superToken),
            };
        }

        this.consume(TokenType.LBrace, "Expected '{' before class body");
        const methods: FunctionStatement[] = [];
        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            methods.push(this.functionDeclaration("method", this.peek()));
        }
        const endToken = this.consume(
            TokenType.RBrace,
            "Expected '}' after class body",
        );

        return new ClassStatement(
            name.value,
            superclass,
            methods,
            this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        );
    }

    private functionDeclaration(
        kind: "function" | "method",
        startToken: Token,
    ): FunctionStatement {
        // fn name (a, b) { body }
        const nameToken = this.consume(
            TokenType.Identifier,
            `Expected ${kind} name`,
        );

        this.consume(TokenType.LParen, `Expected '(' after ${kind} name`);
        const params: Param[] = [];
        if (!this.check(TokenType.RParen)) {
            do {
                if (params.length >= MAX_ARGUMENTS) {
                    this.error(
                        this.peek(),
                        `Cannot have more than ${MAX_ARGUMENTS} parameters`,
                    );
                }
                const paramToken = this.consume(
                    TokenType.Identifier,
                    "Expected parameter name",
                );
                params.push({
                    name: paramToken.value,
                    loc: this.getLoc(paramToken),
                });
            } while (this.match(TokenType.Comma));
        }
        this.consume(TokenType.RParen, `Expected ')' after ${kind} parameters`);

        this.consume(TokenType.LBrace, `Expected '{' before ${kind} body`);
        const block = this.blockStatement(this.previous());

        return new FunctionStatement(
            nameToken.value,
            params,
            block.statements,
            this.mergeLoc(this.getLoc(startToken), block.loc),
        );
    }

    private letDeclaration(): LetStatement {
        // let total = a + b;
        const startToken = this.previous();
        const nameToken = this.consume(
            TokenType.Identifier,
            "Expected variable name",
        );

        let initializer: Expression | undefined;
        if (this.match(TokenType.Equals)) {
            initializer = this.expression();
        }

        const endToken = this.consume(
            TokenType.Semicolon,
            "Expected ';' after variable declaration",
        );

        return new LetStatement(
            nameToken.value,
            initializer,
            this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        );
    }

    // --- Statements ---

    private statement(): Statement {
        if (this.match(TokenType.If)) {
            return this.ifStatement();
        }
        if (this.match(TokenType.Print)) {
            return this.printStatement();
        }
        if (this.match(TokenType.Return)) {
            return this.returnStatement();
        }
        if (this.match(TokenType.While)) {
            return this.whileStatement();
        }
        if (this.match(TokenType.For)) {
            return this.forStatement();
        }
        if (this.match(TokenType.LBrace)) {
            return this.blockStatement(this.previous());
        }
        return this.expressionStatement();
    }

    private ifStatement(): IfStatement {
        const startToken = this.previous();
        this.consume(TokenType.LParen, "Expected '(' after 'if'");
        const condition = this.expression();
        this.consume(TokenType.RParen, "Expected ')' after if condition");

        const thenBranch = this.statement();
        let elseBranch: Statement | undefined;
        if (this.match(TokenType.Else)) {
            elseBranch = this.statement();
        }

        return new IfStatement(
            condition,
            thenBranch,
            elseBranch,
            this.mergeLoc(
                this.getLoc(startToken),
                (elseBranch ?? thenBranch).loc,
            ),
        );
    }

    private printStatement(): PrintStatement {
        const startToken = this.previous();
        this.consume(TokenType.LParen, "Expected '(' after 'print'");
        const value = this.expression();
        this.consume(TokenType.RParen, "Expected ')' after print argument");
        const endToken = this.consume(
            TokenType.Semicolon,
            "Expected ';' after print statement",
        );

        return new PrintStatement(
            value,
            this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        );
    }

    private returnStatement(): ReturnStatement {
        const keyword = this.previous();
        let value: Expression | undefined;

        if (!this.check(TokenType.Semicolon)) {
            value = this.expression();
        }

        const endToken = this.consume(
            TokenType.Semicolon,
            "Expected ';' after return value",
        );

        return {
            kind: "ReturnStatement",
            value,
            loc: this.mergeLoc(this.getLoc(keyword), this.getLoc(endToken)),
        };
    }

    private whileStatement(): WhileStatement {
        const startToken = this.previous();
        this.consume(TokenType.LParen, "Expected '(' after 'while'");
        const condition = this.expression();
        this.consume(TokenType.RParen, "Expected ')' after while condition");
        const body = this.statement();

        return new WhileStatement(
            condition,
            body,
            this.mergeLoc(this.getLoc(startToken), body.loc),
        );
    }

    private forStatement(): ForStatement {
        const startToken = this.previous();
        this.consume(TokenType.LParen, "Expected '(' after 'for'");

        let initializer: LetStatement | ExpressionStatement | undefined;
        if (this.match(TokenType.Semicolon)) {
            initializer = undefined;
        } else if (this.match(TokenType.Let)) {
            initializer = this.letDeclaration();
        } else {
            initializer = this.expressionStatement();
        }

        let condition: Expression | undefined;
        if (!this.check(TokenType.Semicolon)) {
            condition = this.expression();
        }
        this.consume(TokenType.Semicolon, "Expected ';' after loop condition");

        let increment: Expression | undefined;
        if (!this.check(TokenType.RParen)) {
            increment = this.expression();
        }
        this.consume(TokenType.RParen, "Expected ')' after for clauses");

        const body = this.statement();

        return new ForStatement(
            initializer,
            condition,
            increment,
            body,
            this.mergeLoc(this.getLoc(startToken), body.loc),
        );
    }

    private blockStatement(startToken: Token): BlockStatement {
        // '{' was matched by the caller
        const statements: Statement[] = [];

        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            const stmt = this.declaration();
            if (stmt) statements.push(stmt);
        }

        const endToken = this.consume(TokenType.RBrace, "Expected '}' after block");

        return {
            kind: "BlockStatement",
            statements,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private expressionStatement(): ExpressionStatement {
        const expr = this.expression();
        const endToken = this.consume(
            TokenType.Semicolon,
            "Expected ';' after expression",
        );
        return {
            kind: "ExpressionStatement",
            expression: expr,
            loc: this.mergeLoc(expr.loc, this.getLoc(endToken)),
        };
    }

    // --- Expressions ---

    private expression(): Expression {
        return this.assignment();
    }

    private assignment(): Expression {
        const expr = this.or();

        if (this.match(TokenType.Equals)) {
            const equals = this.previous();
            const value = this.assignment();
            const loc = this.mergeLoc(expr.loc, value.loc);

            if (expr.type === "VarReference") {
                return {
                    type: "AssignmentExpression",
                    varName: expr.varName,
                    value,
                    loc,
                };
            }
            if (expr.type === "MemberExpression") {
                return {
                    type: "MemberAssignmentExpression",
                    object: expr.object,
                    property: expr.property,
                    value,
                    loc,
                };
            }

            // Reported, but parsing carries on from here
            this.error(equals, "Invalid assignment target");
        }

        return expr;
    }

    private or(): Expression {
        let left = this.and();

        while (this.match(TokenType.Or)) {
            const right = this.and();
            left = {
                type: "LogicalExpression",
                operator: "or",
                left,
                right,
                loc: this.mergeLoc(left.loc, right.loc),
            };
        }

        return left;
    }

    private and(): Expression {
        let left = this.equality();

        while (this.match(TokenType.And)) {
            const right = this.equality();
            left = {
                type: "LogicalExpression",
                operator: "and",
                left,
                right,
                loc: this.mergeLoc(left.loc, right.loc),
            };
        }

        return left;
    }

    private equality(): Expression {
        return this.binary(
            () => this.comparison(),
            TokenType.Equal,
            TokenType.NotEqual,
        );
    }

    private comparison(): Expression {
        return this.binary(
            () => this.term(),
            TokenType.Greater,
            TokenType.GreaterEqual,
            TokenType.Less,
            TokenType.LessEqual,
        );
    }

    private term(): Expression {
        return this.binary(
            () => this.factor(),
            TokenType.PlusOp,
            TokenType.MinusOp,
        );
    }

    private factor(): Expression {
        return this.binary(
            () => this.unary(),
            TokenType.MultiplyOp,
            TokenType.DivideOp,
            TokenType.ModuloOp,
        );
    }

    /**
     * Left-associative chain of binary operators at one precedence level.
     */
    private binary(
        operand: () => Expression,
        ...operators: TokenType[]
    ): Expression {
        let left = operand();

        while (this.match(...operators)) {
            const operator = BINARY_OPERATORS[this.previous().type];
            if (operator === undefined) {
                throw this.error(this.previous(), "Unknown binary operator");
            }
            const right = operand();
            left = {
                type: "BinaryExpression",
                operator,
                left,
                right,
                loc: this.mergeLoc(left.loc, right.loc),
            };
        }

        return left;
    }

    private unary(): Expression {
        if (this.match(TokenType.Bang, TokenType.MinusOp)) {
            const operatorToken = this.previous();
            const right = this.unary();
            return {
                type: "UnaryExpression",
                operator: operatorToken.type === TokenType.Bang ? "!" : "-",
                value: right,
                loc: this.mergeLoc(this.getLoc(operatorToken), right.loc),
            };
        }
        return this.call();
    }

    private call(): Expression {
        let expr = this.primary();

        while (true) {
            if (this.match(TokenType.LParen)) {
                expr = this.finishCall(expr);
            } else if (this.match(TokenType.Dot)) {
                const nameToken = this.consume(
                    TokenType.Identifier,
                    "Expected property name after '.'",
                );
                expr = {
                    type: "MemberExpression",
                    object: expr,
                    property: nameToken.value,
                    loc: this.mergeLoc(expr.loc, this.getLoc(nameToken)),
                };
            } else {
                break;
            }
        }

        return expr;
    }

    private finishCall(callee: Expression): CallExpression {
        const args: Expression[] = [];
        if (!this.check(TokenType.RParen)) {
            do {
                if (args.length >= MAX_ARGUMENTS) {
                    this.error(
                        this.peek(),
                        `Cannot have more than ${MAX_ARGUMENTS} arguments`,
                    );
                }
                args.push(this.expression());
            } while (this.match(TokenType.Comma));
        }
        const endToken = this.consume(
            TokenType.RParen,
            "Expected ')' after arguments",
        );
        return {
            type: "CallExpression",
            callee,
            arguments: args,
            loc: this.mergeLoc(callee.loc, this.getLoc(endToken)),
        };
    }

    private primary(): Expression {
        if (this.match(TokenType.False, TokenType.True)) {
            const token = this.previous();
            return {
                type: "BoolLiteral",
                value: token.type === TokenType.True,
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.Nil)) {
            return { type: "NilLiteral", loc: this.getLoc(this.previous()) };
        }
        if (this.match(TokenType.NumberLiteral)) {
            const token = this.previous();
            return {
                type: "NumberLiteral",
                value: parseFloat(token.value),
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.StringLiteral)) {
            const token = this.previous();
            return {
                type: "StringLiteral",
                value: token.value,
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.This)) {
            return { type: "ThisExpression", loc: this.getLoc(this.previous()) };
        }
        if (this.match(TokenType.Super)) {
            const keyword = this.previous();
            this.consume(TokenType.Dot, "Expected '.' after 'super'");
            const method = this.consume(
                TokenType.Identifier,
                "Expected superclass method name",
            );
            return {
                type: "SuperExpression",
                method: method.value,
                loc: this.mergeLoc(this.getLoc(keyword), this.getLoc(method)),
            };
        }
        if (this.match(TokenType.Identifier)) {
            const token = this.previous();
            return {
                type: "VarReference",
                varName: token.value,
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.LParen)) {
            const startParen = this.previous();
            const expr = this.expression();
            const endParen = this.consume(
                TokenType.RParen,
                "Expected ')' after expression",
            );
            return {
                type: "GroupingExpression",
                expression: expr,
                loc: this.mergeLoc(
                    this.getLoc(startParen),
                    this.getLoc(endParen),
                ),
            };
        }

        throw this.error(
            this.peek(),
            this.isAtEnd()
                ? "Expected expression, found end of input"
                : `Expected expression, found "${this.peek().value}"`,
        );
    }

    // --- Helpers ---

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();
        throw this.error(this.peek(), message);
    }

    private check(...types: TokenType[]): boolean {
        if (this.isAtEnd()) return false;
        return types.includes(this.peek().type);
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    /**
     * Discards tokens until the start of the next statement.
     */
    private synchronize() {
        this.advance();
        while (!this.isAtEnd()) {
            if (this.previous().type === TokenType.Semicolon) return;
            if (STATEMENT_STARTS.includes(this.peek().type)) return;
            this.advance();
        }
    }

    private error(token: Token, message: string): RiftError {
        if (token.type === TokenType.EOF) {
            this.incomplete = true;
        }
        const error = makeError("parse", this.source, this.getLoc(token), message);
        this.errors.push(error);
        return error;
    }
}
