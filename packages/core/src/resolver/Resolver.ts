import {
    AST,
    Expression,
    ResolvableExpression,
    SourceLocation,
} from "../parser/types";
import {
    Statement,
    ClassStatement,
    ForStatement,
    FunctionStatement,
    LetStatement,
} from "../parser/statements";
import { makeError, RiftError } from "../utils/Error";

/**
 * Scope distance for every resolved reference. A node with no entry is a
 * global, looked up by name at run time.
 */
export type Resolution = Map<ResolvableExpression, number>;

// false = declared, true = defined
type Scope = Map<string, boolean>;

type FunctionKind = "none" | "function" | "method" | "initializer";
type ClassKind = "none" | "class" | "subclass";

export interface ResolverOptions {
    /** Globals that exist before the program runs (natives, earlier REPL input). */
    knownGlobals?: Iterable<string>;
}

export interface ResolverResult {
    resolution: Resolution;
    errors: RiftError[];
}

export class Resolver {
    private source: string;
    private knownGlobals: Set<string>;

    private scopes: Scope[] = [];
    private resolution: Resolution = new Map();
    private errors: RiftError[] = [];
    private currentFunction: FunctionKind = "none";
    private currentClass: ClassKind = "none";

    // Top-level names declared so far, and the one whose initializer is being resolved
    private globals: Set<string> = new Set();
    private pendingGlobal: string | null = null;

    constructor(source: string = "", options: ResolverOptions = {}) {
        this.source = source;
        this.knownGlobals = new Set(options.knownGlobals ?? []);
    }

    public resolve(ast: AST): ResolverResult {
        this.scopes = [];
        this.resolution = new Map();
        this.errors = [];
        this.currentFunction = "none";
        this.currentClass = "none";
        this.globals = new Set();
        this.pendingGlobal = null;

        this.resolveStatements(ast.statements);

        return { resolution: this.resolution, errors: this.errors };
    }

    private resolveStatements(statements: Statement[]) {
        for (const stmt of statements) {
            this.resolveStatement(stmt);
        }
    }

    private resolveStatement(stmt: Statement) {
        switch (stmt.kind) {
            case "ExpressionStatement":
                this.resolveExpression(stmt.expression);
                return;
            case "PrintStatement":
                this.resolveExpression(stmt.expression);
                return;
            case "LetStatement":
                this.resolveLet(stmt);
                return;
            case "BlockStatement":
                this.beginScope();
                this.resolveStatements(stmt.statements);
                this.endScope();
                return;
            case "IfStatement":
                this.resolveExpression(stmt.condition);
                this.resolveStatement(stmt.thenBranch);
                if (stmt.elseBranch) this.resolveStatement(stmt.elseBranch);
                return;
            case "WhileStatement":
                this.resolveExpression(stmt.condition);
                this.resolveStatement(stmt.body);
                return;
            case "ForStatement":
                this.resolveFor(stmt);
                return;
            case "FunctionStatement":
                this.declare(stmt.name, stmt.loc);
                this.define(stmt.name);
                this.resolveFunction(stmt, "function");
                return;
            case "ReturnStatement":
                if (this.currentFunction === "none") {
                    this.report(stmt.loc, "cannot return from top-level code");
                }
                if (stmt.value) {
                    if (this.currentFunction === "initializer") {
                        this.report(
                            stmt.loc,
                            "cannot return a value from an initializer",
                        );
                    }
                    this.resolveExpression(stmt.value);
                }
                return;
            case "ClassStatement":
                this.resolveClass(stmt);
                return;
        }
    }

    private resolveLet(stmt: LetStatement) {
        // Checked before declaring, which records the name as a global
        const guard =
            this.scopes.length === 0 &&
            !this.globals.has(stmt.name) &&
            !this.knownGlobals.has(stmt.name);

        this.declare(stmt.name, stmt.loc);

        if (stmt.initializer) {
            if (guard) this.pendingGlobal = stmt.name;
            this.resolveExpression(stmt.initializer);
            this.pendingGlobal = null;
        }

        this.define(stmt.name);
    }

    private resolveFor(stmt: ForStatement) {
        // A `let` in the header gets its own scope, which the interpreter
        // recreates for every iteration
        const scoped = stmt.initializer?.kind === "LetStatement";
        if (scoped) this.beginScope();

        if (stmt.initializer) this.resolveStatement(stmt.initializer);
        if (stmt.condition) this.resolveExpression(stmt.condition);
        if (stmt.increment) this.resolveExpression(stmt.increment);
        this.resolveStatement(stmt.body);

        if (scoped) this.endScope();
    }

    private resolveFunction(fn: FunctionStatement, kind: FunctionKind) {
        const enclosingFunction = this.currentFunction;
        this.currentFunction = kind;

        this.beginScope();
        for (const param of fn.params) {
            if (this.peekScope()?.has(param.name)) {
                this.report(param.loc, `duplicate parameter '${param.name}'`);
            }
            this.declare(param.name, param.loc, false);
            this.define(param.name);
        }
        this.resolveStatements(fn.body);
        this.endScope();

        this.currentFunction = enclosingFunction;
    }

    private resolveClass(stmt: ClassStatement) {
        const enclosingClass = this.currentClass;
        this.currentClass = "class";

        this.declare(stmt.name, stmt.loc);
        this.define(stmt.name);

        if (stmt.superclass) {
            if (stmt.superclass.varName === stmt.name) {
                this.report(
                    stmt.superclass.loc,
                    "a class cannot inherit from itself",
                );
            }
            this.currentClass = "subclass";
            this.resolveExpression(stmt.superclass);

            this.beginScope();
            this.peekScope()?.set("super", true);
        }

        this.beginScope();
        this.peekScope()?.set("this", true);

        for (const method of stmt.methods) {
            this.resolveFunction(
                method,
                method.name === "init" ? "initializer" : "method",
            );
        }

        this.endScope();
        if (stmt.superclass) this.endScope();

        this.currentClass = enclosingClass;
    }

    private resolveExpression(expr: Expression) {
        switch (expr.type) {
            case "NumberLiteral":
            case "StringLiteral":
            case "BoolLiteral":
            case "NilLiteral":
                return;
            case "VarReference": {
                const scope = this.peekScope();
                if (scope && scope.get(expr.varName) === false) {
                    this.report(
                        expr.loc,
                        `cannot read local variable '${expr.varName}' in its own initializer`,
                    );
                }
                if (!scope && expr.varName === this.pendingGlobal) {
                    this.report(
                        expr.loc,
                        `cannot read global variable '${expr.varName}' in its own initializer`,
                    );
                }
                this.resolveLocal(expr, expr.varName);
                return;
            }
            case "AssignmentExpression":
                this.resolveExpression(expr.value);
                this.resolveLocal(expr, expr.varName);
                return;
            case "UnaryExpression":
                this.resolveExpression(expr.value);
                return;
            case "BinaryExpression":
            case "LogicalExpression":
                this.resolveExpression(expr.left);
                this.resolveExpression(expr.right);
                return;
            case "CallExpression":
                this.resolveExpression(expr.callee);
                for (const arg of expr.arguments) {
                    this.resolveExpression(arg);
                }
                return;
            case "MemberExpression":
                this.resolveExpression(expr.object);
                return;
            case "MemberAssignmentExpression":
                this.resolveExpression(expr.value);
                this.resolveExpression(expr.object);
                return;
            case "ThisExpression":
                if (this.currentClass === "none") {
                    this.report(expr.loc, "cannot use 'this' outside of a class");
                    return;
                }
                this.resolveLocal(expr, "this");
                return;
            case "SuperExpression":
                if (this.currentClass === "none") {
                    this.report(expr.loc, "cannot use 'super' outside of a class");
                    return;
                }
                if (this.currentClass !== "subclass") {
                    this.report(
                        expr.loc,
                        "cannot use 'super' in a class with no superclass",
                    );
                    return;
                }
                this.resolveLocal(expr, "super");
                return;
            case "GroupingExpression":
                this.resolveExpression(expr.expression);
                return;
        }
    }

    private resolveLocal(expr: ResolvableExpression, name: string) {
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            if (this.scopes[i].has(name)) {
                this.resolution.set(expr, this.scopes.length - 1 - i);
                return;
            }
        }
        // Not found: left unresolved, looked up as a global
    }

    private declare(name: string, loc: SourceLocation, checkDuplicate = true) {
        const scope = this.peekScope();
        if (!scope) {
            // Globals may be redeclared; a later declaration overwrites
            this.globals.add(name);
            return;
        }
        if (checkDuplicate && scope.has(name)) {
            this.report(loc, `variable '${name}' already declared in this scope`);
        }
        scope.set(name, false);
    }

    private define(name: string) {
        this.peekScope()?.set(name, true);
    }

    private beginScope() {
        this.scopes.push(new Map());
    }

    private endScope() {
        this.scopes.pop();
    }

    private peekScope(): Scope | undefined {
        return this.scopes[this.scopes.length - 1];
    }

    private report(loc: SourceLocation, message: string) {
        this.errors.push(makeError("resolve", this.source, loc, message));
    }
}
