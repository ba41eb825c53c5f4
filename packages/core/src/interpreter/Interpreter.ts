import { AST, Statement } from "../types/ast";
import {
    BinaryExpression,
    CallExpression,
    Expression,
    ResolvableExpression,
    SuperExpression,
} from "../types/expression";
import {
    ClassStatement,
    ForStatement,
    FunctionStatement,
} from "../parser/statements";
import { Resolution } from "../resolver/Resolver";
import {
    ErrorLocation,
    NativeError,
    RiftRuntimeError,
    RuntimeErrorKind,
} from "../utils/Error";
import { Environment } from "./Environment";
import {
    arityOf,
    bindMethod,
    bool,
    CallableValue,
    callableName,
    ClassValue,
    findMethod,
    FunctionValue,
    InstanceValue,
    isCallable,
    isTruthy,
    NativeValue,
    NIL,
    num,
    RuntimeValue,
    str,
    stringify,
    typeName,
    valuesEqual,
} from "./values";

/**
 * Outcome of executing a statement. A `return` travels up as a value until
 * the enclosing call consumes it.
 */
export type Completion =
    | { kind: "normal" }
    | { kind: "return"; value: RuntimeValue };

const NORMAL: Completion = { kind: "normal" };

export const DEFAULT_MAX_CALL_DEPTH = 512;

export interface InterpreterOptions {
    /** Receives one line per `print`. Defaults to console.log. */
    output?: (line: string) => void;
    natives?: NativeValue[];
    maxCallDepth?: number;
}

type Located = { loc: ErrorLocation };

export class Interpreter {
    public readonly globals: Environment = new Environment();
    private environment: Environment = this.globals;
    private resolution = new WeakMap<ResolvableExpression, number>();
    private source: string = "";

    private output: (line: string) => void;
    private maxCallDepth: number;
    private callDepth: number = 0;

    constructor(options: InterpreterOptions = {}) {
        this.output = options.output ?? ((line) => console.log(line));
        this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;

        for (const native of options.natives ?? []) {
            this.defineNative(native);
        }
    }

    /**
     * Runs a resolved program against the global frame. Stops at the first
     * runtime error, which is thrown as a RiftRuntimeError. Globals and the
     * resolution of earlier programs are kept, so one interpreter can run
     * successive REPL inputs.
     */
    public interpret(ast: AST, resolution: Resolution, source: string = "") {
        this.source = source;
        for (const [node, distance] of resolution) {
            this.resolution.set(node, distance);
        }

        for (const statement of ast.statements) {
            try {
                this.execute(statement);
            } catch (e) {
                if (e instanceof RangeError) {
                    throw this.error(
                        "StackOverflow",
                        statement,
                        "host call stack exhausted",
                        "check for unbounded recursion",
                    );
                }
                throw e;
            } finally {
                this.environment = this.globals;
                this.callDepth = 0;
            }
        }
    }

    public defineNative(native: NativeValue) {
        this.globals.define(native.name, native);
    }

    public getGlobal(name: string): RuntimeValue | undefined {
        return this.globals.has(name) ? this.globals.get(0, name) : undefined;
    }

    public globalNames(): string[] {
        return this.globals.names();
    }

    // --- Statements ---

    private execute(stmt: Statement): Completion {
        switch (stmt.kind) {
            case "ExpressionStatement":
                this.evaluate(stmt.expression);
                return NORMAL;

            case "PrintStatement":
                this.output(stringify(this.evaluate(stmt.expression)));
                return NORMAL;

            case "LetStatement": {
                const value = stmt.initializer
                    ? this.evaluate(stmt.initializer)
                    : NIL;
                this.environment.define(stmt.name, value);
                return NORMAL;
            }

            case "BlockStatement":
                return this.executeBlock(
                    stmt.statements,
                    this.environment.child(),
                );

            case "IfStatement":
                if (isTruthy(this.evaluate(stmt.condition))) {
                    return this.execute(stmt.thenBranch);
                }
                if (stmt.elseBranch) {
                    return this.execute(stmt.elseBranch);
                }
                return NORMAL;

            case "WhileStatement":
                while (isTruthy(this.evaluate(stmt.condition))) {
                    const completion = this.execute(stmt.body);
                    if (completion.kind === "return") return completion;
                }
                return NORMAL;

            case "ForStatement":
                return this.executeFor(stmt);

            case "FunctionStatement":
                this.environment.define(
                    stmt.name,
                    this.makeFunction(stmt, this.environment, false),
                );
                return NORMAL;

            case "ReturnStatement":
                return {
                    kind: "return",
                    value: stmt.value ? this.evaluate(stmt.value) : NIL,
                };

            case "ClassStatement":
                this.executeClass(stmt);
                return NORMAL;
        }
    }

    private executeBlock(
        statements: Statement[],
        environment: Environment,
    ): Completion {
        const previous = this.environment;
        this.environment = environment;
        try {
            for (const stmt of statements) {
                const completion = this.execute(stmt);
                if (completion.kind === "return") return completion;
            }
            return NORMAL;
        } finally {
            this.environment = previous;
        }
    }

    private executeFor(stmt: ForStatement): Completion {
        const previous = this.environment;
        const loopVar =
            stmt.initializer?.kind === "LetStatement"
                ? stmt.initializer.name
                : null;

        try {
            if (loopVar !== null) {
                this.environment = previous.child();
            }
            if (stmt.initializer) {
                this.execute(stmt.initializer);
            }

            while (!stmt.condition || isTruthy(this.evaluate(stmt.condition))) {
                const completion = this.execute(stmt.body);
                if (completion.kind === "return") return completion;

                // Next iteration gets its own frame, seeded with the current
                // value, so closures from this iteration keep theirs
                if (loopVar !== null) {
                    const next = previous.child();
                    next.define(loopVar, this.environment.get(0, loopVar));
                    this.environment = next;
                }

                if (stmt.increment) {
                    this.evaluate(stmt.increment);
                }
            }
            return NORMAL;
        } finally {
            this.environment = previous;
        }
    }

    private executeClass(stmt: ClassStatement) {
        let superclass: ClassValue | null = null;
        if (stmt.superclass) {
            const value = this.evaluate(stmt.superclass);
            if (value.type !== "class") {
                throw this.error(
                    "TypeError",
                    stmt.superclass,
                    `superclass must be a class, got ${typeName(value)}`,
                );
            }
            superclass = value;
        }

        let methodEnv = this.environment;
        if (superclass) {
            methodEnv = this.environment.child();
            methodEnv.define("super", superclass);
        }

        const methods = new Map<string, FunctionValue>();
        for (const method of stmt.methods) {
            methods.set(
                method.name,
                this.makeFunction(method, methodEnv, method.name === "init"),
            );
        }

        const klass: ClassValue = {
            type: "class",
            name: stmt.name,
            superclass,
            methods,
        };
        this.environment.define(stmt.name, klass);
    }

    private makeFunction(
        declaration: FunctionStatement,
        closure: Environment,
        isInitializer: boolean,
    ): FunctionValue {
        return {
            type: "function",
            declaration,
            closure,
            isInitializer,
            source: this.source,
        };
    }

    // --- Expressions ---

    private evaluate(expr: Expression): RuntimeValue {
        switch (expr.type) {
            case "NumberLiteral":
                return num(expr.value);
            case "StringLiteral":
                return str(expr.value);
            case "BoolLiteral":
                return bool(expr.value);
            case "NilLiteral":
                return NIL;
            case "GroupingExpression":
                return this.evaluate(expr.expression);

            case "VarReference":
                return this.lookUpVariable(expr.varName, expr);

            case "AssignmentExpression": {
                const value = this.evaluate(expr.value);
                const distance = this.resolution.get(expr);
                try {
                    if (distance === undefined) {
                        this.globals.assignGlobal(expr.varName, value);
                    } else {
                        this.environment.assign(distance, expr.varName, value);
                    }
                } catch (e) {
                    throw this.locate(
                        e,
                        expr,
                        `declare it first with 'let ${expr.varName}'`,
                    );
                }
                return value;
            }

            case "UnaryExpression": {
                const operand = this.evaluate(expr.value);
                if (expr.operator === "!") {
                    return bool(!isTruthy(operand));
                }
                if (operand.type !== "num") {
                    throw this.error(
                        "TypeError",
                        expr,
                        `operand of '-' must be a number, got ${typeName(operand)}`,
                    );
                }
                return num(-operand.value);
            }

            case "BinaryExpression":
                return this.evaluateBinary(
                    expr,
                    this.evaluate(expr.left),
                    this.evaluate(expr.right),
                );

            case "LogicalExpression": {
                const left = this.evaluate(expr.left);
                if (expr.operator === "or") {
                    if (isTruthy(left)) return left;
                } else if (!isTruthy(left)) {
                    return left;
                }
                return this.evaluate(expr.right);
            }

            case "CallExpression":
                return this.evaluateCall(expr);

            case "MemberExpression": {
                const object = this.evaluate(expr.object);
                if (object.type !== "instance") {
                    throw this.error(
                        "TypeError",
                        expr,
                        `only instances have properties, got ${typeName(object)}`,
                    );
                }
                const field = object.fields.get(expr.property);
                if (field !== undefined) return field;

                const method = findMethod(object.klass, expr.property);
                if (method) return bindMethod(method, object);

                throw this.error(
                    "UndefinedProperty",
                    expr,
                    `undefined property '${expr.property}' on ${object.klass.name}`,
                );
            }

            case "MemberAssignmentExpression": {
                const object = this.evaluate(expr.object);
                if (object.type !== "instance") {
                    throw this.error(
                        "TypeError",
                        expr,
                        `only instances have fields, got ${typeName(object)}`,
                    );
                }
                const value = this.evaluate(expr.value);
                object.fields.set(expr.property, value);
                return value;
            }

            case "ThisExpression":
                return this.lookUpVariable("this", expr);

            case "SuperExpression":
                return this.evaluateSuper(expr);
        }
    }

    private evaluateBinary(
        expr: BinaryExpression,
        left: RuntimeValue,
        right: RuntimeValue,
    ): RuntimeValue {
        const { operator } = expr;

        if (operator === "==") return bool(valuesEqual(left, right));
        if (operator === "!=") return bool(!valuesEqual(left, right));

        if (operator === "+") {
            if (left.type === "num" && right.type === "num") {
                return num(left.value + right.value);
            }
            if (left.type === "str" && right.type === "str") {
                return str(left.value + right.value);
            }
            throw this.error(
                "TypeError",
                expr,
                `operands of '+' must be two numbers or two strings, got ${typeName(left)} and ${typeName(right)}`,
            );
        }

        if (left.type !== "num" || right.type !== "num") {
            throw this.error(
                "TypeError",
                expr,
                `operands of '${operator}' must be numbers, got ${typeName(left)} and ${typeName(right)}`,
            );
        }

        const a = left.value;
        const b = right.value;
        switch (operator) {
            case "-":
                return num(a - b);
            case "*":
                return num(a * b);
            case "/":
                if (b === 0) {
                    throw this.error("TypeError", expr, "division by zero");
                }
                return num(a / b);
            case "%":
                if (b === 0) {
                    throw this.error("TypeError", expr, "modulo by zero");
                }
                // Floored: the result takes the sign of the divisor
                return num(a - b * Math.floor(a / b));
            case "<":
                return bool(a < b);
            case "<=":
                return bool(a <= b);
            case ">":
                return bool(a > b);
            case ">=":
                return bool(a >= b);
        }
    }

    private evaluateCall(expr: CallExpression): RuntimeValue {
        const callee = this.evaluate(expr.callee);

        const args: RuntimeValue[] = [];
        for (const argExpr of expr.arguments) {
            args.push(this.evaluate(argExpr));
        }

        if (!isCallable(callee)) {
            throw this.error(
                "NotCallable",
                expr,
                `can only call functions and classes, got ${typeName(callee)}`,
            );
        }

        const arity = arityOf(callee);
        if (args.length !== arity) {
            throw this.error(
                "ArityMismatch",
                expr,
                `${callableName(callee)} expected ${arity} argument${arity === 1 ? "" : "s"} but got ${args.length}`,
            );
        }

        return this.call(callee, args, expr);
    }

    private call(
        callee: CallableValue,
        args: RuntimeValue[],
        expr: CallExpression,
    ): RuntimeValue {
        switch (callee.type) {
            case "native":
                try {
                    return callee.call(args);
                } catch (e) {
                    if (e instanceof NativeError) {
                        throw this.error(
                            "NativeError",
                            expr,
                            `${callee.name}: ${e.message}`,
                        );
                    }
                    throw this.locate(e, expr);
                }

            case "function":
                return this.callFunction(callee, callee.closure, null, args, expr);

            case "bound":
                return this.callFunction(
                    callee.method,
                    callee.closure,
                    callee.receiver,
                    args,
                    expr,
                );

            case "class": {
                const instance: InstanceValue = {
                    type: "instance",
                    klass: callee,
                    fields: new Map(),
                };
                const init = findMethod(callee, "init");
                if (init) {
                    this.callFunction(
                        init,
                        bindMethod(init, instance).closure,
                        instance,
                        args,
                        expr,
                    );
                }
                return instance;
            }
        }
    }

    private callFunction(
        fn: FunctionValue,
        closure: Environment,
        receiver: InstanceValue | null,
        args: RuntimeValue[],
        expr: CallExpression,
    ): RuntimeValue {
        if (this.callDepth >= this.maxCallDepth) {
            throw this.error(
                "StackOverflow",
                expr,
                `maximum call depth of ${this.maxCallDepth} exceeded`,
                "check for unbounded recursion",
            );
        }

        const env = closure.child();
        fn.declaration.params.forEach((param, i) => {
            env.define(param.name, args[i]);
        });

        const callerSource = this.source;
        this.source = fn.source;
        this.callDepth++;
        try {
            const completion = this.executeBlock(fn.declaration.body, env);
            // An initializer always yields its instance, even on `return;`
            if (fn.isInitializer && receiver) return receiver;
            return completion.kind === "return" ? completion.value : NIL;
        } finally {
            this.callDepth--;
            this.source = callerSource;
        }
    }

    private evaluateSuper(expr: SuperExpression): RuntimeValue {
        const distance = this.resolution.get(expr);
        if (distance === undefined) {
            throw this.error(
                "UndefinedVariable",
                expr,
                "'super' was not resolved",
            );
        }

        // `this` lives one frame inside the frame holding `super`
        const superclass = this.environment.get(distance, "super");
        const receiver = this.environment.get(distance - 1, "this");
        if (superclass.type !== "class" || receiver.type !== "instance") {
            throw this.error(
                "TypeError",
                expr,
                "'super' used outside a bound method",
            );
        }

        const method = findMethod(superclass, expr.method);
        if (!method) {
            throw this.error(
                "UndefinedProperty",
                expr,
                `undefined property '${expr.method}' on superclass ${superclass.name}`,
            );
        }
        return bindMethod(method, receiver);
    }

    private lookUpVariable(
        name: string,
        expr: ResolvableExpression,
    ): RuntimeValue {
        const distance = this.resolution.get(expr);
        try {
            if (distance === undefined) {
                return this.globals.getGlobal(name);
            }
            return this.environment.get(distance, name);
        } catch (e) {
            throw this.locate(e, expr);
        }
    }

    // --- Errors ---

    private error(
        kind: RuntimeErrorKind,
        node: Located,
        message: string,
        hint?: string,
    ): RiftRuntimeError {
        return new RiftRuntimeError(kind, message, node.loc, this.source, hint);
    }

    private locate(e: unknown, node: Located, hint?: string): unknown {
        if (e instanceof RiftRuntimeError) {
            return e.located(node.loc, this.source, hint);
        }
        return e;
    }
}
