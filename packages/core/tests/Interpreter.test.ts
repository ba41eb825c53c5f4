import { interpret, InterpretOptions } from "../src";
import { Interpreter } from "../src/interpreter/Interpreter";
import { NIL, NativeValue, num } from "../src/interpreter/values";
import { NativeError, RiftRuntimeError } from "../src/utils/Error";

describe("Interpreter", () => {
    function run(source: string, options: InterpretOptions = {}) {
        const lines: string[] = [];
        const result = interpret(source, {
            output: (line) => lines.push(line),
            ...options,
        });
        return { lines, result };
    }

    function output(source: string, options: InterpretOptions = {}): string[] {
        const { lines, result } = run(source, options);
        expect(result.errors.map((e) => e.rawMessage)).toEqual([]);
        return lines;
    }

    function runtimeError(source: string, options: InterpretOptions = {}) {
        const { result } = run(source, options);
        expect(result.ok).toBe(false);
        const error = result.errors[0];
        if (!(error instanceof RiftRuntimeError)) {
            throw new Error(`expected a runtime error, got ${String(error)}`);
        }
        return error;
    }

    describe("expressions", () => {
        test("arithmetic", () => {
            expect(
                output(`
                    print(1 + 2 * 3);
                    print((1 + 2) * 3);
                    print(10 / 4);
                    print(7 % 3);
                    print(-7 % 3);
                    print(7 % -3);
                    print(-(2 - 5));
                `),
            ).toEqual(["7", "9", "2.5", "1", "2", "-2", "3"]);
        });

        test("number formatting", () => {
            expect(output("print(3.0); print(0.5); print(-0);")).toEqual([
                "3",
                "0.5",
                "-0",
            ]);
        });

        test("string concatenation", () => {
            expect(output(`print("a" + "b");`)).toEqual(["ab"]);
        });

        test("adding a number and a string is a TypeError", () => {
            const { result } = run(`print(1 + "x");`);

            expect(result.ok).toBe(false);
            expect(result.diagnostics).toEqual([
                {
                    phase: "runtime",
                    message:
                        "operands of '+' must be two numbers or two strings, got number and string",
                    line: 1,
                },
            ]);
            expect(runtimeError(`print(1 + "x");`).kind).toBe("TypeError");
        });

        test("division and remainder by zero are TypeErrors", () => {
            const division = runtimeError("print(1 / 0);");
            expect(division.kind).toBe("TypeError");
            expect(division.rawMessage).toBe("division by zero");

            const remainder = runtimeError("print(1 % 0);");
            expect(remainder.kind).toBe("TypeError");
            expect(remainder.rawMessage).toBe("modulo by zero");
        });

        test("comparison requires numbers", () => {
            expect(output("print(1 < 2); print(2 <= 2); print(1 > 2); print(3 >= 4);")).toEqual(
                ["true", "true", "false", "false"],
            );

            const error = runtimeError(`print("a" < "b");`);
            expect(error.kind).toBe("TypeError");
            expect(error.rawMessage).toBe(
                "operands of '<' must be numbers, got string and string",
            );
        });

        test("negation requires a number", () => {
            const error = runtimeError(`print(-"a");`);
            expect(error.kind).toBe("TypeError");
            expect(error.rawMessage).toBe(
                "operand of '-' must be a number, got string",
            );
        });

        test("truthiness", () => {
            expect(
                output(`print(!nil); print(!false); print(!0); print(!"");`),
            ).toEqual(["true", "true", "false", "false"]);
        });

        test("equality never coerces", () => {
            expect(
                output(`
                    print(nil == nil);
                    print(1 == "1");
                    print("a" == "a");
                    print(nil == false);
                    print(1 != 2);
                `),
            ).toEqual(["true", "false", "true", "false", "true"]);
        });

        test("logical operators short-circuit and yield an operand", () => {
            expect(
                output(`
                    print(nil or "x");
                    print(1 and 2);
                    print(false and undefinedThing);
                    print("left" or undefinedThing);
                `),
            ).toEqual(["x", "2", "false", "left"]);
        });
    });

    describe("variables and scope", () => {
        test("blocks shadow and restore", () => {
            expect(
                output(`
                    let a = "global";
                    {
                        let a = "inner";
                        print(a);
                    }
                    print(a);
                `),
            ).toEqual(["inner", "global"]);
        });

        test("declaration without initializer is nil", () => {
            expect(output("let a; print(a);")).toEqual(["nil"]);
        });

        test("assignment yields its value", () => {
            expect(output("let a; let b; a = b = 3; print(a + b);")).toEqual([
                "6",
            ]);
        });

        test("assigning an undeclared name fails", () => {
            const error = runtimeError("missing = 1;");

            expect(error.kind).toBe("UndefinedVariable");
            expect(error.rawMessage).toBe("undefined variable 'missing'");
            expect(error.hint).toBe("declare it first with 'let missing'");
            expect(error.loc?.line).toBe(1);
        });

        test("reading an undefined global fails", () => {
            const { result } = run("print(1);\n\nprint(missing);");

            expect(result.diagnostics).toEqual([
                {
                    phase: "runtime",
                    message: "undefined variable 'missing'",
                    line: 3,
                },
            ]);
        });

        test("globals may be redeclared", () => {
            expect(output("let a = 1; let a = a + 1; print(a);")).toEqual([
                "2",
            ]);
        });

        test("functions may refer to globals declared later", () => {
            expect(
                output(`
                    fn a() { return b(); }
                    fn b() { return "b"; }
                    print(a());
                `),
            ).toEqual(["b"]);
        });
    });

    describe("control flow", () => {
        test("if and else", () => {
            expect(
                output(`
                    if (1 > 2) print("then"); else print("else");
                    if (nil) print("skipped");
                    if ("") print("empty string is truthy");
                `),
            ).toEqual(["else", "empty string is truthy"]);
        });

        test("while loop", () => {
            expect(
                output(`
                    let i = 0;
                    while (i < 3) {
                        print(i);
                        i = i + 1;
                    }
                `),
            ).toEqual(["0", "1", "2"]);
        });

        test("for loop", () => {
            expect(
                output(`
                    let total = 0;
                    for (let i = 1; i <= 4; i = i + 1) total = total + i;
                    print(total);
                `),
            ).toEqual(["10"]);
        });

        test("closures capture a fresh loop variable per iteration", () => {
            expect(
                output(`
                    let f0; let f1; let f2;
                    for (let i = 0; i < 3; i = i + 1) {
                        fn capture() { return i; }
                        if (i == 0) f0 = capture;
                        if (i == 1) f1 = capture;
                        if (i == 2) f2 = capture;
                    }
                    print(f0());
                    print(f1());
                    print(f2());
                `),
            ).toEqual(["0", "1", "2"]);
        });

        test("loop variable declared outside the header is shared", () => {
            expect(
                output(`
                    let f0; let f1;
                    let j;
                    for (j = 0; j < 2; j = j + 1) {
                        fn capture() { return j; }
                        if (j == 0) f0 = capture;
                        if (j == 1) f1 = capture;
                    }
                    print(f0());
                    print(f1());
                `),
            ).toEqual(["2", "2"]);
        });

        test("loop variable is not visible after the loop", () => {
            const error = runtimeError(`
                for (let i = 0; i < 1; i = i + 1) {}
                print(i);
            `);
            expect(error.kind).toBe("UndefinedVariable");
        });
    });

    describe("functions", () => {
        test("return from a nested block", () => {
            expect(
                output(`
                    fn find() {
                        let i = 0;
                        while (true) {
                            {
                                if (i == 2) { return i; }
                            }
                            i = i + 1;
                        }
                    }
                    print(find());
                `),
            ).toEqual(["2"]);
        });

        test("missing return yields nil", () => {
            expect(output("fn f() {} print(f()); print(f);")).toEqual([
                "nil",
                "<fn f>",
            ]);
        });

        test("recursion", () => {
            expect(
                output(`
                    fn fib(n) {
                        if (n < 2) return n;
                        return fib(n - 1) + fib(n - 2);
                    }
                    print(fib(10));
                `),
            ).toEqual(["55"]);
        });

        test("closures share their frame", () => {
            expect(
                output(`
                    fn makeCounter() {
                        let count = 0;
                        fn increment() {
                            count = count + 1;
                            return count;
                        }
                        return increment;
                    }
                    let c = makeCounter();
                    print(c());
                    print(c());
                    let d = makeCounter();
                    print(d());
                `),
            ).toEqual(["1", "2", "1"]);
        });

        test("assignment is visible to closures over the same frame", () => {
            expect(
                output(`
                    let x = 1;
                    fn show() { print(x); }
                    x = 2;
                    show();
                `),
            ).toEqual(["2"]);
        });

        test("calling a non-callable", () => {
            const error = runtimeError(`"str"();`);

            expect(error.kind).toBe("NotCallable");
            expect(error.rawMessage).toBe(
                "can only call functions and classes, got string",
            );
        });

        test("argument count must match", () => {
            const error = runtimeError("fn f(a, b) {} f(1);");

            expect(error.kind).toBe("ArityMismatch");
            expect(error.rawMessage).toBe("f expected 2 arguments but got 1");
        });

        test("call depth is bounded", () => {
            const error = runtimeError("fn r() { return r(); } r();", {
                maxCallDepth: 50,
            });

            expect(error.kind).toBe("StackOverflow");
            expect(error.rawMessage).toBe("maximum call depth of 50 exceeded");
        });

        test("unbounded recursion is a StackOverflow at the default depth", () => {
            expect(runtimeError("fn r(n) { return r(n + 1); } r(0);").kind).toBe(
                "StackOverflow",
            );
        });
    });

    describe("natives", () => {
        const twice: NativeValue = {
            type: "native",
            name: "twice",
            arity: 1,
            call: ([x]) => (x.type === "num" ? num(x.value * 2) : NIL),
        };

        const fail: NativeValue = {
            type: "native",
            name: "fail",
            arity: 0,
            call: () => {
                throw new NativeError("boom");
            },
        };

        test("call a native", () => {
            expect(
                output("print(twice(21)); print(twice);", { natives: [twice] }),
            ).toEqual(["42", "<native fn twice>"]);
        });

        test("native failures become runtime errors at the call", () => {
            const error = runtimeError("\nfail();", { natives: [fail] });

            expect(error.kind).toBe("NativeError");
            expect(error.rawMessage).toBe("fail: boom");
            expect(error.loc?.line).toBe(2);
        });

        test("natives are checked for arity", () => {
            expect(runtimeError("twice();", { natives: [twice] }).rawMessage).toBe(
                "twice expected 1 argument but got 0",
            );
        });
    });

    describe("execution", () => {
        test("a runtime error aborts the run", () => {
            const { lines, result } = run("print(1); print(nil + 1); print(2);");

            expect(lines).toEqual(["1"]);
            expect(result.ok).toBe(false);
        });

        test("static errors prevent execution", () => {
            const { lines, result } = run("print(1); return 2;");

            expect(lines).toEqual([]);
            expect(result.diagnostics).toEqual([
                {
                    phase: "resolve",
                    message: "cannot return from top-level code",
                    line: 1,
                },
            ]);
        });

        test("parse errors are reported", () => {
            const { result } = run("print(1");

            expect(result.ok).toBe(false);
            expect(result.errors[0].phase).toBe("parse");
        });

        test("read globals after a run", () => {
            const interpreter = new Interpreter({ output: () => {} });
            const result = interpret("let r = 6 * 7;", { interpreter });

            expect(result.ok).toBe(true);
            expect(interpreter.getGlobal("r")).toEqual(num(42));
            expect(interpreter.getGlobal("nothing")).toBeUndefined();
            expect(interpreter.globalNames()).toEqual(["r"]);
        });

        test("successive runs share one interpreter", () => {
            const lines: string[] = [];
            const interpreter = new Interpreter({
                output: (line) => lines.push(line),
            });

            interpret(
                "fn makeAdder(n) { fn add(x) { return x + n; } return add; }",
                { interpreter },
            );
            const result = interpret("let add2 = makeAdder(2); print(add2(3));", {
                interpreter,
            });

            expect(result.ok).toBe(true);
            expect(lines).toEqual(["5"]);
        });

        test("errors in earlier programs show that program's source", () => {
            const interpreter = new Interpreter({ output: () => {} });
            const definition = "fn f() {\n    return nil + 1;\n}";

            interpret(definition, { interpreter });
            const result = interpret("f();", { interpreter });

            expect(result.ok).toBe(false);
            expect(result.errors[0].source).toBe(definition);
            expect(result.errors[0].loc?.line).toBe(2);
        });

        test("the caller's source is restored after a call", () => {
            const interpreter = new Interpreter({ output: () => {} });
            interpret("fn one() { return 1; }", { interpreter });

            const current = "let x = one();\nprint(x - nil);";
            const result = interpret(current, { interpreter });

            expect(result.ok).toBe(false);
            expect(result.errors[0].source).toBe(current);
            expect(result.errors[0].loc?.line).toBe(2);
        });

        test("the interpreter recovers after a runtime error", () => {
            const lines: string[] = [];
            const interpreter = new Interpreter({
                output: (line) => lines.push(line),
            });

            interpret("fn bad() { { return nil + 1; } }", { interpreter });
            expect(interpret("bad();", { interpreter }).ok).toBe(false);
            expect(interpret("let x = 1; print(x);", { interpreter }).ok).toBe(
                true,
            );
            expect(lines).toEqual(["1"]);
        });
    });
});
