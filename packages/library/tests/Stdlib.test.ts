import {
    interpret,
    InterpretOptions,
    Interpreter,
    num,
    RiftRuntimeError,
    str,
} from "@rift/core";
import { createInput, packages, registerStdlib, stdlib } from "../src";

describe("Standard library", () => {
    function run(source: string, options: InterpretOptions = {}) {
        const lines: string[] = [];
        const result = interpret(source, {
            output: (line) => lines.push(line),
            natives: stdlib,
            ...options,
        });
        return { lines, result };
    }

    function output(source: string): string[] {
        const { lines, result } = run(source);
        expect(result.errors.map((e) => e.rawMessage)).toEqual([]);
        return lines;
    }

    function nativeError(source: string): string {
        const error = run(source).result.errors[0];
        if (!(error instanceof RiftRuntimeError)) {
            throw new Error(`expected a runtime error, got ${String(error)}`);
        }
        expect(error.kind).toBe("NativeError");
        return error.rawMessage;
    }

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("register every native", () => {
        const interpreter = new Interpreter();
        registerStdlib(interpreter);

        expect(interpreter.globalNames().sort()).toEqual([
            "clock",
            "input",
            "len",
            "num",
            "str",
            "type",
        ]);
    });

    test("arity comes from the signature", () => {
        expect(packages["rift/time"].clock.arity).toBe(0);
        expect(packages["rift/strings"].len.arity).toBe(1);
    });

    test("clock returns seconds", () => {
        jest.spyOn(Date, "now").mockReturnValue(1500);

        expect(packages["rift/time"].clock.call([])).toEqual(num(1.5));
        expect(output("print(clock());")).toEqual(["1.5"]);
    });

    test("len", () => {
        expect(output(`print(len("hello")); print(len(""));`)).toEqual([
            "5",
            "0",
        ]);
        expect(nativeError("len(1);")).toBe("len: expected a string, got number");
    });

    test("len counts characters outside the BMP once", () => {
        const { len } = packages["rift/strings"];
        expect(len.call([str("\u{1F600}")])).toEqual(num(1));
        expect(len.call([str("a\u{1F600}b")])).toEqual(num(3));
    });

    test("str", () => {
        expect(
            output(`
                print(str(12) + "!");
                print(str(nil));
                print(str(true) + str(2.5));
            `),
        ).toEqual(["12!", "nil", "true2.5"]);
    });

    test("num", () => {
        expect(output(`print(num("3.5") + 1); print(num(" 42 "));`)).toEqual([
            "4.5",
            "42",
        ]);
        expect(nativeError(`num("abc");`)).toBe(
            'num: cannot convert "abc" to a number',
        );
        expect(nativeError(`num("");`)).toBe('num: cannot convert "" to a number');
        expect(output(`print(num("-1e3")); print(num(".5")); print(num("+2."));`)).toEqual([
            "-1000",
            "0.5",
            "2",
        ]);
        expect(nativeError(`num("0x10");`)).toBe(
            'num: cannot convert "0x10" to a number',
        );
        expect(nativeError(`num("0b1");`)).toBe(
            'num: cannot convert "0b1" to a number',
        );
        expect(nativeError("num(1);")).toBe("num: expected a string, got number");
    });

    test("type", () => {
        expect(
            output(`
                class Cat {}
                print(type(nil));
                print(type(true));
                print(type(1));
                print(type("s"));
                print(type(Cat()));
                print(type(Cat));
                print(type(len));
            `),
        ).toEqual([
            "nil",
            "bool",
            "number",
            "string",
            "Cat",
            "function",
            "function",
        ]);
    });

    test("input writes the prompt and reads a line", () => {
        const written: string[] = [];
        const input = createInput(
            () => "Ada",
            (text) => written.push(text),
        );

        const { lines, result } = run(
            `let name = input("Name? "); print("Hi " + name);`,
            { natives: [input] },
        );

        expect(result.ok).toBe(true);
        expect(written).toEqual(["Name? "]);
        expect(lines).toEqual(["Hi Ada"]);
    });

    test("input yields nil at end of input", () => {
        const input = createInput(
            () => null,
            () => {},
        );

        const { lines } = run(`print(input(">"));`, { natives: [input] });
        expect(lines).toEqual(["nil"]);
    });
});
