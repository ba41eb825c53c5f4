import { CONTINUATION_PROMPT, PROMPT, ReplSession } from "../src/commands/repl";

describe("ReplSession", () => {
    function session(options: { stdlib?: boolean } = {}) {
        const lines: string[] = [];
        const errors: string[] = [];
        const repl = new ReplSession({
            output: (line) => lines.push(line),
            error: (text) => errors.push(text),
            ...options,
        });
        return { repl, lines, errors };
    }

    test("keep state between inputs", () => {
        const { repl, lines } = session();

        expect(repl.feed("let x = 1;")).toBe("ran");
        expect(repl.feed("print(x + 1);")).toBe("ran");
        expect(lines).toEqual(["2"]);
    });

    test("buffer input until it is complete", () => {
        const { repl, lines } = session();

        expect(repl.feed("fn add(a, b) {")).toBe("continue");
        expect(repl.prompt).toBe(CONTINUATION_PROMPT);
        expect(repl.feed("return a + b;")).toBe("continue");
        expect(repl.feed("}")).toBe("ran");
        expect(repl.prompt).toBe(PROMPT);

        repl.feed("print(add(2, 3));");
        expect(lines).toEqual(["5"]);
    });

    test("strings may continue on the next line", () => {
        const { repl, lines } = session();

        expect(repl.feed('print("a')).toBe("continue");
        expect(repl.feed('b");')).toBe("ran");
        expect(lines).toEqual(["a\nb"]);
    });

    test("report errors and continue", () => {
        const { repl, lines, errors } = session();

        repl.feed("print(nope);");
        repl.feed("print(1 +);");
        repl.feed('print("ok");');

        expect(errors).toHaveLength(2);
        expect(errors[0]).toContain("undefined variable 'nope'");
        expect(errors[1]).toContain("Expected expression");
        expect(lines).toEqual(["ok"]);
    });

    test("redeclare globals across inputs", () => {
        const { repl, lines } = session();

        repl.feed("let a = 1;");
        repl.feed("let a = a + 1;");
        repl.feed("print(a);");
        expect(lines).toEqual(["2"]);
    });

    test("exit and quit leave the session", () => {
        const { repl } = session();

        expect(repl.feed("exit")).toBe("exit");
        expect(repl.feed("  quit ")).toBe("exit");
        expect(repl.feed("")).toBe("ran");
    });

    test("standard library can be left out", () => {
        expect(session().repl.interpreter.getGlobal("clock")?.type).toBe("native");
        expect(
            session({ stdlib: false }).repl.interpreter.getGlobal("clock"),
        ).toBeUndefined();
    });
});
