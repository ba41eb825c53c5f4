import { Lexer } from "./lexer/Lexer";
import { Parser } from "./parser/Parser";
import { Resolution, Resolver } from "./resolver/Resolver";
import { Interpreter } from "./interpreter/Interpreter";
import { NativeValue } from "./interpreter/values";
import { AST } from "./types/ast";
import { Diagnostic, RiftError } from "./utils/Error";

export { Lexer } from "./lexer/Lexer";
export { Parser } from "./parser/Parser";
export * from "./resolver/Resolver";
export * from "./interpreter/Interpreter";
export { Environment } from "./interpreter/Environment";
export * from "./interpreter/values";
export { TokenType } from "./types/token";
export type { Token } from "./types/token";
export * from "./parser/types";
export * from "./parser/statements";
export * from "./config/Config";
export * from "./utils/Error";

export interface CompileOptions {
    /** Globals defined before this source runs, see ResolverOptions. */
    knownGlobals?: Iterable<string>;
}

export interface CompileResult {
    ast: AST;
    resolution: Resolution;
    errors: RiftError[];
    /** The source ended early; more input could complete it. */
    incomplete: boolean;
}

/**
 * Lexes, parses and resolves a program. Stops after the first phase that
 * reports errors.
 */
export function compile(
    source: string,
    options: CompileOptions = {},
): CompileResult {
    const lexer = new Lexer(source);
    const tokens = lexer.tokenize();
    if (lexer.errors.length > 0) {
        return {
            ast: { statements: [] },
            resolution: new Map(),
            errors: lexer.errors,
            incomplete: lexer.incomplete,
        };
    }

    const parser = new Parser(tokens, source);
    const ast = parser.parse();
    if (parser.errors.length > 0) {
        return {
            ast,
            resolution: new Map(),
            errors: parser.errors,
            incomplete: parser.incomplete,
        };
    }

    const resolver = new Resolver(source, {
        knownGlobals: options.knownGlobals,
    });
    const { resolution, errors } = resolver.resolve(ast);
    return { ast, resolution, errors, incomplete: false };
}

export interface InterpretOptions {
    output?: (line: string) => void;
    natives?: NativeValue[];
    maxCallDepth?: number;
    /** Run against an existing interpreter, keeping its globals. */
    interpreter?: Interpreter;
}

export interface InterpretResult {
    ok: boolean;
    errors: RiftError[];
    diagnostics: Diagnostic[];
}

/**
 * Compiles and runs a program. Static errors prevent execution; a runtime
 * error stops it. Either way the errors are returned, not thrown.
 */
export function interpret(
    source: string,
    options: InterpretOptions = {},
): InterpretResult {
    const interpreter =
        options.interpreter ??
        new Interpreter({
            output: options.output,
            natives: options.natives,
            maxCallDepth: options.maxCallDepth,
        });
    if (options.interpreter) {
        for (const native of options.natives ?? []) {
            interpreter.defineNative(native);
        }
    }

    const { ast, resolution, errors } = compile(source, {
        knownGlobals: interpreter.globalNames(),
    });
    if (errors.length > 0) {
        return failed(errors);
    }

    try {
        interpreter.interpret(ast, resolution, source);
    } catch (e) {
        if (e instanceof RiftError) {
            return failed([e]);
        }
        throw e;
    }

    return { ok: true, errors: [], diagnostics: [] };
}

function failed(errors: RiftError[]): InterpretResult {
    return {
        ok: false,
        errors,
        diagnostics: errors.map((e) => e.toDiagnostic()),
    };
}
