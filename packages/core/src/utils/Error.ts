import chalk from "chalk";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
    endLine?: number;
    endCol?: number;
}

export type ErrorPhase = "lex" | "parse" | "resolve" | "runtime";

export type RuntimeErrorKind =
    | "TypeError"
    | "UndefinedVariable"
    | "UndefinedProperty"
    | "NotCallable"
    | "ArityMismatch"
    | "StackOverflow"
    | "NativeError";

/**
 * Structured form of an error, handed to whatever reports diagnostics
 * (the CLI prints them, the REPL prints and continues).
 */
export interface Diagnostic {
    phase: ErrorPhase;
    message: string;
    line: number;
}

/**
 * Renders an error pointing at a location in the source code.
 *
 * Error: [message]
 *    --> line [line]:[col]
 *     |
 * 10  | let x = y;
 *     |         ^
 *     |
 *     = [hint]
 */
function formatError(
    label: string,
    message: string,
    loc?: ErrorLocation,
    source?: string,
    hint?: string,
): string {
    const errorHeader = `${chalk.red.bold(label + ":")} ${chalk.bold(message)}`;
    if (!loc) {
        return errorHeader;
    }

    const lines = source ? source.split("\n") : [];
    const lineContent = lines[loc.line - 1] ?? "";

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);

    const locationLine = `${chalk.blue(padding)} ${chalk.blue("-->")} line ${loc.line}:${loc.col}`;
    const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
    const codeLine = `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`;

    const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
    const underlineLen = Math.max(1, loc.len || 1);
    const pointer = chalk.red.bold("^".repeat(underlineLen));
    const pointerLine = `${chalk.blue(padding)} ${chalk.blue("|")} ${pointerSpace}${pointer}`;

    const output = [errorHeader, locationLine];
    if (source) {
        output.push(pipeLine, codeLine, pointerLine, pipeLine);
    }

    if (hint) {
        output.push(`${chalk.blue(padding)} ${chalk.blue("=")} ${hint}`);
    }

    return "\n" + output.join("\n");
}

export class RiftError extends Error {
    public rawMessage: string;
    public phase: ErrorPhase;
    public loc?: ErrorLocation;
    public source?: string;
    public hint?: string;

    constructor(
        phase: ErrorPhase,
        message: string,
        loc?: ErrorLocation,
        source?: string,
        hint?: string,
        label: string = "Error",
    ) {
        super(formatError(label, message, loc, source, hint));
        this.name = "RiftError";
        this.rawMessage = message;
        this.phase = phase;
        this.loc = loc;
        this.source = source;
        this.hint = hint;
    }

    public toDiagnostic(): Diagnostic {
        return {
            phase: this.phase,
            message: this.rawMessage,
            line: this.loc?.line ?? 0,
        };
    }
}

export class RiftRuntimeError extends RiftError {
    public kind: RuntimeErrorKind;

    constructor(
        kind: RuntimeErrorKind,
        message: string,
        loc?: ErrorLocation,
        source?: string,
        hint?: string,
    ) {
        super("runtime", message, loc, source, hint, kind);
        this.name = "RiftRuntimeError";
        this.kind = kind;
    }

    /**
     * Errors raised away from the AST (by Environment, or by a native) carry
     * no location; the interpreter pins them to the node that observed them.
     */
    public located(
        loc: ErrorLocation,
        source?: string,
        hint?: string,
    ): RiftRuntimeError {
        if (this.loc) return this;
        return new RiftRuntimeError(
            this.kind,
            this.rawMessage,
            loc,
            source,
            hint ?? this.hint,
        );
    }
}

/**
 * Thrown by native function implementations to report a failure to the
 * calling program.
 */
export class NativeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "NativeError";
    }
}

export function makeError(
    phase: ErrorPhase,
    source: string,
    loc: ErrorLocation,
    message: string,
    hint?: string,
): RiftError {
    return new RiftError(phase, message, loc, source, hint);
}
