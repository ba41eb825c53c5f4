import * as readline from "readline";
import chalk from "chalk";
import { CommandModule } from "yargs";
import { compile, Interpreter, RiftError } from "@rift/core";
import { registerStdlib } from "@rift/library";

export const PROMPT = "> ";
export const CONTINUATION_PROMPT = "... ";

export type FeedResult = "ran" | "continue" | "exit";

export interface ReplOptions {
    output?: (line: string) => void;
    error?: (text: string) => void;
    stdlib?: boolean;
}

/**
 * Line-at-a-time evaluation against one interpreter. Input that ends
 * mid-statement is buffered until a later line completes it.
 */
export class ReplSession {
    public readonly interpreter: Interpreter;
    private buffer: string[] = [];
    private error: (text: string) => void;

    constructor(options: ReplOptions = {}) {
        this.interpreter = new Interpreter({ output: options.output });
        this.error = options.error ?? ((text) => console.error(text));
        if (options.stdlib ?? true) {
            registerStdlib(this.interpreter);
        }
    }

    public get prompt(): string {
        return this.buffer.length > 0 ? CONTINUATION_PROMPT : PROMPT;
    }

    public feed(line: string): FeedResult {
        if (this.buffer.length === 0) {
            const command = line.trim();
            if (command === "exit" || command === "quit") return "exit";
            if (command === "") return "ran";
        }

        this.buffer.push(line);
        const source = this.buffer.join("\n");
        const result = compile(source, {
            knownGlobals: this.interpreter.globalNames(),
        });
        if (result.incomplete) return "continue";

        this.buffer = [];
        if (result.errors.length > 0) {
            for (const error of result.errors) {
                this.error(error.message);
            }
            return "ran";
        }

        try {
            this.interpreter.interpret(result.ast, result.resolution, source);
        } catch (e) {
            if (!(e instanceof RiftError)) throw e;
            this.error(e.message);
        }
        return "ran";
    }
}

export const replCommand: CommandModule = {
    command: "repl",
    describe: "Start an interactive Rift session",
    handler: () => {
        const session = new ReplSession();
        const rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
        });

        console.log(chalk.gray("Rift REPL. Type 'exit' to leave."));
        rl.setPrompt(session.prompt);
        rl.prompt();

        rl.on("line", (line) => {
            if (session.feed(line) === "exit") {
                rl.close();
                return;
            }
            rl.setPrompt(session.prompt);
            rl.prompt();
        });
    },
};
