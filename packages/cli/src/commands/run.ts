import chalk from "chalk";
import { ArgumentsCamelCase, CommandModule } from "yargs";
import { compile, Interpreter, RiftError } from "@rift/core";
import { registerStdlib } from "@rift/library";
import { resolveRunTarget, writeErrorLog } from "../utils";

interface RunArgs {
    path: string;
}

export const runCommand: CommandModule<{}, RunArgs> = {
    command: "run <path>",
    describe: "Run a Rift file or project",
    builder: (yargs) =>
        yargs.positional("path", {
            describe: "Source file, or a project directory with rift.yml",
            type: "string",
            demandOption: true,
        }),
    handler: async (argv: ArgumentsCamelCase<RunArgs>) => {
        const fs = await import("node:fs/promises");

        let entrypoint: string | undefined;

        try {
            const target = resolveRunTarget(argv.path);
            entrypoint = target.entrypoint;
            const code = await fs.readFile(entrypoint, "utf-8");

            const interpreter = new Interpreter({
                maxCallDepth: target.config?.maxCallDepth,
            });
            if (target.config?.stdlib ?? true) {
                registerStdlib(interpreter);
            }

            // Static analysis; nothing runs if it fails
            const result = compile(code, {
                knownGlobals: interpreter.globalNames(),
            });
            if (result.errors.length > 0) {
                for (const error of result.errors) {
                    console.error(error.message);
                }
                const count = result.errors.length;
                console.error(
                    chalk.red(`\nFound ${count} error${count === 1 ? "" : "s"}.`),
                );

                const logPath = writeErrorLog(target.projectDir, result.errors);
                console.error(chalk.gray(`Log written to ${logPath}`));
                process.exit(1);
            }

            interpreter.interpret(result.ast, result.resolution, code);
        } catch (e) {
            if (e instanceof RiftError) {
                console.error(e.message, "\n");
                process.exit(1);
            }

            const fileLocation = entrypoint ? ` in ${entrypoint}` : "";
            const message = e instanceof Error ? e.message : String(e);
            console.error(chalk.red(`Error${fileLocation}: `), message, "\n");
            process.exit(1);
        }
    },
};
