import chalk from "chalk";
import { ArgumentsCamelCase, CommandModule } from "yargs";

const DEFAULT_CONFIG = `entrypoint: "main.rf"
# maxCallDepth: 512
# stdlib: true
`;

const DEFAULT_MAIN = `class Greeter {
    init(name) {
        this.name = name;
    }

    greet() {
        print("Hello, " + this.name + "!");
    }
}

Greeter("Rift").greet();
`;

interface InitArgs {
    name: string;
}

export const initCommand: CommandModule<{}, InitArgs> = {
    command: "init <name>",
    describe: "Initialize a new Rift project",
    builder: (yargs) =>
        yargs.positional("name", {
            describe: "Name of the new project directory",
            type: "string",
            demandOption: true,
        }),
    handler: async (argv: ArgumentsCamelCase<InitArgs>) => {
        const fs = await import("node:fs/promises");
        const nodePath = await import("node:path");

        const name = argv.name;
        const projectDir = nodePath.resolve(name);

        try {
            await fs.mkdir(projectDir, { recursive: true });
            console.log(chalk.green(`Created directory ${name}/`));

            await fs.writeFile(nodePath.join(projectDir, ".gitignore"), ".rift\n");
            console.log(chalk.gray(`Created ${name}/.gitignore`));

            await fs.writeFile(
                nodePath.join(projectDir, "rift.yml"),
                DEFAULT_CONFIG,
            );
            console.log(chalk.gray(`Created ${name}/rift.yml`));

            await fs.writeFile(nodePath.join(projectDir, "main.rf"), DEFAULT_MAIN);
            console.log(chalk.gray(`Created ${name}/main.rf`));

            console.log(
                chalk.green(`\nProject '${name}' initialized successfully!`),
            );
            console.log(chalk.white(`Run with: rift run ${name}`));
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            console.error(chalk.red(`Failed to initialize project: ${message}`));
            process.exit(1);
        }
    },
};
