#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runCommand } from "./commands/run";
import { replCommand } from "./commands/repl";
import { initCommand } from "./commands/init";

yargs(hideBin(process.argv))
    .scriptName("rift")
    .usage("$0 <cmd> [args]")
    .command(runCommand)
    .command(replCommand)
    .command(initCommand)
    .demandCommand(1, "Specify a command: run, repl or init")
    .strict()
    .help()
    .parse();
