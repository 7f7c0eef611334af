#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import * as runCommand from "./commands/run";
import * as replCommand from "./commands/repl";
import * as checkCommand from "./commands/check";

void yargs(hideBin(process.argv))
    .scriptName("ypsh")
    .usage("$0 <cmd> [args]")
    .command(
        runCommand.command,
        runCommand.describe,
        runCommand.builder,
        runCommand.handler,
    )
    .command(
        replCommand.command,
        replCommand.describe,
        replCommand.builder,
        replCommand.handler,
    )
    .command(
        checkCommand.command,
        checkCommand.describe,
        checkCommand.builder,
        checkCommand.handler,
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
