import chalk from "chalk";
import type { Argv } from "yargs";
import { Orchestrator, startRepl } from "@ypsh/core";

import { CONFIG_FILE, ConfigError, loadConfig } from "../config";
import { fileModuleLoader } from "../moduleLoader";

export interface ReplArgs {
    verbose?: boolean;
}

export const command = "repl";
export const describe = "Start an interactive session";

export function builder(yargs: Argv) {
    return yargs.option("verbose", {
        describe: "Log container activity",
        type: "boolean",
    });
}

export async function handler(argv: ReplArgs): Promise<void> {
    let orchestrator: Orchestrator;
    try {
        const config = loadConfig(CONFIG_FILE);
        orchestrator = new Orchestrator({
            containers: config.containers,
            shellPath: config.shell?.path,
            verbose: argv.verbose ?? config.verbose,
        });
    } catch (e) {
        if (!(e instanceof ConfigError)) throw e;
        console.error(chalk.red(`Error in ${e.file}: `) + e.message);
        process.exitCode = 1;
        return;
    }

    orchestrator.init();
    try {
        await startRepl({ orchestrator, moduleLoader: fileModuleLoader });
    } finally {
        orchestrator.destroy();
    }
}
