import fs from "fs";
import chalk from "chalk";
import type { Argv } from "yargs";
import { ExitOutcome, Orchestrator, run } from "@ypsh/core";

import { ConfigError, resolveProject } from "../config";
import { fileModuleLoader } from "../moduleLoader";

export interface RunArgs {
    path?: string;
    config?: string;
    verbose?: boolean;
}

export const command = "run [path]";
export const describe = "Run a YPSH script or project directory";

export function builder(yargs: Argv) {
    return yargs
        .positional("path", {
            describe: "Script file, or a project directory with ypsh.yml",
            type: "string",
            default: ".",
        })
        .option("config", {
            describe: "Path to a ypsh.yml to use instead of the one beside the script",
            type: "string",
        })
        .option("verbose", {
            describe: "Log container activity",
            type: "boolean",
        });
}

export function handler(argv: RunArgs): void {
    let entrypoint: string | undefined;

    try {
        const project = resolveProject(argv.path ?? ".", argv.config);
        entrypoint = project.entrypoint;
        const source = fs.readFileSync(entrypoint, "utf-8");

        const orchestrator = new Orchestrator({
            containers: project.config.containers,
            shellPath: project.config.shell?.path,
            verbose: argv.verbose ?? project.config.verbose,
        });
        orchestrator.init();

        let outcome: ExitOutcome;
        try {
            outcome = run(source, entrypoint, {
                orchestrator,
                moduleLoader: fileModuleLoader,
            });
        } finally {
            orchestrator.destroy();
        }

        if (!outcome.ok) process.exitCode = outcome.exitCode;
    } catch (e) {
        if (e instanceof ConfigError) {
            console.error(chalk.red(`Error in ${e.file}: `) + e.message);
        } else {
            const fileLocation = entrypoint ? ` in ${entrypoint}` : "";
            console.error(
                chalk.red(`Error${fileLocation}: `),
                e instanceof Error ? e.message : String(e),
            );
        }
        process.exitCode = 1;
    }
}
