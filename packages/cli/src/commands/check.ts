import fs from "fs";
import nodePath from "path";
import chalk from "chalk";
import type { Argv } from "yargs";
import { Lexer, Parser, Scanner, YpshError } from "@ypsh/core";

export interface CheckArgs {
    file: string;
}

export const command = "check <file>";
export const describe = "Report syntax errors and undeclared names without running";

export function builder(yargs: Argv) {
    return yargs.positional("file", {
        describe: "Script to check",
        type: "string",
        demandOption: true,
    });
}

export function handler(argv: CheckArgs): void {
    const file = nodePath.resolve(argv.file);
    const source = fs.readFileSync(file, "utf-8");

    let errors: YpshError[];
    try {
        const ast = new Parser(new Lexer(source).tokenize(), source).parse();
        errors = new Scanner(source, file).scan(ast).errors;
    } catch (e) {
        if (!(e instanceof YpshError)) throw e;
        console.error(e.attach(undefined, source, file).format());
        process.exitCode = 2;
        return;
    }

    for (const error of errors) {
        console.error(error.format());
    }

    if (errors.length > 0) {
        console.error(chalk.red(`\nFound ${errors.length} error${errors.length === 1 ? "" : "s"}.`));
        process.exitCode = 1;
        return;
    }

    console.log(chalk.green(`${argv.file}: no problems found.`));
}
