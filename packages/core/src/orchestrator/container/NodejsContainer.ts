import vm from "vm";
import chalk from "chalk";

import { IRuntimeContainer } from "./IRuntimeContainer";
import { OutputSink, processOutput } from "../../utils/output";

export interface NodejsContainerOptions {
    output?: OutputSink;
    verbose?: boolean;
}

/**
 * Implements runtime container for JavaScript. Each block runs in a fresh
 * `vm` context as a function body, so `return` hands a value back. Context
 * attributes are exposed as globals.
 */
export class NodejsContainer implements IRuntimeContainer {
    private output: OutputSink;
    private verbose: boolean;

    constructor(
        private name: string,
        options: NodejsContainerOptions = {},
    ) {
        this.output = options.output ?? processOutput;
        this.verbose = options.verbose ?? false;
    }

    init(): void {
        // nothing to prepare, contexts are created per execution
    }

    executeSync(code: string, context: Record<string, unknown>): unknown {
        const format = (args: unknown[]) =>
            args.map(formatLogArg).join(" ") + "\n";
        const write = (...args: unknown[]) => this.output.write(format(args));
        const error = (...args: unknown[]) => this.output.error(format(args));
        const sandbox: Record<string, unknown> = {
            ...context,
            console: { log: write, info: write, warn: error, error },
        };

        if (this.verbose) {
            console.log(
                chalk.dim(
                    `[${this.name}] Executing ${code.trim().split("\n").length} line(s)`,
                ),
            );
        }

        return vm.runInNewContext(`(function() {\n${code}\n})()`, sandbox, {
            filename: `<${this.name}>`,
        });
    }

    destroy(): void {
        // nothing to destroy
    }
}

function formatLogArg(arg: unknown): string {
    if (typeof arg === "string") return arg;
    if (typeof arg === "object" && arg !== null) {
        try {
            return JSON.stringify(arg);
        } catch {
            return String(arg);
        }
    }
    return String(arg);
}
