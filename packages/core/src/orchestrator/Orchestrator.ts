import chalk from "chalk";

import { IRuntimeContainer } from "./container/IRuntimeContainer";
import { BashContainer, Spawner } from "./container/BashContainer";
import { NodejsContainer } from "./container/NodejsContainer";
import { ContainerConfig } from "./Config";
import { OutputSink, processOutput } from "../utils/output";
import { YpshError } from "../utils/Error";

export interface OrchestratorOptions {
    containers?: Record<string, ContainerConfig>;
    shellPath?: string;
    cwd?: string;
    verbose?: boolean;
    output?: OutputSink;
    spawner?: Spawner;
}

/**
 * Registry of the containers `<name> ... </name>` blocks run in. `js` and
 * `sh` are always present; config can add more names.
 */
export class Orchestrator {
    private containers: Map<string, IRuntimeContainer> = new Map();
    private verbose: boolean;

    /** Shared by `$` lines, `shell.run()` and `bash` containers. */
    public readonly shell: BashContainer;

    constructor(options: OrchestratorOptions = {}) {
        this.verbose = options.verbose ?? false;
        const output = options.output ?? processOutput;

        this.shell = new BashContainer({
            shellPath: options.shellPath,
            cwd: options.cwd,
            spawner: options.spawner,
        });

        const containers: Record<string, ContainerConfig> = {
            js: { runtime: "nodejs" },
            sh: { runtime: "bash" },
            ...options.containers,
        };

        for (const [name, containerConfig] of Object.entries(containers)) {
            if (containerConfig.runtime === "nodejs") {
                this.containers.set(
                    name,
                    new NodejsContainer(name, { output, verbose: this.verbose }),
                );
            } else if (containerConfig.runtime === "bash") {
                this.containers.set(name, this.shell);
            } else {
                console.log(
                    chalk.red(
                        `[Orchestrator] Unknown runtime: ${String(containerConfig.runtime)}. Available: nodejs, bash.\n`,
                    ),
                );

                throw new Error("Unsupported runtime");
            }
        }
    }

    public init(): void {
        this.log(chalk.bold.magenta("[Orchestrator] Spinning up all containers..."));

        // The shell may back several names, init it once
        for (const container of new Set(this.containers.values())) {
            container.init();
        }

        this.log(
            chalk.bold.magenta(
                `[Orchestrator] Containers ready: ${this.names().join(", ")}`,
            ),
        );
    }

    public names(): string[] {
        return [...this.containers.keys()];
    }

    public has(containerName: string): boolean {
        return this.containers.has(containerName);
    }

    public execute(
        containerName: string,
        code: string,
        context: Record<string, unknown>,
    ): unknown {
        const container = this.containers.get(containerName);

        if (!container) {
            throw new YpshError(
                "ForeignExecutionError",
                `Container '${containerName}' not found`,
                undefined,
                { hint: `Available containers: ${this.names().join(", ")}` },
            );
        }

        this.log(chalk.yellow(`[${containerName}] Executing block...`));
        return container.executeSync(code, context);
    }

    public destroy(): void {
        for (const container of new Set(this.containers.values())) {
            container.destroy();
        }

        this.log(chalk.bold.magenta("[Orchestrator] All containers destroyed."));
    }

    private log(message: string) {
        if (this.verbose) console.log(message);
    }
}
