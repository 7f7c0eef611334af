export interface IRuntimeContainer {
    /**
     * Initialize runtime container
     */
    init(): void;

    /**
     * Execute code inside container, blocking until it finishes
     * @param code to execute
     * @param context variables passed into code
     */
    executeSync(code: string, context: Record<string, unknown>): unknown;

    /**
     * Stop and destroy runtime container
     */
    destroy(): void;
}

export interface CommandResult {
    code: number;
    stdout: string;
    stderr: string;
}

/**
 * Runs `$` lines and `shell.run()` commands.
 */
export interface ICommandRunner {
    readonly cwd: string;
    runCommand(command: string): CommandResult;
}
