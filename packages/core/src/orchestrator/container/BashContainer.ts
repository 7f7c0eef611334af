import { spawnSync } from "child_process";
import { existsSync, statSync } from "fs";
import { homedir, platform } from "os";
import path from "path";

import {
    CommandResult,
    ICommandRunner,
    IRuntimeContainer,
} from "./IRuntimeContainer";

export interface SpawnResult {
    status: number | null;
    stdout: string;
    stderr: string;
    error?: Error;
}

export type Spawner = (
    command: string,
    args: string[],
    options: { cwd: string; env: NodeJS.ProcessEnv },
) => SpawnResult;

export interface BashContainerOptions {
    shellPath?: string;
    cwd?: string;
    spawner?: Spawner;
}

const defaultSpawner: Spawner = (command, args, options) => {
    const result = spawnSync(command, args, {
        ...options,
        encoding: "utf-8",
        maxBuffer: Infinity,
    });
    return {
        status: result.status,
        stdout: result.stdout ?? "",
        stderr: result.stderr ?? "",
        error: result.error,
    };
};

/**
 * Implements runtime container for the host shell. Also runs `$` lines,
 * keeping its own working directory so `cd` persists between them.
 */
export class BashContainer implements IRuntimeContainer, ICommandRunner {
    private shellCmd: string;
    private shellArgs: string[] = [];
    private spawner: Spawner;
    private currentDir: string;

    constructor(options: BashContainerOptions = {}) {
        this.shellCmd = options.shellPath ?? "/bin/sh";
        this.spawner = options.spawner ?? defaultSpawner;
        this.currentDir = options.cwd ?? process.cwd();
    }

    public get cwd(): string {
        return this.currentDir;
    }

    // Detects available shell interpreter on the current platform
    init(): void {
        const plat = platform();

        if (plat !== "win32") {
            return;
        }

        const gitBashPaths = [
            "C:\\Program Files\\Git\\bin\\bash.exe",
            "C:\\Program Files (x86)\\Git\\bin\\bash.exe",
            process.env.PROGRAMFILES + "\\Git\\bin\\bash.exe",
        ];

        for (const candidate of gitBashPaths) {
            if (existsSync(candidate)) {
                this.shellCmd = candidate;
                this.shellArgs = [];
                return;
            }
        }

        this.shellCmd = "wsl";
        this.shellArgs = ["bash"];
    }

    runCommand(command: string): CommandResult {
        const cd = /^cd(?:\s+(.*))?$/.exec(command.trim());
        if (cd) {
            return this.changeDirectory(cd[1]?.trim() ?? "");
        }
        return this.spawn(command, {});
    }

    executeSync(code: string, context: Record<string, unknown>): unknown {
        const result = this.spawn(code, context);

        if (result.code !== 0) {
            throw new Error(
                result.stderr.trim() || `Command failed with code ${result.code}`,
            );
        }

        return result.stdout.trim();
    }

    destroy(): void {
        // nothing to destroy
    }

    private spawn(
        code: string,
        context: Record<string, unknown>,
    ): CommandResult {
        const result = this.spawner(
            this.shellCmd,
            [...this.shellArgs, "-c", code],
            { cwd: this.currentDir, env: this.createEnv(context) },
        );

        if (result.error) {
            return { code: 127, stdout: "", stderr: `${result.error.message}\n` };
        }

        return {
            code: result.status ?? 1,
            stdout: result.stdout,
            stderr: result.stderr,
        };
    }

    private changeDirectory(rawTarget: string): CommandResult {
        const unquoted = rawTarget.replace(/^(["'])(.*)\1$/, "$2");
        const target = unquoted === "" || unquoted === "~"
            ? homedir()
            : unquoted.replace(/^~(?=\/)/, homedir());
        const resolved = path.resolve(this.currentDir, target);

        if (!existsSync(resolved) || !statSync(resolved).isDirectory()) {
            return {
                code: 1,
                stdout: "",
                stderr: `cd: ${unquoted}: No such file or directory\n`,
            };
        }

        this.currentDir = resolved;
        return { code: 0, stdout: "", stderr: "" };
    }

    private createEnv(context: Record<string, unknown>): NodeJS.ProcessEnv {
        const env: NodeJS.ProcessEnv = { ...process.env };
        for (const [key, value] of Object.entries(context)) {
            if (typeof value === "object" && value !== null) {
                env[key] = JSON.stringify(value);
            } else {
                env[key] = String(value ?? "");
            }
        }
        return env;
    }
}
