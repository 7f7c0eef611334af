import fs from "fs";
import nodePath from "path";
import yaml from "js-yaml";
import {
    CONTAINER_RUNTIMES,
    ContainerConfig,
    DEFAULT_CONFIG,
    ProjectConfig,
} from "@ypsh/core";

export const CONFIG_FILE = "ypsh.yml";
export const DEFAULT_ENTRYPOINT = "main.ypsh";

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly file: string,
    ) {
        super(message);
        this.name = "ConfigError";
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses and validates the text of a `ypsh.yml` file. An empty document
 * yields the defaults.
 */
export function parseConfig(text: string, file: string): ProjectConfig {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (e) {
        throw new ConfigError(
            `Invalid YAML: ${e instanceof Error ? e.message : String(e)}`,
            file,
        );
    }

    if (raw === undefined || raw === null) {
        return { ...DEFAULT_CONFIG, containers: {} };
    }
    if (!isRecord(raw)) {
        throw new ConfigError("Config must be a mapping", file);
    }

    const config: ProjectConfig = { containers: {}, verbose: false };

    if (raw.entrypoint !== undefined) {
        if (typeof raw.entrypoint !== "string") {
            throw new ConfigError("'entrypoint' must be a string", file);
        }
        config.entrypoint = raw.entrypoint;
    }

    if (raw.shell !== undefined) {
        if (!isRecord(raw.shell)) {
            throw new ConfigError("'shell' must be a mapping", file);
        }
        const shellPath = raw.shell.path;
        if (shellPath !== undefined && typeof shellPath !== "string") {
            throw new ConfigError("'shell.path' must be a string", file);
        }
        config.shell = { path: shellPath };
    }

    if (raw.containers !== undefined) {
        if (!isRecord(raw.containers)) {
            throw new ConfigError("'containers' must be a mapping", file);
        }
        for (const [name, entry] of Object.entries(raw.containers)) {
            config.containers[name] = parseContainer(name, entry, file);
        }
    }

    if (raw.verbose !== undefined) {
        if (typeof raw.verbose !== "boolean") {
            throw new ConfigError("'verbose' must be true or false", file);
        }
        config.verbose = raw.verbose;
    }

    return config;
}

function parseContainer(
    name: string,
    entry: unknown,
    file: string,
): ContainerConfig {
    if (!isRecord(entry)) {
        throw new ConfigError(`Container '${name}' must be a mapping`, file);
    }
    const runtime = CONTAINER_RUNTIMES.find((r) => r === entry.runtime);
    if (!runtime) {
        throw new ConfigError(
            `Container '${name}' has unknown runtime '${String(entry.runtime)}'. Available: ${CONTAINER_RUNTIMES.join(", ")}`,
            file,
        );
    }
    return { runtime };
}

/**
 * Reads `file`, or returns the defaults when it does not exist and was not
 * asked for explicitly.
 */
export function loadConfig(file: string, required: boolean = false): ProjectConfig {
    if (!fs.existsSync(file)) {
        if (required) throw new ConfigError("Config file not found", file);
        return { ...DEFAULT_CONFIG, containers: {} };
    }
    return parseConfig(fs.readFileSync(file, "utf-8"), file);
}

export interface ResolvedProject {
    entrypoint: string;
    config: ProjectConfig;
}

/**
 * Resolves what `ypsh run <path>` should execute. A directory runs the
 * entrypoint named by its config; a file picks up the config beside it.
 */
export function resolveProject(
    target: string,
    configPath?: string,
): ResolvedProject {
    const resolved = nodePath.resolve(target);
    const isDirectory =
        fs.existsSync(resolved) && fs.statSync(resolved).isDirectory();
    const projectDir = isDirectory ? resolved : nodePath.dirname(resolved);

    const config = configPath
        ? loadConfig(nodePath.resolve(configPath), true)
        : loadConfig(nodePath.join(projectDir, CONFIG_FILE));

    const entrypoint = isDirectory
        ? nodePath.join(projectDir, config.entrypoint ?? DEFAULT_ENTRYPOINT)
        : resolved;

    return { entrypoint, config };
}
