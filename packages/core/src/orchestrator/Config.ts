export interface ProjectConfig {
    entrypoint?: string;
    shell?: { path?: string };
    containers: Record<string, ContainerConfig>;
    verbose: boolean;
}

export interface ContainerConfig {
    runtime: ContainerRuntime;
}

export const CONTAINER_RUNTIMES = ["nodejs", "bash"] as const;

export type ContainerRuntime = (typeof CONTAINER_RUNTIMES)[number];

export const DEFAULT_CONFIG: ProjectConfig = {
    containers: {},
    verbose: false,
};
