export interface ServiceSpec {
    image: string;
    container_name: string;
    hostname: string;
    command: string;
    stdin_open: true;
    tty: true;
    privileged?: true;
    environment?: Record<string, string>;
    ports?: string[];
    volumes: string[];          // "source:target[:ro]" format
    networks: string[];
    labels: Record<string, string>;
    [param: string]: unknown;
}

export interface NetworkSpec {
    name: string;
    external: true;
}

/**
 * A compose document: one service per selected image on one shared network.
 */
export interface RuntimeSpec {
    name: string;
    services: Record<string, ServiceSpec>;
    networks: Record<string, NetworkSpec>;
    volumes?: Record<string, { name: string }>;
}

export type ContainerState = "running" | "created" | "restarting" | "paused" | "exited" | "dead" | "unknown";

export interface ContainerStatus {
    name: string;
    state: ContainerState;
    exitCode?: number;
    startedAt?: string;
    labels: Record<string, string>;
}

export interface CommandResult {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface RuntimeCapabilities {
    runtimeName: string;
    runtimeVersion?: string;
    composeVersion?: string;
}
