type ParamKind = "string" | "number" | "boolean" | "list" | "map";

interface ParamSpec {
    kinds: readonly ParamKind[];
    description: string;
}

/**
 * Compose service keys an image block may carry on top of the catalog's own fields.
 * They are copied to the generated service unchanged.
 */
export const COMPOSE_PASSTHROUGH_PARAMS: Readonly<Record<string, ParamSpec>> = {
    extra_hosts: { kinds: [ "map", "list" ],
        description: "Add hostname mappings" },
    dns: { kinds: [ "list", "string" ],
        description: "Custom DNS servers" },
    dns_search: { kinds: [ "list", "string" ],
        description: "Custom DNS search domains" },
    mac_address: { kinds: [ "string" ],
        description: "Container MAC address" },
    cap_add: { kinds: [ "list" ],
        description: "Add Linux capabilities" },
    cap_drop: { kinds: [ "list" ],
        description: "Drop Linux capabilities" },
    security_opt: { kinds: [ "list" ],
        description: "Security options" },
    user: { kinds: [ "string" ],
        description: "Username or UID" },
    mem_limit: { kinds: [ "string", "number" ],
        description: "Memory limit" },
    memswap_limit: { kinds: [ "string", "number" ],
        description: "Swap limit" },
    shm_size: { kinds: [ "string", "number" ],
        description: "Size of /dev/shm" },
    cpu_shares: { kinds: [ "number" ],
        description: "CPU shares (relative weight)" },
    pids_limit: { kinds: [ "number" ],
        description: "Container pids limit" },
    oom_kill_disable: { kinds: [ "boolean" ],
        description: "Disable OOM killer" },
    pid: { kinds: [ "string" ],
        description: "PID namespace" },
    ipc: { kinds: [ "string" ],
        description: "IPC mode" },
    init: { kinds: [ "boolean" ],
        description: "Run an init inside the container" },
    tmpfs: { kinds: [ "list", "string" ],
        description: "Mount tmpfs directories" },
    devices: { kinds: [ "list" ],
        description: "Device mappings" },
    sysctls: { kinds: [ "map", "list" ],
        description: "Kernel parameters" },
    ulimits: { kinds: [ "map" ],
        description: "Ulimit options" },
    read_only: { kinds: [ "boolean" ],
        description: "Read-only root filesystem" },
    working_dir: { kinds: [ "string" ],
        description: "Working directory inside the container" },
    runtime: { kinds: [ "string" ],
        description: "OCI runtime" },
    healthcheck: { kinds: [ "map" ],
        description: "Healthcheck configuration" },
    logging: { kinds: [ "map" ],
        description: "Logging configuration" },
    group_add: { kinds: [ "list" ],
        description: "Additional groups for the container user" },
    userns_mode: { kinds: [ "string" ],
        description: "User namespace" },
    network_mode: { kinds: [ "string" ],
        description: "Network mode" },
    storage_opt: { kinds: [ "map" ],
        description: "Storage driver options" },
};

/** Keys the catalog itself interprets. */
export const CATALOG_KEYS: ReadonlySet<string> = new Set([
    "image", "category", "description", "shell", "keep_alive_cmd",
    "privileged", "volumes", "ports", "environment", "scripts", "motd",
    "replace",
]);

/** Keys generated for every service; setting them in a catalog has no effect. */
export const RESERVED_KEYS: ReadonlySet<string> = new Set([
    "container_name", "name", "hostname", "command", "labels",
    "networks", "network", "stdin_open", "tty", "detach",
]);

function kindOf(value: unknown): ParamKind | null {
    if (typeof value === "string") {
        return "string";
    }
    if (typeof value === "number") {
        return "number";
    }
    if (typeof value === "boolean") {
        return "boolean";
    }
    if (Array.isArray(value)) {
        return "list";
    }
    if (value !== null && typeof value === "object") {
        return "map";
    }
    return null;
}

/**
 * Splits an image block's extra keys into compose passthrough params and warnings.
 */
export function extractComposeParams(imageName: string, block: Record<string, unknown>): { params: Record<string, unknown>; warnings: string[] } {
    const params: Record<string, unknown> = {};
    const warnings: string[] = [];

    for (const [ key, value ] of Object.entries(block)) {
        if (CATALOG_KEYS.has(key)) {
            continue;
        }
        if (RESERVED_KEYS.has(key)) {
            warnings.push(`images.${imageName}.${key}: generated by playpen, ignored`);
            continue;
        }

        const spec = COMPOSE_PASSTHROUGH_PARAMS[key];
        if (!spec) {
            warnings.push(`images.${imageName}.${key}: unknown parameter, ignored`);
            continue;
        }
        if (value === null || value === undefined) {
            continue;
        }

        const kind = kindOf(value);
        if (kind === null || !spec.kinds.includes(kind)) {
            warnings.push(`images.${imageName}.${key}: expected ${spec.kinds.join(" or ")}, got ${kind ?? typeof value}, ignored`);
            continue;
        }

        params[key] = value;
    }

    return { params,
        warnings };
}

export function getSupportedParams(): Record<string, string> {
    return Object.fromEntries(
        Object.entries(COMPOSE_PASSTHROUGH_PARAMS).map(([ key, spec ]) => [ key, spec.description ])
    );
}
