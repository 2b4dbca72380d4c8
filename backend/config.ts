import path from "path";
import dotenv from "dotenv";
import { ValidationError } from "./util-server.js";

export interface ServerConfig {
    /** Project root; relative paths below resolve against it. */
    rootDir: string;
    baseCatalog: string;
    /** Overlay directories, applied in this order on top of the base catalog. */
    overlayDirs: string[];
    scriptsDir: string;
    sharedDir: string;
    /** Where generated compose files are written, one directory per image. */
    runtimeDir: string;
    networkName: string;
    /** Prefix for container names and management labels. */
    prefix: string;
    port: number;
    healthCheckIntervalMs: number;
    healthCheckAttempts: number;
    hookTimeoutMs: number;
}

export type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min = 0): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        const kind = min > 0 ? "a positive integer" : "a non-negative integer";
        throw new ValidationError(`${key} must be ${kind}, got "${raw}"`);
    }
    return value;
}

function resolveFrom(rootDir: string, value: string): string {
    return path.isAbsolute(value) ? value : path.join(rootDir, value);
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
    const rootDir = path.resolve(env.PLAYPEN_ROOT ?? process.cwd());

    const overlayDirs = (env.PLAYPEN_OVERLAY_DIRS ?? [ "config.d", "custom.d" ].join(path.delimiter))
        .split(path.delimiter)
        .map((dir) => dir.trim())
        .filter((dir) => dir.length > 0)
        .map((dir) => resolveFrom(rootDir, dir));

    const prefix = env.PLAYPEN_PREFIX ?? "playpen";
    if (!/^[a-z0-9][a-z0-9_-]*$/.test(prefix)) {
        throw new ValidationError("PLAYPEN_PREFIX can only contain [a-z][0-9] _ - only");
    }

    return {
        rootDir,
        baseCatalog: resolveFrom(rootDir, env.PLAYPEN_CONFIG ?? "config.yml"),
        overlayDirs,
        scriptsDir: resolveFrom(rootDir, env.PLAYPEN_SCRIPTS_DIR ?? "scripts"),
        sharedDir: resolveFrom(rootDir, env.PLAYPEN_SHARED_DIR ?? "shared-volumes"),
        runtimeDir: resolveFrom(rootDir, env.PLAYPEN_RUNTIME_DIR ?? ".playpen"),
        networkName: env.PLAYPEN_NETWORK ?? `${prefix}-network`,
        prefix,
        port: readInt(env, "PLAYPEN_PORT", 5050),
        healthCheckIntervalMs: readInt(env, "PLAYPEN_HEALTH_INTERVAL_MS", 500, 1),
        healthCheckAttempts: readInt(env, "PLAYPEN_HEALTH_ATTEMPTS", 60, 1),
        hookTimeoutMs: readInt(env, "PLAYPEN_HOOK_TIMEOUT_MS", 300_000, 1),
    };
}

/**
 * Loads `.env` from the working directory into process.env, then reads the config.
 */
export function loadServerConfigFromEnvironment(): ServerConfig {
    dotenv.config();
    return loadServerConfig(process.env);
}
