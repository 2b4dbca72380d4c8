import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { resolve } from "../../backend/catalog/resolver.js";
import { EffectiveCatalog } from "../../backend/catalog/types.js";
import { ServerConfig } from "../../backend/config.js";
import { ScriptExecutor } from "../../backend/lifecycle/hooks.js";

export function catalogFrom(content: string, ...overlays: string[]): EffectiveCatalog {
    return resolve(
        { name: "config.yml",
            content },
        overlays.map((overlay, index) => ({ name: `overlay-${index + 1}.yml`,
            content: overlay })),
    );
}

export function makeTempDir(prefix = "playpen-test-"): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true,
        force: true });
}

/** Runs `fn` with one environment variable replaced, restoring it afterwards. */
export async function withEnv<T>(key: string, value: string, fn: () => Promise<T>): Promise<T> {
    const previous = process.env[key];
    process.env[key] = value;
    try {
        return await fn();
    } finally {
        if (previous === undefined) {
            delete process.env[key];
        } else {
            process.env[key] = previous;
        }
    }
}

/** Config pointing every path into `root`, with a fast health check. */
export function testConfig(root: string, overrides: Partial<ServerConfig> = {}): ServerConfig {
    return {
        rootDir: root,
        baseCatalog: path.join(root, "config.yml"),
        overlayDirs: [ path.join(root, "config.d") ],
        scriptsDir: path.join(root, "scripts"),
        sharedDir: path.join(root, "shared-volumes"),
        runtimeDir: path.join(root, ".playpen"),
        networkName: "playpen-network",
        prefix: "playpen",
        port: 0,
        healthCheckIntervalMs: 1,
        healthCheckAttempts: 3,
        hookTimeoutMs: 1000,
        ...overrides,
    };
}

export interface RecordedScript {
    scriptPath: string;
    args: string[];
    env: Record<string, string | undefined>;
    content: string;
}

/**
 * Script executor that records each call (including the script text, read while the
 * file still exists) and answers with the given exit code.
 */
export function recordingExecutor(exitCode = 0, stderr = ""): { executor: ScriptExecutor; runs: RecordedScript[] } {
    const runs: RecordedScript[] = [];
    const executor: ScriptExecutor = async (scriptPath, args, options) => {
        runs.push({
            scriptPath,
            args,
            env: options.env ?? {},
            content: fs.readFileSync(scriptPath, "utf-8"),
        });
        return { stdout: "",
            stderr,
            exitCode,
            timedOut: false };
    };
    return { executor,
        runs };
}

export const BASIC_CATALOG = `
images:
  alpine:
    image: alpine:3.20
    category: base
  php-stack:
    image: php:8.3-cli
    category: stack
    scripts:
      post_start:
        inline: "echo started > /dev/null"
  postgres:
    image: postgres:16
    category: database
    scripts:
      pre_stop:
        inline: "echo stopping"
group:
  name: web
  description: Web stack
  containers:
    - postgres
    - php-stack
    - ghost
`;
