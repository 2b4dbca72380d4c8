import fs from "fs";
import os from "os";
import path from "path";
import { ExecOptions, ExecResult, execCommand } from "../runtime/exec.js";
import { Hook, HookPoint, ImageDefinition } from "../catalog/types.js";
import { log } from "../log.js";

export type ScriptExecutor = (scriptPath: string, args: string[], options: ExecOptions) => Promise<ExecResult>;

export class HookFailed extends Error {
    constructor(readonly imageName: string, readonly point: HookPoint, reason: string) {
        super(`${point} hook for ${imageName} failed: ${reason}`);
        this.name = "HookFailed";
    }
}

export interface HookRunnerOptions {
    scriptsDir: string;
    sharedDir: string;
    timeoutMs: number;
    executor?: ScriptExecutor;
}

export interface HookRun {
    /** Label reported to the owning operation while the hook runs. */
    label: string;
    stdout: string;
}

const runWithBash: ScriptExecutor = (scriptPath, args, options) => execCommand("bash", [ scriptPath, ...args ], options);

export function hookFor(image: ImageDefinition, point: HookPoint): Hook {
    return point === "post_start" ? image.hooks.postStart : image.hooks.preStop;
}

export function hookLabel(imageName: string, point: HookPoint, hook: Hook): string {
    return hook.kind === "file" ? `${imageName}:${point}:${hook.path}` : `${imageName}:${point}`;
}

/** Single-quotes a value for bash; nothing inside is expanded. */
export function shellQuote(value: string): string {
    return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Inline hooks get the container name and the shared directory as shell variables
 * ahead of the configured text.
 */
export function inlinePreamble(containerName: string, sharedDir: string): string {
    return [
        "#!/bin/bash",
        `CONTAINER_NAME=${shellQuote(containerName)}`,
        `SHARED_DIR=${shellQuote(sharedDir)}`,
        "",
    ].join("\n");
}

/**
 * Runs post_start / pre_stop hooks on the host with bash, the image name as the only argument.
 */
export class HookRunner {
    private executor: ScriptExecutor;

    constructor(private options: HookRunnerOptions) {
        this.executor = options.executor ?? runWithBash;
    }

    /**
     * Returns null when the image has no hook at this point. Every failure (missing file,
     * temp file trouble, non-zero exit, timeout) is thrown as HookFailed.
     */
    async run(image: ImageDefinition, point: HookPoint, containerName: string, onStart?: (label: string) => void): Promise<HookRun | null> {
        const hook = hookFor(image, point);
        if (hook.kind === "none") {
            return null;
        }

        const label = hookLabel(image.name, point, hook);
        const env = {
            SHARED_DIR: this.options.sharedDir,
            CONTAINER_NAME: containerName,
        };
        onStart?.(label);
        log.info("hooks", `Running ${label}`);

        let result: ExecResult;
        try {
            if (hook.kind === "inline") {
                result = await this.runInline(image.name, point, hook.script, containerName, env);
            } else {
                const scriptPath = path.join(this.options.scriptsDir, hook.path);
                if (!fs.existsSync(scriptPath)) {
                    throw new HookFailed(image.name, point, `script file not found: ${scriptPath}`);
                }
                result = await this.exec(image.name, scriptPath, env);
            }
        } catch (e) {
            if (e instanceof HookFailed) {
                throw e;
            }
            throw new HookFailed(image.name, point, e instanceof Error ? e.message : String(e));
        }

        if (result.timedOut) {
            throw new HookFailed(image.name, point, `timed out after ${this.options.timeoutMs} ms`);
        }
        if (result.exitCode !== 0) {
            const detail = result.stderr.trim();
            throw new HookFailed(image.name, point, `exit code ${result.exitCode}${detail ? `: ${detail}` : ""}`);
        }

        if (result.stdout.trim()) {
            log.debug("hooks", `${label} output: ${result.stdout.trim()}`);
        }
        return { label,
            stdout: result.stdout };
    }

    private async runInline(imageName: string, point: HookPoint, script: string, containerName: string, env: Record<string, string>): Promise<ExecResult> {
        const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "playpen-hook-"));
        const scriptPath = path.join(dir, `${containerName}-${point}.sh`);
        try {
            await fs.promises.writeFile(scriptPath, inlinePreamble(containerName, this.options.sharedDir) + script, { mode: 0o755 });
            return await this.exec(imageName, scriptPath, env);
        } finally {
            await fs.promises.rm(dir, { recursive: true,
                force: true });
        }
    }

    private exec(imageName: string, scriptPath: string, env: Record<string, string>): Promise<ExecResult> {
        return this.executor(scriptPath, [ imageName ], {
            cwd: fs.existsSync(this.options.scriptsDir) ? this.options.scriptsDir : undefined,
            env,
            timeoutMs: this.options.timeoutMs,
        });
    }
}
