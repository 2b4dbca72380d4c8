import { spawn } from "child_process";
import { CommandResult } from "./types.js";

export interface ExecOptions {
    cwd?: string;
    env?: Record<string, string | undefined>;
    /** Kills the process (SIGKILL) after this many milliseconds. */
    timeoutMs?: number;
}

export interface ExecResult extends CommandResult {
    timedOut: boolean;
}

/**
 * A runtime command that exited non-zero.
 */
export class CommandError extends Error {
    constructor(readonly command: string, readonly result: CommandResult) {
        super(`${command} exited with code ${result.exitCode}${result.stderr.trim() ? `: ${result.stderr.trim()}` : ""}`);
        this.name = "CommandError";
    }
}

export function execCommand(cmd: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
        const proc = spawn(cmd, args, {
            cwd: options.cwd,
            env: options.env ? { ...process.env,
                ...options.env } : process.env,
        });
        let stdout = "";
        let stderr = "";
        let timedOut = false;

        const timer = options.timeoutMs !== undefined
            ? setTimeout(() => {
                timedOut = true;
                proc.kill("SIGKILL");
            }, options.timeoutMs)
            : null;

        proc.stdout?.on("data", (d: Buffer) => {
            stdout += d.toString();
        });
        proc.stderr?.on("data", (d: Buffer) => {
            stderr += d.toString();
        });
        proc.on("close", (code: number | null) => {
            if (timer) {
                clearTimeout(timer);
            }
            resolve({ stdout,
                stderr,
                exitCode: code ?? 1,
                timedOut });
        });
        proc.on("error", (err: Error) => {
            if (timer) {
                clearTimeout(timer);
            }
            reject(new Error(`Failed to execute ${cmd} ${args.join(" ")}: ${err.message}`));
        });
    });
}
