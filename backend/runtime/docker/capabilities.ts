import { execCommand } from "../exec.js";
import { RuntimeCapabilities } from "../types.js";

async function execQuiet(cmd: string, args: string[]): Promise<{ stdout: string; exitCode: number }> {
    try {
        const result = await execCommand(cmd, args);
        return { stdout: result.stdout,
            exitCode: result.exitCode };
    } catch {
        // spawn failure: the binary is not installed
        return { stdout: "",
            exitCode: 1 };
    }
}

export async function isRuntimeAvailable(): Promise<boolean> {
    const result = await execQuiet("docker", [ "info", "--format", "{{.ServerVersion}}" ]);
    return result.exitCode === 0;
}

export async function detectCapabilities(): Promise<RuntimeCapabilities> {
    const available = await isRuntimeAvailable();
    if (!available) {
        throw new Error("Docker runtime not available");
    }

    let runtimeVersion = "unknown";
    const versionResult = await execQuiet("docker", [ "version", "--format", "{{.Server.Version}}" ]);
    if (versionResult.exitCode === 0) {
        runtimeVersion = versionResult.stdout.trim();
    }

    let composeVersion: string | undefined;
    const composeResult = await execQuiet("docker", [ "compose", "version", "--short" ]);
    if (composeResult.exitCode === 0) {
        composeVersion = composeResult.stdout.trim();
    } else {
        throw new Error("Docker Compose plugin not available");
    }

    return {
        runtimeName: "docker",
        runtimeVersion,
        composeVersion,
    };
}
