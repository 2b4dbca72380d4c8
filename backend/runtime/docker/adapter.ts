import { RuntimeAdapter } from "../runtime-adapter.js";
import { CommandError, ExecOptions, ExecResult, execCommand } from "../exec.js";
import { ContainerState, ContainerStatus, RuntimeCapabilities, RuntimeSpec } from "../types.js";
import { toComposeYAML } from "../compose-generator.js";
import { SpecStore } from "./spec-store.js";
import { detectCapabilities } from "./capabilities.js";
import { parsePublishedPorts } from "../ports.js";
import { log } from "../../log.js";

export type CommandRunner = (cmd: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
    return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function mapState(raw: string): ContainerState {
    const lower = (raw || "").toLowerCase();
    switch (lower) {
        case "running":
        case "created":
        case "restarting":
        case "paused":
        case "exited":
        case "dead":
            return lower;
        case "removing":
            return "dead";
    }
    if (lower.startsWith("up")) {
        return "running";
    }
    if (lower.startsWith("exited")) {
        return "exited";
    }
    return "unknown";
}

/**
 * Accepts a JSON array, a single object, or one object per line (`--format '{{json .}}'`).
 */
export function parseJsonOutputRecords(stdout: string): JsonRecord[] {
    const trimmed = stdout.trim();
    if (!trimmed) {
        return [];
    }

    try {
        const parsed: unknown = JSON.parse(trimmed);
        return (Array.isArray(parsed) ? parsed : [ parsed ]).filter(isRecord);
    } catch {
        return trimmed.split("\n")
            .filter((line) => line.trim().length > 0)
            .map((line): unknown => {
                try {
                    return JSON.parse(line);
                } catch {
                    return null;
                }
            })
            .filter(isRecord);
    }
}

/**
 * `docker ps` prints labels as "k1=v1,k2=v2".
 */
export function parseLabels(raw: unknown): Record<string, string> {
    if (isRecord(raw)) {
        const labels: Record<string, string> = {};
        for (const [ key, value ] of Object.entries(raw)) {
            labels[key] = String(value);
        }
        return labels;
    }
    if (typeof raw !== "string" || !raw) {
        return {};
    }
    const labels: Record<string, string> = {};
    for (const pair of raw.split(",")) {
        const eq = pair.indexOf("=");
        if (eq > 0) {
            labels[pair.substring(0, eq)] = pair.substring(eq + 1);
        }
    }
    return labels;
}

/** Reads one record of `docker inspect`. */
export function readInspectRecord(item: JsonRecord): ContainerStatus {
    const state = isRecord(item.State) ? item.State : {};
    const config = isRecord(item.Config) ? item.Config : {};
    const rawName = typeof item.Name === "string" ? item.Name : "";
    const exitCode = typeof state.ExitCode === "number" ? state.ExitCode : undefined;
    const startedAt = typeof state.StartedAt === "string" ? state.StartedAt : undefined;

    return {
        name: rawName.replace(/^\//, ""),
        state: mapState(typeof state.Status === "string" ? state.Status : ""),
        exitCode,
        startedAt,
        labels: parseLabels(config.Labels),
    };
}

/** Reads one line of `docker ps --format '{{json .}}'`. */
export function readPsRecord(item: JsonRecord): ContainerStatus {
    const names = typeof item.Names === "string" ? item.Names : "";
    const rawState = typeof item.State === "string" ? item.State : (typeof item.Status === "string" ? item.Status : "");
    return {
        name: names.split(",")[0] ?? "",
        state: mapState(rawState),
        labels: parseLabels(item.Labels),
    };
}

function isNoSuchContainer(result: ExecResult): boolean {
    return /no such (container|object)/i.test(result.stderr);
}

/**
 * Drives the Docker CLI and its compose plugin. One compose project per applied spec.
 */
export class DockerComposeAdapter extends RuntimeAdapter {
    private store: SpecStore;

    constructor(runtimeDir: string, private run: CommandRunner = execCommand) {
        super();
        this.store = new SpecStore(runtimeDir);
    }

    private async docker(args: string[], options?: ExecOptions): Promise<ExecResult> {
        log.debug("docker", `docker ${args.join(" ")}`);
        return this.run("docker", args, options);
    }

    private async dockerChecked(args: string[], options?: ExecOptions): Promise<ExecResult> {
        const result = await this.docker(args, options);
        if (result.exitCode !== 0) {
            throw new CommandError(`docker ${args.join(" ")}`, result);
        }
        return result;
    }

    async ensureNetwork(networkName: string): Promise<void> {
        const existing = await this.docker([ "network", "inspect", networkName ]);
        if (existing.exitCode === 0) {
            return;
        }
        log.info("docker", `Creating network ${networkName}`);
        await this.dockerChecked([ "network", "create", "--driver", "bridge", networkName ]);
    }

    async apply(spec: RuntimeSpec): Promise<void> {
        const composePath = this.store.write(spec.name, toComposeYAML(spec));
        await this.dockerChecked([ "compose", "-p", spec.name, "-f", composePath, "up", "-d" ]);
    }

    async inspect(containerName: string): Promise<ContainerStatus | null> {
        const result = await this.docker([ "inspect", "--type", "container", containerName ]);
        if (result.exitCode !== 0) {
            if (isNoSuchContainer(result)) {
                return null;
            }
            throw new CommandError(`docker inspect ${containerName}`, result);
        }
        const [ first ] = parseJsonOutputRecords(result.stdout);
        return first ? readInspectRecord(first) : null;
    }

    async stop(containerName: string, timeoutSeconds: number): Promise<void> {
        await this.dockerChecked([ "stop", "-t", String(timeoutSeconds), containerName ]);
    }

    async remove(containerName: string, force = false): Promise<void> {
        const args = force ? [ "rm", "-f", containerName ] : [ "rm", containerName ];
        const result = await this.docker(args);
        if (result.exitCode !== 0 && !isNoSuchContainer(result)) {
            throw new CommandError(`docker ${args.join(" ")}`, result);
        }
    }

    async listManaged(labelKey: string): Promise<ContainerStatus[]> {
        const result = await this.dockerChecked([
            "ps", "-a",
            "--filter", `label=${labelKey}=true`,
            "--format", "{{json .}}",
        ]);
        return parseJsonOutputRecords(result.stdout)
            .map(readPsRecord)
            .filter((status) => status.name.length > 0);
    }

    async portOwners(): Promise<Map<number, string>> {
        const result = await this.dockerChecked([ "ps", "--format", "{{json .}}" ]);
        const owners = new Map<number, string>();
        for (const record of parseJsonOutputRecords(result.stdout)) {
            const { name } = readPsRecord(record);
            const ports = typeof record.Ports === "string" ? parsePublishedPorts(record.Ports) : [];
            for (const port of ports) {
                owners.set(port, name);
            }
        }
        return owners;
    }

    async logs(containerName: string, tail = 50): Promise<string> {
        const result = await this.docker([ "logs", "--tail", String(tail), containerName ]);
        if (result.exitCode !== 0) {
            throw new CommandError(`docker logs ${containerName}`, result);
        }
        // docker logs replays the container's stderr on its own stderr
        return [ result.stdout, result.stderr ].filter((part) => part.length > 0).join("");
    }

    async getCapabilities(): Promise<RuntimeCapabilities> {
        return detectCapabilities();
    }

    async discard(projectName: string): Promise<void> {
        this.store.delete(projectName);
    }
}
