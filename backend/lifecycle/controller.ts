import { EffectiveCatalog, HookPoint, ImageDefinition } from "../catalog/types.js";
import { RuntimeAdapter } from "../runtime/runtime-adapter.js";
import { containerName, generate, projectName } from "../runtime/compose-generator.js";
import { ContainerStatus } from "../runtime/types.js";
import { hostPorts, isHostPortInUse, PortProbe } from "../runtime/ports.js";
import { HookFailed, HookRunner } from "./hooks.js";
import { pollUntil } from "./retry.js";
import { ValidationError, errorMessage } from "../util-server.js";
import { log } from "../log.js";

export type LifecycleState =
    | "Idle"
    | "Starting"
    | "HealthChecking"
    | "Hooking"
    | "Running"
    | "PreHooking"
    | "Stopping"
    | "Failed";

export class StartFailed extends Error {
    constructor(readonly imageName: string, reason: string, readonly diagnostics?: string) {
        super(`Failed to start ${imageName}: ${reason}`);
        this.name = "StartFailed";
    }
}

export type StopFailureReason = "not_found" | "runtime";

export class StopFailed extends Error {
    constructor(readonly imageName: string, readonly reason: StopFailureReason, detail: string) {
        super(`Failed to stop ${imageName}: ${detail}`);
        this.name = "StopFailed";
    }
}

export interface LifecycleSettings {
    prefix: string;
    networkName: string;
    sharedDir: string;
    projectRoot: string;
    healthCheckIntervalMs: number;
    healthCheckAttempts: number;
}

/** Receives hook progress for the owning operation. */
export interface LifecycleListener {
    hookStarted?(label: string): void;
    hookFinished?(label: string): void;
}

export interface StartOptions {
    /** What to do with a container that is already running. */
    ifRunning?: "recreate" | "skip";
    listener?: LifecycleListener;
}

export interface StartResult {
    outcome: "started" | "already_running";
    containerName: string;
    /** The container did not report running within the health-check budget. */
    degraded: boolean;
    warnings: string[];
    diagnostics?: string;
}

export interface StopResult {
    outcome: "stopped" | "not_running";
    containerName: string;
    warnings: string[];
}

export interface RestartResult {
    outcome: "restarted" | "not_running";
    containerName: string;
    degraded: boolean;
    warnings: string[];
}

export interface CleanupResult {
    outcome: "removed";
    containerName: string;
    warnings: string[];
}

/** Grace period handed to the runtime when stopping, in seconds. */
export const STOP_TIMEOUT_WITH_HOOK = 30;
export const STOP_TIMEOUT_DEFAULT = 10;
const DIAGNOSTIC_LOG_LINES = 50;

const TERMINATED_STATES: ReadonlySet<ContainerStatus["state"]> = new Set([ "exited", "dead" ]);

/**
 * Drives one image through start and stop. Every call takes the catalog it should work
 * against; nothing here keeps a catalog of its own.
 */
export class LifecycleController {
    private states = new Map<string, LifecycleState>();

    constructor(
        private runtime: RuntimeAdapter,
        private hooks: HookRunner,
        private settings: LifecycleSettings,
        private portInUse: PortProbe = isHostPortInUse,
    ) {
    }

    getState(imageName: string): LifecycleState {
        return this.states.get(imageName) ?? "Idle";
    }

    containerNameOf(imageName: string): string {
        return containerName(this.settings.prefix, imageName);
    }

    private transition(imageName: string, to: LifecycleState): void {
        const from = this.getState(imageName);
        if (to === "Idle") {
            this.states.delete(imageName);
        } else {
            this.states.set(imageName, to);
        }
        const level = to === "Failed" ? "warn" : "debug";
        log[level]("lifecycle", `${imageName}: ${from} -> ${to}`);
    }

    private requireImage(catalog: EffectiveCatalog, imageName: string): ImageDefinition {
        const image = catalog.images.get(imageName);
        if (!image) {
            throw new ValidationError(`Unknown image: ${imageName}`);
        }
        return image;
    }

    async start(catalog: EffectiveCatalog, imageName: string, options: StartOptions = {}): Promise<StartResult> {
        const image = this.requireImage(catalog, imageName);
        const name = this.containerNameOf(image.name);
        const warnings: string[] = [];

        let existing: ContainerStatus | null = null;
        try {
            existing = await this.runtime.inspect(name);
            if (existing && !(existing.state === "running" && options.ifRunning === "skip")) {
                log.info("lifecycle", `Removing existing container ${name} (${existing.state})`);
                await this.runtime.remove(name, true);
            }
        } catch (e) {
            throw new StartFailed(image.name, errorMessage(e));
        }
        if (existing?.state === "running" && options.ifRunning === "skip") {
            log.info("lifecycle", `${name} is already running`);
            return { outcome: "already_running",
                containerName: name,
                degraded: false,
                warnings };
        }

        const conflicts = await this.findPortConflicts(image);
        if (conflicts.length > 0) {
            throw new StartFailed(image.name, `Port conflicts: ${conflicts.join(", ")}`);
        }

        this.transition(image.name, "Starting");
        try {
            const spec = generate([ image ], {
                projectName: projectName(this.settings.prefix, image.name),
                networkName: this.settings.networkName,
                sharedDir: this.settings.sharedDir,
                projectRoot: this.settings.projectRoot,
                prefix: this.settings.prefix,
            });
            await this.runtime.ensureNetwork(this.settings.networkName);
            await this.runtime.apply(spec);
        } catch (e) {
            await this.failStart(image.name, name);
            throw new StartFailed(image.name, errorMessage(e));
        }

        this.transition(image.name, "HealthChecking");
        let degraded = false;
        let diagnostics: string | undefined;
        try {
            const health = await pollUntil({
                intervalMs: this.settings.healthCheckIntervalMs,
                maxAttempts: this.settings.healthCheckAttempts,
            }, async () => {
                const status = await this.runtime.inspect(name);
                if (status?.state === "running") {
                    return "running";
                }
                if (status && TERMINATED_STATES.has(status.state)) {
                    return "terminated";
                }
                return undefined;
            });

            if (health.done && health.value === "terminated") {
                const logs = await this.captureLogs(name);
                await this.failStart(image.name, name);
                throw new StartFailed(image.name, "container exited during start", logs);
            }
            if (!health.done) {
                degraded = true;
                diagnostics = await this.captureLogs(name);
                const seconds = (this.settings.healthCheckIntervalMs * this.settings.healthCheckAttempts) / 1000;
                warnings.push(`${image.name}: container not running after ${seconds}s, left running (degraded)`);
                log.warn("lifecycle", `Health check timed out for ${name}`);
            }
        } catch (e) {
            if (e instanceof StartFailed) {
                throw e;
            }
            await this.failStart(image.name, name);
            throw new StartFailed(image.name, errorMessage(e));
        }

        this.transition(image.name, "Hooking");
        await this.runHook(image, "post_start", name, warnings, options.listener);

        this.transition(image.name, "Running");
        log.info("lifecycle", `Started ${name}${degraded ? " (degraded)" : ""}`);
        return { outcome: "started",
            containerName: name,
            degraded,
            warnings,
            diagnostics };
    }

    /**
     * A catalog entry is optional here: containers left over from an older catalog can
     * still be stopped, just without hooks.
     */
    async stop(catalog: EffectiveCatalog, imageName: string, listener?: LifecycleListener): Promise<StopResult> {
        const image = catalog.images.get(imageName);
        const name = this.containerNameOf(imageName);
        const warnings: string[] = [];

        let status: ContainerStatus | null = null;
        try {
            status = await this.runtime.inspect(name);
        } catch (e) {
            throw new StopFailed(imageName, "runtime", errorMessage(e));
        }
        if (!status) {
            throw new StopFailed(imageName, "not_found", `container ${name} does not exist`);
        }

        const wasRunning = status.state === "running";
        try {
            if (wasRunning) {
                this.transition(imageName, "PreHooking");
                if (image) {
                    await this.runHook(image, "pre_stop", name, warnings, listener);
                }
                this.transition(imageName, "Stopping");
                const hasPreStop = image !== undefined && image.hooks.preStop.kind !== "none";
                await this.runtime.stop(name, hasPreStop ? STOP_TIMEOUT_WITH_HOOK : STOP_TIMEOUT_DEFAULT);
            } else {
                this.transition(imageName, "Stopping");
            }
            await this.runtime.remove(name);
            await this.runtime.discard(projectName(this.settings.prefix, imageName));
        } catch (e) {
            this.transition(imageName, "Failed");
            throw new StopFailed(imageName, "runtime", errorMessage(e));
        }

        this.transition(imageName, "Idle");
        log.info("lifecycle", `Stopped ${name}`);
        return { outcome: wasRunning ? "stopped" : "not_running",
            containerName: name,
            warnings };
    }

    /** Restarts a running container; anything else is reported as not running and left alone. */
    async restart(catalog: EffectiveCatalog, imageName: string, listener?: LifecycleListener): Promise<RestartResult> {
        this.requireImage(catalog, imageName);
        const name = this.containerNameOf(imageName);
        const status = await this.runtime.inspect(name);
        if (status?.state !== "running") {
            return { outcome: "not_running",
                containerName: name,
                degraded: false,
                warnings: [] };
        }

        const stopped = await this.stop(catalog, imageName, listener);
        const started = await this.start(catalog, imageName, { ifRunning: "recreate",
            listener });
        return { outcome: "restarted",
            containerName: name,
            degraded: started.degraded,
            warnings: [ ...stopped.warnings, ...started.warnings ] };
    }

    /** Force-removes the container in whatever state it is in. */
    async cleanup(catalog: EffectiveCatalog, imageName: string, listener?: LifecycleListener): Promise<CleanupResult> {
        const image = catalog.images.get(imageName);
        const name = this.containerNameOf(imageName);
        const warnings: string[] = [];

        const status = await this.runtime.inspect(name);
        if (!status) {
            throw new StopFailed(imageName, "not_found", `container ${name} does not exist`);
        }
        if (status.state === "running" && image) {
            this.transition(imageName, "PreHooking");
            await this.runHook(image, "pre_stop", name, warnings, listener);
        }
        this.transition(imageName, "Stopping");
        try {
            await this.runtime.remove(name, true);
            await this.runtime.discard(projectName(this.settings.prefix, imageName));
        } catch (e) {
            this.transition(imageName, "Failed");
            throw new StopFailed(imageName, "runtime", errorMessage(e));
        }
        this.transition(imageName, "Idle");
        log.info("lifecycle", `Removed ${name}`);
        return { outcome: "removed",
            containerName: name,
            warnings };
    }

    private async runHook(image: ImageDefinition, point: HookPoint, name: string, warnings: string[], listener?: LifecycleListener): Promise<void> {
        let label: string | undefined;
        try {
            await this.hooks.run(image, point, name, (started) => {
                label = started;
                listener?.hookStarted?.(started);
            });
        } catch (e) {
            // hooks never fail the lifecycle step they belong to
            const failure = e instanceof HookFailed ? e : new HookFailed(image.name, point, errorMessage(e));
            log.warn("lifecycle", failure.message);
            warnings.push(failure.message);
        } finally {
            if (label !== undefined) {
                listener?.hookFinished?.(label);
            }
        }
    }

    /** Each published host port that a container or another process already holds, as "port (used by owner)". */
    private async findPortConflicts(image: ImageDefinition): Promise<string[]> {
        const ports = image.ports.flatMap(hostPorts);
        if (ports.length === 0) {
            return [];
        }
        let owners: Map<number, string>;
        try {
            owners = await this.runtime.portOwners();
        } catch (e) {
            throw new StartFailed(image.name, errorMessage(e));
        }
        const conflicts: string[] = [];
        for (const port of ports) {
            const owner = owners.get(port) ?? (await this.portInUse(port) ? "host system" : undefined);
            if (owner !== undefined) {
                conflicts.push(`${port} (used by ${owner})`);
            }
        }
        return conflicts;
    }

    private async captureLogs(name: string): Promise<string | undefined> {
        try {
            return await this.runtime.logs(name, DIAGNOSTIC_LOG_LINES);
        } catch (e) {
            log.warn("lifecycle", `Could not read logs of ${name}: ${errorMessage(e)}`);
            return undefined;
        }
    }

    /** Failed -> force-remove -> Idle. A cleanup error is logged; the start error is what the caller sees. */
    private async failStart(imageName: string, name: string): Promise<void> {
        this.transition(imageName, "Failed");
        try {
            await this.runtime.remove(name, true);
            await this.runtime.discard(projectName(this.settings.prefix, imageName));
        } catch (e) {
            log.error("lifecycle", `Cleanup of ${name} failed: ${errorMessage(e)}`);
        }
        this.transition(imageName, "Idle");
    }
}
