import { EffectiveCatalog, Group, ImageDefinition } from "../catalog/types.js";
import { listCategories, loadCatalog } from "../catalog/resolver.js";
import { ServerConfig } from "../config.js";
import { RuntimeAdapter } from "../runtime/runtime-adapter.js";
import { PortProbe } from "../runtime/ports.js";
import { ContainerState } from "../runtime/types.js";
import { HookRunner, ScriptExecutor } from "../lifecycle/hooks.js";
import { LifecycleController } from "../lifecycle/controller.js";
import { BulkAction, GroupCoordinator, MemberAction, resolveMembers } from "../lifecycle/group-coordinator.js";
import { OperationTracker } from "./tracker.js";
import { OperationKind, OperationLookup } from "./types.js";
import { ValidationError, errorMessage } from "../util-server.js";
import { log } from "../log.js";

/**
 * Every mutating call returns an operation id right away; progress is read back with
 * operationStatus.
 */
export interface OrchestrationApi {
    start(imageName: string): Promise<string>;
    stop(imageName: string): Promise<string>;
    restart(imageName: string): Promise<string>;
    cleanup(imageName: string): Promise<string>;
    startGroup(groupName: string): Promise<string>;
    /** Starts every image of a category; running ones count as already_running. */
    startCategory(category: string): Promise<string>;
    stopGroup(groupName: string): Promise<string>;
    stopAll(): Promise<string>;
    restartAll(): Promise<string>;
    cleanupAll(): Promise<string>;
    operationStatus(operationId: string): Promise<OperationLookup>;
    discardOperation(operationId: string): Promise<boolean>;
    /** The last `tail` lines of an image's container output. */
    logs(imageName: string, tail?: number): Promise<string>;
}

export const DEFAULT_LOG_TAIL = 100;

export interface ImageSummary {
    name: string;
    image: string;
    category: string;
    description: string;
    ports: string[];
    hasPostStart: boolean;
    hasPreStop: boolean;
    motd?: string;
}

export interface CatalogSummary {
    images: ImageSummary[];
    groups: { name: string; description: string; containers: string[] }[];
    categories: string[];
    sources: string[];
    warnings: string[];
}

export interface GroupMemberStatus {
    image: string;
    container: string;
    state: ContainerState | "absent";
}

export interface GroupStatus {
    name: string;
    description: string;
    members: GroupMemberStatus[];
    missing: string[];
    running: number;
}

export interface ServiceOptions {
    config: ServerConfig;
    runtime: RuntimeAdapter;
    /** Loaded from the configured paths when not given. */
    catalog?: EffectiveCatalog;
    hookExecutor?: ScriptExecutor;
    /** Checks whether a host port is taken by something other than a container. */
    portProbe?: PortProbe;
}

const SINGLE_KINDS: Record<MemberAction, OperationKind> = {
    start: "start",
    stop: "stop",
    restart: "restart",
    cleanup: "cleanup",
};

const BULK_KINDS: Record<BulkAction, OperationKind> = {
    stop: "stop_group",
    restart: "restart",
    cleanup: "cleanup",
};

function summarizeImage(image: ImageDefinition): ImageSummary {
    return {
        name: image.name,
        image: image.image,
        category: image.category,
        description: image.description,
        ports: [ ...image.ports ],
        hasPostStart: image.hooks.postStart.kind !== "none",
        hasPreStop: image.hooks.preStop.kind !== "none",
        motd: image.motd,
    };
}

/**
 * Owns the current catalog value and the operation tracker, and runs every request as a
 * background task.
 */
export class OrchestrationService implements OrchestrationApi {
    readonly tracker = new OperationTracker();
    readonly controller: LifecycleController;
    private coordinator: GroupCoordinator;
    private catalog: EffectiveCatalog;
    private tasks = new Set<Promise<void>>();

    constructor(private options: ServiceOptions) {
        const { config, runtime } = options;
        const hooks = new HookRunner({
            scriptsDir: config.scriptsDir,
            sharedDir: config.sharedDir,
            timeoutMs: config.hookTimeoutMs,
            executor: options.hookExecutor,
        });
        this.controller = new LifecycleController(runtime, hooks, {
            prefix: config.prefix,
            networkName: config.networkName,
            sharedDir: config.sharedDir,
            projectRoot: config.rootDir,
            healthCheckIntervalMs: config.healthCheckIntervalMs,
            healthCheckAttempts: config.healthCheckAttempts,
        }, options.portProbe);
        this.coordinator = new GroupCoordinator(this.controller, this.tracker, runtime, config.prefix);
        this.catalog = options.catalog ?? this.loadFromDisk();
    }

    getCatalog(): EffectiveCatalog {
        return this.catalog;
    }

    /** Re-reads the catalog files. On failure the current catalog stays in place. */
    reloadCatalog(): EffectiveCatalog {
        try {
            this.catalog = this.loadFromDisk();
        } catch (e) {
            log.error("service", `Catalog reload failed, keeping previous catalog: ${errorMessage(e)}`);
            throw e;
        }
        return this.catalog;
    }

    summarizeCatalog(): CatalogSummary {
        const catalog = this.catalog;
        return {
            images: [ ...catalog.images.values() ].map(summarizeImage),
            groups: [ ...catalog.groups.values() ].map((group) => ({
                name: group.name,
                description: group.description,
                containers: [ ...group.containers ],
            })),
            categories: listCategories(catalog),
            sources: [ ...catalog.sources ],
            warnings: [ ...catalog.warnings ],
        };
    }

    async groupStatus(groupName: string): Promise<GroupStatus> {
        const group = this.requireGroup(groupName);
        const { members, missing } = resolveMembers(this.catalog, group);
        const statuses: GroupMemberStatus[] = [];
        for (const image of members) {
            const container = this.controller.containerNameOf(image);
            const status = await this.options.runtime.inspect(container);
            statuses.push({ image,
                container,
                state: status?.state ?? "absent" });
        }
        return {
            name: group.name,
            description: group.description,
            members: statuses,
            missing,
            running: statuses.filter((member) => member.state === "running").length,
        };
    }

    async start(imageName: string): Promise<string> {
        return this.single("start", imageName);
    }

    async stop(imageName: string): Promise<string> {
        return this.single("stop", imageName);
    }

    async restart(imageName: string): Promise<string> {
        return this.single("restart", imageName);
    }

    async cleanup(imageName: string): Promise<string> {
        return this.single("cleanup", imageName);
    }

    async startGroup(groupName: string): Promise<string> {
        return this.group("start_group", groupName);
    }

    async startCategory(category: string): Promise<string> {
        const catalog = this.catalog;
        const opId = this.tracker.create("start_group", category, 0);
        const containers = [ ...catalog.images.values() ]
            .filter((image) => image.category === category)
            .map((image) => image.name);
        if (containers.length === 0) {
            this.tracker.fail(opId, `Unknown category: ${category}`);
            return opId;
        }
        const group: Group = { name: category,
            description: `All ${category} images`,
            containers,
            source: "category" };
        this.launch(opId, () => this.coordinator.startGroup(catalog, group, opId));
        return opId;
    }

    async stopGroup(groupName: string): Promise<string> {
        return this.group("stop_group", groupName);
    }

    async stopAll(): Promise<string> {
        return this.bulk("stop");
    }

    async restartAll(): Promise<string> {
        return this.bulk("restart");
    }

    async cleanupAll(): Promise<string> {
        return this.bulk("cleanup");
    }

    async operationStatus(operationId: string): Promise<OperationLookup> {
        return this.tracker.get(operationId);
    }

    async discardOperation(operationId: string): Promise<boolean> {
        return this.tracker.discard(operationId);
    }

    async logs(imageName: string, tail = DEFAULT_LOG_TAIL): Promise<string> {
        if (!this.catalog.images.has(imageName)) {
            throw new ValidationError(`Unknown image: ${imageName}`);
        }
        if (!Number.isInteger(tail) || tail < 1) {
            throw new ValidationError(`tail must be a positive integer, got ${tail}`);
        }
        const container = this.controller.containerNameOf(imageName);
        if (!await this.options.runtime.inspect(container)) {
            throw new ValidationError(`Container ${container} does not exist`);
        }
        return this.options.runtime.logs(container, tail);
    }

    /** Resolves once every background task, including ones started while waiting, has settled. */
    async drain(): Promise<void> {
        while (this.tasks.size > 0) {
            await Promise.allSettled([ ...this.tasks ]);
        }
    }

    private loadFromDisk(): EffectiveCatalog {
        const { config } = this.options;
        return loadCatalog({
            baseCatalog: config.baseCatalog,
            overlayDirs: config.overlayDirs,
            scriptsDir: config.scriptsDir,
        });
    }

    private requireGroup(groupName: string): Group {
        const group = this.catalog.groups.get(groupName);
        if (!group) {
            throw new ValidationError(`Unknown group: ${groupName}`);
        }
        return group;
    }

    private single(action: MemberAction, imageName: string): string {
        const catalog = this.catalog;
        if (!catalog.images.has(imageName)) {
            throw new ValidationError(`Unknown image: ${imageName}`);
        }
        const opId = this.tracker.create(SINGLE_KINDS[action], imageName, 1);
        this.launch(opId, async () => {
            await this.coordinator.runMember(catalog, action, imageName, opId, { absentIsNotRunning: false });
            this.tracker.complete(opId);
        });
        return opId;
    }

    /** An unknown group still gets an operation, ending in error. */
    private group(kind: "start_group" | "stop_group", groupName: string): string {
        const catalog = this.catalog;
        const group = catalog.groups.get(groupName);
        const opId = this.tracker.create(kind, groupName, 0);
        if (!group) {
            this.tracker.fail(opId, `Unknown group: ${groupName}`);
            return opId;
        }
        this.launch(opId, () => kind === "start_group"
            ? this.coordinator.startGroup(catalog, group, opId)
            : this.coordinator.stopGroup(catalog, group, opId));
        return opId;
    }

    private bulk(action: BulkAction): string {
        const catalog = this.catalog;
        const opId = this.tracker.create(BULK_KINDS[action], "*", 0);
        this.launch(opId, () => this.coordinator.runBulk(catalog, action, opId));
        return opId;
    }

    private launch(opId: string, work: () => Promise<void>): void {
        const task: Promise<void> = work()
            .catch((e: unknown) => {
                const message = errorMessage(e);
                log.error("service", `Operation ${opId} aborted: ${message}`);
                const current = this.tracker.get(opId);
                if (current.found && current.operation.status === "running") {
                    this.tracker.fail(opId, message);
                }
            })
            .finally(() => {
                this.tasks.delete(task);
            });
        this.tasks.add(task);
    }
}
