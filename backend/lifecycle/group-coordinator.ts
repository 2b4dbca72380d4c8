import { EffectiveCatalog, Group } from "../catalog/types.js";
import { RuntimeAdapter } from "../runtime/runtime-adapter.js";
import { labelKeys } from "../runtime/compose-generator.js";
import { OperationTracker } from "../operations/tracker.js";
import { LifecycleController, LifecycleListener, StartFailed, StopFailed } from "./controller.js";
import { errorMessage } from "../util-server.js";
import { log } from "../log.js";

export type MemberAction = "start" | "stop" | "restart" | "cleanup";

export type BulkAction = "stop" | "restart" | "cleanup";

export interface MemberOptions {
    /**
     * Count a stop of a container that does not exist as not_running instead of failed.
     * Group and bulk runs do; a single stop does not.
     */
    absentIsNotRunning: boolean;
}

export interface GroupMembers {
    members: string[];
    missing: string[];
}

export function resolveMembers(catalog: EffectiveCatalog, group: Group): GroupMembers {
    const members: string[] = [];
    const missing: string[] = [];
    for (const name of group.containers) {
        if (catalog.images.has(name)) {
            members.push(name);
        } else {
            missing.push(name);
        }
    }
    return { members,
        missing };
}

/**
 * Runs lifecycle actions over several images one after another and writes each member's
 * outcome into the operation as soon as it is known.
 */
export class GroupCoordinator {
    constructor(
        private controller: LifecycleController,
        private tracker: OperationTracker,
        private runtime: RuntimeAdapter,
        private prefix: string,
    ) {
    }

    async startGroup(catalog: EffectiveCatalog, group: Group, opId: string): Promise<void> {
        const members = this.prepare(catalog, group, opId);
        if (members === null) {
            return;
        }
        for (const member of members) {
            await this.runMember(catalog, "start", member, opId, { absentIsNotRunning: true });
        }
        this.tracker.complete(opId);
    }

    /** Members are stopped in reverse declaration order. */
    async stopGroup(catalog: EffectiveCatalog, group: Group, opId: string): Promise<void> {
        const members = this.prepare(catalog, group, opId);
        if (members === null) {
            return;
        }
        for (const member of [ ...members ].reverse()) {
            await this.runMember(catalog, "stop", member, opId, { absentIsNotRunning: true });
        }
        this.tracker.complete(opId);
    }

    /**
     * stop and restart walk every catalog image; cleanup walks every container that
     * carries the management label, whether or not the catalog still knows its image.
     */
    async runBulk(catalog: EffectiveCatalog, action: BulkAction, opId: string): Promise<void> {
        const targets = action === "cleanup" ? await this.managedImages() : [ ...catalog.images.keys() ];
        this.tracker.update(opId, { total: targets.length });
        if (targets.length === 0) {
            this.tracker.update(opId, { skipped: true });
        }
        for (const target of targets) {
            await this.runMember(catalog, action, target, opId, { absentIsNotRunning: true });
        }
        this.tracker.complete(opId);
    }

    /**
     * Runs one action for one image and classifies the result into the operation's
     * counters. Never throws for a failed member; the failure is counted instead.
     */
    async runMember(catalog: EffectiveCatalog, action: MemberAction, imageName: string, opId: string, options: MemberOptions): Promise<void> {
        const listener: LifecycleListener = {
            hookStarted: (label) => this.tracker.trackScript(opId, label),
            hookFinished: (label) => this.tracker.completeScript(opId, label),
        };

        try {
            switch (action) {
                case "start": {
                    const result = await this.controller.start(catalog, imageName, { ifRunning: "skip",
                        listener });
                    this.record(opId, result.outcome, result.containerName, result.warnings);
                    if (result.diagnostics !== undefined) {
                        this.tracker.addDiagnostics(opId, imageName, result.diagnostics);
                    }
                    break;
                }
                case "stop": {
                    const result = await this.controller.stop(catalog, imageName, listener);
                    this.record(opId, result.outcome, result.containerName, result.warnings);
                    break;
                }
                case "restart": {
                    const result = await this.controller.restart(catalog, imageName, listener);
                    this.record(opId, result.outcome, result.containerName, result.warnings);
                    break;
                }
                case "cleanup": {
                    const result = await this.controller.cleanup(catalog, imageName, listener);
                    this.record(opId, result.outcome, result.containerName, result.warnings);
                    break;
                }
            }
        } catch (e) {
            if (e instanceof StopFailed && e.reason === "not_found" && options.absentIsNotRunning && action !== "cleanup") {
                this.tracker.increment(opId, "not_running");
                return;
            }
            if (e instanceof StartFailed && e.diagnostics !== undefined) {
                this.tracker.addDiagnostics(opId, imageName, e.diagnostics);
            }
            const message = `${imageName}: ${errorMessage(e)}`;
            log.error("coordinator", message);
            this.tracker.increment(opId, "failed");
            this.tracker.addError(opId, message);
        }
    }

    /**
     * Writes the total and the missing-member warnings. Returns null when nothing is left
     * to do, after completing the operation as skipped.
     */
    private prepare(catalog: EffectiveCatalog, group: Group, opId: string): string[] | null {
        const { members, missing } = resolveMembers(catalog, group);
        for (const name of missing) {
            this.tracker.addWarning(opId, `${name}: not in catalog, skipped`);
        }
        this.tracker.update(opId, { total: members.length });
        if (members.length === 0) {
            log.warn("coordinator", `Group ${group.name} has no members in the catalog`);
            this.tracker.update(opId, { skipped: true });
            this.tracker.complete(opId);
            return null;
        }
        return members;
    }

    private record(opId: string, outcome: "started" | "already_running" | "stopped" | "not_running" | "restarted" | "removed", container: string, warnings: string[]): void {
        for (const warning of warnings) {
            this.tracker.addWarning(opId, warning);
        }
        if (outcome !== "not_running") {
            this.tracker.addContainer(opId, container);
        }
        this.tracker.increment(opId, outcome);
    }

    private async managedImages(): Promise<string[]> {
        const labels = labelKeys(this.prefix);
        const containers = await this.runtime.listManaged(labels.managed);
        const namePrefix = `${this.prefix}-`;
        return containers
            .map((container) => container.labels[labels.image]
                ?? (container.name.startsWith(namePrefix) ? container.name.substring(namePrefix.length) : container.name))
            .sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
    }
}
