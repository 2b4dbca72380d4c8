import { EventEmitter } from "events";
import { nanoid } from "nanoid";
import {
    COUNTERS_BY_KIND,
    CounterName,
    Counters,
    Operation,
    OperationKind,
    OperationLookup,
    OperationStatus,
    isTerminal,
} from "./types.js";
import { log } from "../log.js";

export class OperationStateError extends Error {
    constructor(readonly operationId: string, message: string) {
        super(`Operation ${operationId}: ${message}`);
        this.name = "OperationStateError";
    }
}

export interface OperationPatch {
    status?: OperationStatus;
    total?: number;
    counters?: Counters;
    skipped?: boolean;
    error?: string;
}

function snapshot(operation: Operation): Operation {
    return structuredClone(operation);
}

/**
 * In-memory registry of operations. Every change emits "update" with a snapshot of
 * the record; records handed out are copies.
 */
export class OperationTracker extends EventEmitter {
    private operations = new Map<string, Operation>();

    create(kind: OperationKind, target: string, total: number): string {
        const id = nanoid();
        const counters: Counters = {};
        for (const counter of COUNTERS_BY_KIND[kind]) {
            counters[counter] = 0;
        }
        const operation: Operation = {
            id,
            kind,
            target,
            status: "running",
            counters,
            total,
            startedAt: new Date().toISOString(),
            errors: [],
            warnings: [],
            containers: [],
            skipped: false,
            scriptsRunning: [],
            scriptsCompleted: [],
            diagnostics: {},
        };
        this.operations.set(id, operation);
        log.debug("operations", `Created ${kind} ${target} (${id})`);
        this.emitUpdate(operation);
        return id;
    }

    get(id: string): OperationLookup {
        const operation = this.operations.get(id);
        if (!operation) {
            return { found: false };
        }
        return { found: true,
            operation: snapshot(operation) };
    }

    list(): Operation[] {
        return [ ...this.operations.values() ].map(snapshot);
    }

    update(id: string, patch: OperationPatch): void {
        const operation = this.mutable(id);

        if (patch.counters) {
            for (const [ counter, value ] of Object.entries(patch.counters)) {
                this.checkCounter(operation, counter, value);
            }
        }
        if (patch.total !== undefined && patch.total < 0) {
            throw new OperationStateError(id, `total cannot be negative (${patch.total})`);
        }
        if (patch.status === "running" && isTerminal(operation.status)) {
            throw new OperationStateError(id, `status cannot go from ${operation.status} to running`);
        }

        if (patch.counters) {
            Object.assign(operation.counters, patch.counters);
        }
        if (patch.total !== undefined) {
            operation.total = patch.total;
        }
        if (patch.skipped !== undefined) {
            operation.skipped = patch.skipped;
        }
        if (patch.error !== undefined) {
            operation.error = patch.error;
        }
        if (patch.status && patch.status !== operation.status) {
            operation.status = patch.status;
            operation.completedAt = new Date().toISOString();
            log.info("operations", `${operation.kind} ${operation.target} (${id}) ${patch.status}`);
        }
        this.emitUpdate(operation);
    }

    increment(id: string, counter: CounterName, by = 1): void {
        const operation = this.mutable(id);
        this.update(id, { counters: { [counter]: (operation.counters[counter] ?? 0) + by } });
    }

    addError(id: string, message: string): void {
        this.mutable(id).errors.push(message);
        this.touch(id);
    }

    addWarning(id: string, message: string): void {
        this.mutable(id).warnings.push(message);
        this.touch(id);
    }

    addContainer(id: string, containerName: string): void {
        this.mutable(id).containers.push(containerName);
        this.touch(id);
    }

    trackScript(id: string, label: string): void {
        this.mutable(id).scriptsRunning.push(label);
        this.touch(id);
    }

    completeScript(id: string, label: string): void {
        const operation = this.mutable(id);
        const index = operation.scriptsRunning.indexOf(label);
        if (index >= 0) {
            operation.scriptsRunning.splice(index, 1);
        }
        operation.scriptsCompleted.push(label);
        this.touch(id);
    }

    addDiagnostics(id: string, imageName: string, logs: string): void {
        this.mutable(id).diagnostics[imageName] = logs;
        this.touch(id);
    }

    complete(id: string): void {
        this.update(id, { status: "completed" });
    }

    fail(id: string, error: string): void {
        this.update(id, { status: "error",
            error });
    }

    /** Removes a record once the client no longer needs it. Returns false for unknown ids. */
    discard(id: string): boolean {
        return this.operations.delete(id);
    }

    private mutable(id: string): Operation {
        const operation = this.operations.get(id);
        if (!operation) {
            throw new OperationStateError(id, "not found");
        }
        if (isTerminal(operation.status)) {
            throw new OperationStateError(id, `already ${operation.status}`);
        }
        return operation;
    }

    private checkCounter(operation: Operation, counter: string, value: number | undefined): void {
        const name = COUNTERS_BY_KIND[operation.kind].find((allowed) => allowed === counter);
        if (!name) {
            throw new OperationStateError(operation.id, `${operation.kind} has no counter "${counter}"`);
        }
        const current = operation.counters[name] ?? 0;
        if (value === undefined || !Number.isInteger(value) || value < current) {
            throw new OperationStateError(operation.id, `counter ${counter} cannot go from ${current} to ${String(value)}`);
        }
    }

    private touch(id: string): void {
        const operation = this.operations.get(id);
        if (operation) {
            this.emitUpdate(operation);
        }
    }

    private emitUpdate(operation: Operation): void {
        this.emit("update", snapshot(operation));
    }
}
