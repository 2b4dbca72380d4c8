export type OperationKind = "start" | "stop" | "start_group" | "stop_group" | "restart" | "cleanup";

export type OperationStatus = "running" | "completed" | "error";

export type CounterName = "started" | "already_running" | "stopped" | "not_running" | "restarted" | "removed" | "failed";

export const COUNTERS_BY_KIND: Readonly<Record<OperationKind, readonly CounterName[]>> = {
    start: [ "started", "already_running", "failed" ],
    start_group: [ "started", "already_running", "failed" ],
    stop: [ "stopped", "not_running", "failed" ],
    stop_group: [ "stopped", "not_running", "failed" ],
    restart: [ "restarted", "not_running", "failed" ],
    cleanup: [ "removed", "failed" ],
};

export type Counters = Partial<Record<CounterName, number>>;

export interface Operation {
    id: string;
    kind: OperationKind;
    /** Image name, group name, or "*" for the bulk variants. */
    target: string;
    status: OperationStatus;
    counters: Counters;
    total: number;
    startedAt: string;
    completedAt?: string;
    errors: string[];
    warnings: string[];
    /** Containers processed successfully. */
    containers: string[];
    skipped: boolean;
    scriptsRunning: string[];
    scriptsCompleted: string[];
    /** Recent container logs captured when a member failed to start or came up degraded, by image. */
    diagnostics: Record<string, string>;
    /** Why the operation ended in error. */
    error?: string;
}

export type OperationLookup =
    | { found: true; operation: Operation }
    | { found: false };

export function isTerminal(status: OperationStatus): boolean {
    return status !== "running";
}

export function isGroupKind(kind: OperationKind, target: string): boolean {
    return kind === "start_group" || kind === "stop_group" || target === "*";
}
