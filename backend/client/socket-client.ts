import { io, Socket } from "socket.io-client";
import { CatalogSummary, GroupStatus, OrchestrationApi } from "../operations/service.js";
import { Operation, OperationLookup } from "../operations/types.js";

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
    return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isOperation(value: unknown): value is Operation {
    return isRecord(value)
        && typeof value.id === "string"
        && typeof value.kind === "string"
        && typeof value.target === "string"
        && (value.status === "running" || value.status === "completed" || value.status === "error")
        && isRecord(value.counters)
        && typeof value.total === "number"
        && Array.isArray(value.errors)
        && Array.isArray(value.warnings)
        && isRecord(value.diagnostics);
}

function isCatalogSummary(value: unknown): value is CatalogSummary {
    return isRecord(value)
        && Array.isArray(value.images)
        && Array.isArray(value.groups)
        && Array.isArray(value.categories)
        && Array.isArray(value.warnings);
}

function isGroupStatus(value: unknown): value is GroupStatus {
    return isRecord(value)
        && typeof value.name === "string"
        && Array.isArray(value.members)
        && typeof value.running === "number";
}

/** A request the server answered with `{ ok: false }`. */
export class RemoteError extends Error {
    constructor(message: string, readonly type?: string) {
        super(message);
        this.name = type ?? "RemoteError";
    }
}

export interface PlaypenClientOptions {
    /** Per-request ack timeout. */
    timeoutMs?: number;
}

/**
 * OrchestrationApi over socket.io. Each call emits one event and resolves with the ack.
 */
export class PlaypenClient implements OrchestrationApi {
    readonly socket: Socket;
    private timeoutMs: number;

    constructor(url: string, options: PlaypenClientOptions = {}) {
        this.socket = io(url, {
            transports: [ "websocket" ],
            reconnection: false,
        });
        this.timeoutMs = options.timeoutMs ?? 10_000;
    }

    connect(): Promise<void> {
        if (this.socket.connected) {
            return Promise.resolve();
        }
        return new Promise((resolve, reject) => {
            const onConnect = () => {
                this.socket.off("connect_error", onError);
                resolve();
            };
            const onError = (err: Error) => {
                this.socket.off("connect", onConnect);
                reject(new Error(`Cannot connect to playpen server: ${err.message}`));
            };
            this.socket.once("connect", onConnect);
            this.socket.once("connect_error", onError);
        });
    }

    close(): void {
        this.socket.close();
    }

    onOperationUpdate(listener: (operation: Operation) => void): () => void {
        const handler = (payload: unknown) => {
            if (isOperation(payload)) {
                listener(payload);
            }
        };
        this.socket.on("operationUpdate", handler);
        return () => {
            this.socket.off("operationUpdate", handler);
        };
    }

    private async request(event: string, ...args: unknown[]): Promise<JsonRecord> {
        const response: unknown = await this.socket.timeout(this.timeoutMs).emitWithAck(event, ...args);
        if (!isRecord(response)) {
            throw new RemoteError(`Malformed response to ${event}`);
        }
        if (response.ok !== true) {
            const msg = typeof response.msg === "string" ? response.msg : `${event} failed`;
            throw new RemoteError(msg, typeof response.type === "string" ? response.type : undefined);
        }
        return response;
    }

    private async requestOperation(event: string, ...args: unknown[]): Promise<string> {
        const response = await this.request(event, ...args);
        if (typeof response.operationId !== "string") {
            throw new RemoteError(`Missing operationId in response to ${event}`);
        }
        return response.operationId;
    }

    start(imageName: string): Promise<string> {
        return this.requestOperation("startImage", imageName);
    }

    stop(imageName: string): Promise<string> {
        return this.requestOperation("stopImage", imageName);
    }

    restart(imageName: string): Promise<string> {
        return this.requestOperation("restartImage", imageName);
    }

    cleanup(imageName: string): Promise<string> {
        return this.requestOperation("cleanupImage", imageName);
    }

    startGroup(groupName: string): Promise<string> {
        return this.requestOperation("startGroup", groupName);
    }

    startCategory(category: string): Promise<string> {
        return this.requestOperation("startCategory", category);
    }

    stopGroup(groupName: string): Promise<string> {
        return this.requestOperation("stopGroup", groupName);
    }

    stopAll(): Promise<string> {
        return this.requestOperation("stopAll");
    }

    restartAll(): Promise<string> {
        return this.requestOperation("restartAll");
    }

    cleanupAll(): Promise<string> {
        return this.requestOperation("cleanupAll");
    }

    async operationStatus(operationId: string): Promise<OperationLookup> {
        const response = await this.request("operationStatus", operationId);
        if (response.found === true && isOperation(response.operation)) {
            return { found: true,
                operation: response.operation };
        }
        return { found: false };
    }

    async discardOperation(operationId: string): Promise<boolean> {
        const response = await this.request("discardOperation", operationId);
        return response.discarded === true;
    }

    async logs(imageName: string, tail?: number): Promise<string> {
        const response = await this.request("containerLogs", imageName, tail ?? null);
        if (typeof response.logs !== "string") {
            throw new RemoteError("Malformed logs in response");
        }
        return response.logs;
    }

    async getCatalog(): Promise<CatalogSummary> {
        const response = await this.request("getCatalog");
        if (!isCatalogSummary(response.catalog)) {
            throw new RemoteError("Malformed catalog in response");
        }
        return response.catalog;
    }

    async reloadCatalog(): Promise<CatalogSummary> {
        const response = await this.request("reloadCatalog");
        if (!isCatalogSummary(response.catalog)) {
            throw new RemoteError("Malformed catalog in response");
        }
        return response.catalog;
    }

    async groupStatus(groupName: string): Promise<GroupStatus> {
        const response = await this.request("groupStatus", groupName);
        if (!isGroupStatus(response.group)) {
            throw new RemoteError("Malformed group status in response");
        }
        return response.group;
    }
}
