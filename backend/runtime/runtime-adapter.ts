import { ContainerStatus, RuntimeCapabilities, RuntimeSpec } from "./types.js";

/**
 * Point-in-time access to the container runtime. Nothing here waits for a state change;
 * callers poll `inspect` when they need to.
 */
export abstract class RuntimeAdapter {
    abstract ensureNetwork(networkName: string): Promise<void>;
    /** Creates and starts every service of the spec under the given compose project. */
    abstract apply(spec: RuntimeSpec): Promise<void>;
    /** Returns null when no container with that name exists. */
    abstract inspect(containerName: string): Promise<ContainerStatus | null>;
    abstract stop(containerName: string, timeoutSeconds: number): Promise<void>;
    abstract remove(containerName: string, force?: boolean): Promise<void>;
    /** Drops whatever the adapter stored for a compose project once its container is gone. */
    abstract discard(projectName: string): Promise<void>;
    abstract listManaged(labelKey: string): Promise<ContainerStatus[]>;
    /** Host ports published by running containers, mapped to the container holding each. */
    abstract portOwners(): Promise<Map<number, string>>;
    abstract logs(containerName: string, tail?: number): Promise<string>;
    abstract getCapabilities(): Promise<RuntimeCapabilities>;
}
