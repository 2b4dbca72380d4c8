import { OrchestrationApi } from "../operations/service.js";
import { Operation, OperationKind, isGroupKind } from "../operations/types.js";
import { AbortError, sleep } from "../lifecycle/retry.js";
import { errorMessage } from "../util-server.js";
import { log } from "../log.js";

/** `timeout` and `aborted` only ever exist on the client; the server never stores them. */
export type PollOutcome = "completed" | "error" | "timeout" | "aborted" | "not_found";

export interface PollOperationResult {
    outcome: PollOutcome;
    /** Last record seen, if any. */
    operation?: Operation;
    attempts: number;
}

export interface PollOperationOptions {
    intervalMs?: number;
    /** Overrides the budget picked from the operation kind. */
    maxAttempts?: number;
    signal?: AbortSignal;
    onUpdate?: (operation: Operation) => void;
}

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const SINGLE_POLL_ATTEMPTS = 300;
export const GROUP_POLL_ATTEMPTS = 1800;

export function attemptBudget(kind: OperationKind, target: string): number {
    return isGroupKind(kind, target) ? GROUP_POLL_ATTEMPTS : SINGLE_POLL_ATTEMPTS;
}

/**
 * Polls operationStatus until the operation is terminal, disappears, the attempt budget
 * runs out or the signal aborts. A failed status request uses up an attempt.
 */
export async function pollOperation(
    api: Pick<OrchestrationApi, "operationStatus">,
    operationId: string,
    options: PollOperationOptions = {},
): Promise<PollOperationResult> {
    const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    let budget = options.maxAttempts ?? SINGLE_POLL_ATTEMPTS;
    let last: Operation | undefined;

    for (let attempt = 1; attempt <= budget; attempt++) {
        if (options.signal?.aborted) {
            return { outcome: "aborted",
                operation: last,
                attempts: attempt - 1 };
        }

        try {
            const lookup = await api.operationStatus(operationId);
            if (!lookup.found) {
                return { outcome: "not_found",
                    attempts: attempt };
            }
            last = lookup.operation;
            if (options.maxAttempts === undefined) {
                budget = attemptBudget(last.kind, last.target);
            }
            options.onUpdate?.(last);
            if (last.status !== "running") {
                return { outcome: last.status,
                    operation: last,
                    attempts: attempt };
            }
        } catch (e) {
            log.warn("poller", `Status request for ${operationId} failed (attempt ${attempt}/${budget}): ${errorMessage(e)}`);
        }

        if (attempt < budget) {
            try {
                await sleep(intervalMs, options.signal);
            } catch (e) {
                if (e instanceof AbortError) {
                    return { outcome: "aborted",
                        operation: last,
                        attempts: attempt };
                }
                throw e;
            }
        }
    }

    return { outcome: "timeout",
        operation: last,
        attempts: budget };
}
