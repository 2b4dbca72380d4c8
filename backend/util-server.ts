import { Socket } from "socket.io";
import { log } from "./log.js";

export type PlaypenSocket = Socket;

/**
 * Error caused by caller input; reported back to the caller as-is.
 */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ValidationError";
    }
}

export function callbackResult(result: Record<string, unknown>, callback: unknown): void {
    if (typeof callback === "function") {
        callback({ ok: true,
            ...result });
    }
}

export function callbackError(error: unknown, callback: unknown): void {
    if (typeof callback !== "function") {
        log.error("console", "Callback is not a function");
        return;
    }

    if (error instanceof Error) {
        callback({
            ok: false,
            msg: error.message,
            type: error.name,
        });
    } else {
        log.debug("console", "Unknown error: " + String(error));
        callback({
            ok: false,
            msg: String(error),
        });
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
