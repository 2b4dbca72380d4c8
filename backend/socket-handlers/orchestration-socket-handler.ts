import { SocketHandler } from "../socket-handler.js";
import { PlaypenServer } from "../server.js";
import { callbackError, callbackResult, PlaypenSocket, ValidationError } from "../util-server.js";
import { OrchestrationApi } from "../operations/service.js";

type OperationRequest = (service : OrchestrationApi, name : string) => Promise<string>;

const IMAGE_EVENTS: Record<string, OperationRequest> = {
    startImage: (service, name) => service.start(name),
    stopImage: (service, name) => service.stop(name),
    restartImage: (service, name) => service.restart(name),
    cleanupImage: (service, name) => service.cleanup(name),
};

const GROUP_EVENTS: Record<string, OperationRequest> = {
    startGroup: (service, name) => service.startGroup(name),
    stopGroup: (service, name) => service.stopGroup(name),
    startCategory: (service, name) => service.startCategory(name),
};

const BULK_EVENTS: Record<string, (service : OrchestrationApi) => Promise<string>> = {
    stopAll: (service) => service.stopAll(),
    restartAll: (service) => service.restartAll(),
    cleanupAll: (service) => service.cleanupAll(),
};

function optionalTail(value : unknown): number | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof(value) !== "number" || !Number.isInteger(value) || value < 1) {
        throw new ValidationError("Tail must be a positive integer");
    }
    return value;
}

function requireString(value : unknown, what : string): string {
    if (typeof(value) !== "string" || value.length === 0) {
        throw new ValidationError(`${what} must be a non-empty string`);
    }
    return value;
}

export class OrchestrationSocketHandler extends SocketHandler {
    create(socket : PlaypenSocket, server : PlaypenServer) {

        for (const [ event, request ] of Object.entries(IMAGE_EVENTS)) {
            socket.on(event, async (imageName : unknown, callback) => {
                try {
                    const operationId = await request(server.service, requireString(imageName, "Image name"));
                    callbackResult({ operationId }, callback);
                } catch (e) {
                    callbackError(e, callback);
                }
            });
        }

        for (const [ event, request ] of Object.entries(GROUP_EVENTS)) {
            socket.on(event, async (groupName : unknown, callback) => {
                try {
                    const what = event === "startCategory" ? "Category name" : "Group name";
                    const operationId = await request(server.service, requireString(groupName, what));
                    callbackResult({ operationId }, callback);
                } catch (e) {
                    callbackError(e, callback);
                }
            });
        }

        for (const [ event, request ] of Object.entries(BULK_EVENTS)) {
            socket.on(event, async (callback) => {
                try {
                    const operationId = await request(server.service);
                    callbackResult({ operationId }, callback);
                } catch (e) {
                    callbackError(e, callback);
                }
            });
        }

        socket.on("operationStatus", async (operationId : unknown, callback) => {
            try {
                const lookup = await server.service.operationStatus(requireString(operationId, "Operation id"));
                callbackResult({ ...lookup }, callback);
            } catch (e) {
                callbackError(e, callback);
            }
        });

        socket.on("discardOperation", async (operationId : unknown, callback) => {
            try {
                const discarded = await server.service.discardOperation(requireString(operationId, "Operation id"));
                callbackResult({ discarded }, callback);
            } catch (e) {
                callbackError(e, callback);
            }
        });

        socket.on("containerLogs", async (imageName : unknown, tail : unknown, callback) => {
            try {
                const logs = await server.service.logs(requireString(imageName, "Image name"), optionalTail(tail));
                callbackResult({ logs }, callback);
            } catch (e) {
                callbackError(e, callback);
            }
        });

        socket.on("getCatalog", async (callback) => {
            try {
                callbackResult({ catalog: server.service.summarizeCatalog() }, callback);
            } catch (e) {
                callbackError(e, callback);
            }
        });

        socket.on("reloadCatalog", async (callback) => {
            try {
                server.service.reloadCatalog();
                callbackResult({ catalog: server.service.summarizeCatalog() }, callback);
            } catch (e) {
                callbackError(e, callback);
            }
        });

        socket.on("groupStatus", async (groupName : unknown, callback) => {
            try {
                const group = await server.service.groupStatus(requireString(groupName, "Group name"));
                callbackResult({ group }, callback);
            } catch (e) {
                callbackError(e, callback);
            }
        });
    }
}
