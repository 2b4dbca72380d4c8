import http from "http";
import { Server } from "socket.io";
import { OrchestrationService } from "./operations/service.js";
import { Operation } from "./operations/types.js";
import { SocketHandler } from "./socket-handler.js";
import { OrchestrationSocketHandler } from "./socket-handlers/orchestration-socket-handler.js";
import { log } from "./log.js";

/**
 * socket.io front of an OrchestrationService. Operation changes are pushed to every
 * client as "operationUpdate".
 */
export class PlaypenServer {
    readonly httpServer: http.Server;
    readonly io: Server;
    private socketHandlers: SocketHandler[] = [
        new OrchestrationSocketHandler(),
    ];
    private forwardUpdate = (operation: Operation) => {
        this.io.emit("operationUpdate", operation);
    };

    constructor(readonly service: OrchestrationService) {
        this.httpServer = http.createServer();
        this.io = new Server(this.httpServer, {
            cors: { origin: "*" },
        });

        this.io.on("connection", (socket) => {
            log.info("server", `Socket connected: ${socket.id}`);
            for (const socketHandler of this.socketHandlers) {
                socketHandler.create(socket, this);
            }
            socket.on("disconnect", (reason) => {
                log.debug("server", `Socket ${socket.id} disconnected: ${reason}`);
            });
        });

        this.service.tracker.on("update", this.forwardUpdate);
    }

    /** Resolves with the bound port (useful with port 0). */
    listen(port: number, host?: string): Promise<number> {
        return new Promise((resolve, reject) => {
            this.httpServer.once("error", reject);
            this.httpServer.listen(port, host, () => {
                this.httpServer.off("error", reject);
                const address = this.httpServer.address();
                const bound = address !== null && typeof address === "object" ? address.port : port;
                log.info("server", `Listening on port ${bound}`);
                resolve(bound);
            });
        });
    }

    /** Waits for in-flight operations, then closes every connection. */
    async shutdown(): Promise<void> {
        log.info("server", "Shutting down");
        this.service.tracker.off("update", this.forwardUpdate);
        await this.service.drain();
        await new Promise<void>((resolve, reject) => {
            this.io.close((err) => {
                if (err) {
                    reject(err);
                } else {
                    resolve();
                }
            });
        });
    }
}
