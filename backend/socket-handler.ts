import { PlaypenServer } from "./server.js";
import { PlaypenSocket } from "./util-server.js";

export abstract class SocketHandler {
    abstract create(socket : PlaypenSocket, server : PlaypenServer): void;
}
