import net from "node:net";

const CONNECT_TIMEOUT_MS = 500;

function expandRange(raw: string): number[] {
    const [ from, to ] = raw.split("-").map((part) => Number.parseInt(part, 10));
    if (!Number.isInteger(from)) {
        return [];
    }
    if (to === undefined || !Number.isInteger(to) || to < from) {
        return [ from ];
    }
    const ports: number[] = [];
    for (let port = from; port <= to; port++) {
        ports.push(port);
    }
    return ports;
}

/**
 * Host ports a compose port mapping publishes. "8080:80", "127.0.0.1:8080:80/tcp" and
 * "9000-9001:9000-9001" all name their host side; a bare "80" publishes nothing fixed.
 */
export function hostPorts(mapping: string): number[] {
    const parts = mapping.split("/")[0].split(":");
    if (parts.length < 2) {
        return [];
    }
    return expandRange(parts[parts.length - 2]);
}

/** Reads the Ports column of `docker ps`, e.g. "0.0.0.0:5432->5432/tcp, :::5432->5432/tcp". */
export function parsePublishedPorts(raw: string): number[] {
    const ports = new Set<number>();
    for (const entry of raw.split(",")) {
        const arrow = entry.indexOf("->");
        if (arrow < 0) {
            continue;
        }
        const host = entry.substring(0, arrow).trim();
        for (const port of expandRange(host.substring(host.lastIndexOf(":") + 1))) {
            ports.add(port);
        }
    }
    return [ ...ports ];
}

/** True when something on this host accepts connections on the port. */
export function isHostPortInUse(port: number): Promise<boolean> {
    return new Promise((resolve) => {
        const socket = net.connect({ host: "127.0.0.1",
            port });
        const finish = (inUse: boolean) => {
            socket.destroy();
            resolve(inUse);
        };
        socket.setTimeout(CONNECT_TIMEOUT_MS);
        socket.once("connect", () => finish(true));
        socket.once("timeout", () => finish(false));
        socket.once("error", () => finish(false));
    });
}

export type PortProbe = (port: number) => Promise<boolean>;
