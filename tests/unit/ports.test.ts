import assert from "node:assert/strict";
import net from "node:net";
import test from "node:test";
import { hostPorts, isHostPortInUse, parsePublishedPorts } from "../../backend/runtime/ports.js";

test("hostPorts reads the host side of a mapping", () => {
    assert.deepEqual(hostPorts("5432:5432"), [ 5432 ]);
    assert.deepEqual(hostPorts("127.0.0.1:8080:80/tcp"), [ 8080 ]);
    assert.deepEqual(hostPorts("9000-9002:9000-9002"), [ 9000, 9001, 9002 ]);
    assert.deepEqual(hostPorts("80"), []);
    assert.deepEqual(hostPorts("53/udp"), []);
});

test("parsePublishedPorts reads the docker ps Ports column", () => {
    assert.deepEqual(parsePublishedPorts("0.0.0.0:5432->5432/tcp, :::5432->5432/tcp"), [ 5432 ]);
    assert.deepEqual(parsePublishedPorts("127.0.0.1:8080->80/tcp, 0.0.0.0:9000-9001->9000-9001/tcp"), [ 8080, 9000, 9001 ]);
    assert.deepEqual(parsePublishedPorts("6379/tcp"), []);
    assert.deepEqual(parsePublishedPorts(""), []);
});

test("isHostPortInUse sees a listening socket", async () => {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    assert.ok(address !== null && typeof address === "object");
    try {
        assert.equal(await isHostPortInUse(address.port), true);
    } finally {
        await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    assert.equal(await isHostPortInUse(address.port), false);
});
