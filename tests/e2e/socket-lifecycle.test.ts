import assert from "node:assert/strict";
import test from "node:test";
import { PlaypenServer } from "../../backend/server.js";
import { OrchestrationService } from "../../backend/operations/service.js";
import { Operation } from "../../backend/operations/types.js";
import { PlaypenClient, RemoteError } from "../../backend/client/socket-client.js";
import { pollOperation } from "../../backend/client/operation-poller.js";
import { FakeRuntime } from "../helpers/fake-runtime.js";
import { BASIC_CATALOG, catalogFrom, makeTempDir, recordingExecutor, removeDir, testConfig } from "../helpers/fixtures.js";

interface ServerHandle {
    server: PlaypenServer;
    client: PlaypenClient;
    runtime: FakeRuntime;
    root: string;
}

async function startServer(): Promise<ServerHandle> {
    const root = makeTempDir();
    const runtime = new FakeRuntime();
    const service = new OrchestrationService({
        config: testConfig(root),
        runtime,
        catalog: catalogFrom(BASIC_CATALOG),
        hookExecutor: recordingExecutor().executor,
    });
    const server = new PlaypenServer(service);
    const port = await server.listen(0, "127.0.0.1");
    const client = new PlaypenClient(`http://127.0.0.1:${port}`, { timeoutMs: 5000 });
    await client.connect();
    return { server,
        client,
        runtime,
        root };
}

async function stopServer(handle: ServerHandle): Promise<void> {
    handle.client.close();
    await handle.server.shutdown();
    removeDir(handle.root);
}

test("start and stop an image over the socket", async () => {
    const handle = await startServer();
    try {
        const { client, runtime } = handle;
        const pushed: Operation[] = [];
        const unsubscribe = client.onOperationUpdate((operation) => pushed.push(operation));

        const startId = await client.start("alpine");
        const started = await pollOperation(client, startId, { intervalMs: 10 });

        assert.equal(started.outcome, "completed");
        assert.deepEqual(started.operation?.counters, { started: 1,
            already_running: 0,
            failed: 0 });
        assert.equal(runtime.containers.get("playpen-alpine")?.state, "running");

        const stopId = await client.stop("alpine");
        const stopped = await pollOperation(client, stopId, { intervalMs: 10 });

        assert.equal(stopped.outcome, "completed");
        assert.deepEqual(stopped.operation?.counters, { stopped: 1,
            not_running: 0,
            failed: 0 });
        assert.equal(runtime.containers.size, 0);

        assert.equal(await client.discardOperation(startId), true);
        assert.deepEqual(await client.operationStatus(startId), { found: false });

        unsubscribe();
        assert.ok(pushed.some((operation) => operation.id === startId && operation.status === "completed"));
    } finally {
        await stopServer(handle);
    }
});

test("group start reports progress and warnings", async () => {
    const handle = await startServer();
    try {
        const { client } = handle;
        const id = await client.startGroup("web");
        const result = await pollOperation(client, id, { intervalMs: 10 });

        assert.equal(result.outcome, "completed");
        assert.equal(result.operation?.total, 2);
        assert.deepEqual(result.operation?.warnings, [ "ghost: not in catalog, skipped" ]);

        const group = await client.groupStatus("web");
        assert.equal(group.running, 2);
    } finally {
        await stopServer(handle);
    }
});

test("errors come back as RemoteError with the server's type", async () => {
    const handle = await startServer();
    try {
        const { client } = handle;

        await assert.rejects(client.start("nope"), (e: unknown) => {
            assert.ok(e instanceof RemoteError);
            assert.equal(e.type, "ValidationError");
            assert.equal(e.message, "Unknown image: nope");
            return true;
        });
        await assert.rejects(client.start(""), { message: "Image name must be a non-empty string" });

        const missing = await client.groupStatus("web").then((group) => group.missing);
        assert.deepEqual(missing, [ "ghost" ]);

        const unknownGroup = await pollOperation(client, await client.startGroup("nope"), { intervalMs: 10 });
        assert.equal(unknownGroup.outcome, "error");
        assert.equal(unknownGroup.operation?.error, "Unknown group: nope");
    } finally {
        await stopServer(handle);
    }
});

test("getCatalog returns the catalog summary", async () => {
    const handle = await startServer();
    try {
        const catalog = await handle.client.getCatalog();

        assert.deepEqual(catalog.images.map((image) => image.name), [ "alpine", "php-stack", "postgres" ]);
        assert.deepEqual(catalog.categories, [ "base", "database", "stack" ]);
    } finally {
        await stopServer(handle);
    }
});

test("start a category and read a container's logs over the socket", async () => {
    const handle = await startServer();
    try {
        const { client, runtime } = handle;
        const result = await pollOperation(client, await client.startCategory("database"), { intervalMs: 10 });

        assert.equal(result.outcome, "completed");
        assert.equal(result.operation?.kind, "start_group");
        assert.deepEqual(result.operation?.counters, { started: 1,
            already_running: 0,
            failed: 0 });

        assert.equal(await client.logs("postgres"), "logs of playpen-postgres");
        assert.equal(await client.logs("postgres", 5), "logs of playpen-postgres");
        assert.deepEqual(runtime.logRequests, [ "playpen-postgres 100", "playpen-postgres 5" ]);

        await assert.rejects(client.logs("alpine"), { message: "Container playpen-alpine does not exist" });
        await assert.rejects(client.logs("postgres", 0), { message: "Tail must be a positive integer" });
        await assert.rejects(client.startCategory(""), { message: "Category name must be a non-empty string" });
    } finally {
        await stopServer(handle);
    }
});
