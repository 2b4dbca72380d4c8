import assert from "node:assert/strict";
import test from "node:test";
import { LifecycleController, StartFailed, StopFailed } from "../../backend/lifecycle/controller.js";
import { HookRunner, ScriptExecutor } from "../../backend/lifecycle/hooks.js";
import { PortProbe } from "../../backend/runtime/ports.js";
import { ValidationError } from "../../backend/util-server.js";
import { FakeRuntime } from "../helpers/fake-runtime.js";
import { BASIC_CATALOG, catalogFrom, makeTempDir, recordingExecutor, removeDir, withEnv } from "../helpers/fixtures.js";

const catalog = catalogFrom(BASIC_CATALOG);

function setup(executor: ScriptExecutor = recordingExecutor().executor, portInUse: PortProbe = async () => false) {
    const root = makeTempDir();
    const runtime = new FakeRuntime();
    const hooks = new HookRunner({ scriptsDir: `${root}/scripts`,
        sharedDir: `${root}/shared`,
        timeoutMs: 1000,
        executor });
    const controller = new LifecycleController(runtime, hooks, {
        prefix: "playpen",
        networkName: "playpen-network",
        sharedDir: `${root}/shared`,
        projectRoot: root,
        healthCheckIntervalMs: 1,
        healthCheckAttempts: 3,
    }, portInUse);
    return { root,
        runtime,
        controller };
}

test("start applies the spec and waits for running", async () => {
    const { root, runtime, controller } = setup();
    try {
        const result = await controller.start(catalog, "alpine");

        assert.deepEqual(result, { outcome: "started",
            containerName: "playpen-alpine",
            degraded: false,
            warnings: [],
            diagnostics: undefined });
        assert.deepEqual(runtime.calls, [ "network playpen-network", "apply playpen-alpine" ]);
        assert.equal(runtime.containers.get("playpen-alpine")?.labels["playpen.image"], "alpine");
        assert.equal(controller.getState("alpine"), "Running");
    } finally {
        removeDir(root);
    }
});

test("start removes a stale container first", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.seed("playpen-alpine", "exited");
        await controller.start(catalog, "alpine");

        assert.deepEqual(runtime.calls, [ "remove playpen-alpine force", "network playpen-network", "apply playpen-alpine" ]);
    } finally {
        removeDir(root);
    }
});

test("start recreates a running container by default", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.seed("playpen-alpine", "running");
        const result = await controller.start(catalog, "alpine");

        assert.equal(result.outcome, "started");
        assert.equal(runtime.calls[0], "remove playpen-alpine force");
    } finally {
        removeDir(root);
    }
});

test("start with ifRunning skip leaves a running container alone", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.seed("playpen-alpine", "running");
        const result = await controller.start(catalog, "alpine", { ifRunning: "skip" });

        assert.equal(result.outcome, "already_running");
        assert.deepEqual(runtime.calls, []);
    } finally {
        removeDir(root);
    }
});

test("a container that exits during start fails the start and is cleaned up", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.stateOnApply.set("playpen-alpine", "exited");

        await assert.rejects(controller.start(catalog, "alpine"), (e: unknown) => {
            assert.ok(e instanceof StartFailed);
            assert.equal(e.message, "Failed to start alpine: container exited during start");
            assert.equal(e.diagnostics, "logs of playpen-alpine");
            return true;
        });
        assert.equal(runtime.containers.has("playpen-alpine"), false);
        assert.deepEqual(runtime.calls.slice(-2), [ "remove playpen-alpine force", "discard playpen-alpine" ]);
        assert.equal(controller.getState("alpine"), "Idle");
    } finally {
        removeDir(root);
    }
});

test("a health-check timeout is a degraded start, not a failure", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.stateOnApply.set("playpen-alpine", "created");
        const result = await controller.start(catalog, "alpine");

        assert.equal(result.outcome, "started");
        assert.equal(result.degraded, true);
        assert.equal(result.diagnostics, "logs of playpen-alpine");
        assert.deepEqual(result.warnings, [ "alpine: container not running after 0.003s, left running (degraded)" ]);
        assert.equal(runtime.containers.get("playpen-alpine")?.state, "created");
    } finally {
        removeDir(root);
    }
});

test("an apply failure is a StartFailed", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.failApply.add("playpen-alpine");

        await assert.rejects(controller.start(catalog, "alpine"), {
            name: "StartFailed",
            message: "Failed to start alpine: image alpine:3.20 not found",
        });
        assert.equal(controller.getState("alpine"), "Idle");
    } finally {
        removeDir(root);
    }
});

test("a failing post_start hook becomes a warning", async () => {
    const { executor, runs } = recordingExecutor(1, "boom");
    const { root, controller } = setup(executor);
    try {
        const hookEvents: string[] = [];
        const result = await controller.start(catalog, "php-stack", {
            listener: {
                hookStarted: (label) => hookEvents.push(`start ${label}`),
                hookFinished: (label) => hookEvents.push(`finish ${label}`),
            },
        });

        assert.equal(result.outcome, "started");
        assert.deepEqual(result.warnings, [ "post_start hook for php-stack failed: exit code 1: boom" ]);
        assert.deepEqual(hookEvents, [ "start php-stack:post_start", "finish php-stack:post_start" ]);
        assert.deepEqual(runs[0].args, [ "php-stack" ]);
    } finally {
        removeDir(root);
    }
});

test("start of an unknown image is a ValidationError", async () => {
    const { root, controller } = setup();
    try {
        await assert.rejects(controller.start(catalog, "nope"), ValidationError);
    } finally {
        removeDir(root);
    }
});

test("stop runs pre_stop and gives a longer grace period", async () => {
    const { executor, runs } = recordingExecutor();
    const { root, runtime, controller } = setup(executor);
    try {
        runtime.seed("playpen-postgres", "running");
        const result = await controller.stop(catalog, "postgres");

        assert.deepEqual(result, { outcome: "stopped",
            containerName: "playpen-postgres",
            warnings: [] });
        assert.equal(runs.length, 1);
        assert.deepEqual(runtime.calls, [ "stop playpen-postgres 30", "remove playpen-postgres", "discard playpen-postgres" ]);
        assert.equal(controller.getState("postgres"), "Idle");
    } finally {
        removeDir(root);
    }
});

test("stop without a pre_stop hook uses the default grace period", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.seed("playpen-alpine", "running");
        await controller.stop(catalog, "alpine");

        assert.equal(runtime.calls[0], "stop playpen-alpine 10");
    } finally {
        removeDir(root);
    }
});

test("stop of a missing container is StopFailed(not_found)", async () => {
    const { root, controller } = setup();
    try {
        await assert.rejects(controller.stop(catalog, "alpine"), (e: unknown) => {
            assert.ok(e instanceof StopFailed);
            assert.equal(e.reason, "not_found");
            assert.equal(e.message, "Failed to stop alpine: container playpen-alpine does not exist");
            return true;
        });
    } finally {
        removeDir(root);
    }
});

test("stop of an exited container removes it and reports not_running", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.seed("playpen-alpine", "exited");
        const result = await controller.stop(catalog, "alpine");

        assert.equal(result.outcome, "not_running");
        assert.deepEqual(runtime.calls, [ "remove playpen-alpine", "discard playpen-alpine" ]);
    } finally {
        removeDir(root);
    }
});

test("a runtime error while stopping is StopFailed(runtime)", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.seed("playpen-alpine", "running");
        runtime.failStop.add("playpen-alpine");

        await assert.rejects(controller.stop(catalog, "alpine"), (e: unknown) => {
            assert.ok(e instanceof StopFailed);
            assert.equal(e.reason, "runtime");
            return true;
        });
        assert.equal(controller.getState("alpine"), "Failed");
    } finally {
        removeDir(root);
    }
});

test("restart only touches running containers", async () => {
    const { root, runtime, controller } = setup();
    try {
        assert.equal((await controller.restart(catalog, "alpine")).outcome, "not_running");

        runtime.seed("playpen-alpine", "running");
        const result = await controller.restart(catalog, "alpine");

        assert.equal(result.outcome, "restarted");
        assert.deepEqual(runtime.calls, [
            "stop playpen-alpine 10",
            "remove playpen-alpine",
            "discard playpen-alpine",
            "network playpen-network",
            "apply playpen-alpine",
        ]);
        assert.equal(runtime.containers.get("playpen-alpine")?.state, "running");
    } finally {
        removeDir(root);
    }
});

test("cleanup force-removes whatever is there", async () => {
    const { root, runtime, controller } = setup();
    try {
        runtime.seed("playpen-alpine", "paused");
        const result = await controller.cleanup(catalog, "alpine");

        assert.equal(result.outcome, "removed");
        assert.deepEqual(runtime.calls, [ "remove playpen-alpine force", "discard playpen-alpine" ]);
        await assert.rejects(controller.cleanup(catalog, "alpine"), StopFailed);
    } finally {
        removeDir(root);
    }
});

test("start then stop leaves nothing labelled for the image", async () => {
    const { root, runtime, controller } = setup();
    try {
        await controller.start(catalog, "php-stack");
        assert.equal((await runtime.listManaged("playpen.managed")).length, 1);

        await controller.stop(catalog, "php-stack");
        assert.deepEqual(await runtime.listManaged("playpen.managed"), []);
    } finally {
        removeDir(root);
    }
});

const PORTS_CATALOG = catalogFrom(`
images:
  db:
    image: postgres:16
    ports: ["5432:5432", "127.0.0.1:8080:80/tcp"]
  db-copy:
    image: postgres:16
    ports: ["5432:5432"]
`);

test("published ports held elsewhere fail the start before anything is applied", async () => {
    const { root, runtime, controller } = setup(undefined, async (port) => port === 8080);
    try {
        runtime.publishedPorts.set(5432, "other-db");

        await assert.rejects(controller.start(PORTS_CATALOG, "db"), (e: unknown) => {
            assert.ok(e instanceof StartFailed);
            assert.equal(e.message, "Failed to start db: Port conflicts: 5432 (used by other-db), 8080 (used by host system)");
            return true;
        });
        assert.deepEqual(runtime.calls, []);
        assert.equal(controller.getState("db"), "Idle");
    } finally {
        removeDir(root);
    }
});

test("a port published by another managed container is a conflict", async () => {
    const probed: number[] = [];
    const { root, runtime, controller } = setup(undefined, async (port) => {
        probed.push(port);
        return false;
    });
    try {
        await controller.start(PORTS_CATALOG, "db");
        assert.deepEqual(probed, [ 5432, 8080 ]);

        await assert.rejects(controller.start(PORTS_CATALOG, "db-copy"), {
            name: "StartFailed",
            message: "Failed to start db-copy: Port conflicts: 5432 (used by playpen-db)",
        });
        assert.equal(runtime.containers.has("playpen-db-copy"), false);
    } finally {
        removeDir(root);
    }
});

test("restarting an image does not conflict with its own ports", async () => {
    const { root, runtime, controller } = setup();
    try {
        await controller.start(PORTS_CATALOG, "db");
        const result = await controller.restart(PORTS_CATALOG, "db");

        assert.equal(result.outcome, "restarted");
        assert.equal(runtime.containers.get("playpen-db")?.state, "running");
    } finally {
        removeDir(root);
    }
});

test("a hook that cannot write its temporary script still lets start and stop finish", async () => {
    const { executor, runs } = recordingExecutor();
    const { root, runtime, controller } = setup(executor);
    try {
        runtime.seed("playpen-postgres", "running");
        const started = await withEnv("TMPDIR", "/nonexistent/tmp", () => controller.start(catalog, "php-stack"));
        const stopped = await withEnv("TMPDIR", "/nonexistent/tmp", () => controller.stop(catalog, "postgres"));

        assert.equal(started.outcome, "started");
        assert.equal(started.warnings.length, 1);
        assert.match(started.warnings[0], /^post_start hook for php-stack failed: ENOENT/);
        assert.equal(controller.getState("php-stack"), "Running");
        assert.equal(runtime.containers.get("playpen-php-stack")?.state, "running");

        assert.equal(stopped.outcome, "stopped");
        assert.equal(stopped.warnings.length, 1);
        assert.match(stopped.warnings[0], /^pre_stop hook for postgres failed: ENOENT/);
        assert.equal(runtime.containers.has("playpen-postgres"), false);
        assert.equal(runs.length, 0);
    } finally {
        removeDir(root);
    }
});
