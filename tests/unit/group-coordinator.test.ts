import assert from "node:assert/strict";
import test from "node:test";
import { LifecycleController } from "../../backend/lifecycle/controller.js";
import { GroupCoordinator, resolveMembers } from "../../backend/lifecycle/group-coordinator.js";
import { HookRunner } from "../../backend/lifecycle/hooks.js";
import { OperationTracker } from "../../backend/operations/tracker.js";
import { Group } from "../../backend/catalog/types.js";
import { FakeRuntime } from "../helpers/fake-runtime.js";
import { BASIC_CATALOG, catalogFrom, makeTempDir, recordingExecutor, removeDir } from "../helpers/fixtures.js";

const catalog = catalogFrom(BASIC_CATALOG);

function webGroup(): Group {
    const group = catalog.groups.get("web");
    assert.ok(group);
    return group;
}

function setup() {
    const root = makeTempDir();
    const runtime = new FakeRuntime();
    const tracker = new OperationTracker();
    const hooks = new HookRunner({ scriptsDir: `${root}/scripts`,
        sharedDir: `${root}/shared`,
        timeoutMs: 1000,
        executor: recordingExecutor().executor });
    const controller = new LifecycleController(runtime, hooks, {
        prefix: "playpen",
        networkName: "playpen-network",
        sharedDir: `${root}/shared`,
        projectRoot: root,
        healthCheckIntervalMs: 1,
        healthCheckAttempts: 3,
    });
    const coordinator = new GroupCoordinator(controller, tracker, runtime, "playpen");
    return { root,
        runtime,
        tracker,
        coordinator };
}

function operation(tracker: OperationTracker, id: string) {
    const lookup = tracker.get(id);
    assert.ok(lookup.found);
    return lookup.operation;
}

test("resolveMembers splits known and unknown members", () => {
    assert.deepEqual(resolveMembers(catalog, webGroup()), {
        members: [ "postgres", "php-stack" ],
        missing: [ "ghost" ],
    });
});

test("startGroup starts members in order and counts each outcome", async () => {
    const { root, runtime, tracker, coordinator } = setup();
    try {
        runtime.seed("playpen-postgres", "running");
        const id = tracker.create("start_group", "web", 0);

        await coordinator.startGroup(catalog, webGroup(), id);
        const op = operation(tracker, id);

        assert.equal(op.status, "completed");
        assert.equal(op.total, 2);
        assert.deepEqual(op.counters, { started: 1,
            already_running: 1,
            failed: 0 });
        assert.deepEqual(op.warnings, [ "ghost: not in catalog, skipped" ]);
        assert.deepEqual(op.containers, [ "playpen-postgres", "playpen-php-stack" ]);
        assert.deepEqual(op.scriptsRunning, []);
        assert.deepEqual(op.scriptsCompleted, [ "php-stack:post_start" ]);
        assert.deepEqual(runtime.calls, [ "network playpen-network", "apply playpen-php-stack" ]);
    } finally {
        removeDir(root);
    }
});

test("a failing member is counted and the rest continue", async () => {
    const { root, runtime, tracker, coordinator } = setup();
    try {
        runtime.failApply.add("playpen-postgres");
        const id = tracker.create("start_group", "web", 0);

        await coordinator.startGroup(catalog, webGroup(), id);
        const op = operation(tracker, id);

        assert.equal(op.status, "completed");
        assert.deepEqual(op.counters, { started: 1,
            already_running: 0,
            failed: 1 });
        assert.deepEqual(op.errors, [ "postgres: Failed to start postgres: image postgres:16 not found" ]);
        assert.ok(runtime.containers.has("playpen-php-stack"));
    } finally {
        removeDir(root);
    }
});

test("stopGroup goes in reverse order and counts absent members as not running", async () => {
    const { root, runtime, tracker, coordinator } = setup();
    try {
        runtime.seed("playpen-postgres", "running");
        const id = tracker.create("stop_group", "web", 0);

        await coordinator.stopGroup(catalog, webGroup(), id);
        const op = operation(tracker, id);

        assert.deepEqual(op.counters, { stopped: 1,
            not_running: 1,
            failed: 0 });
        assert.equal(op.total, 2);
        assert.deepEqual(runtime.calls, [ "stop playpen-postgres 30", "remove playpen-postgres", "discard playpen-postgres" ]);
    } finally {
        removeDir(root);
    }
});

test("a group with no resolvable members completes as skipped", async () => {
    const { root, tracker, coordinator } = setup();
    try {
        const id = tracker.create("start_group", "empty", 0);
        const group: Group = { name: "empty",
            description: "",
            containers: [ "ghost" ],
            source: "config.yml" };

        await coordinator.startGroup(catalog, group, id);
        const op = operation(tracker, id);

        assert.equal(op.status, "completed");
        assert.equal(op.skipped, true);
        assert.equal(op.total, 0);
        assert.deepEqual(op.warnings, [ "ghost: not in catalog, skipped" ]);
    } finally {
        removeDir(root);
    }
});

test("stopAll walks every catalog image", async () => {
    const { root, runtime, tracker, coordinator } = setup();
    try {
        runtime.seed("playpen-alpine", "running");
        runtime.seed("playpen-php-stack", "exited");
        const id = tracker.create("stop_group", "*", 0);

        await coordinator.runBulk(catalog, "stop", id);
        const op = operation(tracker, id);

        assert.equal(op.total, 3);
        assert.deepEqual(op.counters, { stopped: 1,
            not_running: 2,
            failed: 0 });
        assert.equal(runtime.containers.size, 0);
    } finally {
        removeDir(root);
    }
});

test("restartAll restarts only running images", async () => {
    const { root, runtime, tracker, coordinator } = setup();
    try {
        runtime.seed("playpen-alpine", "running");
        const id = tracker.create("restart", "*", 0);

        await coordinator.runBulk(catalog, "restart", id);

        assert.deepEqual(operation(tracker, id).counters, { restarted: 1,
            not_running: 2,
            failed: 0 });
    } finally {
        removeDir(root);
    }
});

test("cleanupAll removes every labelled container, known to the catalog or not", async () => {
    const { root, runtime, tracker, coordinator } = setup();
    try {
        runtime.seed("playpen-alpine", "running", { "playpen.managed": "true",
            "playpen.image": "alpine" });
        runtime.seed("playpen-retired", "exited", { "playpen.managed": "true",
            "playpen.image": "retired" });
        runtime.seed("someone-else", "running");
        const id = tracker.create("cleanup", "*", 0);

        await coordinator.runBulk(catalog, "cleanup", id);
        const op = operation(tracker, id);

        assert.equal(op.total, 2);
        assert.deepEqual(op.counters, { removed: 2,
            failed: 0 });
        assert.deepEqual([ ...runtime.containers.keys() ], [ "someone-else" ]);
    } finally {
        removeDir(root);
    }
});

test("cleanupAll with nothing to remove is skipped", async () => {
    const { root, tracker, coordinator } = setup();
    try {
        const id = tracker.create("cleanup", "*", 0);
        await coordinator.runBulk(catalog, "cleanup", id);
        const op = operation(tracker, id);

        assert.equal(op.status, "completed");
        assert.equal(op.skipped, true);
        assert.equal(op.total, 0);
    } finally {
        removeDir(root);
    }
});

test("a single stop of an absent container is counted as failed", async () => {
    const { root, tracker, coordinator } = setup();
    try {
        const id = tracker.create("stop", "alpine", 1);
        await coordinator.runMember(catalog, "stop", "alpine", id, { absentIsNotRunning: false });

        const op = operation(tracker, id);
        assert.deepEqual(op.counters, { stopped: 0,
            not_running: 0,
            failed: 1 });
        assert.deepEqual(op.errors, [ "alpine: Failed to stop alpine: container playpen-alpine does not exist" ]);
    } finally {
        removeDir(root);
    }
});
