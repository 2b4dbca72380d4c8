#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { loadServerConfigFromEnvironment } from "./config.js";
import { DockerComposeAdapter } from "./runtime/docker/adapter.js";
import { CatalogSummary, DEFAULT_LOG_TAIL, GroupStatus, OrchestrationApi, OrchestrationService } from "./operations/service.js";
import { PlaypenClient } from "./client/socket-client.js";
import { pollOperation } from "./client/operation-poller.js";
import { PlaypenServer } from "./server.js";
import { getSupportedParams } from "./catalog/compose-params.js";
import { exitCodeFor, formatCatalog, formatGroups, formatGroupStatus, formatOperation, formatResult } from "./cli/output.js";
import { errorMessage } from "./util-server.js";
import { log } from "./log.js";

interface GlobalOptions {
    server?: string;
    interval: string;
    wait: boolean;
    verbose?: boolean;
}

/** What a command needs from either an in-process service or a remote server. */
interface Backend {
    api: OrchestrationApi;
    catalog(): Promise<CatalogSummary>;
    groupStatus(groupName: string): Promise<GroupStatus>;
    close(): Promise<void>;
}

const program = new Command();

function globalOptions(): GlobalOptions {
    return program.opts<GlobalOptions>();
}

async function openBackend(): Promise<Backend> {
    const { server } = globalOptions();
    if (server) {
        const client = new PlaypenClient(server);
        await client.connect();
        return {
            api: client,
            catalog: () => client.getCatalog(),
            groupStatus: (groupName) => client.groupStatus(groupName),
            close: async () => client.close(),
        };
    }

    const config = loadServerConfigFromEnvironment();
    const service = new OrchestrationService({
        config,
        runtime: new DockerComposeAdapter(config.runtimeDir),
    });
    return {
        api: service,
        catalog: async () => service.summarizeCatalog(),
        groupStatus: (groupName) => service.groupStatus(groupName),
        close: () => service.drain(),
    };
}

function safeAction<TArgs extends unknown[]>(fn: (...args: TArgs) => Promise<void>) {
    return async (...args: TArgs): Promise<void> => {
        try {
            await fn(...args);
        } catch (e) {
            console.error(chalk.red(`Error: ${errorMessage(e)}`));
            process.exitCode = 1;
        }
    };
}

/**
 * Sends one request and, unless --no-wait, follows the operation to its end. In-process
 * runs always wait, since the operation only lives as long as this process.
 */
async function runOperation(request: (api: OrchestrationApi) => Promise<string>): Promise<void> {
    const backend = await openBackend();
    const options = globalOptions();
    try {
        const operationId = await request(backend.api);
        if (options.server && !options.wait) {
            console.log(operationId);
            return;
        }

        const controller = new AbortController();
        const onSigint = () => controller.abort();
        process.once("SIGINT", onSigint);
        let lastStatus = "";
        const result = await pollOperation(backend.api, operationId, {
            intervalMs: Number(options.interval),
            signal: controller.signal,
            onUpdate: (operation) => {
                const line = `${operation.status} ${Object.entries(operation.counters).map(([ k, v ]) => `${k}=${v}`).join(" ")}`;
                if (line !== lastStatus) {
                    log.debug("cli", line);
                    lastStatus = line;
                }
            },
        });
        process.off("SIGINT", onSigint);

        const output = formatResult(operationId, result);
        if (exitCodeFor(result) === 0) {
            console.log(output);
        } else {
            console.error(output);
            process.exitCode = 1;
        }
        if (options.server && result.outcome !== "timeout" && result.outcome !== "aborted") {
            await backend.api.discardOperation(operationId);
        }
    } finally {
        await backend.close();
    }
}

program
    .name("playpen")
    .description("Start and stop disposable development containers from a layered YAML catalog")
    .option("-s, --server <url>", "drive a running playpen server instead of working in-process")
    .option("--interval <ms>", "status poll interval in milliseconds", "1000")
    .option("--no-wait", "print the operation id and return (with --server)")
    .option("-v, --verbose", "debug logging")
    .hook("preAction", () => {
        if (globalOptions().verbose) {
            log.setLevel("debug");
        }
    });

program
    .command("serve")
    .description("run the socket.io server")
    .option("-p, --port <port>", "port to listen on (default PLAYPEN_PORT or 5050)")
    .action(safeAction(async (options: { port?: string }) => {
        const config = loadServerConfigFromEnvironment();
        const runtime = new DockerComposeAdapter(config.runtimeDir);
        const capabilities = await runtime.getCapabilities();
        log.info("cli", `Using ${capabilities.runtimeName} ${capabilities.runtimeVersion ?? "unknown"}, compose ${capabilities.composeVersion ?? "unknown"}`);
        const service = new OrchestrationService({
            config,
            runtime,
        });
        const server = new PlaypenServer(service);
        const port = await server.listen(options.port ? Number(options.port) : config.port);
        console.log(chalk.green(`playpen listening on port ${port}`));

        const shutdown = () => {
            server.shutdown()
                .then(() => process.exit(0))
                .catch((e: unknown) => {
                    log.error("cli", `Shutdown failed: ${errorMessage(e)}`);
                    process.exit(1);
                });
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
    }));

program
    .command("list")
    .description("list catalog images by category")
    .option("-c, --category <name>", "only this category")
    .action(safeAction(async (options: { category?: string }) => {
        const backend = await openBackend();
        try {
            console.log(formatCatalog(await backend.catalog(), options.category));
        } finally {
            await backend.close();
        }
    }));

program
    .command("groups")
    .description("list groups, or show the member states of one group")
    .argument("[group]")
    .action(safeAction(async (groupName: string | undefined) => {
        const backend = await openBackend();
        try {
            if (groupName) {
                console.log(formatGroupStatus(await backend.groupStatus(groupName)));
            } else {
                console.log(formatGroups(await backend.catalog()));
            }
        } finally {
            await backend.close();
        }
    }));

program
    .command("params")
    .description("list compose parameters an image block may pass through")
    .action(safeAction(async () => {
        for (const [ key, description ] of Object.entries(getSupportedParams())) {
            console.log(`${chalk.cyan(key)}: ${description}`);
        }
    }));

const imageCommands: [string, string, (api: OrchestrationApi, image: string) => Promise<string>][] = [
    [ "start", "start an image (left alone when already running)", (api, image) => api.start(image) ],
    [ "stop", "stop and remove an image's container", (api, image) => api.stop(image) ],
    [ "restart", "restart a running image", (api, image) => api.restart(image) ],
    [ "cleanup", "force-remove an image's container", (api, image) => api.cleanup(image) ],
];

for (const [ name, description, request ] of imageCommands) {
    program
        .command(name)
        .description(description)
        .argument("<image>")
        .action(safeAction(async (image: string) => {
            await runOperation((api) => request(api, image));
        }));
}

const groupCommands: [string, string, (api: OrchestrationApi, group: string) => Promise<string>][] = [
    [ "start-group", "start every member of a group in order", (api, group) => api.startGroup(group) ],
    [ "stop-group", "stop every member of a group in reverse order", (api, group) => api.stopGroup(group) ],
    [ "start-category", "start every image of a category", (api, category) => api.startCategory(category) ],
];

for (const [ name, description, request ] of groupCommands) {
    program
        .command(name)
        .description(description)
        .argument(name === "start-category" ? "<category>" : "<group>")
        .action(safeAction(async (group: string) => {
            await runOperation((api) => request(api, group));
        }));
}

const bulkCommands: [string, string, (api: OrchestrationApi) => Promise<string>][] = [
    [ "stop-all", "stop every catalog image", (api) => api.stopAll() ],
    [ "restart-all", "restart every running catalog image", (api) => api.restartAll() ],
    [ "cleanup-all", "remove every managed container", (api) => api.cleanupAll() ],
];

for (const [ name, description, request ] of bulkCommands) {
    program
        .command(name)
        .description(description)
        .action(safeAction(async () => {
            await runOperation(request);
        }));
}

program
    .command("logs")
    .description("print the recent output of an image's container")
    .argument("<image>")
    .option("-n, --tail <lines>", "number of lines", String(DEFAULT_LOG_TAIL))
    .action(safeAction(async (image: string, options: { tail: string }) => {
        const backend = await openBackend();
        try {
            process.stdout.write(await backend.api.logs(image, Number(options.tail)));
        } finally {
            await backend.close();
        }
    }));

program
    .command("status")
    .description("show an operation of a running server")
    .argument("<id>")
    .action(safeAction(async (operationId: string) => {
        const backend = await openBackend();
        try {
            const lookup = await backend.api.operationStatus(operationId);
            if (lookup.found) {
                console.log(formatOperation(lookup.operation));
            } else {
                console.error(chalk.red(`Operation ${operationId} not found`));
                process.exitCode = 1;
            }
        } finally {
            await backend.close();
        }
    }));

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(e)}`));
    process.exitCode = 1;
});
