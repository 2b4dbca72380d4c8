import chalk from "chalk";
import { PollOperationResult } from "../client/operation-poller.js";
import { CatalogSummary, GroupStatus } from "../operations/service.js";
import { Operation } from "../operations/types.js";

/** 0 only when the operation completed without a failed member. */
export function exitCodeFor(result: PollOperationResult): number {
    if (result.outcome !== "completed") {
        return 1;
    }
    return (result.operation?.counters.failed ?? 0) > 0 ? 1 : 0;
}

export function formatCounters(operation: Operation): string {
    return Object.entries(operation.counters)
        .map(([ name, value ]) => `${name}=${value}`)
        .join(" ");
}

export function formatOperation(operation: Operation): string {
    const lines = [
        `${operation.kind} ${operation.target} [${operation.id}]: ${operation.status}`,
        `  ${formatCounters(operation)} total=${operation.total}${operation.skipped ? " (skipped)" : ""}`,
    ];
    for (const warning of operation.warnings) {
        lines.push(chalk.yellow(`  warning: ${warning}`));
    }
    for (const error of operation.errors) {
        lines.push(chalk.red(`  error: ${error}`));
    }
    if (operation.error) {
        lines.push(chalk.red(`  ${operation.error}`));
    }
    for (const [ image, logs ] of Object.entries(operation.diagnostics)) {
        lines.push(`  ${image} logs:`);
        for (const line of logs.trimEnd().split("\n")) {
            lines.push(chalk.dim(`    ${line}`));
        }
    }
    return lines.join("\n");
}

export function formatResult(operationId: string, result: PollOperationResult): string {
    switch (result.outcome) {
        case "not_found":
            return chalk.red(`Operation ${operationId} not found`);
        case "timeout":
            return chalk.yellow(`Gave up waiting for ${operationId} after ${result.attempts} attempts`)
                + (result.operation ? `\n${formatOperation(result.operation)}` : "");
        case "aborted":
            return chalk.yellow(`Stopped waiting for ${operationId}`);
        default:
            return result.operation ? formatOperation(result.operation) : `Operation ${operationId} ${result.outcome}`;
    }
}

export function formatCatalog(catalog: CatalogSummary, category?: string): string {
    const lines: string[] = [];
    const categories = category ? [ category ] : catalog.categories;
    for (const name of categories) {
        const images = catalog.images.filter((image) => image.category === name);
        if (images.length === 0) {
            continue;
        }
        lines.push(chalk.bold(name));
        for (const image of images) {
            const description = image.description ? ` - ${image.description}` : "";
            lines.push(`  ${chalk.cyan(image.name)} (${image.image})${description}`);
        }
    }
    for (const warning of catalog.warnings) {
        lines.push(chalk.yellow(`warning: ${warning}`));
    }
    return lines.join("\n");
}

export function formatGroups(catalog: CatalogSummary): string {
    if (catalog.groups.length === 0) {
        return "No groups defined";
    }
    return catalog.groups
        .map((group) => `${chalk.cyan(group.name)}: ${group.containers.join(", ")}${group.description ? `\n  ${group.description}` : ""}`)
        .join("\n");
}

export function formatGroupStatus(status: GroupStatus): string {
    const lines = [ `${chalk.bold(status.name)} (${status.running}/${status.members.length} running)` ];
    for (const member of status.members) {
        const state = member.state === "running" ? chalk.green(member.state) : chalk.gray(member.state);
        lines.push(`  ${member.image}: ${state}`);
    }
    for (const missing of status.missing) {
        lines.push(chalk.yellow(`  ${missing}: not in catalog`));
    }
    return lines.join("\n");
}
