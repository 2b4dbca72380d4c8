export * from "./catalog/types.js";
export { ConfigError, InvalidSource, InvalidImage, resolve, loadCatalog, getImage, getImageProperty, listCategories, mergeBlocks } from "./catalog/resolver.js";
export { getSupportedParams } from "./catalog/compose-params.js";
export * from "./runtime/types.js";
export { RuntimeAdapter } from "./runtime/runtime-adapter.js";
export { generate, toComposeYAML, containerName, projectName, labelKeys, VolumeProvisionError } from "./runtime/compose-generator.js";
export { DockerComposeAdapter } from "./runtime/docker/adapter.js";
export { CommandError } from "./runtime/exec.js";
export { pollUntil, sleep, AbortError } from "./lifecycle/retry.js";
export { HookRunner, HookFailed } from "./lifecycle/hooks.js";
export { LifecycleController, StartFailed, StopFailed } from "./lifecycle/controller.js";
export type { LifecycleState, StartResult, StopResult } from "./lifecycle/controller.js";
export { GroupCoordinator } from "./lifecycle/group-coordinator.js";
export * from "./operations/types.js";
export { OperationTracker, OperationStateError } from "./operations/tracker.js";
export { OrchestrationService } from "./operations/service.js";
export type { OrchestrationApi, CatalogSummary, GroupStatus } from "./operations/service.js";
export { pollOperation } from "./client/operation-poller.js";
export type { PollOutcome, PollOperationResult } from "./client/operation-poller.js";
export { PlaypenClient, RemoteError } from "./client/socket-client.js";
export { PlaypenServer } from "./server.js";
export { loadServerConfig, loadServerConfigFromEnvironment } from "./config.js";
export type { ServerConfig } from "./config.js";
export { ValidationError } from "./util-server.js";
