/**
 * Library entry point for embedding input source sync in a host application.
 *
 * @example
 * ```typescript
 * const { mode } = createInputSourceSync(host, loadConfig());
 * await mode.enable();
 * ```
 */

export { createInputSourceSync, type InputSourceSync, type InputSourceSyncDeps } from "./main/bootstrap";
export { loadConfig, type InputSourceSyncConfig } from "./main/config";
export { InputSourceSyncMode, type SubscriptionControl } from "./main/input-source-sync-mode";
export { ProcessHost } from "./main/process-host";
export * from "./services/input-sources";
export * from "./services/focus";
export * from "./services/bus";
export * from "./services/logging";
export * from "./services/errors";
export type { Unsubscribe } from "./services/types";
