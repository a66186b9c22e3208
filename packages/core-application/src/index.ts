// Public API of the core-application package: ports, services and the Node
// adapters, so that the CLI (or another host) imports what it needs without
// reaching into internal file paths.

// Ports (interfaces)
export type * from "./ports/remote-store.js";
export type * from "./ports/logger.js";
export type * from "./ports/dataset-validator.js";
export type * from "./ports/connectivity-check.js";

// Application
export * from "./application/errors.js";
export * from "./application/config.js";
export * from "./application/run-report.js";
export type { RunContext, TlsTrust } from "./application/run-context.js";

// Services
export * from "./services/file-kind.js";
export * from "./services/local-scanner.js";
export * from "./services/remote-walk.js";
export * from "./services/remote-scanner.js";
export * from "./services/reconciler.js";
export * from "./services/grouping-uploader.js";
export * from "./services/metadata-propagator.js";
export * from "./services/remote-reset.js";
export * from "./services/comparison-report.js";
export * from "./services/run-summary.js";
export * from "./services/import-service.js";

// Node adapters
export * from "./adapters/girder-remote-store.js";
export * from "./adapters/girder-connectivity-check.js";
export * from "./adapters/tls-agent.js";
export * from "./adapters/console-logger.js";
export * from "./adapters/bids-validator-cli.js";
