// Public API of the core-application package: ports, value objects,
// services and the Node adapters that back them.

// Ports (interfaces)
export * from "./ports/cancellation";
export * from "./ports/clock";
export * from "./ports/logger";
export * from "./ports/file-scanner";
export * from "./ports/file-hasher";
export * from "./ports/image-decoder";
export * from "./ports/metadata-reader";
export * from "./ports/format-detector";
export * from "./ports/file-mover";
export * from "./ports/report-writer";
export * from "./ports/progress-sink";

// Value objects
export * from "./value-objects/detection-settings";
export * from "./value-objects/run-request";

// Application helpers
export * from "./application/cancellation";
export * from "./application/validate-run-request";
export * from "./application/with-timeout";

// Services
export * from "./services/similarity-scorer";
export * from "./services/duplicate-grouper";
export * from "./services/action-planner";
export * from "./services/action-executor";
export * from "./services/feature-extractor";
export * from "./services/run-report";
export * from "./services/dedupe-service";

// Utilities
export * from "./utils/format";
export * from "./utils/name-similarity";
export * from "./utils/perceptual-hash";

// Node adapters
export * from "./adapters/console-logger";
export * from "./adapters/system-clock";
export * from "./adapters/fast-glob-file-scanner";
export * from "./adapters/node-file-hasher";
export * from "./adapters/sharp-image-decoder";
export * from "./adapters/exifr-metadata-reader";
export * from "./adapters/file-type-format-detector";
export * from "./adapters/node-file-mover";
export * from "./adapters/node-report-writer";
export * from "./adapters/node-dedupe-service";
