export * from "./value-objects/detection-method";

export * from "./entities/file-record";
export * from "./entities/feature-set";
export * from "./entities/verdict";
export * from "./entities/duplicate-group";
export * from "./entities/action-plan";
export * from "./entities/run-result";

export * from "./errors/dedupe-error";
