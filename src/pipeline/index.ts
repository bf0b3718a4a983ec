export * from "./definition";
export * from "./errors";
export * from "./executionId";
export * from "./orchestrator";
export * from "./payload";
export * from "./stage";
