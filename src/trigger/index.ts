export * from "./sqsTriggerListener";
export * from "./storageEvents";
