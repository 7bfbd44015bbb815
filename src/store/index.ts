export * from "./failureList";
export * from "./metadataFile";
