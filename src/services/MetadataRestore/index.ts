export * from "./MetadataRestoreService";
export * from "./MetadataRestoreServiceDefault";
export * from "./RunSummary";
