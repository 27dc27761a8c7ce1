export * from "./Metadata";
export * from "./MetadataExtractor";
export * from "./MetadataExtractorJson";
