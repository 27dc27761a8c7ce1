export * from "./EmbeddedTags";
export * from "./ExifDateTimeHelper";
export * from "./MediaTagService";
export * from "./MediaTagServiceExifTool";
