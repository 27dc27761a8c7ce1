import type { Logger } from "~shared/Logger";

import type { MediaTagService } from "@/services/MediaTagService";

import { ContainerTagWriter } from "./ContainerTagWriter";
import { FilesystemOnlyWriter } from "./FilesystemOnlyWriter";
import type { FormatWriterRegistry } from "./FormatWriter";
import { ImageExifWriter } from "./ImageExifWriter";

export * from "./ContainerTagWriter";
export * from "./FilesystemOnlyWriter";
export * from "./FormatFamily";
export * from "./FormatWriter";
export * from "./GpsHelper";
export * from "./ImageExifWriter";
export * from "./TagWriterBase";

export function createFormatWriters(deps: {
  tagService: MediaTagService;
  logger: Logger;
}): FormatWriterRegistry {
  const image = new ImageExifWriter(deps);
  return {
    JPEG_LIKE: image,
    HEIC: image,
    CONTAINER_TAGGED: new ContainerTagWriter(deps),
    FILESYSTEM_ONLY: new FilesystemOnlyWriter(),
  };
}
