import type { Logger } from "~shared/Logger";
import { type Result, err, isOk, ok } from "~shared/utils/Result";

import type {
  EmbeddedTags,
  MediaTagService,
  TagAssignment,
} from "@/services/MediaTagService";
import type { CanonicalMetadata, GpsLocation } from "@/services/MetadataExtractor";

import type { EmbedResult, FormatWriter, WriteError } from "./FormatWriter";
import { ALTITUDE_TOLERANCE, isSameCoordinate } from "./GpsHelper";

/**
 * 讀取現有標籤 → 已相同則略過 → 否則寫入。
 * 讀取失敗不中斷，直接嘗試寫入。
 */
export abstract class TagWriterBase implements FormatWriter {
  readonly capability = "EMBED_METADATA";

  protected readonly tagService: MediaTagService;
  protected readonly logger: Logger;

  constructor(deps: { tagService: MediaTagService; logger: Logger }) {
    this.tagService = deps.tagService;
    this.logger = deps.logger.extend(this.constructor.name);
  }

  protected abstract buildAssignments(
    metadata: CanonicalMetadata
  ): TagAssignment[];

  protected abstract isUpToDate(
    current: EmbeddedTags,
    metadata: CanonicalMetadata
  ): boolean;

  async apply(
    filePath: string,
    metadata: CanonicalMetadata
  ): Promise<Result<EmbedResult, WriteError>> {
    const current = await this.tagService.readTags(filePath);
    if (isOk(current)) {
      if (this.isUpToDate(current.value, metadata)) {
        this.logger.debug({ filePath })`內嵌標籤已是最新，略過寫入`;
        return ok("UNCHANGED");
      }
    } else {
      this.logger.debug({
        filePath,
        error: current.error,
      })`讀取現有標籤失敗，直接寫入`;
    }

    const written = await this.tagService.writeTags(
      filePath,
      this.buildAssignments(metadata)
    );
    if (!written.ok) {
      return err({ type: "WRITE_FAILED", message: written.error.message });
    }
    return ok("EMBEDDED");
  }
}

export function isGpsUpToDate(
  current: EmbeddedTags,
  gps: GpsLocation | undefined
): boolean {
  // sidecar 沒有座標時不清除檔案既有的 GPS
  if (!gps) return true;
  if (current.latitude === undefined || current.longitude === undefined) {
    return false;
  }
  if (
    !isSameCoordinate(current.latitude, gps.latitude) ||
    !isSameCoordinate(current.longitude, gps.longitude)
  ) {
    return false;
  }
  if (gps.altitude === undefined) return true;
  return (
    current.altitude !== undefined &&
    Math.abs(current.altitude - gps.altitude) < ALTITUDE_TOLERANCE
  );
}
