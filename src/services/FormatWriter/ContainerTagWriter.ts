import {
  type EmbeddedTags,
  type TagAssignment,
  formatExifUtc,
  parseExifDateTime,
} from "@/services/MediaTagService";
import type { CanonicalMetadata } from "@/services/MetadataExtractor";

import { TagWriterBase, isGpsUpToDate } from "./TagWriterBase";

const QUICKTIME_DATE_TAGS = [
  "QuickTime:CreateDate",
  "QuickTime:ModifyDate",
  "QuickTime:TrackCreateDate",
  "QuickTime:TrackModifyDate",
  "QuickTime:MediaCreateDate",
  "QuickTime:MediaModifyDate",
] as const;

/** MP4、MOV：寫入 QuickTime 日期（UTC）與 Keys:GPSCoordinates */
export class ContainerTagWriter extends TagWriterBase {
  protected buildAssignments(metadata: CanonicalMetadata): TagAssignment[] {
    return buildContainerAssignments(metadata);
  }

  protected isUpToDate(current: EmbeddedTags, metadata: CanonicalMetadata) {
    const existing = parseExifDateTime(current.createDate, "utc");
    if (!existing || existing.getTime() !== metadata.takenAt.getTime()) {
      return false;
    }
    return isGpsUpToDate(current, metadata.gps);
  }
}

export function buildContainerAssignments(
  metadata: CanonicalMetadata
): TagAssignment[] {
  const date = formatExifUtc(metadata.takenAt);
  const assignments: TagAssignment[] = QUICKTIME_DATE_TAGS.map((tag) => ({
    tag,
    value: date,
  }));

  const { gps } = metadata;
  if (gps) {
    const parts = [gps.latitude, gps.longitude];
    if (gps.altitude !== undefined) parts.push(gps.altitude);
    assignments.push({ tag: "Keys:GPSCoordinates", value: parts.join(", ") });
  }
  return assignments;
}
