import {
  type EmbeddedTags,
  type TagAssignment,
  formatExifLocal,
  parseExifDateTime,
} from "@/services/MediaTagService";
import type { CanonicalMetadata } from "@/services/MetadataExtractor";

import { formatDmsForExifTool, toDms } from "./GpsHelper";
import { TagWriterBase, isGpsUpToDate } from "./TagWriterBase";

/** JPEG、PNG、WebP、HEIC：寫入 EXIF 日期與 GPS IFD */
export class ImageExifWriter extends TagWriterBase {
  protected buildAssignments(metadata: CanonicalMetadata): TagAssignment[] {
    return buildImageAssignments(metadata);
  }

  protected isUpToDate(current: EmbeddedTags, metadata: CanonicalMetadata) {
    const existing = parseExifDateTime(current.dateTimeOriginal, "local");
    if (!existing || existing.getTime() !== metadata.takenAt.getTime()) {
      return false;
    }
    return isGpsUpToDate(current, metadata.gps);
  }
}

export function buildImageAssignments(
  metadata: CanonicalMetadata
): TagAssignment[] {
  const date = formatExifLocal(metadata.takenAt);
  const assignments: TagAssignment[] = [
    { tag: "EXIF:DateTimeOriginal", value: date },
    { tag: "EXIF:CreateDate", value: date },
    { tag: "EXIF:ModifyDate", value: date },
  ];

  const { gps } = metadata;
  if (!gps) return assignments;

  const lat = toDms(gps.latitude, "latitude");
  const lon = toDms(gps.longitude, "longitude");
  assignments.push(
    { tag: "GPS:GPSLatitude", value: formatDmsForExifTool(lat) },
    { tag: "GPS:GPSLatitudeRef", value: lat.ref },
    { tag: "GPS:GPSLongitude", value: formatDmsForExifTool(lon) },
    { tag: "GPS:GPSLongitudeRef", value: lon.ref }
  );
  if (gps.altitude !== undefined) {
    assignments.push(
      { tag: "GPS:GPSAltitude", value: String(Math.abs(gps.altitude)) },
      {
        tag: "GPS:GPSAltitudeRef",
        value: gps.altitude < 0 ? "Below Sea Level" : "Above Sea Level",
      }
    );
  }
  return assignments;
}
