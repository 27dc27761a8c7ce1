import { type Static, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import type { CanonicalMetadata, GpsLocation } from "./Metadata";
import type { ExtractError, MetadataExtractor } from "./MetadataExtractor";

const geoDataSchema = t.Object({
  latitude: t.Optional(t.Number()),
  longitude: t.Optional(t.Number()),
  altitude: t.Optional(t.Number()),
});

/** 只描述用得到的欄位，其餘欄位直接忽略 */
const sidecarSchema = t.Object({
  photoTakenTime: t.Optional(
    t.Object({
      timestamp: t.Optional(t.Union([t.String(), t.Number()])),
    })
  ),
  geoData: t.Optional(geoDataSchema),
  geoDataExif: t.Optional(geoDataSchema),
});

type GeoData = Static<typeof geoDataSchema>;

const EPOCH_SECONDS_RE = /^\d+$/;

export class MetadataExtractorJson implements MetadataExtractor {
  async extract(
    sidecarPath: string
  ): Promise<Result<CanonicalMetadata, ExtractError>> {
    let content: string;
    try {
      content = await readFile(sidecarPath, "utf8");
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 sidecar 失敗: ${sidecarPath} (${e instanceof Error ? e.message : String(e)})`,
      });
    }
    return this.parse(content);
  }

  parse(content: string): Result<CanonicalMetadata, ExtractError> {
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      return err({ type: "INVALID_JSON", message: "sidecar 不是合法的 JSON" });
    }

    if (!Value.Check(sidecarSchema, json)) {
      const first = Value.Errors(sidecarSchema, json).First();
      return err({
        type: "SCHEMA_MISMATCH",
        message: `sidecar 欄位格式不符: ${first ? `${first.path} ${first.message}` : "未知"}`,
      });
    }

    const raw = json.photoTakenTime?.timestamp;
    if (raw === undefined) {
      return err({
        type: "MISSING_TIMESTAMP",
        message: "缺少 photoTakenTime.timestamp",
      });
    }
    const seconds = parseEpochSeconds(raw);
    if (seconds === undefined) {
      return err({
        type: "INVALID_TIMESTAMP",
        message: `無效的 photoTakenTime.timestamp: ${raw}`,
      });
    }

    const gps = toGpsLocation(json.geoData) ?? toGpsLocation(json.geoDataExif);
    if (gps && !isInRange(gps)) {
      return err({
        type: "INVALID_GEO",
        message: `座標超出範圍: ${gps.latitude}, ${gps.longitude}`,
      });
    }

    const metadata: CanonicalMetadata = { takenAt: new Date(seconds * 1000) };
    if (gps) metadata.gps = gps;
    return ok(metadata);
  }
}

function parseEpochSeconds(raw: string | number): number | undefined {
  const text = typeof raw === "number" ? String(raw) : raw.trim();
  if (!EPOCH_SECONDS_RE.test(text)) return undefined;
  const seconds = Number(text);
  if (!Number.isSafeInteger(seconds) || seconds <= 0) return undefined;
  if (Number.isNaN(new Date(seconds * 1000).getTime())) return undefined;
  return seconds;
}

/**
 * 匯出工具以 0/0 代表「沒有位置」，不是赤道與本初子午線交點。
 */
function toGpsLocation(geo: GeoData | undefined): GpsLocation | undefined {
  if (!geo) return undefined;
  const { latitude, longitude, altitude } = geo;
  if (latitude === undefined || longitude === undefined) return undefined;
  if (latitude === 0 && longitude === 0) return undefined;
  const gps: GpsLocation = { latitude, longitude };
  if (altitude !== undefined && Number.isFinite(altitude)) {
    gps.altitude = altitude;
  }
  return gps;
}

function isInRange(gps: GpsLocation) {
  return (
    Number.isFinite(gps.latitude) &&
    Number.isFinite(gps.longitude) &&
    Math.abs(gps.latitude) <= 90 &&
    Math.abs(gps.longitude) <= 180
  );
}
