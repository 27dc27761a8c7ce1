import { ExifTool, type Tags } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { replaceAtomically } from "@/utils/AtomicReplace";
import { exists } from "@/utils/helper";

import type {
  EmbeddedTags,
  TagAssignment,
  TagReadError,
  TagWriteError,
} from "./EmbeddedTags";
import { getRawDateTime } from "./ExifDateTimeHelper";
import type { MediaTagService } from "./MediaTagService";

export class MediaTagServiceExifTool implements MediaTagService {
  private readonly exiftool: ExifTool;

  constructor(options?: { taskTimeoutMillis?: number; maxProcs?: number }) {
    this.exiftool = new ExifTool({
      taskTimeoutMillis: options?.taskTimeoutMillis ?? 30_000,
      ...(options?.maxProcs !== undefined && { maxProcs: options.maxProcs }),
    });
  }

  async readTags(filePath: string): Promise<Result<EmbeddedTags, TagReadError>> {
    if (!(await exists(filePath))) {
      return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
    }
    try {
      const tags = await this.exiftool.read(filePath);
      const embedded: EmbeddedTags = { filePath };

      const dateTimeOriginal = getRawDateTime(tags.DateTimeOriginal);
      if (dateTimeOriginal) embedded.dateTimeOriginal = dateTimeOriginal;
      const createDate = getRawDateTime(tags.CreateDate);
      if (createDate) embedded.createDate = createDate;

      const latitude = signedCoordinate(tags.GPSLatitude, tags.GPSLatitudeRef, "S");
      const longitude = signedCoordinate(tags.GPSLongitude, tags.GPSLongitudeRef, "W");
      if (latitude !== undefined && longitude !== undefined) {
        embedded.latitude = latitude;
        embedded.longitude = longitude;
      }
      const altitude = signedAltitude(tags);
      if (altitude !== undefined) embedded.altitude = altitude;

      return ok(embedded);
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取標籤失敗: ${filePath} (${e instanceof Error ? e.message : String(e)})`,
      });
    }
  }

  async writeTags(
    filePath: string,
    assignments: readonly TagAssignment[]
  ): Promise<Result<void, TagWriteError>> {
    if (assignments.length === 0) return ok();
    try {
      await replaceAtomically(filePath, async (tempPath) => {
        await this.exiftool.write(
          tempPath,
          {},
          {
            writeArgs: [
              "-overwrite_original",
              ...assignments.map((a) => `-${a.tag}=${a.value}`),
            ],
          }
        );
      });
      return ok();
    } catch (error) {
      return err({
        type: "WRITE_FAILED",
        message: `寫入標籤失敗: ${filePath} (${error instanceof Error ? error.message : String(error)})`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await this.exiftool.end();
  }
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

/**
 * exiftool 可能回傳已帶正負號的值，也可能回傳絕對值加上 Ref，
 * Ref 存在時以 Ref 決定正負。
 */
function signedCoordinate(
  value: unknown,
  ref: unknown,
  negativeRef: "S" | "W"
): number | undefined {
  const n = toNumber(value);
  if (n === undefined) return undefined;
  if (typeof ref !== "string" || ref.trim() === "") return n;
  const first = ref.trim().charAt(0).toUpperCase();
  return first === negativeRef ? -Math.abs(n) : Math.abs(n);
}

function signedAltitude(tags: Tags): number | undefined {
  const n = toNumber(tags.GPSAltitude);
  if (n === undefined) return undefined;
  const ref: unknown = tags.GPSAltitudeRef;
  const below =
    ref === 1 ||
    ref === "1" ||
    (typeof ref === "string" && ref.toLowerCase().includes("below"));
  return below ? -Math.abs(n) : Math.abs(n);
}
