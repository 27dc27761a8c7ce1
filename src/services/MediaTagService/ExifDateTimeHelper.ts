import { format } from "date-fns";
import { ExifDateTime } from "exiftool-vendored";

export const EXIF_DATE_TIME_FORMAT = "yyyy:MM:dd HH:mm:ss";

const RAW_DATE_TIME_RE =
  /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * EXIF 日期沒有時區，以執行環境的本地時區輸出。
 * 不推測拍攝地時區，也不做夏令時間修正；時區由 TZ 環境變數決定。
 */
export function formatExifLocal(date: Date): string {
  return format(date, EXIF_DATE_TIME_FORMAT);
}

/** QuickTime 日期依慣例存 UTC */
export function formatExifUtc(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}:${pad(date.getUTCMonth() + 1)}:${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/**
 * 將 exiftool 的日期字串轉回 Date。
 * 規則：
 * 1) 字串自帶時區（`Z`、`+08:00`）時以它為準。
 * 2) 否則依 zone 當作本地時間或 UTC 解讀。
 * 3) 無法解析回傳 undefined。
 */
export function parseExifDateTime(
  raw: string | undefined,
  zone: "local" | "utc"
): Date | undefined {
  if (!raw) return undefined;
  const m = RAW_DATE_TIME_RE.exec(raw.trim());
  if (!m) return undefined;

  const year = Number(m[1]);
  const month = Number(m[2]); // 1-12
  const day = Number(m[3]);
  const hour = Number(m[4]);
  const minute = Number(m[5]);
  const second = Number(m[6]);
  const offset = m[7];

  let d: Date;
  if (offset !== undefined) {
    const baseUtcMs = Date.UTC(year, month - 1, day, hour, minute, second);
    d = new Date(baseUtcMs - parseOffsetMinutes(offset) * 60 * 1000);
  } else if (zone === "utc") {
    d = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  } else {
    d = new Date(year, month - 1, day, hour, minute, second);
  }
  return Number.isNaN(d.getTime()) ? undefined : d;
}

/** 取出 exiftool 回傳值的原始日期字串 */
export function getRawDateTime(value: unknown): string | undefined {
  if (value instanceof ExifDateTime) return value.rawValue;
  if (typeof value === "string") return value;
  return undefined;
}

function parseOffsetMinutes(offset: string) {
  if (offset === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}
