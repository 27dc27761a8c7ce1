import { describe, expect, test } from "vitest";

import {
  formatExifLocal,
  formatExifUtc,
  parseExifDateTime,
} from "@/services/MediaTagService";

// vitest.config.ts 將 TZ 固定為 UTC
describe("ExifDateTimeHelper", () => {
  const takenAt = new Date("2023-11-14T22:13:20.000Z");

  test("本地時間格式", () => {
    expect(formatExifLocal(takenAt)).toBe("2023:11:14 22:13:20");
  });

  test("UTC 格式", () => {
    expect(formatExifUtc(new Date("2001-02-03T04:05:06.000Z"))).toBe(
      "2001:02:03 04:05:06"
    );
  });

  test("沒有時區的字串依 zone 解讀", () => {
    expect(parseExifDateTime("2023:11:14 22:13:20", "utc")).toEqual(takenAt);
    expect(parseExifDateTime("2023:11:14 22:13:20", "local")).toEqual(takenAt);
  });

  test("字串自帶時區時以它為準", () => {
    expect(parseExifDateTime("2023:11:15 06:13:20+08:00", "utc")).toEqual(
      takenAt
    );
    expect(parseExifDateTime("2023:11:14 22:13:20Z", "local")).toEqual(takenAt);
    expect(parseExifDateTime("2023:11:14 17:13:20-0500", "utc")).toEqual(
      takenAt
    );
  });

  test("無法解析回傳 undefined", () => {
    expect(parseExifDateTime(undefined, "utc")).toBeUndefined();
    expect(parseExifDateTime("", "utc")).toBeUndefined();
    expect(parseExifDateTime("0000:00:00 00:00:00 garbage", "utc")).toBeUndefined();
  });
});
