import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { MetadataExtractorJson } from "@/services/MetadataExtractor";

const tmpDir = "test/tmp/extractor";

function sidecar(body: Record<string, unknown>) {
  return JSON.stringify({ title: "IMG_0001.jpg", ...body });
}

describe("MetadataExtractorJson.parse", () => {
  const extractor = new MetadataExtractorJson();

  test("讀出拍攝時間與座標", () => {
    const result = extractor.parse(
      sidecar({
        photoTakenTime: { timestamp: "1700000000", formatted: "ignored" },
        geoData: { latitude: 25.033, longitude: 121.5654, altitude: 12.5 },
      })
    );
    expectOk(result);
    expect(result.value).toEqual({
      takenAt: new Date("2023-11-14T22:13:20.000Z"),
      gps: { latitude: 25.033, longitude: 121.5654, altitude: 12.5 },
    });
  });

  test("數字型態的 timestamp 也接受", () => {
    const result = extractor.parse(sidecar({ photoTakenTime: { timestamp: 1700000000 } }));
    expectOk(result);
    expect(result.value.takenAt.getTime()).toBe(1700000000 * 1000);
  });

  test("0/0 座標視為沒有位置", () => {
    const result = extractor.parse(
      sidecar({
        photoTakenTime: { timestamp: "1700000000" },
        geoData: { latitude: 0, longitude: 0, altitude: 0 },
      })
    );
    expectOk(result);
    expect(result.value).toEqual({ takenAt: new Date(1700000000 * 1000) });
    expect("gps" in result.value).toBe(false);
  });

  test("geoData 為 0/0 時改用 geoDataExif", () => {
    const result = extractor.parse(
      sidecar({
        photoTakenTime: { timestamp: "1700000000" },
        geoData: { latitude: 0, longitude: 0 },
        geoDataExif: { latitude: -33.8568, longitude: 151.2153 },
      })
    );
    expectOk(result);
    expect(result.value.gps).toEqual({ latitude: -33.8568, longitude: 151.2153 });
  });

  test("缺少 timestamp → MISSING_TIMESTAMP", () => {
    const result = extractor.parse(sidecar({ photoTakenTime: {} }));
    expectErr(result);
    expect(result.error.type).toBe("MISSING_TIMESTAMP");

    const noField = extractor.parse(sidecar({}));
    expectErr(noField);
    expect(noField.error.type).toBe("MISSING_TIMESTAMP");
  });

  test("非數字或非正數的 timestamp → INVALID_TIMESTAMP", () => {
    for (const timestamp of ["abc", "0", "-5", "12.5", ""]) {
      const result = extractor.parse(sidecar({ photoTakenTime: { timestamp } }));
      expectErr(result);
      expect(result.error.type).toBe("INVALID_TIMESTAMP");
    }
  });

  test("超出 Date 可表示範圍的 timestamp → INVALID_TIMESTAMP", () => {
    for (const timestamp of ["9000000000000", 9000000000000]) {
      const result = extractor.parse(sidecar({ photoTakenTime: { timestamp } }));
      expectErr(result);
      expect(result.error.type).toBe("INVALID_TIMESTAMP");
    }

    const edge = extractor.parse(
      sidecar({ photoTakenTime: { timestamp: "8640000000000" } })
    );
    expectOk(edge);
    expect(edge.value.takenAt.toISOString()).toBe("+275760-09-13T00:00:00.000Z");
  });

  test("不是 JSON → INVALID_JSON", () => {
    const result = extractor.parse("{ not json");
    expectErr(result);
    expect(result.error.type).toBe("INVALID_JSON");
  });

  test("欄位型態不符 → SCHEMA_MISMATCH", () => {
    const result = extractor.parse(
      sidecar({ photoTakenTime: { timestamp: true } })
    );
    expectErr(result);
    expect(result.error.type).toBe("SCHEMA_MISMATCH");

    const notObject = extractor.parse("[]");
    expectErr(notObject);
    expect(notObject.error.type).toBe("SCHEMA_MISMATCH");
  });

  test("座標超出範圍 → INVALID_GEO", () => {
    const result = extractor.parse(
      sidecar({
        photoTakenTime: { timestamp: "1700000000" },
        geoData: { latitude: 91, longitude: 10 },
      })
    );
    expectErr(result);
    expect(result.error.type).toBe("INVALID_GEO");
  });
});

describe("MetadataExtractorJson.extract", () => {
  const extractor = new MetadataExtractorJson();

  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    await writeFile(
      join(tmpDir, "IMG_0001.jpg.json"),
      sidecar({ photoTakenTime: { timestamp: "1600000000" } })
    );
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("讀取檔案後解析", async () => {
    const result = await extractor.extract(join(tmpDir, "IMG_0001.jpg.json"));
    expectOk(result);
    expect(result.value.takenAt).toEqual(new Date("2020-09-13T12:26:40.000Z"));
  });

  test("檔案不存在 → READ_FAILED", async () => {
    const result = await extractor.extract(join(tmpDir, "missing.json"));
    expectErr(result);
    expect(result.error.type).toBe("READ_FAILED");
  });
});
