import { mkdir, readFile, rm, stat, utimes, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeEach, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { createFormatWriters } from "@/services/FormatWriter";
import {
  type MetadataExtractor,
  MetadataExtractorJson,
} from "@/services/MetadataExtractor";
import {
  MetadataRestoreServiceDefault,
  isProcessedSuccessfully,
} from "@/services/MetadataRestore";
import { SidecarMatcherDefault } from "@/services/SidecarMatcher";
import {
  type TimestampSetter,
  TimestampSetterFs,
} from "@/services/TimestampSetter";

import { MediaTagServiceFake } from "~test/fakes/MediaTagServiceFake";
import { TimestampSetterFake } from "~test/fakes/TimestampSetterFake";

const tmpRoot = "test/tmp/restore";
const takenAt = new Date("2023-11-14T22:13:20.000Z");
const oldTime = new Date("2000-01-01T00:00:00.000Z");

const sidecarJson = JSON.stringify({
  title: "placeholder",
  photoTakenTime: { timestamp: "1700000000" },
  geoData: { latitude: 25.033, longitude: 121.5654, altitude: 0 },
});

function build(options?: {
  timestampSetter?: TimestampSetter;
  metadataExtractor?: MetadataExtractor;
}) {
  const logger = buildTestLogger();
  const tagService = new MediaTagServiceFake();
  const service = new MetadataRestoreServiceDefault({
    sidecarMatcher: new SidecarMatcherDefault(),
    metadataExtractor: options?.metadataExtractor ?? new MetadataExtractorJson(),
    formatWriters: createFormatWriters({ tagService, logger }),
    timestampSetter: options?.timestampSetter ?? new TimestampSetterFs(),
    logger,
    concurrency: 2,
  });
  return { service, tagService };
}

async function createFiles(dir: string, files: Record<string, string>) {
  await mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    const filePath = join(dir, name);
    await writeFile(filePath, content);
    await utimes(filePath, oldTime, oldTime);
  }
}

async function mtimeOf(filePath: string) {
  return (await stat(filePath)).mtime.getTime();
}

describe("MetadataRestoreServiceDefault.processFile", () => {
  const dir = join(tmpRoot, "file");

  beforeEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("JPEG：寫入內嵌標籤並設定檔案時間 → UPDATED", async () => {
    await createFiles(dir, {
      "IMG_0001.jpg": "jpeg-bytes",
      "IMG_0001.jpg.json": sidecarJson,
    });
    const { service, tagService } = build();
    const mediaPath = join(dir, "IMG_0001.jpg");

    const report = await service.processFile(
      mediaPath,
      join(dir, "IMG_0001.jpg.json")
    );

    expect(report).toEqual({
      mediaPath,
      sidecarPath: join(dir, "IMG_0001.jpg.json"),
      outcome: { kind: "UPDATED", embed: "EMBEDDED" },
    });
    expect(tagService.writes.map((w) => w.filePath)).toEqual([mediaPath]);
    expect(await mtimeOf(mediaPath)).toBe(takenAt.getTime());
  });

  test("RAW：內容完全不變，只設定檔案時間", async () => {
    await createFiles(dir, {
      "DSC_0001.NEF": "raw-bytes",
      "DSC_0001.NEF.json": sidecarJson,
    });
    const { service, tagService } = build();
    const mediaPath = join(dir, "DSC_0001.NEF");

    const report = await service.processFile(
      mediaPath,
      join(dir, "DSC_0001.NEF.json")
    );

    expect(report.outcome).toEqual({ kind: "SKIPPED_UNSUPPORTED_FORMAT" });
    expect(isProcessedSuccessfully(report.outcome)).toBe(true);
    expect(tagService.writes).toEqual([]);
    expect(await readFile(mediaPath, "utf8")).toBe("raw-bytes");
    expect(await mtimeOf(mediaPath)).toBe(takenAt.getTime());
  });

  test("沒有 sidecar → SKIPPED_UNMATCHED，檔案不變", async () => {
    await createFiles(dir, { "IMG_0002.jpg": "jpeg-bytes" });
    const { service, tagService } = build();
    const mediaPath = join(dir, "IMG_0002.jpg");

    const report = await service.processFile(mediaPath);

    expect(report).toEqual({
      mediaPath,
      outcome: { kind: "SKIPPED_UNMATCHED" },
    });
    expect(isProcessedSuccessfully(report.outcome)).toBe(false);
    expect(tagService.writes).toEqual([]);
    expect(await mtimeOf(mediaPath)).toBe(oldTime.getTime());
  });

  test("sidecar 損毀 → CORRUPT_METADATA，媒體檔內容與時間不變", async () => {
    await createFiles(dir, {
      "IMG_0003.jpg": "jpeg-bytes",
      "IMG_0003.jpg.json": "{ broken",
    });
    const { service, tagService } = build();
    const mediaPath = join(dir, "IMG_0003.jpg");

    const report = await service.processFile(
      mediaPath,
      join(dir, "IMG_0003.jpg.json")
    );

    expect(report.outcome).toEqual({
      kind: "FAILED",
      error: {
        type: "CORRUPT_METADATA",
        message: "sidecar 不是合法的 JSON",
        cause: "INVALID_JSON",
      },
    });
    expect(tagService.writes).toEqual([]);
    expect(await readFile(mediaPath, "utf8")).toBe("jpeg-bytes");
    expect(await mtimeOf(mediaPath)).toBe(oldTime.getTime());
  });

  test("timestamp 超出範圍 → CORRUPT_METADATA，不寫入也不設定檔案時間", async () => {
    const outOfRange = JSON.stringify({
      title: "placeholder",
      photoTakenTime: { timestamp: "9000000000000" },
    });
    await createFiles(dir, {
      "IMG_0009.jpg": "jpeg-bytes",
      "IMG_0009.jpg.json": outOfRange,
      "DSC_0009.NEF": "raw-bytes",
      "DSC_0009.NEF.json": outOfRange,
    });
    const { service, tagService } = build();

    for (const name of ["IMG_0009.jpg", "DSC_0009.NEF"]) {
      const mediaPath = join(dir, name);
      const report = await service.processFile(mediaPath, `${mediaPath}.json`);

      expect(report.outcome).toEqual({
        kind: "FAILED",
        error: {
          type: "CORRUPT_METADATA",
          message: "無效的 photoTakenTime.timestamp: 9000000000000",
          cause: "INVALID_TIMESTAMP",
        },
      });
      expect(await mtimeOf(mediaPath)).toBe(oldTime.getTime());
    }
    expect(tagService.writes).toEqual([]);
  });

  test("寫入失敗 → WRITE_FAILURE，不設定檔案時間", async () => {
    await createFiles(dir, {
      "IMG_0004.jpg": "jpeg-bytes",
      "IMG_0004.jpg.json": sidecarJson,
    });
    const timestampSetter = new TimestampSetterFake();
    const { service, tagService } = build({ timestampSetter });
    const mediaPath = join(dir, "IMG_0004.jpg");
    tagService.setWriteError(mediaPath, {
      type: "WRITE_FAILED",
      message: "exiftool failed",
    });

    const report = await service.processFile(
      mediaPath,
      join(dir, "IMG_0004.jpg.json")
    );

    expect(report.outcome).toEqual({
      kind: "FAILED",
      error: {
        type: "WRITE_FAILURE",
        message: "exiftool failed",
        cause: "WRITE_FAILED",
      },
    });
    expect(timestampSetter.calls).toEqual([]);
    expect(await readFile(mediaPath, "utf8")).toBe("jpeg-bytes");
  });

  test("設定檔案時間失敗 → TIMESTAMP_FAILURE，標記內嵌標籤已寫入", async () => {
    await createFiles(dir, {
      "IMG_0005.jpg": "jpeg-bytes",
      "IMG_0005.jpg.json": sidecarJson,
    });
    const timestampSetter = new TimestampSetterFake();
    const { service } = build({ timestampSetter });
    const mediaPath = join(dir, "IMG_0005.jpg");
    timestampSetter.failOn(mediaPath);

    const report = await service.processFile(
      mediaPath,
      join(dir, "IMG_0005.jpg.json")
    );

    expect(report.outcome).toEqual({
      kind: "FAILED",
      error: {
        type: "TIMESTAMP_FAILURE",
        message: `設定檔案時間失敗: ${mediaPath}`,
        cause: "SET_TIMES_FAILED",
        embeddedUpdated: true,
      },
    });
  });

  test("不支援的格式 → UNSUPPORTED_FORMAT", async () => {
    const { service } = build();
    const report = await service.processFile(join(dir, "notes.txt"));
    expect(report.outcome).toEqual({
      kind: "FAILED",
      error: { type: "UNSUPPORTED_FORMAT", message: "不支援的格式: .txt" },
    });
  });

  test("未預期的例外 → UNEXPECTED，不會拋出", async () => {
    const throwing: MetadataExtractor = {
      parse: () => {
        throw new Error("unreachable");
      },
      extract: async () => {
        throw new Error("kaboom");
      },
    };
    const { service } = build({ metadataExtractor: throwing });

    const report = await service.processFile(
      join(dir, "IMG_0006.jpg"),
      join(dir, "IMG_0006.jpg.json")
    );

    expect(report.outcome).toEqual({
      kind: "FAILED",
      error: { type: "UNEXPECTED", message: "kaboom" },
    });
  });
});

describe("MetadataRestoreServiceDefault.processDirectory", () => {
  const dir = join(tmpRoot, "directory");

  beforeEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("回報已使用與未使用的 sidecar，略過暫存檔與非媒體檔", async () => {
    await createFiles(dir, {
      "IMG_0001.jpg": "jpeg-bytes",
      "IMG_0001.jpg.json": sidecarJson,
      "orphan.jpg.json": sidecarJson,
      "notes.txt": "text",
    });
    const { service, tagService } = build();

    const report = await service.processDirectory(dir, [
      "IMG_0001.jpg",
      "IMG_0001.jpg.json",
      "orphan.jpg.json",
      "notes.txt",
      ".IMG_0001.deadbeef.restore-tmp.jpg",
    ]);

    expect(report).toEqual({
      directory: dir,
      files: [
        {
          mediaPath: join(dir, "IMG_0001.jpg"),
          sidecarPath: join(dir, "IMG_0001.jpg.json"),
          matchKind: "EXACT",
          outcome: { kind: "UPDATED", embed: "EMBEDDED" },
        },
      ],
      consumedSidecars: [join(dir, "IMG_0001.jpg.json")],
      unusedSidecars: [join(dir, "orphan.jpg.json")],
      cancelled: false,
      allSucceeded: true,
    });
    expect(tagService.writes).toHaveLength(1);
  });

  test("有任何檔案未成功時 allSucceeded 為 false", async () => {
    await createFiles(dir, {
      "IMG_0001.jpg": "jpeg-bytes",
      "IMG_0001.jpg.json": sidecarJson,
      "IMG_0002.jpg": "jpeg-bytes",
    });
    const { service } = build();

    const report = await service.processDirectory(dir, [
      "IMG_0001.jpg",
      "IMG_0001.jpg.json",
      "IMG_0002.jpg",
    ]);

    expect(report.files.map((f) => f.outcome.kind)).toEqual([
      "UPDATED",
      "SKIPPED_UNMATCHED",
    ]);
    expect(report.allSucceeded).toBe(false);
  });

  test("已中斷時不處理任何檔案", async () => {
    await createFiles(dir, {
      "IMG_0001.jpg": "jpeg-bytes",
      "IMG_0001.jpg.json": sidecarJson,
    });
    const { service, tagService } = build();
    const controller = new AbortController();
    controller.abort();

    const report = await service.processDirectory(
      dir,
      ["IMG_0001.jpg", "IMG_0001.jpg.json"],
      controller.signal
    );

    expect(report.files).toEqual([]);
    expect(report.consumedSidecars).toEqual([]);
    expect(report.cancelled).toBe(true);
    expect(report.allSucceeded).toBe(false);
    expect(tagService.writes).toEqual([]);
  });
});

describe("MetadataRestoreServiceDefault.run", () => {
  const dirA = join(tmpRoot, "run", "a");
  const dirB = join(tmpRoot, "run", "b");

  beforeEach(async () => {
    await rm(join(tmpRoot, "run"), { recursive: true, force: true });
  });

  afterAll(async () => {
    await rm(tmpRoot, { recursive: true, force: true });
  });

  test("依資料夾分組處理並彙總結果", async () => {
    await createFiles(dirA, {
      "IMG_0001.jpg": "jpeg-bytes",
      "IMG_0001.jpg.json": sidecarJson,
    });
    await createFiles(dirB, {
      "DSC_0001.NEF": "raw-bytes",
      "DSC_0001.NEF.json": sidecarJson,
      "IMG_0002.jpg": "jpeg-bytes",
      "broken.jpg": "jpeg-bytes",
      "broken.jpg.json": "{",
    });
    const { service } = build();

    const report = await service.run([
      join(dirA, "IMG_0001.jpg"),
      join(dirB, "DSC_0001.NEF"),
      join(dirA, "IMG_0001.jpg.json"),
      join(dirB, "DSC_0001.NEF.json"),
      join(dirB, "IMG_0002.jpg"),
      join(dirB, "broken.jpg"),
      join(dirB, "broken.jpg.json"),
    ]);

    expect(report.directories.map((d) => d.directory)).toEqual([dirA, dirB]);
    expect(report.directories.map((d) => d.allSucceeded)).toEqual([true, false]);
    expect(report.summary).toEqual({
      total: 4,
      updated: 1,
      skippedUnmatched: 1,
      skippedUnsupportedFormat: 1,
      failed: 1,
      failedByType: { CORRUPT_METADATA: 1 },
    });
    expect(report.cancelled).toBe(false);
  });
});
