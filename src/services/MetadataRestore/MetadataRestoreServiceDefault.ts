import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { defaultConcurrency } from "@/constants";
import {
  type FormatWriterRegistry,
  resolveFormatFamily,
} from "@/services/FormatWriter";
import type { MetadataExtractor } from "@/services/MetadataExtractor";
import {
  type SidecarMatcher,
  isSidecarName,
} from "@/services/SidecarMatcher";
import type { TimestampSetter } from "@/services/TimestampSetter";
import { isTempArtifact } from "@/utils/AtomicReplace";
import { runPool } from "@/utils/helper";

import {
  type DirectoryReport,
  type FileReport,
  type MetadataRestoreService,
  type ProcessingOutcome,
  type RunReport,
  isProcessedSuccessfully,
} from "./MetadataRestoreService";
import { RunSummary } from "./RunSummary";

export type MetadataRestoreServiceDeps = {
  sidecarMatcher: SidecarMatcher;
  metadataExtractor: MetadataExtractor;
  formatWriters: FormatWriterRegistry;
  timestampSetter: TimestampSetter;
  logger: Logger;
  /** 同時處理的資料夾數，同一資料夾內一律依序處理 */
  concurrency?: number;
};

/**
 * 單一檔案的流程：
 * 判斷格式 → 讀取 sidecar → 寫入內嵌標籤 → 設定檔案時間。
 * 任何一步失敗就停止，之後的步驟不執行。
 */
export class MetadataRestoreServiceDefault implements MetadataRestoreService {
  private readonly logger: Logger;
  private readonly concurrency: number;

  constructor(private readonly deps: MetadataRestoreServiceDeps) {
    this.logger = deps.logger.extend("MetadataRestore");
    this.concurrency = Math.max(1, deps.concurrency ?? defaultConcurrency);
  }

  async run(
    filePaths: readonly string[],
    options?: { signal?: AbortSignal }
  ): Promise<RunReport> {
    const groups = groupByDirectory(filePaths);
    this.logger.info({
      emoji: "📂",
      directories: groups.length,
      concurrency: this.concurrency,
    })`開始處理 ${filePaths.length} 個檔案`;

    const directories = await runPool(
      groups,
      this.concurrency,
      ([directory, names]) =>
        this.processDirectory(directory, names, options?.signal)
    );

    const summary = new RunSummary();
    for (const dir of directories) {
      for (const file of dir.files) summary.record(file.outcome);
    }
    const cancelled = directories.some((d) => d.cancelled);
    const counts = summary.toJSON();
    this.logger.info({ emoji: "📊", ...counts, cancelled })`處理完成`;
    return { directories, summary: counts, cancelled };
  }

  async processDirectory(
    directory: string,
    fileNames: readonly string[],
    signal?: AbortSignal
  ): Promise<DirectoryReport> {
    const logger = this.logger.append({ directory });
    const names = fileNames.filter((n) => !isTempArtifact(n));
    const mediaNames = names.filter((n) => resolveFormatFamily(n));
    const sidecarNames = names.filter(isSidecarName);
    const ignored = names.length - mediaNames.length - sidecarNames.length;
    if (ignored > 0) {
      logger.debug({ ignored })`略過非媒體也非 sidecar 的檔案`;
    }

    const matches = this.deps.sidecarMatcher.matchAll(mediaNames, sidecarNames);
    const files: FileReport[] = [];
    const consumed = new Set<string>();
    let cancelled = false;

    for (const mediaName of mediaNames) {
      // 只在檔案之間檢查，正在處理的檔案一定會完成
      if (signal?.aborted) {
        cancelled = true;
        break;
      }
      const match = matches.get(mediaName);
      const report = await this.processFile(
        path.join(directory, mediaName),
        match ? path.join(directory, match.sidecarName) : undefined
      );
      if (match) {
        consumed.add(match.sidecarName);
        files.push({ ...report, matchKind: match.kind });
      } else {
        files.push(report);
      }
    }

    const matched = new Set([...matches.values()].map((m) => m.sidecarName));
    const unusedSidecars = sidecarNames
      .filter((n) => !matched.has(n))
      .map((n) => path.join(directory, n));
    if (unusedSidecars.length > 0) {
      logger.warn({ emoji: "🧾", unusedSidecars })`有 sidecar 沒有配對到媒體檔`;
    }

    return {
      directory,
      files,
      consumedSidecars: [...consumed].map((n) => path.join(directory, n)),
      unusedSidecars,
      cancelled,
      allSucceeded:
        !cancelled && files.every((f) => isProcessedSuccessfully(f.outcome)),
    };
  }

  async processFile(mediaPath: string, sidecarPath?: string): Promise<FileReport> {
    let outcome: ProcessingOutcome;
    try {
      outcome = await this.restore(mediaPath, sidecarPath);
    } catch (error) {
      outcome = {
        kind: "FAILED",
        error: {
          type: "UNEXPECTED",
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
    this.logOutcome(mediaPath, sidecarPath, outcome);
    return sidecarPath === undefined
      ? { mediaPath, outcome }
      : { mediaPath, sidecarPath, outcome };
  }

  private async restore(
    mediaPath: string,
    sidecarPath: string | undefined
  ): Promise<ProcessingOutcome> {
    const family = resolveFormatFamily(mediaPath);
    if (!family) {
      return {
        kind: "FAILED",
        error: {
          type: "UNSUPPORTED_FORMAT",
          message: `不支援的格式: ${path.extname(mediaPath) || "(無副檔名)"}`,
        },
      };
    }
    if (sidecarPath === undefined) return { kind: "SKIPPED_UNMATCHED" };

    const metadata = await this.deps.metadataExtractor.extract(sidecarPath);
    if (isErr(metadata)) {
      return {
        kind: "FAILED",
        error: {
          type: "CORRUPT_METADATA",
          message: metadata.error.message,
          cause: metadata.error.type,
        },
      };
    }

    const writer = this.deps.formatWriters[family.kind];
    const embed = await writer.apply(mediaPath, metadata.value);
    if (isErr(embed)) {
      return {
        kind: "FAILED",
        error: {
          type: "WRITE_FAILURE",
          message: embed.error.message,
          cause: embed.error.type,
        },
      };
    }

    // 內嵌標籤寫入會改變 mtime，所以檔案時間一定最後設定
    const times = await this.deps.timestampSetter.set(
      mediaPath,
      metadata.value.takenAt
    );
    if (isErr(times)) {
      return {
        kind: "FAILED",
        error: {
          type: "TIMESTAMP_FAILURE",
          message: times.error.message,
          cause: times.error.type,
          embeddedUpdated: embed.value === "EMBEDDED",
        },
      };
    }

    if (embed.value === "UNSUPPORTED") {
      return { kind: "SKIPPED_UNSUPPORTED_FORMAT" };
    }
    return { kind: "UPDATED", embed: embed.value };
  }

  private logOutcome(
    mediaPath: string,
    sidecarPath: string | undefined,
    outcome: ProcessingOutcome
  ) {
    const logger = this.logger.append({ mediaPath, sidecarPath });
    switch (outcome.kind) {
      case "UPDATED":
        logger.info({ emoji: "✅", embed: outcome.embed })`已還原`;
        break;
      case "SKIPPED_UNSUPPORTED_FORMAT":
        logger.info({ emoji: "🕒" })`格式不寫內嵌標籤，只設定檔案時間`;
        break;
      case "SKIPPED_UNMATCHED":
        logger.warn({ emoji: "❔" })`找不到對應的 sidecar`;
        break;
      case "FAILED":
        logger.error({ emoji: "❌", error: outcome.error })`處理失敗`;
        break;
    }
  }
}

/** 依所在資料夾分組，保留第一次出現的順序 */
function groupByDirectory(filePaths: readonly string[]): [string, string[]][] {
  const groups = new Map<string, string[]>();
  for (const p of filePaths) {
    const dir = path.dirname(p);
    const names = groups.get(dir);
    if (names) names.push(path.basename(p));
    else groups.set(dir, [path.basename(p)]);
  }
  return [...groups.entries()];
}
