import type { CAC } from "cac";
import { mkdir, readdir, rename, rmdir, unlink } from "node:fs/promises";
import path from "node:path";

import { ConfigError } from "~shared/ConfigFactory";
import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { type RestoreConfig, loadRestoreConfig, parseIntFlag } from "@/config";
import { mediaExtensions, sidecarExtension } from "@/constants";
import { CompletionPlanServiceDefault } from "@/services/CompletionPlan";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { createFormatWriters } from "@/services/FormatWriter";
import { MediaTagServiceExifTool } from "@/services/MediaTagService";
import { MetadataExtractorJson } from "@/services/MetadataExtractor";
import {
  MetadataRestoreServiceDefault,
  type RunReport,
} from "@/services/MetadataRestore";
import { SidecarMatcherDefault } from "@/services/SidecarMatcher";
import { TimestampSetterFs } from "@/services/TimestampSetter";
import type { CompletionPlan, MoveFile } from "@/types";
import { confirm, exists, expandHome } from "@/utils/helper";

type RestoreOptions = {
  completed?: string;
  deleteSidecars?: boolean;
  deleteEmptyDirs?: boolean;
  concurrency?: number | string;
  truncationThreshold?: number | string;
  yes?: boolean;
};

export function registerRestore(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "restore <folder>",
      "依 sidecar JSON 還原拍攝時間與 GPS：寫入內嵌標籤並設定檔案時間"
    )
    .option("--completed <dir>", "處理成功的媒體檔搬到此資料夾（保留相對路徑）")
    .option("--delete-sidecars", "資料夾全部成功時刪除已使用的 sidecar", {
      default: false,
    })
    .option("--delete-empty-dirs", "資料夾全部成功且清空後移除", {
      default: false,
    })
    .option("--concurrency <n>", "同時處理的資料夾數")
    .option("--truncation-threshold <n>", "sidecar 檔名截斷判定長度")
    .option("--yes", "略過確認直接執行收尾計畫", { default: false })
    .action(async (folder: string, options: RestoreOptions) => {
      const logger = baseLogger.extend("restore");
      const root = path.resolve(expandHome(folder));
      const completedDirectory = options.completed
        ? path.resolve(expandHome(options.completed))
        : undefined;

      let config: RestoreConfig;
      try {
        config = loadRestoreConfig({
          concurrency: parseIntFlag("--concurrency", options.concurrency),
          truncationThreshold: parseIntFlag(
            "--truncation-threshold",
            options.truncationThreshold
          ),
        });
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        logger.error({ emoji: "❌", issues: error.issues })`設定錯誤`;
        process.exit(1);
      }

      // 掃描
      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(root, {
        allowExts: [...mediaExtensions, sidecarExtension],
        excludeDirs: completedDirectory ? [completedDirectory] : [],
      });
      if (isErr(scanRes)) {
        logger.error({ emoji: "❌", error: scanRes.error })`掃描來源目錄失敗`;
        process.exit(1);
      }
      const files = scanRes.value;
      if (files.length === 0) {
        logger.warn("來源目錄沒有可處理的檔案");
        return;
      }
      logger.info({ emoji: "🔎", count: files.length })`掃描完成`;

      // 還原
      await using tagService = new MediaTagServiceExifTool();
      const service = new MetadataRestoreServiceDefault({
        sidecarMatcher: new SidecarMatcherDefault({
          truncationThreshold: config.truncationThreshold,
          editedSuffixes: config.editedSuffixes,
        }),
        metadataExtractor: new MetadataExtractorJson(),
        formatWriters: createFormatWriters({ tagService, logger }),
        timestampSetter: new TimestampSetterFs(),
        logger,
        concurrency: config.concurrency,
      });

      const controller = new AbortController();
      const onSigint = () => {
        logger.warn({ emoji: "⏹️" })`收到中斷訊號，目前檔案完成後停止`;
        controller.abort();
      };
      process.once("SIGINT", onSigint);
      let report: RunReport;
      try {
        report = await service.run(files, { signal: controller.signal });
      } finally {
        process.off("SIGINT", onSigint);
      }

      const writer = new DumpWriterDefault(logger, config.reportDir);
      await writer.dump("還原報告", toRelativeReport(root, report));
      if (report.summary.failed > 0) process.exitCode = 1;
      if (report.cancelled) {
        logger.warn({ emoji: "⏹️" })`已中斷，不執行收尾`;
        return;
      }

      // 收尾計畫
      const plan = new CompletionPlanServiceDefault().planFromReport(report, {
        root,
        completedDirectory,
        deleteSidecars: options.deleteSidecars ?? false,
        deleteEmptyDirectories: options.deleteEmptyDirs ?? false,
      });
      const total =
        plan.moves.length + plan.deletes.length + plan.emptyDirectories.length;
      if (total === 0) {
        logger.info({ emoji: "✅" })`沒有需要收尾的檔案`;
        return;
      }
      await reportPlan(writer, root, plan);

      const proceed =
        options.yes ||
        (await confirm(
          `將搬移 ${plan.moves.length} 個檔案、刪除 ${plan.deletes.length} 個 sidecar、` +
            `檢查 ${plan.emptyDirectories.length} 個空資料夾，是否繼續？ [y/N] `
        ));
      if (!proceed) {
        logger.warn({ emoji: "⏹️" })`使用者取消`;
        return;
      }

      const executed = await executeCompletionPlan(plan, logger);
      if (!executed) process.exit(1);
    });
}

/**
 * 依序執行：搬移 → 刪除 sidecar → 移除空資料夾。
 * 目標已存在時停止，回傳 false。
 */
export async function executeCompletionPlan(
  plan: CompletionPlan,
  logger: Logger
): Promise<boolean> {
  let moved = 0,
    deleted = 0,
    removedDirs = 0;

  for (const m of plan.moves) {
    // 防覆蓋
    if (await exists(m.to)) {
      logger.error({
        emoji: "🧨",
        from: m.from,
        to: m.to,
      })`目標已存在，停止（避免覆蓋）`;
      return false;
    }
    await mkdir(path.dirname(m.to), { recursive: true });
    await rename(m.from, m.to);
    moved++;
  }

  for (const d of plan.deletes) {
    await unlink(d);
    deleted++;
  }

  for (const dir of plan.emptyDirectories) {
    if (!(await exists(dir))) continue;
    const entries = await readdir(dir);
    if (entries.length > 0) {
      logger.debug({ dir, remaining: entries.length })`資料夾非空，保留`;
      continue;
    }
    await rmdir(dir);
    removedDirs++;
  }

  logger.info({ emoji: "✅", moved, deleted, removedDirs })`收尾完成`;
  return true;
}

export async function reportPlan(
  dumper: DumpWriter,
  root: string,
  plan: CompletionPlan
) {
  const rel = (p: string) => path.relative(root, p) || ".";
  const moves: MoveFile[] = plan.moves
    .map((m) => ({ from: rel(m.from), to: m.to }))
    .sort((a, b) => a.from.localeCompare(b.from));
  await dumper.dump("收尾計畫", {
    moves,
    deletes: plan.deletes.map(rel).sort((a, b) => a.localeCompare(b)),
    emptyDirectories: plan.emptyDirectories.map(rel),
  });
}

function toRelativeReport(root: string, report: RunReport) {
  const rel = (p: string) => path.relative(root, p) || ".";
  return {
    summary: report.summary,
    cancelled: report.cancelled,
    directories: report.directories.map((d) => ({
      ...d,
      directory: rel(d.directory),
      files: d.files.map((f) => ({
        ...f,
        mediaPath: rel(f.mediaPath),
        sidecarPath: f.sidecarPath === undefined ? undefined : rel(f.sidecarPath),
      })),
      consumedSidecars: d.consumedSidecars.map(rel),
      unusedSidecars: d.unusedSidecars.map(rel),
    })),
  };
}
