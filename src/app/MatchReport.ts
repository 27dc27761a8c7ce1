import type { CAC } from "cac";
import path from "node:path";

import { ConfigError } from "~shared/ConfigFactory";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { type RestoreConfig, loadRestoreConfig, parseIntFlag } from "@/config";
import { mediaExtensions, sidecarExtension } from "@/constants";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { resolveFormatFamily } from "@/services/FormatWriter";
import {
  type MatchKind,
  type SidecarMatcher,
  SidecarMatcherDefault,
  isSidecarName,
} from "@/services/SidecarMatcher";
import { expandHome } from "@/utils/helper";

type MatchOptions = {
  truncationThreshold?: number | string;
};

export type DirectoryPairing = {
  matched: Array<{ media: string; sidecar: string; kind: MatchKind }>;
  unmatchedMedia: string[];
  unusedSidecars: string[];
};

export function registerMatch(cli: CAC, baseLogger: Logger) {
  cli
    .command("match <folder>", "只列出媒體檔與 sidecar 的配對結果，不修改任何檔案")
    .option("--truncation-threshold <n>", "sidecar 檔名截斷判定長度")
    .action(async (folder: string, options: MatchOptions) => {
      const logger = baseLogger.extend("match");
      const root = path.resolve(expandHome(folder));
      let config: RestoreConfig;
      try {
        config = loadRestoreConfig({
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

      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(root, {
        allowExts: [...mediaExtensions, sidecarExtension],
      });
      if (isErr(scanRes)) {
        logger.error({ emoji: "❌", error: scanRes.error })`掃描來源目錄失敗`;
        process.exit(1);
      }

      const matcher = new SidecarMatcherDefault({
        truncationThreshold: config.truncationThreshold,
        editedSuffixes: config.editedSuffixes,
      });
      const pairing = buildPairing(matcher, root, scanRes.value);

      let matched = 0,
        unmatched = 0,
        unused = 0;
      for (const dir of Object.values(pairing)) {
        matched += dir.matched.length;
        unmatched += dir.unmatchedMedia.length;
        unused += dir.unusedSidecars.length;
      }
      logger.info({ emoji: "🔗", matched, unmatched, unused })`配對完成`;

      const writer = new DumpWriterDefault(logger, config.reportDir);
      await writer.dump("sidecar配對", pairing);
    });
}

/** 以相對資料夾為 key 整理配對結果，資料夾名稱排序 */
export function buildPairing(
  matcher: SidecarMatcher,
  root: string,
  filePaths: readonly string[]
): Record<string, DirectoryPairing> {
  const byDir = new Map<string, string[]>();
  for (const p of filePaths) {
    const key = path.relative(root, path.dirname(p)) || ".";
    const names = byDir.get(key) ?? [];
    names.push(path.basename(p));
    byDir.set(key, names);
  }

  const result: Record<string, DirectoryPairing> = {};
  for (const key of [...byDir.keys()].sort((a, b) => a.localeCompare(b))) {
    const names = byDir.get(key) ?? [];
    const media = names.filter((n) => resolveFormatFamily(n));
    const sidecars = names.filter(isSidecarName);
    const matches = matcher.matchAll(media, sidecars);
    const used = new Set([...matches.values()].map((m) => m.sidecarName));
    result[key] = {
      matched: [...matches.values()].map((m) => ({
        media: m.mediaName,
        sidecar: m.sidecarName,
        kind: m.kind,
      })),
      unmatchedMedia: media.filter((n) => !matches.has(n)),
      unusedSidecars: sidecars.filter((n) => !used.has(n)),
    };
  }
  return result;
}
