import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { isTempArtifact } from "@/utils/AtomicReplace";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const lowerExts = allowExts.map((e) => {
      if (e.startsWith(".")) return e.toLowerCase();
      return `.${e.toLowerCase()}`;
    });
    const allowExtsSet = new Set(lowerExts);
    const excluded = new Set(
      (options?.excludeDirs ?? []).map((d) => path.resolve(d))
    );

    const files: string[] = [];
    const walk = async (dir: string) => {
      const entries = await readdir(dir, { withFileTypes: true });
      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (isRecursive && !excluded.has(path.resolve(fullPath))) {
            await walk(fullPath);
          }
          continue;
        }
        if (!entry.isFile() || isTempArtifact(entry.name)) continue;
        if (
          allowExtsSet.size > 0 &&
          !allowExtsSet.has(path.extname(entry.name).toLowerCase())
        ) {
          continue;
        }
        files.push(fullPath);
      }
    };

    try {
      await walk(rootPath);
      return ok(files);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
