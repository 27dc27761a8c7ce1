import { randomUUID } from "node:crypto";
import { copyFile, rename, rm } from "node:fs/promises";
import path from "node:path";

const TEMP_MARKER = ".restore-tmp";

/**
 * 暫存檔與原檔放在同一資料夾（確保 rename 為原子操作），
 * 副檔名保持不變，exiftool 才能辨識格式。
 * 例：`IMG_0001.jpg` → `.IMG_0001.1a2b3c4d.restore-tmp.jpg`
 */
export function buildTempPath(filePath: string): string {
  const dir = path.dirname(filePath);
  const ext = path.extname(filePath);
  const base = path.basename(filePath, ext);
  const token = randomUUID().slice(0, 8);
  return path.join(dir, `.${base}.${token}${TEMP_MARKER}${ext}`);
}

/** 中斷後殘留的暫存檔，掃描時應略過 */
export function isTempArtifact(fileName: string): boolean {
  const ext = path.extname(fileName);
  return (
    fileName.startsWith(".") &&
    path.basename(fileName, ext).endsWith(TEMP_MARKER)
  );
}

/**
 * 複製原檔到暫存檔，交給 mutate 修改後再 rename 取代原檔。
 * mutate 或 rename 失敗時刪除暫存檔並拋出原本的錯誤，原檔不受影響。
 */
export async function replaceAtomically(
  filePath: string,
  mutate: (tempPath: string) => Promise<void>
): Promise<void> {
  const tempPath = buildTempPath(filePath);
  try {
    await copyFile(filePath, tempPath);
    await mutate(tempPath);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
