import path from "node:path";

import {
  containerExtensions,
  heicExtensions,
  jpegLikeExtensions,
  rawExtensions,
  untaggedExtensions,
} from "@/constants";

export type FormatFamily =
  | { kind: "JPEG_LIKE"; extension: string }
  | { kind: "HEIC"; extension: string }
  | { kind: "CONTAINER_TAGGED"; extension: string }
  | {
      kind: "FILESYSTEM_ONLY";
      extension: string;
      /** RAW 刻意不寫；NO_WRITABLE_TAGS 是格式本身沒有可寫的標籤 */
      reason: "RAW" | "NO_WRITABLE_TAGS";
    };

export type FormatFamilyKind = FormatFamily["kind"];

function includes(list: readonly string[], ext: string) {
  return list.includes(ext);
}

/**
 * 依副檔名（不分大小寫）決定格式家族。
 * 不在支援清單內回傳 undefined。
 */
export function resolveFormatFamily(filePath: string): FormatFamily | undefined {
  const extension = path.extname(filePath).toLowerCase();
  if (includes(jpegLikeExtensions, extension)) {
    return { kind: "JPEG_LIKE", extension };
  }
  if (includes(heicExtensions, extension)) return { kind: "HEIC", extension };
  if (includes(containerExtensions, extension)) {
    return { kind: "CONTAINER_TAGGED", extension };
  }
  if (includes(rawExtensions, extension)) {
    return { kind: "FILESYSTEM_ONLY", extension, reason: "RAW" };
  }
  if (includes(untaggedExtensions, extension)) {
    return { kind: "FILESYSTEM_ONLY", extension, reason: "NO_WRITABLE_TAGS" };
  }
  return undefined;
}
