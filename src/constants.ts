export const rawExtensions = [
  ".nef",
  ".arw",
  ".cr2",
  ".cr3",
  ".dng",
  ".orf",
  ".rw2",
  ".raf",
] as const;

/** 以 EXIF 區塊寫入拍攝時間與 GPS 的影像格式 */
export const jpegLikeExtensions = [".jpg", ".jpeg", ".png", ".webp"] as const;

export const heicExtensions = [".heic"] as const;

/** exiftool 可寫入 QuickTime 時間與座標標籤的容器 */
export const containerExtensions = [".mp4", ".mov"] as const;

/** 支援但沒有可寫入標籤的格式，只更新檔案時間 */
export const untaggedExtensions = [".gif", ".mkv", ".flv"] as const;

export const mediaExtensions = [
  ...jpegLikeExtensions,
  ...heicExtensions,
  ...containerExtensions,
  ...untaggedExtensions,
  ...rawExtensions,
] as const;

export const sidecarExtension = ".json";

/** 匯出工具產生的 sidecar 檔名上限為 51 字元，扣掉 `.json` 後為 46 */
export const defaultTruncationThreshold = 46;

export const defaultEditedSuffixes = ["-edited"] as const;

export const defaultConcurrency = 4;
