import type { MatchKind } from "@/services/SidecarMatcher";

export type RestoreErrorType =
  | "CORRUPT_METADATA"
  | "WRITE_FAILURE"
  | "TIMESTAMP_FAILURE"
  | "UNSUPPORTED_FORMAT"
  | "UNEXPECTED";

export type RestoreError = {
  type: RestoreErrorType;
  message: string;
  /** 底層錯誤類型，例如 MISSING_TIMESTAMP */
  cause?: string;
  /** TIMESTAMP_FAILURE 時內嵌標籤是否已經寫入（不回滾） */
  embeddedUpdated?: boolean;
};

export type ProcessingOutcome =
  | { kind: "UPDATED"; embed: "EMBEDDED" | "UNCHANGED" }
  | { kind: "SKIPPED_UNMATCHED" }
  /** 不寫內嵌標籤，只設定了檔案時間 */
  | { kind: "SKIPPED_UNSUPPORTED_FORMAT" }
  | { kind: "FAILED"; error: RestoreError };

export type FileReport = {
  mediaPath: string;
  sidecarPath?: string;
  matchKind?: MatchKind;
  outcome: ProcessingOutcome;
};

export type DirectoryReport = {
  directory: string;
  files: FileReport[];
  /** 已配對並處理過的 sidecar 完整路徑 */
  consumedSidecars: string[];
  /** 沒有配對到任何媒體檔的 sidecar 完整路徑 */
  unusedSidecars: string[];
  cancelled: boolean;
  /** 所有媒體檔都處理成功，才可以清理 sidecar 與空資料夾 */
  allSucceeded: boolean;
};

export type RunSummaryCounts = {
  total: number;
  updated: number;
  skippedUnmatched: number;
  skippedUnsupportedFormat: number;
  failed: number;
  failedByType: Partial<Record<RestoreErrorType, number>>;
};

export type RunReport = {
  directories: DirectoryReport[];
  summary: RunSummaryCounts;
  cancelled: boolean;
};

export interface MetadataRestoreService {
  /**
   * 處理一批檔案路徑（媒體檔與 sidecar 混合），依資料夾分組。
   */
  run(
    filePaths: readonly string[],
    options?: { signal?: AbortSignal }
  ): Promise<RunReport>;

  /**
   * 處理單一資料夾中的檔名清單，同一資料夾內依序處理。
   */
  processDirectory(
    directory: string,
    fileNames: readonly string[],
    signal?: AbortSignal
  ): Promise<DirectoryReport>;

  /**
   * 處理單一媒體檔，不會拋出例外。
   */
  processFile(mediaPath: string, sidecarPath?: string): Promise<FileReport>;
}

/** 只有這兩種結果可以移到完成資料夾 */
export function isProcessedSuccessfully(outcome: ProcessingOutcome): boolean {
  return (
    outcome.kind === "UPDATED" || outcome.kind === "SKIPPED_UNSUPPORTED_FORMAT"
  );
}
