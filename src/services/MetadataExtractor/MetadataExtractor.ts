import type { Result } from "~shared/utils/Result";

import type { CanonicalMetadata } from "./Metadata";

export type ExtractError = {
  type:
    | "READ_FAILED"
    | "INVALID_JSON"
    | "SCHEMA_MISMATCH"
    | "MISSING_TIMESTAMP"
    | "INVALID_TIMESTAMP"
    | "INVALID_GEO";
  message: string;
};

export interface MetadataExtractor {
  /**
   * 解析 sidecar JSON 內容，不碰檔案系統。
   */
  parse(content: string): Result<CanonicalMetadata, ExtractError>;

  /**
   * 讀取單一 sidecar 檔案後解析。
   */
  extract(sidecarPath: string): Promise<Result<CanonicalMetadata, ExtractError>>;
}
