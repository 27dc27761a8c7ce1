import type { Result } from "~shared/utils/Result";

import type { CanonicalMetadata } from "@/services/MetadataExtractor";

import type { FormatFamilyKind } from "./FormatFamily";

/**
 * - EMBEDDED：已寫入檔案內嵌標籤
 * - UNCHANGED：內嵌標籤已經相同，未寫入
 * - UNSUPPORTED：格式不寫內嵌標籤，只靠檔案時間
 */
export type EmbedResult = "EMBEDDED" | "UNCHANGED" | "UNSUPPORTED";

export type WriteError = {
  type: "WRITE_FAILED";
  message: string;
};

export type WriterCapability = "EMBED_METADATA" | "FILESYSTEM_ONLY";

export interface FormatWriter {
  readonly capability: WriterCapability;

  /**
   * 將 metadata 寫入檔案內嵌標籤。
   * 失敗時原檔保持不變。
   */
  apply(
    filePath: string,
    metadata: CanonicalMetadata
  ): Promise<Result<EmbedResult, WriteError>>;
}

export type FormatWriterRegistry = Record<FormatFamilyKind, FormatWriter>;
