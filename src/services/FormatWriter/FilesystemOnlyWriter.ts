import { type Result, ok } from "~shared/utils/Result";

import type { EmbedResult, FormatWriter, WriteError } from "./FormatWriter";

/**
 * RAW 與沒有可寫標籤的格式：刻意不動檔案內容，
 * 拍攝時間只透過檔案時間還原。
 */
export class FilesystemOnlyWriter implements FormatWriter {
  readonly capability = "FILESYSTEM_ONLY";

  async apply(): Promise<Result<EmbedResult, WriteError>> {
    return ok("UNSUPPORTED");
  }
}
