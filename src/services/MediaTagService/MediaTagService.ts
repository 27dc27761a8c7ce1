import type { Result } from "~shared/utils/Result";

import type {
  EmbeddedTags,
  TagAssignment,
  TagReadError,
  TagWriteError,
} from "./EmbeddedTags";

export interface MediaTagService {
  /**
   * 讀取檔案內嵌的拍攝時間與 GPS。
   */
  readTags(filePath: string): Promise<Result<EmbeddedTags, TagReadError>>;

  /**
   * 寫入標籤，保留其他既有標籤。
   * 寫入在暫存檔完成後才取代原檔，失敗時原檔不變。
   */
  writeTags(
    filePath: string,
    assignments: readonly TagAssignment[]
  ): Promise<Result<void, TagWriteError>>;
}
