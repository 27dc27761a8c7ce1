import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  recursive?: boolean;
  /** 副檔名白名單，空陣列表示全部 */
  allowExts?: readonly string[];
  /** 不進入這些資料夾（絕對或相對路徑皆可） */
  excludeDirs?: readonly string[];
};

export interface FileSystemScanner {
  /**
   * 列出 rootPath 底下的檔案完整路徑。
   * 中斷後殘留的暫存檔不會出現在結果中。
   */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
