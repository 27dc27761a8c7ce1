export interface DumpWriter {
  /**
   * 將資料寫成報告檔並回傳檔案路徑。
   */
  dump(name: string, data: unknown): Promise<string>;
}
