/**
 * 配對方式，依優先順序排列：
 * - EXACT：`IMG_0001.jpg.json`、`IMG_0001.json`
 * - TRANSPOSED：`IMG_0001(1).jpg` ↔ `IMG_0001.jpg(1).json`
 * - TRUNCATED：sidecar 檔名被匯出工具截斷
 * - EDITED：`IMG_0001-edited.jpg` 沿用原始檔的 sidecar
 */
export type MatchKind = "EXACT" | "TRANSPOSED" | "TRUNCATED" | "EDITED";

export const matchKinds: readonly MatchKind[] = [
  "EXACT",
  "TRANSPOSED",
  "TRUNCATED",
  "EDITED",
];

export type SidecarMatch = {
  mediaName: string;
  sidecarName: string;
  kind: MatchKind;
};

export interface SidecarMatcher {
  /**
   * 從同資料夾的 JSON 檔名中找出最符合 mediaName 的 sidecar。
   * 找不到時回傳 undefined，這是正常情況而非錯誤。
   */
  match(
    mediaName: string,
    candidateNames: readonly string[]
  ): SidecarMatch | undefined;

  /**
   * 為整個資料夾配對，每個 sidecar 最多只會被一個媒體檔使用。
   * 回傳以 mediaName 為 key 的配對結果，未配對的媒體檔不會出現在結果中。
   */
  matchAll(
    mediaNames: readonly string[],
    candidateNames: readonly string[]
  ): Map<string, SidecarMatch>;
}
