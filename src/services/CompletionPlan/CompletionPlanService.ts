import type { RunReport } from "@/services/MetadataRestore";
import type { CompletionPlan } from "@/types";

export type CompletionOptions = {
  /** 掃描的根目錄，搬移時保留相對於它的路徑 */
  root: string;
  /** 設定時把處理成功的媒體檔搬到此資料夾 */
  completedDirectory?: string;
  deleteSidecars: boolean;
  deleteEmptyDirectories: boolean;
};

export interface CompletionPlanService {
  /**
   * 根據處理結果產生收尾計畫。
   * - 只搬移處理成功的媒體檔
   * - 只有整個資料夾都成功時才刪除 sidecar、移除空資料夾
   */
  planFromReport(report: RunReport, options: CompletionOptions): CompletionPlan;
}
