import type { Result } from "~shared/utils/Result";

export type TimestampError = {
  type: "SET_TIMES_FAILED";
  message: string;
};

export interface TimestampSetter {
  /**
   * 將檔案的修改時間與存取時間設為 takenAt。
   */
  set(filePath: string, takenAt: Date): Promise<Result<void, TimestampError>>;
}
