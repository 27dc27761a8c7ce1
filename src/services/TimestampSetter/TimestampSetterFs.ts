import { utimes } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import type { TimestampError, TimestampSetter } from "./TimestampSetter";

export class TimestampSetterFs implements TimestampSetter {
  async set(
    filePath: string,
    takenAt: Date
  ): Promise<Result<void, TimestampError>> {
    try {
      await utimes(filePath, takenAt, takenAt);
      return ok();
    } catch (e) {
      return err({
        type: "SET_TIMES_FAILED",
        message: `設定檔案時間失敗: ${filePath} (${e instanceof Error ? e.message : String(e)})`,
      });
    }
  }
}
