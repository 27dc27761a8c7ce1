export type CompletionPlan = {
  moves: Array<MoveFile>;
  deletes: string[];
  /** 搬移與刪除後若已清空就移除的資料夾 */
  emptyDirectories: string[];
};

export type MoveFile = { from: string; to: string };
