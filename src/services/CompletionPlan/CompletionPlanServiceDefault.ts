import path from "node:path";

import { type RunReport, isProcessedSuccessfully } from "@/services/MetadataRestore";
import type { CompletionPlan } from "@/types";

import type {
  CompletionOptions,
  CompletionPlanService,
} from "./CompletionPlanService";

export class CompletionPlanServiceDefault implements CompletionPlanService {
  planFromReport(report: RunReport, options: CompletionOptions) {
    const plan: CompletionPlan = { moves: [], deletes: [], emptyDirectories: [] };
    const root = path.resolve(options.root);
    const completed = options.completedDirectory
      ? path.resolve(options.completedDirectory)
      : undefined;

    for (const dir of report.directories) {
      if (completed) {
        for (const file of dir.files) {
          if (!isProcessedSuccessfully(file.outcome)) continue;
          const from = path.resolve(file.mediaPath);
          plan.moves.push({
            from,
            to: path.join(completed, path.relative(root, from)),
          });
        }
      }

      // 有任何失敗或被中斷的資料夾一律保留 sidecar，方便重跑
      if (!dir.allSucceeded) continue;

      if (options.deleteSidecars) {
        plan.deletes.push(...dir.consumedSidecars.map((p) => path.resolve(p)));
      }

      const directory = path.resolve(dir.directory);
      if (options.deleteEmptyDirectories && directory !== root) {
        plan.emptyDirectories.push(directory);
      }
    }

    // 由深到淺，子資料夾先移除
    plan.emptyDirectories.sort(
      (a, b) => depth(b) - depth(a) || a.localeCompare(b)
    );
    return plan;
  }
}

function depth(p: string) {
  return p.split(path.sep).length;
}
