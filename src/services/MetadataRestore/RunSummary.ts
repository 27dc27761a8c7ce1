import type {
  ProcessingOutcome,
  RunSummaryCounts,
} from "./MetadataRestoreService";

/** 由單一擁有者在所有 worker 完成後累計 */
export class RunSummary {
  private readonly counts: RunSummaryCounts = {
    total: 0,
    updated: 0,
    skippedUnmatched: 0,
    skippedUnsupportedFormat: 0,
    failed: 0,
    failedByType: {},
  };

  record(outcome: ProcessingOutcome) {
    this.counts.total++;
    switch (outcome.kind) {
      case "UPDATED":
        this.counts.updated++;
        break;
      case "SKIPPED_UNMATCHED":
        this.counts.skippedUnmatched++;
        break;
      case "SKIPPED_UNSUPPORTED_FORMAT":
        this.counts.skippedUnsupportedFormat++;
        break;
      case "FAILED": {
        this.counts.failed++;
        const type = outcome.error.type;
        this.counts.failedByType[type] =
          (this.counts.failedByType[type] ?? 0) + 1;
        break;
      }
    }
  }

  toJSON(): RunSummaryCounts {
    return { ...this.counts, failedByType: { ...this.counts.failedByType } };
  }
}
