import { Type as t } from "@sinclair/typebox";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envInteger,
  envList,
  parseEnvList,
} from "~shared/ConfigFactory";

import {
  defaultConcurrency,
  defaultEditedSuffixes,
  defaultTruncationThreshold,
} from "@/constants";
import { toInt } from "@/utils/helper";

const restoreEnvSchema = t.Object({
  RESTORE_TRUNCATION_THRESHOLD: t.Optional(envInteger({ minimum: 1 })),
  RESTORE_CONCURRENCY: t.Optional(envInteger({ minimum: 1 })),
  RESTORE_EDITED_SUFFIXES: t.Optional(envList([...defaultEditedSuffixes])),
  RESTORE_REPORT_DIR: t.Optional(t.String()),
});

export type RestoreConfig = {
  truncationThreshold: number;
  concurrency: number;
  editedSuffixes: string[];
  reportDir: string;
};

/** CLI 參數優先於環境變數，環境變數優先於預設值 */
export function loadRestoreConfig(
  overrides: Partial<RestoreConfig> = {},
  getEnv?: () => Record<string, string | undefined>
): RestoreConfig {
  const env = buildConfigFactoryEnv(restoreEnvSchema, getEnv)();
  const editedSuffixes = parseEnvList(env.RESTORE_EDITED_SUFFIXES);
  return {
    truncationThreshold:
      overrides.truncationThreshold ??
      env.RESTORE_TRUNCATION_THRESHOLD ??
      defaultTruncationThreshold,
    concurrency:
      overrides.concurrency ?? env.RESTORE_CONCURRENCY ?? defaultConcurrency,
    editedSuffixes:
      overrides.editedSuffixes ??
      (editedSuffixes.length > 0 ? editedSuffixes : [...defaultEditedSuffixes]),
    reportDir: overrides.reportDir ?? env.RESTORE_REPORT_DIR ?? "reports",
  };
}

/** CLI 數值參數；未指定回傳 undefined，交給環境變數與預設值 */
export function parseIntFlag(
  flag: string,
  value: number | string | undefined
): number | undefined {
  if (value === undefined) return undefined;
  const n = toInt(value, Number.NaN);
  if (!Number.isInteger(n) || n < 1) {
    const issue = `${flag}: 必須是正整數，收到 ${String(value)}`;
    throw new ConfigError(`參數錯誤: ${issue}`, [issue]);
  }
  return n;
}
