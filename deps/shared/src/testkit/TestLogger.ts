import { type LogLevel, LoggerConsole, logLevels } from "../Logger";

/**
 * 測試用 logger，預設只輸出 error。
 * 可用 TEST_LOG_LEVEL 調整。
 */
export function buildTestLogger(): LoggerConsole {
  return new LoggerConsole(resolveLevel(process.env.TEST_LOG_LEVEL));
}

function resolveLevel(value: string | undefined): LogLevel {
  return logLevels.find((level) => level === value) ?? "error";
}
