import type { AsyncDisposable } from "../utils/Disposeable";

export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 事件名稱，取代輸出中的等級標籤 */
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type ErrorRecord = {
  name: string;
  message: string;
  stack?: string;
};

/** 交給 transport 的單筆紀錄，context 欄位攤平在最外層 */
export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  err?: ErrorRecord;
  [key: string]: unknown;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，名稱接在路徑之後，context 會被繼承 */
  extend(name: string, context?: LogContext): Logger;

  /** 建立只合併 context、不改變路徑的 logger */
  append(context: LogContext): Logger;
}
