import { format } from "date-fns";
import kleur from "kleur";

import { dispose } from "../utils/Disposeable";
import type {
  ErrorRecord,
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTransport,
  Logger,
  TemplateLog,
} from "./Logger";
import { logLevels } from "./Logger";

export type EmojiMap = Partial<Record<string, string>>;

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const noop: TemplateLog = () => {};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod = (a?: string | LogContext, b?: string) =>
    this.log("trace", a, b);
  readonly debug: LogMethod = (a?: string | LogContext, b?: string) =>
    this.log("debug", a, b);
  readonly info: LogMethod = (a?: string | LogContext, b?: string) =>
    this.log("info", a, b);
  readonly warn: LogMethod = (a?: string | LogContext, b?: string) =>
    this.log("warn", a, b);
  readonly error: LogMethod = (a?: string | LogContext, b?: string) =>
    this.log("error", a, b);

  constructor(
    readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly transports: LogTransport[] = []
  ) {}

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  /** transport 由所有子 logger 共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await dispose(...transports);
  }

  private log(
    level: LogLevel,
    contextOrMessage: string | LogContext | undefined,
    message: string | undefined
  ): TemplateLog {
    if (typeof contextOrMessage === "string") {
      this.emit(level, {}, contextOrMessage, contextOrMessage);
      return noop;
    }
    const context = contextOrMessage ?? {};
    if (message !== undefined) {
      this.emit(level, context, message, message);
      return noop;
    }
    return (strings, ...values) => {
      let plain = strings[0] ?? "";
      let colored = plain;
      const templateValues: Record<string, unknown> = {};
      values.forEach((value, i) => {
        const text = String(value);
        const rest = strings[i + 1] ?? "";
        plain += text + rest;
        colored += kleur.green(text) + rest;
        templateValues[`__${i}`] = value;
      });
      this.emit(level, { ...context, ...templateValues }, plain, colored);
    };
  }

  private isEnabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private resolveEmoji(level: LogLevel, context: LogContext) {
    if (context.emoji) return context.emoji;
    if (context.event && this.emojiMap[context.event])
      return this.emojiMap[context.event];
    // warn/error 一律使用等級 emoji，避免被繼承的 emoji 蓋掉
    if (level === "warn" || level === "error")
      return this.emojiMap[level] ?? this.context.emoji;
    return this.context.emoji ?? this.emojiMap[level];
  }

  private emit(
    level: LogLevel,
    context: LogContext,
    plainMessage: string,
    coloredMessage: string
  ) {
    if (!this.isEnabled(level)) return;
    const now = new Date();
    const { event, emoji: _emoji, error, ...rest } = context;
    const {
      event: _inheritedEvent,
      emoji: _inheritedEmoji,
      error: _inheritedError,
      ...inherited
    } = this.context;
    const fields: Record<string, unknown> = { ...inherited, ...rest };

    const errRecord = error instanceof Error ? toErrorRecord(error) : undefined;
    if (error !== undefined && !errRecord) fields.error = error;

    const label = [...this.path, event ?? level].join(":");
    const emoji = this.resolveEmoji(level, context);
    const json = Object.keys(fields).length > 0 ? safeStringify(fields) : "";
    const line = [
      emoji,
      kleur.gray(format(now, "HH:mm:ss.SSS")),
      `${label}: ${coloredMessage}`,
      json,
    ]
      .filter(Boolean)
      .join(" ");

    writeConsole(level, line);
    if (errRecord?.stack) console.error(errRecord.stack);

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      ...fields,
      time: now.toISOString(),
      level,
      path: this.path.join(":"),
      msg: plainMessage,
    };
    if (event) record.event = event;
    if (errRecord) record.err = errRecord;
    for (const transport of this.transports) transport.write(record);
  }
}

function writeConsole(level: LogLevel, line: string) {
  switch (level) {
    case "trace":
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.info(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
}

export function toErrorRecord(error: Error): ErrorRecord {
  return { name: error.name, message: error.message, stack: error.stack };
}

function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}
