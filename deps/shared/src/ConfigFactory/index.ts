import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** 環境變數中的布林值，接受 true/false/1/0 */
export function envBoolean() {
  return t.Boolean();
}

/** 環境變數中的整數 */
export function envInteger(options?: { minimum?: number; maximum?: number }) {
  return t.Integer(options);
}

/** 以逗號分隔的字串清單，例如 `a,b,c` */
export function envList(defaultValue?: string[]) {
  return t.String(
    defaultValue ? { default: defaultValue.join(",") } : undefined
  );
}

export function parseEnvList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * 依 schema 從環境變數建立設定讀取函式。
 * 每次呼叫都重新讀取 env，方便測試中覆寫。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  getEnv: () => Record<string, string | undefined> = () => process.env
): () => Static<T> {
  return () => {
    const env = getEnv();
    const picked: Record<string, unknown> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }

    const withDefaults = Value.Default(schema, picked);
    const converted = Value.Convert(schema, withDefaults);
    if (Value.Check(schema, converted)) return converted;

    const issues = [...Value.Errors(schema, converted)].map(
      (e) => `${e.path}: ${e.message}`
    );
    throw new ConfigError(`環境變數設定錯誤: ${issues.join("; ")}`, issues);
  };
}
