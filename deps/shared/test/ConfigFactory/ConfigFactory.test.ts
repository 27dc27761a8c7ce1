import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envBoolean,
  envInteger,
  envList,
  parseEnvList,
} from "~shared/ConfigFactory";

const schema = t.Object({
  PORT: envInteger({ minimum: 1 }),
  VERBOSE: t.Optional(envBoolean()),
  NAMES: envList(["alpha"]),
  MODE: t.String({ default: "fast" }),
});

describe("buildConfigFactoryEnv", () => {
  test("轉換型態並補上預設值", () => {
    const getConfig = buildConfigFactoryEnv(schema, () => ({
      PORT: "8080",
      VERBOSE: "true",
      UNRELATED: "ignored",
    }));
    expect(getConfig()).toEqual({
      PORT: 8080,
      VERBOSE: true,
      NAMES: "alpha",
      MODE: "fast",
    });
  });

  test("空字串視為未設定", () => {
    const getConfig = buildConfigFactoryEnv(schema, () => ({
      PORT: "1",
      MODE: "",
    }));
    expect(getConfig().MODE).toBe("fast");
  });

  test("每次呼叫都重新讀取 env", () => {
    const env: Record<string, string | undefined> = { PORT: "1" };
    const getConfig = buildConfigFactoryEnv(schema, () => env);
    expect(getConfig().PORT).toBe(1);
    env.PORT = "2";
    expect(getConfig().PORT).toBe(2);
  });

  test("缺少必要欄位或型態錯誤時拋出 ConfigError", () => {
    const missing = buildConfigFactoryEnv(schema, () => ({}));
    expect(() => missing()).toThrow(ConfigError);

    const invalid = buildConfigFactoryEnv(schema, () => ({ PORT: "abc" }));
    try {
      invalid();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.some((issue) => issue.startsWith("/PORT"))).toBe(
          true
        );
      }
    }
  });
});

describe("parseEnvList", () => {
  test("以逗號分隔並去除空白", () => {
    expect(parseEnvList(" a, b ,,c ")).toEqual(["a", "b", "c"]);
    expect(parseEnvList(undefined)).toEqual([]);
    expect(parseEnvList("")).toEqual([]);
  });
});
