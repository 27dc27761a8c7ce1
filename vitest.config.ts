import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// EXIF 日期以本地時區寫入，測試固定為 UTC
process.env.TZ = "UTC";

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@/": fromRoot("./src/"),
      "~shared/": fromRoot("./deps/shared/src/"),
      "~test/": fromRoot("./test/"),
    },
  },
  test: {
    include: ["test/**/*.test.ts", "deps/shared/test/**/*.test.ts"],
    env: { TZ: "UTC" },
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
