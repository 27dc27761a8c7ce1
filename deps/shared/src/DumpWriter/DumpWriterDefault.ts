import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";
import type { DumpWriter } from "./DumpWriter";

/** 將報告以 JSON 寫入 `<dir>/<yyyyMMdd-HHmmss>-<name>.json` */
export class DumpWriterDefault implements DumpWriter {
  constructor(
    private readonly logger: Logger,
    private readonly dir = "reports",
    private readonly now: () => Date = () => new Date()
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    const fileName = `${format(this.now(), "yyyyMMdd-HHmmss")}-${toSafeName(name)}.json`;
    const filePath = path.join(this.dir, fileName);
    await mkdir(this.dir, { recursive: true });
    await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
    this.logger.info({ emoji: "📝", event: "dump", filePath })`已輸出報告 ${name}`;
    return filePath;
  }
}

function toSafeName(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "_");
}
