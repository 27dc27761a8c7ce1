import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerMatch } from "./app/MatchReport";
import { registerRestore } from "./app/Restore";

const logger = createDefaultLoggerFromEnv();
const cli = cac("takeout-sidecar-restore");

registerRestore(cli, logger);
registerMatch(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await logger[Symbol.asyncDispose]();
}
