import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerRenameImages } from "./app/RenameImages";

const logger = createDefaultLoggerFromEnv();
const cli = cac("geo-image-renamer");

registerRenameImages(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

// --help 已由 cac 輸出
if (!cli.matchedCommand) {
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(logger);
}
