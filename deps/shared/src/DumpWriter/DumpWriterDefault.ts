import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

/**
 * 將報告以 JSON 寫到 dumpDir，檔名帶時間戳記避免覆蓋。
 */
export class DumpWriterDefault {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly dumpDir = "dist/reports"
  ) {
    this.logger = logger.extend("dump");
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dumpDir, { recursive: true });
    const stamp = format(new Date(), "yyyyMMdd-HHmmss");
    const filePath = path.join(this.dumpDir, `${stamp}-${safeName(name)}.json`);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", file: filePath })`已輸出報告 ${name}`;
    return filePath;
  }
}

function safeName(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "-");
}
