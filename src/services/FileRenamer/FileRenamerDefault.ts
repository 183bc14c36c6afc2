import { rename } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";

import type { FileRenamer, RenameError } from "./FileRenamer";

/**
 * 先檢查再改名。檢查與改名之間仍可能被其他程序搶先建立目標，
 * 接受這個競態，只保證自己不主動覆蓋。
 */
export class FileRenamerDefault implements FileRenamer {
  exists(filePath: string) {
    return exists(filePath);
  }

  async rename(from: string, to: string): Promise<Result<void, RenameError>> {
    if (from !== to && (await exists(to))) {
      return err({
        type: "DESTINATION_EXISTS",
        message: `目標已存在: ${to}`,
      });
    }
    try {
      await rename(from, to);
      return ok();
    } catch (e) {
      return err({
        type: "RENAME_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
