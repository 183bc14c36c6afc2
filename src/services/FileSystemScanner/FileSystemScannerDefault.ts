import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";

import type { FileSystemScanner, ScanError, ScanOptions } from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const caseSensitive = options?.caseSensitiveExts ?? false;
    const normalize = (ext: string) => (caseSensitive ? ext : ext.toLowerCase());
    const allowExtsSet = new Set(
      allowExts.map((e) => normalize(e.startsWith(".") ? e : `.${e}`))
    );

    if (!(await exists(rootPath))) {
      return err({
        type: "ROOT_NOT_FOUND",
        message: `資料夾不存在: ${rootPath}`,
      });
    }

    try {
      const files = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths: string[] = [];
      for (const d of files) {
        if (allowExtsSet.size > 0 && !allowExtsSet.has(normalize(path.extname(d.name)))) {
          continue;
        }
        const fullPath = path.join(d.parentPath, d.name);
        // symlink 以其指向的目標判斷是否為檔案
        if (d.isFile() || (d.isSymbolicLink() && (await isFileTarget(fullPath)))) {
          fullPaths.push(fullPath);
        }
      }
      // 排序固定處理順序，預覽與執行結果才能重現
      fullPaths.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

async function isFileTarget(linkPath: string) {
  try {
    return (await stat(linkPath)).isFile();
  } catch {
    // 失效的 symlink
    return false;
  }
}
