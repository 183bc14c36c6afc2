import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileRenamer, RenameError } from "@/services/FileRenamer";
import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "@/services/FileSystemScanner";

/**
 * 記憶體中的檔案樹，同時扮演掃描器與改名器。
 */
export class FileSystemFake implements FileSystemScanner, FileRenamer {
  readonly files = new Set<string>();
  private readonly renameFailures = new Map<string, RenameError>();

  addFiles(...filePaths: string[]) {
    for (const p of filePaths) this.files.add(p);
  }

  setRenameFailure(from: string, error: RenameError) {
    this.renameFailures.set(from, error);
  }

  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const prefix = rootPath.endsWith("/") ? rootPath : `${rootPath}/`;
    const under = [...this.files].filter((p) => p.startsWith(prefix));
    if (under.length === 0) {
      return err({ type: "ROOT_NOT_FOUND", message: `No such dir: ${rootPath}` });
    }
    const caseSensitive = options?.caseSensitiveExts ?? false;
    const normalize = (e: string) => (caseSensitive ? e : e.toLowerCase());
    const allow = new Set((options?.allowExts ?? []).map(normalize));
    return ok(
      under
        .filter((p) => allow.size === 0 || allow.has(normalize(path.extname(p))))
        .sort()
    );
  }

  async exists(filePath: string) {
    return this.files.has(filePath);
  }

  async rename(from: string, to: string): Promise<Result<void, RenameError>> {
    const failure = this.renameFailures.get(from);
    if (failure) return err(failure);
    if (this.files.has(to)) {
      return err({ type: "DESTINATION_EXISTS", message: `Exists: ${to}` });
    }
    this.files.delete(from);
    this.files.add(to);
    return ok();
  }
}
