import type { Result } from "~shared/utils/Result";

export type RenameError =
  | { type: "DESTINATION_EXISTS"; message: string }
  | { type: "RENAME_FAILED"; message: string };

export interface FileRenamer {
  /** 路徑上是否已有任何檔案系統項目（含失效的 symlink） */
  exists(filePath: string): Promise<boolean>;

  /**
   * 改名但不覆蓋。目標已存在時回傳 DESTINATION_EXISTS，
   * 其他檔案系統錯誤回傳 RENAME_FAILED 並保留原因。
   */
  rename(from: string, to: string): Promise<Result<void, RenameError>>;
}
