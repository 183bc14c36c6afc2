import type { Result } from "~shared/utils/Result";

export type ScanError =
  | { type: "ROOT_NOT_FOUND"; message: string }
  | { type: "SCAN_FAILED"; message: string };

export type ScanOptions = {
  /** 預設 true */
  recursive?: boolean;
  /** 空陣列表示不過濾 */
  allowExts?: readonly string[];
  /** 預設 false，副檔名比對前先轉小寫 */
  caseSensitiveExts?: boolean;
};

export interface FileSystemScanner {
  /**
   * 列出 rootPath 底下的檔案（不含資料夾），依完整路徑排序。
   */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
