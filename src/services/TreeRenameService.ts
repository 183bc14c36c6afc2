import type { Result } from "~shared/utils/Result";

import type { RenameStatus } from "@/constants";
import type { RenameRunReport } from "@/types";

import type { ScanError } from "./FileSystemScanner";

export type TreeRenameOptions = {
  rootPath: string;
  /** true 時只預覽，不動檔案系統 */
  dryRun: boolean;
  defaultStatus: RenameStatus;
};

export interface TreeRenameService {
  /**
   * 遞迴處理 rootPath 底下的影像。
   * 只有根目錄錯誤會中止；單一檔案的問題都記為略過。
   */
  run(options: TreeRenameOptions): Promise<Result<RenameRunReport, ScanError>>;
}
