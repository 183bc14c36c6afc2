import type { ParsedImageInfo } from "./ImageName";

export interface RenamePlanService {
  /**
   * 根據「檔案清單」產生改名計畫，項目順序與輸入相同。
   */
  planFromList(filePaths: string[], options: { success: boolean }): RenamePlan;
}

export type RenamePlan = {
  entries: RenamePlanEntry[];
};

export type RenamePlanEntry =
  | { type: "RENAME"; from: string; to: string; info: ParsedImageInfo }
  | { type: "SKIP"; from: string; to?: string; error: PlanSkipError };

export type PlanSkipError =
  | { type: "UNRECOGNIZED_FORMAT"; message: string }
  | { type: "DESTINATION_EXISTS"; message: string };
