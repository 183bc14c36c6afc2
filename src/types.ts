import type { ParsedImageInfo } from "@/services/ImageName";

export type RunStatistics = {
  /** 掃描到的合格影像數 */
  total: number;
  /** 已改名（預覽模式為「將改名」）的數量 */
  renamed: number;
  skipped: number;
};

export type RenameSkipError =
  | { type: "UNRECOGNIZED_FORMAT"; message: string }
  | { type: "DESTINATION_EXISTS"; message: string }
  | { type: "RENAME_FAILED"; message: string };

export type RenameOutcome =
  | { type: "RENAMED"; from: string; to: string; info: ParsedImageInfo }
  | { type: "PREVIEWED"; from: string; to: string; info: ParsedImageInfo }
  | { type: "SKIPPED"; from: string; to?: string; error: RenameSkipError };

export type RenameRunReport = {
  root: string;
  dryRun: boolean;
  statistics: RunStatistics;
  outcomes: RenameOutcome[];
};
