import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { getRenameConfig } from "@/config";
import {
  type RenameStatus,
  defaultRoot,
  defaultStatus,
  renameStatuses,
} from "@/constants";
import { FileRenamerDefault } from "@/services/FileRenamer";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { RenamePlanServiceDefault } from "@/services/RenamePlanServiceDefault";
import { TreeRenameServiceDefault } from "@/services/TreeRenameServiceDefault";
import { expandHome } from "@/utils/helper";

export type RenameImagesOptions = {
  root?: string;
  status?: string;
  report?: boolean;
  reportDir?: string;
};

export type ResolvedRenameOptions = {
  rootPath: string;
  dryRun: boolean;
  defaultStatus: RenameStatus;
};

export type OptionError = { type: "INVALID_STATUS"; message: string };

type RenameConfig = ReturnType<typeof getRenameConfig>;

function isRenameStatus(value: string): value is RenameStatus {
  return renameStatuses.some((s) => s === value);
}

/**
 * 決定本次執行的參數。優先順序：命令列 → 環境變數 → 預設值。
 * mode 為 "run" 才實際改名，其餘（含未指定）都是預覽。
 */
export function resolveRenameOptions(
  mode: string | undefined,
  options: RenameImagesOptions,
  config: RenameConfig
): Result<ResolvedRenameOptions, OptionError> {
  const status = String(
    options.status ?? config.RENAME_DEFAULT_STATUS ?? defaultStatus
  );
  if (!isRenameStatus(status)) {
    return err({
      type: "INVALID_STATUS",
      message: `--status 只接受 success 或 failure，收到 ${status}`,
    });
  }
  return ok({
    rootPath: expandHome(String(options.root ?? config.RENAME_ROOT ?? defaultRoot)),
    dryRun: mode !== "run",
    defaultStatus: status,
  });
}

export function registerRenameImages(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "[mode]",
      "將影像檔名改為 _<id>[_query]@<lat>@<lon>@<status>.<ext>；mode 為 run 時實際改名，否則只預覽"
    )
    .option("--root <path>", `掃描的資料夾，預設 RENAME_ROOT 或 ${defaultRoot}`)
    .option(
      "--status <status>",
      `檔名中的狀態 success | failure，預設 RENAME_DEFAULT_STATUS 或 ${defaultStatus}`
    )
    .option("--report", "輸出改名結果報告", { default: false })
    .option("--report-dir <path>", "報告輸出位置", { default: "dist/reports" })
    .action(async (mode: string | undefined, options: RenameImagesOptions) => {
      const resolved = resolveRenameOptions(mode, options, getRenameConfig());
      if (isErr(resolved)) {
        baseLogger.extend("rename-images").error({
          error: resolved.error,
        })`${resolved.error.message}`;
        process.exitCode = 1;
        return;
      }
      const { rootPath, dryRun, defaultStatus } = resolved.value;

      const logger = baseLogger.extend("rename-images", {
        emoji: dryRun ? "👁️" : "🚀",
      });
      logger.info()`${dryRun ? "預覽模式：僅顯示將要進行的更改" : "執行模式：將實際改名檔案"}`;

      const service = new TreeRenameServiceDefault({
        scanner: new FileSystemScannerDefault(),
        planner: new RenamePlanServiceDefault(),
        renamer: new FileRenamerDefault(),
        logger,
      });
      const result = await service.run({ rootPath, dryRun, defaultStatus });
      if (isErr(result)) {
        logger.error({ error: result.error })`${result.error.message}`;
        process.exitCode = 1;
        return;
      }

      const report = result.value;
      if (options.report) {
        await new DumpWriterDefault(logger, options.reportDir).dump(
          dryRun ? "rename-preview" : "rename-result",
          report
        );
      }

      if (dryRun && report.statistics.renamed > 0) {
        logger.info({
          emoji: "💡",
        })`這是預覽模式。確認無誤後請執行: npm start -- run`;
      }
    });
}
