import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, isErr, ok } from "~shared/utils/Result";

import { imageExtensions } from "@/constants";
import type { RenameOutcome, RenameRunReport, RunStatistics } from "@/types";

import type { FileRenamer } from "./FileRenamer";
import type { FileSystemScanner, ScanError } from "./FileSystemScanner";
import type { RenamePlanService } from "./RenamePlanService";
import type { TreeRenameOptions, TreeRenameService } from "./TreeRenameService";

export class TreeRenameServiceDefault implements TreeRenameService {
  private readonly scanner: FileSystemScanner;
  private readonly planner: RenamePlanService;
  private readonly renamer: FileRenamer;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    planner: RenamePlanService;
    renamer: FileRenamer;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.planner = deps.planner;
    this.renamer = deps.renamer;
    this.logger = deps.logger.extend("TreeRenameServiceDefault");
  }

  async run({
    rootPath,
    dryRun,
    defaultStatus,
  }: TreeRenameOptions): Promise<Result<RenameRunReport, ScanError>> {
    const logger = this.logger.extend("run", { root: rootPath, dryRun });
    logger.info({
      event: "start",
    })`掃描資料夾 ${rootPath}，模式: ${dryRun ? "預覽（不會實際改名）" : "執行（將實際改名）"}`;

    const scanRes = await this.scanner.scan(rootPath, {
      allowExts: imageExtensions,
      caseSensitiveExts: true,
    });
    if (isErr(scanRes)) return scanRes;

    const plan = this.planner.planFromList(scanRes.value, {
      success: defaultStatus === "success",
    });

    const statistics: RunStatistics = { total: 0, renamed: 0, skipped: 0 };
    const outcomes: RenameOutcome[] = [];
    const record = (outcome: RenameOutcome) => {
      outcomes.push(outcome);
      statistics.total++;
      if (outcome.type === "SKIPPED") statistics.skipped++;
      else statistics.renamed++;
    };

    for (const entry of plan.entries) {
      const fileName = path.basename(entry.from);

      if (entry.type === "SKIP") {
        logger.warn({
          emoji: "⚠️",
          file: entry.from,
          reason: entry.error.type,
        })`略過 ${fileName}: ${entry.error.message}`;
        record({ type: "SKIPPED", from: entry.from, to: entry.to, error: entry.error });
        continue;
      }

      const newName = path.basename(entry.to);
      // 計畫只看得到掃描清單，這裡再向檔案系統確認一次（例如同名資料夾）
      if (entry.to !== entry.from && (await this.renamer.exists(entry.to))) {
        logger.warn({
          emoji: "⚠️",
          file: entry.from,
          reason: "DESTINATION_EXISTS",
        })`略過 ${fileName}: 目標已存在 ${newName}`;
        record({
          type: "SKIPPED",
          from: entry.from,
          to: entry.to,
          error: { type: "DESTINATION_EXISTS", message: `目標已存在: ${newName}` },
        });
        continue;
      }

      const { info } = entry;
      const subDir = path.relative(rootPath, path.dirname(entry.from)) || ".";
      logger.info({
        emoji: "📁",
        subDir,
        from: fileName,
        to: newName,
        latitude: info.latitude,
        longitude: info.longitude,
        kind: info.isQuery ? "query" : "reference",
      })`${subDir}: ${fileName} → ${newName}，座標 (${info.latitude}, ${info.longitude})，${info.isQuery ? "查詢影像" : "參考影像"}`;

      if (dryRun) {
        logger.debug({ emoji: "👁️" })`預覽模式，未實際改名`;
        record({ type: "PREVIEWED", from: entry.from, to: entry.to, info });
        continue;
      }

      const renameRes = await this.renamer.rename(entry.from, entry.to);
      if (isErr(renameRes)) {
        logger.warn({
          emoji: "❌",
          file: entry.from,
          reason: renameRes.error.type,
        })`改名失敗 ${fileName}: ${renameRes.error.message}`;
        record({
          type: "SKIPPED",
          from: entry.from,
          to: entry.to,
          error: renameRes.error,
        });
        continue;
      }

      logger.debug({ emoji: "✅" })`改名成功 ${newName}`;
      record({ type: "RENAMED", from: entry.from, to: entry.to, info });
    }

    logger.info({
      event: "done",
      ...statistics,
    })`掃描完成，共 ${statistics.total} 個檔案，${dryRun ? "將改名" : "已改名"} ${statistics.renamed}，略過 ${statistics.skipped}`;

    return ok({ root: rootPath, dryRun, statistics, outcomes });
  }
}
